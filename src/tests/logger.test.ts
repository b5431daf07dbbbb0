import { describe, it, expect } from "vitest";
import { logsToConsole } from "../utils/logger";

describe("logsToConsole", () => {
  it.each([
    ["development", true],
    [undefined, true],
    ["production", false],
    ["test", false],
  ])("should return %s -> %s", (nodeEnv, expected) => {
    expect(logsToConsole(nodeEnv)).toBe(expected);
  });
});
