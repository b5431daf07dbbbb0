/**
 * Tests for the LLM service: retries, timeouts, response validation and
 * the per-step post-processing of model answers.
 */

import { describe, it, expect } from "vitest";
import { dedupeSkills, LLMService, SkillContext } from "../services/llm.services";
import {
  AtsScoreError,
  ModelCallError,
  ModelResponseError,
  ModelTimeoutError,
} from "../utils/errors";
import { ScriptedModelClient } from "./helpers/scriptedModelClient";
import {
  COVER_LETTER,
  createTestService,
  DEEP_SUGGESTIONS,
  JOB_DESCRIPTION_TEXT,
  RESUME_TEXT,
} from "./helpers/fixtures";

const SKILLS: SkillContext = {
  resume: RESUME_TEXT,
  jobDescription: JOB_DESCRIPTION_TEXT,
  matchedSkills: ["TypeScript", "Node.js", "PostgreSQL"],
  missingSkills: ["Kubernetes", "GraphQL"],
};

describe("LLMService retries", () => {
  it("should retry a failed call and return the next answer", async () => {
    const { client, llm } = createTestService();
    client.enqueue("cover_letter", new Error("rate limited"));

    const letter = await llm.generateCoverLetter(RESUME_TEXT, JOB_DESCRIPTION_TEXT, "Acme");

    expect(letter).toBe(COVER_LETTER);
    expect(client.stepsCalled()).toEqual(["cover_letter", "cover_letter"]);
  });

  it("should raise a ModelCallError naming the step once attempts run out", async () => {
    const { client, llm } = createTestService();
    client.enqueue("cover_letter", new Error("rate limited"), new Error("still rate limited"));

    const error = await llm
      .generateCoverLetter(RESUME_TEXT, JOB_DESCRIPTION_TEXT, "Acme")
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelCallError);
    if (!(error instanceof ModelCallError)) return;
    expect(error.step).toBe("cover_letter");
    expect(error.attempts).toBe(2);
    expect(error.statusCode).toBe(502);
    expect(error.message).toBe(
      'Model call for step "cover_letter" failed after 2 attempt(s): still rate limited',
    );
    expect(client.calls).toHaveLength(2);
  });

  it("should give up on a call that never answers", async () => {
    const client = new ScriptedModelClient({
      cover_letter: () => new Promise<string>(() => {}),
    });
    const llm = new LLMService(client, { maxAttempts: 1, timeoutMs: 20, backoffMs: [0] });

    const error = await llm
      .generateCoverLetter(RESUME_TEXT, JOB_DESCRIPTION_TEXT, "Acme")
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelCallError);
    if (!(error instanceof ModelCallError)) return;
    expect(error.cause).toBeInstanceOf(ModelTimeoutError);
    expect(error.message).toBe(
      'Model call for step "cover_letter" failed after 1 attempt(s): Model call timed out after 20ms',
    );
  });

  it("should retry an empty text answer", async () => {
    const { client, llm } = createTestService();
    client.enqueue("cover_letter", "   \n ");

    const letter = await llm.generateCoverLetter(RESUME_TEXT, JOB_DESCRIPTION_TEXT, "Acme");

    expect(letter).toBe(COVER_LETTER);
    expect(client.calls).toHaveLength(2);
  });

  it("should send no response schema for free-text steps", async () => {
    const { client, llm } = createTestService();

    await llm.generateCoverLetter(RESUME_TEXT, JOB_DESCRIPTION_TEXT, "Acme");

    expect(client.calls[0].responseSchema).toBeUndefined();
    expect(client.calls[0].prompt).toContain("**Company:** Acme");
  });
});

describe("LLMService.analyzeAts", () => {
  it("should retry malformed JSON", async () => {
    const { client, llm } = createTestService(75);
    client.enqueue("ats_analysis", "Sure! Here is the analysis.");

    const analysis = await llm.analyzeAts(RESUME_TEXT, JOB_DESCRIPTION_TEXT);

    expect(analysis.score).toBe(75);
    expect(client.calls).toHaveLength(2);
    expect(client.calls[0].responseSchema).toBeDefined();
  });

  it("should read JSON wrapped in a code fence", async () => {
    const { client, llm } = createTestService();
    client.enqueue(
      "ats_analysis",
      '```json\n{"score": 82.5, "matchedSkills": ["TypeScript"], "missingSkills": []}\n```',
    );

    const analysis = await llm.analyzeAts(RESUME_TEXT, JOB_DESCRIPTION_TEXT);

    expect(analysis).toEqual({ score: 82.5, matchedSkills: ["TypeScript"], missingSkills: [] });
    expect(client.calls).toHaveLength(1);
  });

  it.each([
    [140, "received 140"],
    ["eighty", 'received "eighty"'],
  ])("should reject score %s without retrying", async (score, received) => {
    const { client, llm } = createTestService(score);

    const error = await llm.analyzeAts(RESUME_TEXT, JOB_DESCRIPTION_TEXT).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AtsScoreError);
    expect(error instanceof AtsScoreError && error.message.endsWith(received)).toBe(true);
    expect(client.calls).toHaveLength(1);
  });

  it("should de-duplicate skills and count a skill reported twice as matched", async () => {
    const { client, llm } = createTestService();
    client.enqueue(
      "ats_analysis",
      JSON.stringify({
        score: 50,
        matchedSkills: [" TypeScript", "typescript", "Node.js", ""],
        missingSkills: ["node.js", "GraphQL", "graphql "],
      }),
    );

    const analysis = await llm.analyzeAts(RESUME_TEXT, JOB_DESCRIPTION_TEXT);

    expect(analysis).toEqual({
      score: 50,
      matchedSkills: ["TypeScript", "Node.js"],
      missingSkills: ["GraphQL"],
    });
  });
});

describe("dedupeSkills", () => {
  it("should keep the first spelling of each skill", () => {
    expect(dedupeSkills(["Docker", "docker", " DOCKER ", "Go"])).toEqual(["Docker", "Go"]);
  });
});

describe("LLMService.generateImprovements", () => {
  it("should format standard suggestions as a numbered list", async () => {
    const { llm } = createTestService();

    const improvements = await llm.generateImprovements("standard", SKILLS);

    expect(improvements).toBe(
      "1. [GraphQL] Mention the GraphQL schema work from the billing project.\n" +
        "2. Move the skills section above experience.",
    );
  });

  it("should keep at most three standard suggestions", async () => {
    const { client, llm } = createTestService();
    client.enqueue(
      "standard_improvements",
      JSON.stringify({
        suggestions: ["One", "Two", "Three", "Four", "Five"].map((suggestion) => ({ suggestion })),
      }),
    );

    const improvements = await llm.generateImprovements("standard", SKILLS);

    expect(improvements).toBe("1. One\n2. Two\n3. Three");
  });

  it("should retry deep suggestions that address no missing skill", async () => {
    const { client, llm } = createTestService();
    client.enqueue(
      "deep_improvements",
      JSON.stringify({ suggestions: [{ skill: "Docker", suggestion: "Mention Docker." }] }),
    );

    const improvements = await llm.generateImprovements("deep", SKILLS);

    expect(client.calls).toHaveLength(2);
    expect(improvements.split("\n")).toHaveLength(DEEP_SUGGESTIONS.suggestions.length);
    expect(improvements.split("\n")[0]).toBe(
      "1. [Kubernetes] Describe how the Docker images you built were deployed.",
    );
  });

  it("should retry deep answers with fewer than four suggestions", async () => {
    const { client, llm } = createTestService();
    client.enqueue(
      "deep_improvements",
      JSON.stringify({ suggestions: [{ skill: "Kubernetes", suggestion: "Add Kubernetes." }] }),
    );

    const improvements = await llm.generateImprovements("deep", SKILLS);

    expect(client.calls).toHaveLength(2);
    expect(improvements.split("\n")).toHaveLength(4);
  });

  it("should report a deep answer that stays short on every attempt", async () => {
    const { client, llm } = createTestService();
    const short = JSON.stringify({
      suggestions: [
        { skill: "Kubernetes", suggestion: "Add Kubernetes." },
        { skill: "GraphQL", suggestion: "Add GraphQL." },
      ],
    });
    client.enqueue("deep_improvements", short, short);

    const error = await llm.generateImprovements("deep", SKILLS).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelCallError);
    expect(error instanceof ModelCallError && error.message).toBe(
      'Model call for step "deep_improvements" failed after 2 attempt(s): Deep improvements need at least 4 suggestions, received 2',
    );
  });

  it("should fail with the last validation error when no attempt fits", async () => {
    const { client, llm } = createTestService();
    client.enqueue("deep_improvements", '{"suggestions": []}', '{"suggestions": []}');

    const error = await llm.generateImprovements("deep", SKILLS).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelCallError);
    expect(error instanceof ModelCallError && error.cause).toBeInstanceOf(ModelResponseError);
  });
});

describe("LLMService.revisePackage", () => {
  it("should return the revised letter, bullets and a trimmed summary", async () => {
    const { client, llm } = createTestService();
    client.enqueue(
      "revise",
      JSON.stringify({ coverLetter: "Letter", bullets: "• Bullet", changeSummary: "  Tightened.\n" }),
    );

    const revision = await llm.revisePackage({
      coverLetter: "Draft",
      bullets: "• Draft",
      critique: "Too long",
      resume: RESUME_TEXT,
      jobDescription: JOB_DESCRIPTION_TEXT,
    });

    expect(revision).toEqual({ coverLetter: "Letter", bullets: "• Bullet", changeSummary: "Tightened." });
    expect(client.promptFor("revise")).toContain("Too long");
  });
});
