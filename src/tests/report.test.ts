/**
 * Tests for report compilation and plain-text rendering.
 */

import { describe, it, expect } from "vitest";
import {
  ApplicationState,
  createInitialState,
  markCompleted,
  StepId,
  updateState,
} from "../pipeline/application-state";
import {
  buildReport,
  formatAtsSummary,
  renderReportText,
} from "../pipeline/report";
import { textInput } from "./helpers/fixtures";

const RULE = "=".repeat(80);

function completed(state: ApplicationState, steps: StepId[]): ApplicationState {
  return steps.reduce((current, step) => markCompleted(current, step), state);
}

describe("formatAtsSummary", () => {
  it("should list matched and missing skills under the score", () => {
    expect(
      formatAtsSummary({
        atsScore: 72,
        matchedSkills: ["TypeScript", "Node.js"],
        missingSkills: [],
      }),
    ).toBe(
      [
        "ATS MATCH SCORE: 72/100",
        "",
        "MATCHED SKILLS:",
        "  • TypeScript",
        "  • Node.js",
        "",
        "MISSING SKILLS:",
        "  (none)",
      ].join("\n"),
    );
  });

  it("should list at most 15 skills per group", () => {
    const skills = Array.from({ length: 20 }, (_, i) => `Skill ${i + 1}`);
    const summary = formatAtsSummary({
      atsScore: 10,
      matchedSkills: [],
      missingSkills: skills,
    });

    expect(summary.split("\n").filter((line) => line.startsWith("  • "))).toHaveLength(15);
    expect(summary).toContain("  • Skill 15");
    expect(summary).not.toContain("  • Skill 16");
  });
});

describe("buildReport", () => {
  it("should add one section per completed section-writing step, in order", () => {
    const state = completed(
      updateState(createInitialState(textInput()), {
        atsScore: 95,
        matchedSkills: ["TypeScript"],
        improvementTier: "skip",
        coverLetter: "Dear team",
      }),
      ["parse", "ats_analysis", "skip_improvements", "cover_letter"],
    );

    const report = buildReport(state);

    expect(report.sections.map((s) => s.id)).toEqual([
      "ats_analysis",
      "improvements",
      "cover_letter",
    ]);
    expect(report.sections[1]).toEqual({
      id: "improvements",
      title: "RESUME IMPROVEMENT SUGGESTIONS",
      content: "",
    });
    expect(report.atsScore).toBe(95);
    expect(report.improvementTier).toBe("skip");
    expect(report.companyName).toBe("Acme");
  });

  it("should show revised cover letter and bullets once revision ran", () => {
    const state = completed(
      updateState(createInitialState(textInput()), {
        coverLetter: "Draft letter",
        optimizedBullets: "• Draft bullet",
        revision: {
          coverLetter: "Revised letter",
          bullets: "• Revised bullet",
          changeSummary: "Sharper opening.",
        },
      }),
      ["cover_letter", "resume_optimizer", "revise"],
    );

    const contents = buildReport(state).sections.map((s) => s.content);

    expect(contents).toEqual(["Revised letter", "• Revised bullet", "Sharper opening."]);
  });
});

describe("renderReportText", () => {
  it("should render banners, the company line and placeholders for empty sections", () => {
    const text = renderReportText(
      [
        { id: "improvements", title: "RESUME IMPROVEMENT SUGGESTIONS", content: "" },
        { id: "cover_letter", title: "COVER LETTER", content: "  Dear team\n" },
      ],
      "Acme",
    );

    expect(text).toBe(
      [
        RULE,
        "COMPLETE JOB APPLICATION PACKAGE",
        "Company: Acme",
        RULE,
        "",
        RULE,
        "RESUME IMPROVEMENT SUGGESTIONS",
        RULE,
        "",
        "No additional suggestions needed.",
        "",
        RULE,
        "COVER LETTER",
        RULE,
        "",
        "Dear team",
        "",
        RULE,
        "END OF REPORT",
        RULE,
      ].join("\n") + "\n",
    );
  });

  it("should omit the company line when no company was given", () => {
    const text = renderReportText([], null);

    expect(text).toBe(
      [RULE, "COMPLETE JOB APPLICATION PACKAGE", RULE, "", RULE, "END OF REPORT", RULE].join("\n") + "\n",
    );
  });
});
