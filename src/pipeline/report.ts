import { MAX_LISTED_SKILLS } from "../utils/constants";
import type {
  ApplicationState,
  ImprovementTier,
  StepId,
} from "./application-state";

export const SECTION_IDS = [
  "ats_analysis",
  "improvements",
  "cover_letter",
  "optimized_bullets",
  "interview_questions",
  "role_research",
  "learning_plan",
  "self_review",
  "revision",
] as const;

export type SectionId = (typeof SECTION_IDS)[number];

export interface ReportSection {
  id: SectionId;
  title: string;
  content: string;
}

export interface ApplicationReport {
  companyName: string | null;
  atsScore: number | null;
  improvementTier: ImprovementTier | null;
  sections: ReportSection[];
  text: string;
}

export const SECTION_TITLES: Record<SectionId, string> = {
  ats_analysis: "ATS MATCH ANALYSIS",
  improvements: "RESUME IMPROVEMENT SUGGESTIONS",
  cover_letter: "COVER LETTER",
  optimized_bullets: "OPTIMIZED RESUME BULLETS",
  interview_questions: "INTERVIEW PREPARATION",
  role_research: "ROLE EXPECTATIONS & RESEARCH",
  learning_plan: "SKILL GROWTH PLAN",
  self_review: "SELF-REVIEW NOTES",
  revision: "REVISION NOTES",
};

/* Which section each step writes; parse and compile_output write none */
const STEP_SECTIONS: Partial<Record<StepId, SectionId>> = {
  ats_analysis: "ats_analysis",
  skip_improvements: "improvements",
  standard_improvements: "improvements",
  deep_improvements: "improvements",
  cover_letter: "cover_letter",
  resume_optimizer: "optimized_bullets",
  interview_prep: "interview_questions",
  role_research: "role_research",
  learning_plan: "learning_plan",
  self_review: "self_review",
  revise: "revision",
};

const EMPTY_SECTION_TEXT: Partial<Record<SectionId, string>> = {
  improvements: "No additional suggestions needed.",
};

const RULE = "=".repeat(80);

function bulletList(items: readonly string[]): string {
  if (items.length === 0) return "  (none)";
  return items
    .slice(0, MAX_LISTED_SKILLS)
    .map((item) => `  • ${item}`)
    .join("\n");
}

export function formatAtsSummary(
  state: Pick<ApplicationState, "atsScore" | "matchedSkills" | "missingSkills">,
): string {
  return [
    `ATS MATCH SCORE: ${state.atsScore ?? "n/a"}/100`,
    "",
    "MATCHED SKILLS:",
    bulletList(state.matchedSkills),
    "",
    "MISSING SKILLS:",
    bulletList(state.missingSkills),
  ].join("\n");
}

function sectionContent(id: SectionId, state: ApplicationState): string {
  switch (id) {
    case "ats_analysis":
      return formatAtsSummary(state);
    case "improvements":
      return state.improvements;
    case "cover_letter":
      return state.revision?.coverLetter ?? state.coverLetter;
    case "optimized_bullets":
      return state.revision?.bullets ?? state.optimizedBullets;
    case "interview_questions":
      return state.interviewQuestions;
    case "role_research":
      return state.roleResearch;
    case "learning_plan":
      return state.learningPlan;
    case "self_review":
      return state.critique;
    case "revision":
      return state.revision?.changeSummary ?? "";
  }
}

/**
 * Builds the report from the steps the state has completed, one section per
 * section-writing step, in the order the steps ran.
 */
export function buildReport(state: ApplicationState): ApplicationReport {
  const sections: ReportSection[] = [];

  for (const step of state.completedSteps) {
    const id = STEP_SECTIONS[step];
    if (!id) continue;
    sections.push({
      id,
      title: SECTION_TITLES[id],
      content: sectionContent(id, state),
    });
  }

  return {
    companyName: state.companyName,
    atsScore: state.atsScore,
    improvementTier: state.improvementTier,
    sections,
    text: renderReportText(sections, state.companyName),
  };
}

/**
 * Renders sections as the downloadable plain-text package. Each section's
 * block depends only on that section, so untouched sections render the same.
 */
export function renderReportText(
  sections: readonly ReportSection[],
  companyName: string | null,
): string {
  const lines: string[] = [RULE, "COMPLETE JOB APPLICATION PACKAGE"];
  if (companyName) lines.push(`Company: ${companyName}`);
  lines.push(RULE, "");

  for (const section of sections) {
    const body = section.content.trim();
    lines.push(
      RULE,
      section.title,
      RULE,
      "",
      body || EMPTY_SECTION_TEXT[section.id] || "(empty)",
      "",
    );
  }

  lines.push(RULE, "END OF REPORT", RULE);
  return `${lines.join("\n")}\n`;
}
