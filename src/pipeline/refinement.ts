import { RequestValidationError } from "../utils/errors";
import logger from "../utils/logger";
import type { LLMService } from "../services/llm.services";
import { ApplicationReport, renderReportText, SectionId } from "./report";

export interface RefinementFocus {
  label: string;
  instruction: string;
  targets: readonly SectionId[];
}

/**
 * Focus options offered to the user. Each one rewrites only its target
 * sections; everything else in the report is carried over untouched.
 */
export const REFINEMENT_FOCUSES = {
  cover_letter_tone: {
    label: "Cover letter: warmer, more personal tone",
    instruction:
      "Make the cover letter warmer and more personal while staying professional. Open with a specific reason for wanting this role.",
    targets: ["cover_letter"],
  },
  quantified_impact: {
    label: "Resume bullets: stronger quantified impact",
    instruction:
      "Rewrite the resume bullets to lead with measurable outcomes (numbers, percentages, scale) supported by the resume.",
    targets: ["optimized_bullets"],
  },
  technical_depth: {
    label: "Interview prep: deeper technical questions",
    instruction:
      "Replace general questions with deeper technical and system-design questions on the required skills, each with a one-line hint on what a strong answer covers.",
    targets: ["interview_questions"],
  },
  leadership: {
    label: "Emphasize leadership and ownership",
    instruction:
      "Emphasize leadership, mentoring, ownership and cross-team influence in the cover letter and the bullets.",
    targets: ["cover_letter", "optimized_bullets"],
  },
  concise: {
    label: "Make everything more concise",
    instruction:
      "Cut length by about a third without losing key facts. Prefer short sentences and remove filler.",
    targets: ["cover_letter", "optimized_bullets", "learning_plan"],
  },
  accelerated_learning: {
    label: "Learning plan: accelerated 6-week version",
    instruction:
      "Compress the learning plan into an intensive 6-week schedule with weekly goals, keeping only the highest-priority skills.",
    targets: ["learning_plan"],
  },
} as const satisfies Record<string, RefinementFocus>;

export type RefinementFocusId = keyof typeof REFINEMENT_FOCUSES;

export function isRefinementFocusId(value: string): value is RefinementFocusId {
  return Object.hasOwn(REFINEMENT_FOCUSES, value);
}

export const REFINEMENT_FOCUS_IDS: RefinementFocusId[] = Object.keys(
  REFINEMENT_FOCUSES,
).filter(isRefinementFocusId);

/**
 * Rewrites the sections the focus targets with one model call and re-renders
 * the report text. Sections outside the focus keep their exact content.
 */
export async function refineReport(
  report: ApplicationReport,
  focusId: RefinementFocusId,
  llm: LLMService,
  instructions = "",
): Promise<ApplicationReport> {
  const focus: RefinementFocus = REFINEMENT_FOCUSES[focusId];
  const targetIds = new Set<SectionId>(focus.targets);

  const targets = report.sections.filter((section) => targetIds.has(section.id));
  const missing = focus.targets.filter(
    (id) => !targets.some((section) => section.id === id),
  );
  if (missing.length > 0) {
    throw new RequestValidationError(
      `Report has no ${missing.join(", ")} section to refine with focus "${focusId}"`,
    );
  }

  logger.info("Refining report sections", {
    focus: focusId,
    targets: focus.targets,
  });

  const rewritten = await llm.refineSections({
    companyName: report.companyName ?? "the company",
    focus: focus.instruction,
    instructions: instructions.trim(),
    targets,
    context: report.sections.filter((section) => !targetIds.has(section.id)),
  });

  const sections = report.sections.map((section) =>
    targetIds.has(section.id)
      ? { ...section, content: rewritten[section.id] }
      : section,
  );

  return {
    ...report,
    sections,
    text: renderReportText(sections, report.companyName),
  };
}
