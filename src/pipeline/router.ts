import { AtsScoreError } from "../utils/errors";

export const SKIP_IMPROVEMENTS_THRESHOLD = 90;
export const STANDARD_IMPROVEMENTS_THRESHOLD = 70;

export type ImprovementRoute =
  | { tier: "skip"; next: "skip_improvements" }
  | { tier: "standard"; next: "standard_improvements" }
  | { tier: "deep"; next: "deep_improvements" };

/**
 * Checks that a value is usable as an ATS score: a finite number in 0..100.
 * Anything else is a routing failure, never defaulted.
 */
export function validateAtsScore(score: unknown): number {
  if (
    typeof score !== "number" ||
    !Number.isFinite(score) ||
    score < 0 ||
    score > 100
  ) {
    throw new AtsScoreError(score);
  }
  return score;
}

/**
 * Picks the improvement step that follows ATS analysis.
 * All three routes converge on the cover letter step.
 */
export function routeByAtsScore(score: unknown): ImprovementRoute {
  const value = validateAtsScore(score);

  if (value >= SKIP_IMPROVEMENTS_THRESHOLD) {
    return { tier: "skip", next: "skip_improvements" };
  }
  if (value >= STANDARD_IMPROVEMENTS_THRESHOLD) {
    return { tier: "standard", next: "standard_improvements" };
  }
  return { tier: "deep", next: "deep_improvements" };
}
