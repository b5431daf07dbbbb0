export { ATS_PROMPTS } from "./ats-prompt";
export { IMPROVEMENT_PROMPTS } from "./improvement-prompt";
export { APPLICATION_PROMPTS } from "./application-prompt";
export { INTERVIEW_PROMPTS } from "./interview-prompt";
export { REVIEW_PROMPTS } from "./review-prompt";
export { REFINEMENT_PROMPTS } from "./refinement-prompt";

/**
 * Utility function to build prompts by replacing placeholders with actual values.
 * Values are inserted in a single pass, so braces inside a resume are never
 * treated as placeholders. Unknown placeholders are left as they are.
 * @param template The prompt template containing placeholders in {key} format.
 * @param variables An object mapping placeholder keys to their replacement values.
 * @returns The final prompt string with all placeholders replaced.
 */
export function buildPrompt(
  template: string,
  variables: Record<string, string>,
): string {
  return template.replace(/{(\w+)}/g, (match, key: string) => {
    return Object.hasOwn(variables, key) ? variables[key] : match;
  });
}
