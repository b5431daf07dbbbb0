/* Input document as received: pasted text, or a PDF carried as base64 so it survives a queue hop */
export type DocumentSource =
  | { kind: "text"; text: string }
  | { kind: "pdf"; filename: string; base64: string };

export interface ApplicationInput {
  resume: DocumentSource;
  jobDescription: DocumentSource;
  companyName?: string | null;
}

export type ImprovementTier = "skip" | "standard" | "deep";

export type StepId =
  | "parse"
  | "ats_analysis"
  | "skip_improvements"
  | "standard_improvements"
  | "deep_improvements"
  | "cover_letter"
  | "resume_optimizer"
  | "interview_prep"
  | "role_research"
  | "learning_plan"
  | "compile_output"
  | "self_review"
  | "revise";

export interface Revision {
  readonly coverLetter: string;
  readonly bullets: string;
  readonly changeSummary: string;
}

/**
 * The record threaded through the pipeline. Steps never mutate it: each one
 * returns a new version via {@link updateState}.
 */
export interface ApplicationState {
  readonly sources: {
    readonly resume: DocumentSource;
    readonly jobDescription: DocumentSource;
  };
  readonly resumeText: string;
  readonly jobDescriptionText: string;
  readonly companyName: string | null;
  readonly atsScore: number | null;
  readonly matchedSkills: readonly string[];
  readonly missingSkills: readonly string[];
  readonly improvementTier: ImprovementTier | null;
  readonly improvements: string;
  readonly coverLetter: string;
  readonly optimizedBullets: string;
  readonly interviewQuestions: string;
  readonly roleResearch: string;
  readonly learningPlan: string;
  readonly compiledReport: string;
  readonly critique: string;
  readonly revision: Revision | null;
  readonly completedSteps: readonly StepId[];
}

export type StateUpdate = Partial<Omit<ApplicationState, "completedSteps" | "sources">>;

export function createInitialState(input: ApplicationInput): ApplicationState {
  const companyName = input.companyName?.trim();

  return Object.freeze({
    sources: Object.freeze({
      resume: input.resume,
      jobDescription: input.jobDescription,
    }),
    resumeText: "",
    jobDescriptionText: "",
    companyName: companyName ? companyName : null,
    atsScore: null,
    matchedSkills: [],
    missingSkills: [],
    improvementTier: null,
    improvements: "",
    coverLetter: "",
    optimizedBullets: "",
    interviewQuestions: "",
    roleResearch: "",
    learningPlan: "",
    compiledReport: "",
    critique: "",
    revision: null,
    completedSteps: [],
  });
}

export function updateState(
  state: ApplicationState,
  update: StateUpdate,
): ApplicationState {
  return Object.freeze({ ...state, ...update });
}

export function markCompleted(
  state: ApplicationState,
  step: StepId,
): ApplicationState {
  return Object.freeze({
    ...state,
    completedSteps: [...state.completedSteps, step],
  });
}

/* Display name used in prompts when no company was given */
export function companyLabel(state: Pick<ApplicationState, "companyName">): string {
  return state.companyName ?? "the company";
}
