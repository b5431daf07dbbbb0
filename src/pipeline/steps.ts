import { MIN_DOCUMENT_LENGTH } from "../utils/constants";
import { DocumentName, DocumentParseError } from "../utils/errors";
import {
  extractTextFromPDF,
  normalizeDocumentText,
} from "../utils/pdf-extraction";
import {
  companyLabel,
  DocumentSource,
  updateState,
} from "./application-state";
import { buildReport } from "./report";
import { routeByAtsScore } from "./router";
import type { PipelineNode, PipelineStep } from "./sequencer";

async function readDocument(
  name: DocumentName,
  source: DocumentSource,
): Promise<string> {
  let raw: string;

  if (source.kind === "text") {
    raw = source.text;
  } else {
    try {
      // pdf.js rejects Node Buffers, hand it a plain Uint8Array copy
      raw = await extractTextFromPDF(
        new Uint8Array(Buffer.from(source.base64, "base64")),
      );
    } catch (error) {
      throw new DocumentParseError(
        name,
        `Unable to read ${name} "${source.filename}": ${error instanceof Error ? error.message : error}`,
        { cause: error },
      );
    }
  }

  const text = normalizeDocumentText(raw);
  if (text.length < MIN_DOCUMENT_LENGTH) {
    throw new DocumentParseError(
      name,
      text.length === 0
        ? `The ${name} is empty`
        : `The ${name} is too short (${text.length} characters, at least ${MIN_DOCUMENT_LENGTH} required)`,
    );
  }
  return text;
}

export const parseStep: PipelineStep = {
  id: "parse",
  description: "Extract text from resume and job description",
  async run(state) {
    const resumeText = await readDocument("resume", state.sources.resume);
    const jobDescriptionText = await readDocument(
      "job_description",
      state.sources.jobDescription,
    );
    return updateState(state, { resumeText, jobDescriptionText });
  },
};

export const atsAnalysisStep: PipelineStep = {
  id: "ats_analysis",
  description: "Analyze ATS match score",
  async run(state, { llm }) {
    const analysis = await llm.analyzeAts(
      state.resumeText,
      state.jobDescriptionText,
    );
    return updateState(state, {
      atsScore: analysis.score,
      matchedSkills: analysis.matchedSkills,
      missingSkills: analysis.missingSkills,
    });
  },
};

export const skipImprovementsStep: PipelineStep = {
  id: "skip_improvements",
  description: "Skip improvements for a strong match",
  async run(state) {
    return updateState(state, { improvementTier: "skip", improvements: "" });
  },
};

export const standardImprovementsStep: PipelineStep = {
  id: "standard_improvements",
  description: "Generate standard improvement suggestions",
  async run(state, { llm }) {
    const improvements = await llm.generateImprovements("standard", {
      resume: state.resumeText,
      jobDescription: state.jobDescriptionText,
      matchedSkills: state.matchedSkills,
      missingSkills: state.missingSkills,
    });
    return updateState(state, { improvementTier: "standard", improvements });
  },
};

export const deepImprovementsStep: PipelineStep = {
  id: "deep_improvements",
  description: "Generate detailed improvement suggestions",
  async run(state, { llm }) {
    const improvements = await llm.generateImprovements("deep", {
      resume: state.resumeText,
      jobDescription: state.jobDescriptionText,
      matchedSkills: state.matchedSkills,
      missingSkills: state.missingSkills,
    });
    return updateState(state, { improvementTier: "deep", improvements });
  },
};

const IMPROVEMENT_STEPS = {
  skip_improvements: skipImprovementsStep,
  standard_improvements: standardImprovementsStep,
  deep_improvements: deepImprovementsStep,
} as const;

export const coverLetterStep: PipelineStep = {
  id: "cover_letter",
  description: "Generate cover letter",
  async run(state, { llm }) {
    const coverLetter = await llm.generateCoverLetter(
      state.resumeText,
      state.jobDescriptionText,
      companyLabel(state),
    );
    return updateState(state, { coverLetter });
  },
};

export const resumeOptimizerStep: PipelineStep = {
  id: "resume_optimizer",
  description: "Optimize resume bullets",
  async run(state, { llm }) {
    const optimizedBullets = await llm.optimizeBullets(
      state.resumeText,
      state.jobDescriptionText,
    );
    return updateState(state, { optimizedBullets });
  },
};

export const interviewPrepStep: PipelineStep = {
  id: "interview_prep",
  description: "Generate interview questions",
  async run(state, { llm }) {
    const interviewQuestions = await llm.generateInterviewQuestions(
      state.jobDescriptionText,
      state.resumeText,
    );
    return updateState(state, { interviewQuestions });
  },
};

export const roleResearchStep: PipelineStep = {
  id: "role_research",
  description: "Research role expectations",
  async run(state, { llm }) {
    const roleResearch = await llm.researchRole(
      state.jobDescriptionText,
      companyLabel(state),
    );
    return updateState(state, { roleResearch });
  },
};

export const learningPlanStep: PipelineStep = {
  id: "learning_plan",
  description: "Generate skill learning plan",
  async run(state, { llm }) {
    const learningPlan = await llm.generateLearningPlan(
      state.missingSkills,
      state.matchedSkills,
    );
    return updateState(state, { learningPlan });
  },
};

export const compileOutputStep: PipelineStep = {
  id: "compile_output",
  description: "Compile draft report",
  async run(state) {
    return updateState(state, { compiledReport: buildReport(state).text });
  },
};

export const selfReviewStep: PipelineStep = {
  id: "self_review",
  description: "Self-review the draft package",
  async run(state, { llm }) {
    const critique = await llm.reviewPackage(
      state.compiledReport,
      state.resumeText,
      state.jobDescriptionText,
    );
    return updateState(state, { critique });
  },
};

export const reviseStep: PipelineStep = {
  id: "revise",
  description: "Revise cover letter and bullets from the review",
  async run(state, { llm }) {
    const revision = await llm.revisePackage({
      coverLetter: state.coverLetter,
      bullets: state.optimizedBullets,
      critique: state.critique,
      resume: state.resumeText,
      jobDescription: state.jobDescriptionText,
    });
    return updateState(state, { revision });
  },
};

/* The full application workflow, in execution order */
export const APPLICATION_PIPELINE: readonly PipelineNode[] = [
  { kind: "step", step: parseStep },
  { kind: "step", step: atsAnalysisStep },
  {
    kind: "branch",
    branch: {
      id: "improvement_router",
      select: (state) => IMPROVEMENT_STEPS[routeByAtsScore(state.atsScore).next],
    },
  },
  { kind: "step", step: coverLetterStep },
  { kind: "step", step: resumeOptimizerStep },
  { kind: "step", step: interviewPrepStep },
  { kind: "step", step: roleResearchStep },
  { kind: "step", step: learningPlanStep },
  { kind: "step", step: compileOutputStep },
  { kind: "step", step: selfReviewStep },
  { kind: "step", step: reviseStep },
];
