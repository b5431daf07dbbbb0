import type { Schema } from "@google/genai";
import { z } from "zod";
import {
  APPLICATION_PROMPTS,
  ATS_PROMPTS,
  buildPrompt,
  IMPROVEMENT_PROMPTS,
  INTERVIEW_PROMPTS,
  REFINEMENT_PROMPTS,
  REVIEW_PROMPTS,
} from "../prompts";
import {
  atsAnalysisResponse,
  atsAnalysisSchema,
  buildRefinementResponse,
  buildRefinementSchema,
  improvementResponse,
  improvementSchema,
  type ImprovementSuggestion,
  revisionResponse,
  revisionSchema,
} from "../schemas";
import type { Revision } from "../pipeline/application-state";
import type { ReportSection, SectionId } from "../pipeline/report";
import { validateAtsScore } from "../pipeline/router";
import {
  MAX_DEEP_SUGGESTIONS,
  MAX_STANDARD_SUGGESTIONS,
  MIN_DEEP_SUGGESTIONS,
  MODEL_MAX_ATTEMPTS,
  MODEL_RETRY_BACKOFF_MS,
  MODEL_TIMEOUT_MS,
} from "../utils/constants";
import {
  ModelCallError,
  ModelResponseError,
  ModelTimeoutError,
} from "../utils/errors";
import logger from "../utils/logger";
import type { ModelClient } from "./model-client";

export interface LLMServiceOptions {
  maxAttempts?: number;
  timeoutMs?: number;
  /* Delay before retry n (0-based); the last entry repeats */
  backoffMs?: number[];
}

export interface AtsAnalysis {
  score: number;
  matchedSkills: string[];
  missingSkills: string[];
}

export interface SkillContext {
  resume: string;
  jobDescription: string;
  matchedSkills: readonly string[];
  missingSkills: readonly string[];
}

export interface RevisionInput {
  coverLetter: string;
  bullets: string;
  critique: string;
  resume: string;
  jobDescription: string;
}

export interface RefinementRequest {
  companyName: string;
  focus: string;
  instructions: string;
  targets: readonly ReportSection[];
  context: readonly ReportSection[];
}

function skillList(skills: readonly string[], limit: number): string {
  return skills.length > 0 ? skills.slice(0, limit).join(", ") : "None";
}

/* Trims and drops case-insensitive duplicates, keeping the first spelling */
export function dedupeSkills(skills: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of skills) {
    const skill = raw.trim();
    const key = skill.toLowerCase();
    if (!skill || seen.has(key)) continue;
    seen.add(key);
    result.push(skill);
  }
  return result;
}

function stripCodeFence(text: string): string {
  const fenced = text.trim().match(/^```(?:json)?\s*([\s\S]*?)\s*```$/);
  return fenced ? fenced[1] : text.trim();
}

function parseJson<S extends z.ZodTypeAny>(text: string, schema: S): z.infer<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(stripCodeFence(text));
  } catch (error) {
    throw new ModelResponseError("Model returned malformed JSON", {
      cause: error,
    });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ModelResponseError(`Model response has the wrong shape: ${issues}`);
  }
  return result.data;
}

export function formatSuggestions(
  suggestions: readonly ImprovementSuggestion[],
): string {
  return suggestions
    .map((item, index) => {
      const skill = item.skill?.trim();
      return `${index + 1}. ${skill ? `[${skill}] ` : ""}${item.suggestion.trim()}`;
    })
    .join("\n");
}

function formatSectionsForPrompt(sections: readonly ReportSection[]): string {
  if (sections.length === 0) return "(none)";
  return sections
    .map((section) => `[${section.id}] ${section.title}\n${section.content}`)
    .join("\n\n");
}

/**
 * Service that turns each application step into a model call.
 * Every call is bounded by a timeout and retried a fixed number of times;
 * when all attempts fail a ModelCallError names the step.
 */
export class LLMService {
  private readonly maxAttempts: number;
  private readonly timeoutMs: number;
  private readonly backoffMs: number[];

  constructor(
    private readonly client: ModelClient,
    options: LLMServiceOptions = {},
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? MODEL_MAX_ATTEMPTS);
    this.timeoutMs = options.timeoutMs ?? MODEL_TIMEOUT_MS;
    this.backoffMs = options.backoffMs ?? MODEL_RETRY_BACKOFF_MS;
  }

  /**
   * Scores how well the resume matches the job description.
   * Skill lists are de-duplicated and a skill reported as both matched and
   * missing counts as matched.
   *
   * @throws AtsScoreError if the model's score is not a number in 0..100.
   */
  async analyzeAts(resume: string, jobDescription: string): Promise<AtsAnalysis> {
    const prompt = buildPrompt(ATS_PROMPTS.ANALYZE_MATCH, {
      resume,
      jobDescription,
    });

    const response = await this.generateJson(
      "ats_analysis",
      prompt,
      atsAnalysisSchema,
      (text) => parseJson(text, atsAnalysisResponse),
    );

    const score = validateAtsScore(response.score);
    const matchedSkills = dedupeSkills(response.matchedSkills);
    const matchedKeys = new Set(matchedSkills.map((s) => s.toLowerCase()));
    const missingSkills = dedupeSkills(response.missingSkills).filter(
      (skill) => !matchedKeys.has(skill.toLowerCase()),
    );

    return { score, matchedSkills, missingSkills };
  }

  /**
   * Generates improvement suggestions for the given tier as a numbered list.
   * Standard keeps at most 3 suggestions, deep between 4 and 7. A deep answer
   * with fewer suggestions, or one that addresses none of the missing skills,
   * is rejected and retried.
   */
  async generateImprovements(
    tier: "standard" | "deep",
    context: SkillContext,
  ): Promise<string> {
    const template =
      tier === "deep" ? IMPROVEMENT_PROMPTS.DEEP : IMPROVEMENT_PROMPTS.STANDARD;
    const limit =
      tier === "deep" ? MAX_DEEP_SUGGESTIONS : MAX_STANDARD_SUGGESTIONS;
    const prompt = buildPrompt(template, {
      resume: context.resume,
      jobDescription: context.jobDescription,
      matchedSkills: skillList(context.matchedSkills, 10),
      missingSkills: skillList(context.missingSkills, 10),
    });
    const missingKeys = new Set(
      context.missingSkills.map((s) => s.trim().toLowerCase()),
    );

    const suggestions = await this.generateJson(
      `${tier}_improvements`,
      prompt,
      improvementSchema,
      (text) => {
        const kept = parseJson(text, improvementResponse).suggestions.slice(
          0,
          limit,
        );
        if (tier === "deep" && kept.length < MIN_DEEP_SUGGESTIONS) {
          throw new ModelResponseError(
            `Deep improvements need at least ${MIN_DEEP_SUGGESTIONS} suggestions, received ${kept.length}`,
          );
        }
        if (
          tier === "deep" &&
          missingKeys.size > 0 &&
          !kept.some((s) => missingKeys.has(s.skill?.trim().toLowerCase() ?? ""))
        ) {
          throw new ModelResponseError(
            "Deep improvements must address at least one missing skill",
          );
        }
        return kept;
      },
    );

    return formatSuggestions(suggestions);
  }

  /**
   * Writes a cover letter tailored to the job description.
   *
   * @param companyName - Company named in the letter; "the company" when unknown.
   * @returns The letter as plain text.
   * @throws ModelCallError if every attempt fails or returns nothing.
   */
  async generateCoverLetter(
    resume: string,
    jobDescription: string,
    companyName: string,
  ): Promise<string> {
    const prompt = buildPrompt(APPLICATION_PROMPTS.COVER_LETTER, {
      resume,
      jobDescription,
      companyName,
    });
    return this.generateText("cover_letter", prompt);
  }

  /**
   * Rewrites the resume's experience bullets toward the job description,
   * keeping to facts the resume supports.
   *
   * @returns "•" bullets as plain text.
   * @throws ModelCallError if every attempt fails or returns nothing.
   */
  async optimizeBullets(resume: string, jobDescription: string): Promise<string> {
    const prompt = buildPrompt(APPLICATION_PROMPTS.OPTIMIZE_BULLETS, {
      resume,
      jobDescription,
    });
    return this.generateText("resume_optimizer", prompt);
  }

  /**
   * Generates likely interview questions for the role, including questions
   * on gaps the resume leaves against the job description.
   *
   * @returns A numbered list of questions as plain text.
   * @throws ModelCallError if every attempt fails or returns nothing.
   */
  async generateInterviewQuestions(
    jobDescription: string,
    resume: string,
  ): Promise<string> {
    const prompt = buildPrompt(INTERVIEW_PROMPTS.QUESTIONS, {
      jobDescription,
      resume,
    });
    return this.generateText("interview_prep", prompt);
  }

  /**
   * Summarizes what the role usually expects, from the job description and
   * general knowledge of similar roles. No web lookup is made.
   *
   * @param companyName - Company the role is at; "the company" when unknown.
   * @throws ModelCallError if every attempt fails or returns nothing.
   */
  async researchRole(jobDescription: string, companyName: string): Promise<string> {
    const prompt = buildPrompt(INTERVIEW_PROMPTS.ROLE_RESEARCH, {
      jobDescription,
      companyName,
    });
    return this.generateText("role_research", prompt);
  }

  /**
   * Builds a study plan for the missing skills, building on the matched ones.
   *
   * @param missingSkills - Skills to learn; at most 15 are sent to the model.
   * @param matchedSkills - Skills already held; at most 10 are sent.
   * @returns The plan as plain text.
   * @throws ModelCallError if every attempt fails or returns nothing.
   */
  async generateLearningPlan(
    missingSkills: readonly string[],
    matchedSkills: readonly string[],
  ): Promise<string> {
    const prompt = buildPrompt(APPLICATION_PROMPTS.LEARNING_PLAN, {
      missingSkills: skillList(missingSkills, 15),
      matchedSkills: skillList(matchedSkills, 10),
    });
    return this.generateText("learning_plan", prompt);
  }

  /* Critiques the compiled draft package */
  async reviewPackage(
    compiledReport: string,
    resume: string,
    jobDescription: string,
  ): Promise<string> {
    const prompt = buildPrompt(REVIEW_PROMPTS.SELF_REVIEW, {
      package: compiledReport,
      resume,
      jobDescription,
    });
    return this.generateText("self_review", prompt);
  }

  /* Applies the critique to the cover letter and bullets in one call */
  async revisePackage(input: RevisionInput): Promise<Revision> {
    const prompt = buildPrompt(REVIEW_PROMPTS.REVISE, {
      coverLetter: input.coverLetter,
      bullets: input.bullets,
      critique: input.critique,
      resume: input.resume,
      jobDescription: input.jobDescription,
    });

    const revision = await this.generateJson("revise", prompt, revisionSchema, (text) =>
      parseJson(text, revisionResponse),
    );
    return {
      coverLetter: revision.coverLetter,
      bullets: revision.bullets,
      changeSummary: revision.changeSummary.trim(),
    };
  }

  /**
   * Rewrites the target sections following a refinement focus.
   * @returns New content keyed by section id, one entry per target.
   */
  async refineSections(
    request: RefinementRequest,
  ): Promise<Record<string, string>> {
    const targetIds: SectionId[] = request.targets.map((section) => section.id);
    const prompt = buildPrompt(REFINEMENT_PROMPTS.REFINE, {
      companyName: request.companyName,
      focus: request.focus,
      instructions: request.instructions || "None",
      sections: formatSectionsForPrompt(request.targets),
      context: formatSectionsForPrompt(request.context),
    });

    const responseShape = buildRefinementResponse(targetIds);
    return this.generateJson(
      "refine",
      prompt,
      buildRefinementSchema(targetIds),
      (text) => parseJson(text, responseShape),
    );
  }

  private async generateText(step: string, prompt: string): Promise<string> {
    return this.withRetry(step, async () => {
      const text = (await this.withTimeout(this.client.generate({ step, prompt }))).trim();
      if (!text) {
        throw new ModelResponseError(`Empty response from LLM for step "${step}"`);
      }
      return text;
    });
  }

  private async generateJson<T>(
    step: string,
    prompt: string,
    responseSchema: Schema,
    parse: (text: string) => T,
  ): Promise<T> {
    return this.withRetry(step, async () => {
      const text = await this.withTimeout(
        this.client.generate({ step, prompt, responseSchema }),
      );
      return parse(text);
    });
  }

  /**
   * Retry logic with backoff. Model calls are pure text-in/text-out, so any
   * failed attempt may be repeated.
   */
  private async withRetry<T>(step: string, fn: () => Promise<T>): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = error;
        logger.warn("Model call attempt failed", {
          step,
          attempt,
          maxAttempts: this.maxAttempts,
          error: error instanceof Error ? error.message : error,
        });

        if (attempt < this.maxAttempts) {
          await this.sleep(this.backoffFor(attempt - 1));
        }
      }
    }

    throw new ModelCallError(step, this.maxAttempts, lastError);
  }

  private backoffFor(retryIndex: number): number {
    if (this.backoffMs.length === 0) return 0;
    return this.backoffMs[Math.min(retryIndex, this.backoffMs.length - 1)];
  }

  private async withTimeout<T>(promise: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new ModelTimeoutError(this.timeoutMs)),
        this.timeoutMs,
      );
    });

    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private sleep(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
