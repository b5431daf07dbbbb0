import type { ApplicationInput } from "../../pipeline/application-state";
import { LLMService } from "../../services/llm.services";
import { ApplicationService } from "../../services/application.services";
import { ScriptedModelClient, ScriptedResponse } from "./scriptedModelClient";

export const RESUME_TEXT = `Jordan Example
Backend Engineer

Skills: TypeScript, Node.js, PostgreSQL, Docker

Experience
Example Corp, Backend Engineer (2020 - present)
- Built REST APIs in Node.js and TypeScript serving 2 million requests per day
- Migrated billing jobs from cron scripts to a queue-based worker`;

export const JOB_DESCRIPTION_TEXT = `Senior Backend Engineer at Acme

We are looking for an engineer with TypeScript, Node.js, PostgreSQL,
Kubernetes and GraphQL experience to build our platform services.`;

export const COVER_LETTER = "Dear Hiring Manager,\nI would love to build platform services at Acme.";
export const BULLETS = "• Built REST APIs serving 2M requests per day";
export const INTERVIEW_QUESTIONS = "1. How would you design a GraphQL gateway?";
export const ROLE_RESEARCH = "1. Common Skills\n• Distributed systems";
export const LEARNING_PLAN = "1. Priority Skills\n• Kubernetes first";
export const CRITIQUE = "• The cover letter opening is generic.";
export const REVISED_COVER_LETTER = "Dear Hiring Manager,\nAcme's platform team solves problems I have shipped before.";
export const REVISED_BULLETS = "• Built REST APIs in TypeScript serving 2M requests per day";
export const CHANGE_SUMMARY = "Rewrote the cover letter opening.";

export const STANDARD_SUGGESTIONS = {
  suggestions: [
    { skill: "GraphQL", suggestion: "Mention the GraphQL schema work from the billing project." },
    { skill: "", suggestion: "Move the skills section above experience." },
  ],
};

export const DEEP_SUGGESTIONS = {
  suggestions: [
    { skill: "Kubernetes", suggestion: "Describe how the Docker images you built were deployed." },
    { skill: "GraphQL", suggestion: "Add a project that exposes the billing data through GraphQL." },
    { suggestion: "Lead each bullet with the outcome, then the technology." },
    { suggestion: "Add a summary line naming the platform work you want to do." },
  ],
};

export function atsResponse(score: unknown): string {
  return JSON.stringify({
    score,
    matchedSkills: ["TypeScript", "Node.js", "PostgreSQL"],
    missingSkills: ["Kubernetes", "GraphQL"],
  });
}

export function defaultResponses(score: unknown): Record<string, ScriptedResponse> {
  return {
    ats_analysis: atsResponse(score),
    standard_improvements: JSON.stringify(STANDARD_SUGGESTIONS),
    deep_improvements: JSON.stringify(DEEP_SUGGESTIONS),
    cover_letter: COVER_LETTER,
    resume_optimizer: BULLETS,
    interview_prep: INTERVIEW_QUESTIONS,
    role_research: ROLE_RESEARCH,
    learning_plan: LEARNING_PLAN,
    self_review: CRITIQUE,
    revise: JSON.stringify({
      coverLetter: REVISED_COVER_LETTER,
      bullets: REVISED_BULLETS,
      changeSummary: CHANGE_SUMMARY,
    }),
  };
}

export function textInput(companyName: string | null = "Acme"): ApplicationInput {
  return {
    resume: { kind: "text", text: RESUME_TEXT },
    jobDescription: { kind: "text", text: JOB_DESCRIPTION_TEXT },
    companyName,
  };
}

export function createTestService(score: unknown = 75) {
  const client = new ScriptedModelClient(defaultResponses(score));
  const llm = new LLMService(client, {
    maxAttempts: 2,
    backoffMs: [0],
    timeoutMs: 1000,
  });
  return { client, llm, service: new ApplicationService(llm) };
}
