import { Schema, Type } from "@google/genai";
import { z } from "zod";

/**
 * LLM's Structured output schema for the ATS match analysis.
 * The score is validated separately: an out-of-range or non-numeric score is a
 * routing failure, not a malformed response to retry.
 */
export const atsAnalysisSchema: Schema = {
  type: Type.OBJECT,
  properties: {
    score: {
      type: Type.NUMBER,
      minimum: 0,
      maximum: 100,
      description: "Match score: matched required skills / required skills * 100.",
    },
    matchedSkills: { type: Type.ARRAY, items: { type: Type.STRING } },
    missingSkills: { type: Type.ARRAY, items: { type: Type.STRING } },
  },
  required: ["score", "matchedSkills", "missingSkills"],
};

export const atsAnalysisResponse = z.object({
  score: z.unknown(),
  matchedSkills: z.array(z.string()),
  missingSkills: z.array(z.string()),
});
