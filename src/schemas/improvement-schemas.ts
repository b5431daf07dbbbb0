import { Schema, Type } from "@google/genai";
import { z } from "zod";

/**
 * LLM's Structured output schema for resume improvement suggestions.
 * Each suggestion may be keyed to the missing skill it addresses.
 */
export const improvementSchema: Schema = {
  type: Type.OBJECT,
  properties: {
    suggestions: {
      type: Type.ARRAY,
      items: {
        type: Type.OBJECT,
        properties: {
          skill: {
            type: Type.STRING,
            description: "The missing skill this suggestion addresses, or empty.",
          },
          suggestion: { type: Type.STRING },
        },
        required: ["suggestion"],
      },
    },
  },
  required: ["suggestions"],
};

export const improvementResponse = z.object({
  suggestions: z
    .array(
      z.object({
        skill: z.string().optional(),
        suggestion: z.string().trim().min(1),
      }),
    )
    .min(1),
});

export type ImprovementSuggestion = z.infer<
  typeof improvementResponse
>["suggestions"][number];
