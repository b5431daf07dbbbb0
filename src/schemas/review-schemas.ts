import { Schema, Type } from "@google/genai";
import { z } from "zod";

/* LLM's Structured output schema for the revision of cover letter and bullets. */
export const revisionSchema: Schema = {
  type: Type.OBJECT,
  properties: {
    coverLetter: { type: Type.STRING },
    bullets: { type: Type.STRING },
    changeSummary: { type: Type.STRING },
  },
  required: ["coverLetter", "bullets", "changeSummary"],
};

export const revisionResponse = z.object({
  coverLetter: z.string().trim().min(1),
  bullets: z.string().trim().min(1),
  changeSummary: z.string(),
});
