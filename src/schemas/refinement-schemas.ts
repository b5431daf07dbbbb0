import { Schema, Type } from "@google/genai";
import { z } from "zod";
import type { SectionId } from "../pipeline/report";

/* One required string field per targeted section */
export function buildRefinementSchema(targets: readonly SectionId[]): Schema {
  const properties: Record<string, Schema> = {};
  for (const id of targets) {
    properties[id] = { type: Type.STRING };
  }
  return {
    type: Type.OBJECT,
    properties,
    required: [...targets],
  };
}

export function buildRefinementResponse(targets: readonly SectionId[]) {
  const shape: Record<string, z.ZodString> = {};
  for (const id of targets) {
    shape[id] = z.string().trim().min(1);
  }
  return z.object(shape);
}
