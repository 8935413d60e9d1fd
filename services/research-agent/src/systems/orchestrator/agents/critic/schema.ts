/**
 * Critic Schemas
 * Input bundle and model output validation for the synthesis critic
 */

import { z } from "zod";
import { ValidationError } from "@sibyl/core";
import {
  ConfidenceSchema,
  CritiqueOutputSchema,
  FactorSchema,
  ResearchModeSchema,
} from "../../schemas.js";
import type { CritiqueOutput } from "../../types.js";

export const CritiqueBundleSchema = z.object({
  subjectId: z.string().min(1),
  title: z.string().min(1),
  mode: ResearchModeSchema,
  marketProbability: z.number().min(0).max(1),
  analysis: z.object({
    predictedProbability: z.number(),
    confidence: ConfidenceSchema,
    reasoning: z.string(),
  }),
  factors: z.array(FactorSchema),
  verificationIssues: z.array(z.string()),
});

/**
 * Take the outermost JSON object from model text, fenced or not
 */
export function extractJsonObject(raw: string): string | null {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(raw);
  const body = fenced?.[1] ?? raw;
  const start = body.indexOf("{");
  const end = body.lastIndexOf("}");
  if (start === -1 || end <= start) return null;
  return body.slice(start, end + 1);
}

export function parseCritiqueOutput(raw: string): CritiqueOutput {
  const json = extractJsonObject(raw);
  if (json === null) {
    throw new ValidationError("critic returned no JSON object", { field: "output" });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new ValidationError(
      `critic returned malformed JSON: ${error instanceof Error ? error.message : String(error)}`,
      { field: "output" }
    );
  }

  const result = CritiqueOutputSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError(`critic output failed validation: ${issues.join("; ")}`, {
      field: "output",
    });
  }
  return result.data;
}
