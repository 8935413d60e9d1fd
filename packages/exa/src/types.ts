/**
 * Exa API Types
 * Zod schemas for validating API responses, plus request shapes
 */

import { z } from "zod";

// ============ Shared ============

export const CostDollarsSchema = z.object({
  total: z.number(),
}).passthrough();

export type CostDollars = z.infer<typeof CostDollarsSchema>;

// Exa sometimes sends "" for unknown dates
const optionalDate = z
  .string()
  .nullable()
  .optional()
  .transform((value) => (value ? value : undefined));

// ============ Search / Contents ============

export const SearchTypeSchema = z.enum(["auto", "neural", "fast", "deep"]);
export type SearchType = z.infer<typeof SearchTypeSchema>;

export const SearchCategorySchema = z.enum([
  "news",
  "research paper",
  "pdf",
  "tweet",
  "financial report",
  "company",
  "personal site",
]);
export type SearchCategory = z.infer<typeof SearchCategorySchema>;

export const ExaResultSchema = z.object({
  id: z.string(),
  url: z.string(),
  title: z.string().nullable().optional(),
  publishedDate: optionalDate,
  author: z.string().nullable().optional(),
  score: z.number().nullable().optional(),
  text: z.string().nullable().optional(),
  summary: z.string().nullable().optional(),
  highlights: z.array(z.string()).nullable().optional(),
}).passthrough();

export type ExaResult = z.infer<typeof ExaResultSchema>;

export const SearchResponseSchema = z.object({
  requestId: z.string().optional(),
  results: z.array(ExaResultSchema),
  costDollars: CostDollarsSchema.nullable().optional(),
});

export type SearchResponse = z.infer<typeof SearchResponseSchema>;

export const ContentsResponseSchema = z.object({
  requestId: z.string().optional(),
  results: z.array(ExaResultSchema),
  statuses: z
    .array(z.object({ id: z.string(), status: z.string() }).passthrough())
    .optional(),
  costDollars: CostDollarsSchema.nullable().optional(),
});

export type ContentsResponse = z.infer<typeof ContentsResponseSchema>;

export interface ContentsOptions {
  text?: boolean | { maxCharacters?: number };
  highlights?: boolean | { numSentences?: number; highlightsPerUrl?: number };
}

export interface SearchRequest {
  query: string;
  type?: SearchType;
  numResults?: number;
  category?: SearchCategory;
  startPublishedDate?: string;
  endPublishedDate?: string;
  includeDomains?: string[];
  excludeDomains?: string[];
  contents?: ContentsOptions;
}

export interface GetContentsRequest extends ContentsOptions {
  urls: string[];
}

// ============ Answer ============

export const AnswerCitationSchema = z.object({
  id: z.string(),
  url: z.string(),
  title: z.string().nullable().optional(),
  publishedDate: optionalDate,
  author: z.string().nullable().optional(),
  text: z.string().nullable().optional(),
}).passthrough();

export type AnswerCitation = z.infer<typeof AnswerCitationSchema>;

export const AnswerResponseSchema = z.object({
  answer: z.union([z.string(), z.record(z.unknown())]).transform((value) =>
    typeof value === "string" ? value : JSON.stringify(value)
  ),
  citations: z.array(AnswerCitationSchema).default([]),
  costDollars: CostDollarsSchema.nullable().optional(),
});

export type AnswerResponse = z.infer<typeof AnswerResponseSchema>;

export interface AnswerRequest {
  query: string;
  text?: boolean;
}

// ============ Research Tasks ============

export const ResearchStatusSchema = z.enum([
  "pending",
  "running",
  "completed",
  "canceled",
  "failed",
]);
export type ResearchStatus = z.infer<typeof ResearchStatusSchema>;

export const TERMINAL_RESEARCH_STATUSES: readonly ResearchStatus[] = [
  "completed",
  "canceled",
  "failed",
];

export const ResearchTaskSchema = z.object({
  researchId: z.string(),
  status: ResearchStatusSchema,
  createdAt: z.number(),
  finishedAt: z.number().nullable().optional(),
  model: z.string().nullable().optional(),
  instructions: z.string(),
  output: z
    .object({
      content: z.string(),
      parsed: z.record(z.unknown()).nullable().optional(),
    })
    .nullable()
    .optional(),
  citations: z
    .array(
      z.object({
        id: z.string(),
        url: z.string(),
        title: z.string().nullable().optional(),
      })
    )
    .nullable()
    .optional(),
  costDollars: CostDollarsSchema.nullable().optional(),
  error: z.string().nullable().optional(),
}).passthrough();

export type ResearchTask = z.infer<typeof ResearchTaskSchema>;

export const ResearchTaskListSchema = z.object({
  data: z.array(ResearchTaskSchema),
  hasMore: z.boolean(),
  nextCursor: z.string().nullable().optional(),
});

export type ResearchTaskList = z.infer<typeof ResearchTaskListSchema>;

export type ResearchModel = "exa-research-fast" | "exa-research" | "exa-research-pro";

export interface CreateResearchTaskRequest {
  instructions: string;
  model?: ResearchModel;
  outputSchema?: Record<string, unknown>;
}

// ============ Helpers ============

export function isTerminalStatus(status: ResearchStatus): boolean {
  return TERMINAL_RESEARCH_STATUSES.includes(status);
}

/**
 * Dollar cost reported by Exa, or 0 when the response carries none
 */
export function costOf(response: { costDollars?: CostDollars | null }): number {
  return response.costDollars?.total ?? 0;
}
