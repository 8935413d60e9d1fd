/**
 * Orchestrator Schemas
 * Zod schemas for plans, steps and everything a run returns
 *
 * Modes, phases, actions and statuses are closed unions: consumers
 * switch over them exhaustively.
 */

import { z } from "zod";

// ============================================
// CLOSED UNIONS
// ============================================

export const ResearchModeSchema = z.enum(["fast", "standard", "deep"]);

export const PhaseSchema = z.enum([
  "background",
  "current_news",
  "expert_opinions",
  "deep_research",
  "synthesis",
]);

export const ActionSchema = z.enum(["search", "fetch_contents", "ask", "deep_task"]);

export const StepStatusSchema = z.enum(["pending", "running", "completed", "failed", "skipped"]);

export const SearchTypeSchema = z.enum(["fast", "auto", "deep"]);

export const StepErrorKindSchema = z.enum([
  "network",
  "auth",
  "rate_limit",
  "api",
  "timeout",
  "task_unrecoverable",
  "cancelled",
  "budget_exhausted",
]);

export const ImpactSchema = z.enum(["up", "down", "unclear"]);

export const StanceSchema = z.enum(["bull", "bear", "neutral"]);

export const ConfidenceSchema = z.enum(["low", "medium", "high"]);

export const ProbabilitySourceSchema = z.enum(["explicit", "sentiment", "aggregate", "critic"]);

export const RunStateSchema = z.enum([
  "planning",
  "executing",
  "synthesizing",
  "verifying",
  "escalating",
  "supervising",
  "re_verifying",
  "done",
]);

export const EscalationTriggerSchema = z.enum(["verification_failed", "ev_delta"]);

export const EscalationBlockSchema = z.enum(["cancelled", "disabled", "no_trigger", "no_budget"]);

// ============================================
// PLANNED STEPS
// ============================================

const StepBaseSchema = z.object({
  id: z.string().min(1),
  phase: PhaseSchema,
  description: z.string(),
  estimatedCost: z.number().min(0),
});

export const SearchParamsSchema = z.object({
  query: z.string().min(1),
  numResults: z.number().int().positive(),
  searchType: SearchTypeSchema,
  category: z.literal("news").optional(),
  recencyDays: z.number().int().positive().optional(),
  includeText: z.boolean(),
  includeHighlights: z.boolean(),
});

export const FetchContentsParamsSchema = z.object({
  fromPhases: z.array(PhaseSchema).min(1),
  limit: z.number().int().positive(),
});

export const AskParamsSchema = z.object({
  query: z.string().min(1),
  includeText: z.boolean(),
});

export const DeepTaskParamsSchema = z.object({
  instructions: z.string().min(1),
  timeoutSeconds: z.number().positive(),
  pollIntervalSeconds: z.number().positive(),
});

export const PlannedStepSchema = z.discriminatedUnion("action", [
  StepBaseSchema.extend({ action: z.literal("search"), params: SearchParamsSchema }),
  StepBaseSchema.extend({ action: z.literal("fetch_contents"), params: FetchContentsParamsSchema }),
  StepBaseSchema.extend({ action: z.literal("ask"), params: AskParamsSchema }),
  StepBaseSchema.extend({ action: z.literal("deep_task"), params: DeepTaskParamsSchema }),
]);

export const PlanSchema = z.object({
  planId: z.string().length(12),
  subjectId: z.string().min(1),
  mode: ResearchModeSchema,
  createdAt: z.string(),
  budgetCeiling: z.number().positive(),
  totalEstimatedCost: z.number().min(0),
  recencyDays: z.number().int().positive(),
  steps: z.array(PlannedStepSchema).min(1),
});

// ============================================
// STEP OUTCOMES
// ============================================

export const SnippetSchema = z.object({
  text: z.string(),
  title: z.string().optional(),
  url: z.string().nullable(),
  publishedDate: z.string().optional(),
  origin: ActionSchema,
  stepId: z.string(),
});

export const StepResultSchema = z.object({
  snippets: z.array(SnippetSchema),
  answerText: z.string().optional(),
  deepOutput: z.string().optional(),
  externalTaskId: z.string().optional(),
});

export const StepErrorSchema = z.object({
  kind: StepErrorKindSchema,
  message: z.string(),
});

export const StepOutcomeSchema = z.object({
  id: z.string(),
  phase: PhaseSchema,
  action: ActionSchema,
  status: StepStatusSchema,
  estimatedCost: z.number(),
  cost: z.number(),
  snippetCount: z.number().int().min(0),
  error: StepErrorSchema.optional(),
});

// ============================================
// SYNTHESIS OUTPUT
// ============================================

export const FactorSchema = z.object({
  description: z.string(),
  impact: ImpactSchema,
  sourceUrl: z.string().min(1),
  stance: StanceSchema,
  publishedDate: z.string().optional(),
});

export const ResearchSummarySchema = z.object({
  subjectId: z.string(),
  title: z.string(),
  mode: ResearchModeSchema,
  factors: z.array(FactorSchema),
  narrative: z.string(),
  queriesUsed: z.array(z.string()),
  totalSourcesFound: z.number().int().min(0),
  droppedUnsourced: z.number().int().min(0),
  totalCost: z.number().min(0),
  budgetCeiling: z.number().positive(),
  budgetExhausted: z.boolean(),
  steps: z.array(StepOutcomeSchema),
});

// Range checks live in the verifier so out-of-range values can be reported
export const AnalysisResultSchema = z.object({
  subjectId: z.string(),
  marketProbability: z.number(),
  predictedProbability: z.number(),
  confidence: ConfidenceSchema,
  reasoning: z.string(),
  factors: z.array(FactorSchema),
  sources: z.array(z.string()),
  probabilitySource: ProbabilitySourceSchema,
  generatedAt: z.string(),
});

export const VerificationReportSchema = z.object({
  passed: z.boolean(),
  issues: z.array(z.string()),
  checkedSources: z.number().int().min(0),
  suggestedEscalation: z.boolean(),
});

export const EscalationDecisionSchema = z.object({
  escalate: z.boolean(),
  triggers: z.array(EscalationTriggerSchema),
  blockedBy: EscalationBlockSchema.optional(),
});

export const CriticNameSchema = z.enum(["research", "consistency", "synthesis"]);

export const CriticOutcomeSchema = z.object({
  critic: CriticNameSchema,
  status: z.enum(["completed", "skipped", "failed"]),
  predictedProbability: z.number().optional(),
  confidence: ConfidenceSchema.optional(),
  notes: z.string(),
  cost: z.number().min(0),
});

export const AgentRunResultSchema = z.object({
  runId: z.string(),
  subjectId: z.string(),
  mode: ResearchModeSchema,
  planId: z.string(),
  analysis: AnalysisResultSchema,
  initialVerification: VerificationReportSchema,
  verification: VerificationReportSchema,
  researchSummary: ResearchSummarySchema,
  escalated: z.boolean(),
  escalation: EscalationDecisionSchema,
  critiques: z.array(CriticOutcomeSchema),
  totalCost: z.number().min(0),
  budgetCeiling: z.number().positive(),
  budgetSpent: z.number().min(0),
  budgetExhausted: z.boolean(),
  states: z.array(RunStateSchema),
  startedAt: z.string(),
  completedAt: z.string(),
});

// ============================================
// CRITIC I/O
// ============================================

export const CritiqueOutputSchema = z.object({
  predictedProbability: z.number().min(0).max(100),
  confidence: ConfidenceSchema,
  notes: z.string().min(1).max(1000),
});
