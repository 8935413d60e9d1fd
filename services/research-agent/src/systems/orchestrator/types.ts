/**
 * Orchestrator Types
 */

import type { z } from "zod";
import { InvariantError } from "@sibyl/core";
import type {
  ResearchModeSchema,
  PhaseSchema,
  ActionSchema,
  StepStatusSchema,
  SearchTypeSchema,
  StepErrorKindSchema,
  ImpactSchema,
  StanceSchema,
  ConfidenceSchema,
  ProbabilitySourceSchema,
  RunStateSchema,
  EscalationTriggerSchema,
  EscalationBlockSchema,
  PlannedStepSchema,
  PlanSchema,
  SearchParamsSchema,
  FetchContentsParamsSchema,
  AskParamsSchema,
  DeepTaskParamsSchema,
  SnippetSchema,
  StepResultSchema,
  StepErrorSchema,
  StepOutcomeSchema,
  FactorSchema,
  ResearchSummarySchema,
  AnalysisResultSchema,
  VerificationReportSchema,
  EscalationDecisionSchema,
  CriticNameSchema,
  CriticOutcomeSchema,
  AgentRunResultSchema,
  CritiqueOutputSchema,
} from "./schemas.js";

// ============================================
// CLOSED UNIONS
// ============================================

export type ResearchMode = z.infer<typeof ResearchModeSchema>;
export type Phase = z.infer<typeof PhaseSchema>;
export type Action = z.infer<typeof ActionSchema>;
export type StepStatus = z.infer<typeof StepStatusSchema>;
export type SearchType = z.infer<typeof SearchTypeSchema>;
export type StepErrorKind = z.infer<typeof StepErrorKindSchema>;
export type Impact = z.infer<typeof ImpactSchema>;
export type Stance = z.infer<typeof StanceSchema>;
export type Confidence = z.infer<typeof ConfidenceSchema>;
export type ProbabilitySource = z.infer<typeof ProbabilitySourceSchema>;
export type RunState = z.infer<typeof RunStateSchema>;
export type EscalationTrigger = z.infer<typeof EscalationTriggerSchema>;
export type EscalationBlock = z.infer<typeof EscalationBlockSchema>;
export type CriticName = z.infer<typeof CriticNameSchema>;

// ============================================
// PLAN
// ============================================

export type SearchParams = z.infer<typeof SearchParamsSchema>;
export type FetchContentsParams = z.infer<typeof FetchContentsParamsSchema>;
export type AskParams = z.infer<typeof AskParamsSchema>;
export type DeepTaskParams = z.infer<typeof DeepTaskParamsSchema>;

export type PlannedStep = z.infer<typeof PlannedStepSchema>;

/** A frozen plan; nothing mutates it once built */
export type Plan = Readonly<Omit<z.infer<typeof PlanSchema>, "steps">> & {
  readonly steps: readonly PlannedStep[];
};

// ============================================
// STEP EXECUTION
// ============================================

export type Snippet = z.infer<typeof SnippetSchema>;
export type StepResult = z.infer<typeof StepResultSchema>;
export type StepError = z.infer<typeof StepErrorSchema>;
export type StepOutcome = z.infer<typeof StepOutcomeSchema>;

/**
 * A planned step plus its execution state.
 * Mutated in place by the step executor only.
 */
export type Step = PlannedStep & {
  status: StepStatus;
  cost: number;
  result?: StepResult;
  error?: StepError;
  startedAt?: string;
  finishedAt?: string;
};

// ============================================
// OUTPUTS
// ============================================

export type Factor = z.infer<typeof FactorSchema>;
export type ResearchSummary = z.infer<typeof ResearchSummarySchema>;
export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;
export type VerificationReport = z.infer<typeof VerificationReportSchema>;
export type EscalationDecision = z.infer<typeof EscalationDecisionSchema>;
export type CriticOutcome = z.infer<typeof CriticOutcomeSchema>;
export type AgentRunResult = z.infer<typeof AgentRunResultSchema>;
export type CritiqueOutput = z.infer<typeof CritiqueOutputSchema>;

// ============================================
// POLICY
// ============================================

/**
 * Tunable policy for a run. Thresholds are heuristics, not calibrated values.
 */
export interface OrchestratorPolicy {
  /** Default budget per mode when a run gives none */
  defaultBudgets: Record<ResearchMode, number>;
  escalationEnabled: boolean;
  evDeltaThreshold: number;
  minVolume24h: number;
  /** Bounded fan-out within a phase (1..3) */
  maxConcurrency: number;
  minCitationDomains: number;
  recencyDays: number;
  deepTaskTimeoutSeconds: number;
  deepTaskPollSeconds: number;
}

export const DEFAULT_BUDGETS: Record<ResearchMode, number> = {
  fast: 0.05,
  standard: 0.25,
  deep: 1.0,
};

export const DEFAULT_POLICY: OrchestratorPolicy = {
  defaultBudgets: DEFAULT_BUDGETS,
  escalationEnabled: false,
  evDeltaThreshold: 0.1,
  minVolume24h: 1000,
  maxConcurrency: 1,
  minCitationDomains: 2,
  recencyDays: 30,
  deepTaskTimeoutSeconds: 300,
  deepTaskPollSeconds: 5,
};

/**
 * Compile-time exhaustiveness check for switches over closed unions
 */
export function assertNever(value: never, label = "value"): never {
  throw new InvariantError(`Unhandled ${label}: ${String(value)}`);
}
