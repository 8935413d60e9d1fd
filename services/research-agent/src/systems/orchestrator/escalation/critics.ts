/**
 * Critics
 * Each critic proposes a candidate (probability, confidence, factors) or explains why it could not
 */

import { InvariantError, toRedactedError } from "@sibyl/core";
import {
  CritiqueFailedError,
  type CritiqueBundle,
  type MarketSnapshot,
  type SynthesisCapability,
} from "../capabilities.js";
import type { ExecutionContext } from "../executor/step-executor.js";
import { runPlan } from "../executor/plan-runner.js";
import type { BudgetLedger } from "../ledger.js";
import { buildCriticPlan } from "../plan/builder.js";
import { roundUsd } from "../plan/policy.js";
import { lowerConfidence, sentimentProbability, toPercent } from "../synthesis/probability.js";
import type { SynthesizeFn } from "../synthesis/synthesizer.js";
import type {
  AnalysisResult,
  Confidence,
  CriticOutcome,
  Factor,
  Plan,
  ResearchSummary,
  Step,
} from "../types.js";

export interface CriticCandidate {
  predictedProbability: number;
  confidence: Confidence;
  factors: Factor[];
}

export interface CriticRun {
  outcome: CriticOutcome;
  candidate?: CriticCandidate;
}

// ============================================
// RESEARCH CRITIC
// ============================================

export interface ResearchCriticInput {
  plan: Plan;
  market: MarketSnapshot;
  steps: readonly Step[];
  ledger: BudgetLedger;
  context: ExecutionContext;
  synthesize: SynthesizeFn;
  maxConcurrency: number;
  now?: Date;
}

export interface ResearchCriticRun extends CriticRun {
  summary?: ResearchSummary;
  criticSteps: Step[];
}

/**
 * Verification-focused searches, then a fresh synthesis over original and critic evidence
 */
export async function runResearchCritic(input: ResearchCriticInput): Promise<ResearchCriticRun> {
  const { plan, market, steps, ledger } = input;
  const criticPlan = buildCriticPlan(market.subject, plan.mode, ledger.ceiling, {
    recencyDays: plan.recencyDays,
    now: input.now,
  });

  const before = ledger.actual;
  const run = await runPlan(
    criticPlan,
    { ...input.context, priorSteps: steps },
    { maxConcurrency: input.maxConcurrency }
  );
  const cost = roundUsd(ledger.actual - before);

  if (run.steps.every((step) => step.status === "skipped")) {
    return {
      outcome: { critic: "research", status: "skipped", notes: "no budget for critic searches", cost },
      criticSteps: run.steps,
    };
  }

  if (!run.steps.some((step) => step.status === "completed")) {
    const kinds = run.steps.map((step) => step.error?.kind ?? step.status);
    return {
      outcome: { critic: "research", status: "failed", notes: `critic searches failed (${kinds.join(", ")})`, cost },
      criticSteps: run.steps,
    };
  }

  const { analysis, summary } = input.synthesize({
    plan,
    steps: [...steps, ...run.steps],
    market,
    ledger,
    budgetExhausted: run.budgetExhausted,
    now: input.now,
  });

  const found = run.steps.reduce((sum, step) => sum + (step.result?.snippets.length ?? 0), 0);
  return {
    outcome: {
      critic: "research",
      status: "completed",
      predictedProbability: analysis.predictedProbability,
      confidence: analysis.confidence,
      notes: `re-synthesised with ${found} verification results`,
      cost,
    },
    candidate: {
      predictedProbability: analysis.predictedProbability,
      confidence: analysis.confidence,
      factors: analysis.factors,
    },
    summary,
    criticSteps: run.steps,
  };
}

// ============================================
// CONSISTENCY CRITIC
// ============================================

/**
 * Compare the stated direction with the factor balance; deterministic and free
 */
export function runConsistencyCritic(analysis: AnalysisResult): CriticRun {
  const up = analysis.factors.filter((factor) => factor.impact === "up").length;
  const down = analysis.factors.filter((factor) => factor.impact === "down").length;
  const predicted = analysis.predictedProbability;

  let conflict: string | null = null;
  if (!Number.isFinite(predicted) || predicted < 0 || predicted > 100) {
    conflict = `prediction ${predicted} is not a probability`;
  } else if (predicted > 50 && down > up) {
    conflict = `prediction leans yes but ${down} factors point down against ${up} up`;
  } else if (predicted < 50 && up > down) {
    conflict = `prediction leans no but ${up} factors point up against ${down} down`;
  }

  if (!conflict) {
    return {
      outcome: {
        critic: "consistency",
        status: "completed",
        predictedProbability: predicted,
        confidence: analysis.confidence,
        notes: "direction consistent with factor balance",
        cost: 0,
      },
      candidate: { predictedProbability: predicted, confidence: analysis.confidence, factors: [] },
    };
  }

  const proposed = toPercent(sentimentProbability(up, down));
  const confidence = lowerConfidence(analysis.confidence);
  return {
    outcome: {
      critic: "consistency",
      status: "completed",
      predictedProbability: proposed,
      confidence,
      notes: `${conflict}; proposing ${proposed}%`,
      cost: 0,
    },
    candidate: { predictedProbability: proposed, confidence, factors: [] },
  };
}

// ============================================
// SYNTHESIS CRITIC
// ============================================

/**
 * Optional model critique, reserved against the ledger before the call
 */
export async function runSynthesisCritic(
  capability: SynthesisCapability | undefined,
  bundle: CritiqueBundle,
  ledger: BudgetLedger,
  signal?: AbortSignal
): Promise<CriticRun> {
  if (signal?.aborted) {
    return { outcome: { critic: "synthesis", status: "skipped", notes: "run cancelled", cost: 0 } };
  }
  if (!capability || !capability.isAvailable()) {
    return { outcome: { critic: "synthesis", status: "skipped", notes: "synthesis critic unavailable", cost: 0 } };
  }

  const estimate = capability.estimatedCost;
  if (!ledger.reserve(estimate)) {
    return {
      outcome: {
        critic: "synthesis",
        status: "skipped",
        notes: `critique estimate $${estimate} exceeds remaining budget`,
        cost: 0,
      },
    };
  }

  try {
    const { value, cost } = await capability.critique(bundle);
    ledger.reconcile(estimate, cost);
    return {
      outcome: {
        critic: "synthesis",
        status: "completed",
        predictedProbability: value.predictedProbability,
        confidence: value.confidence,
        notes: value.notes,
        cost,
      },
      candidate: {
        predictedProbability: value.predictedProbability,
        confidence: value.confidence,
        factors: [],
      },
    };
  } catch (error) {
    if (error instanceof InvariantError) {
      throw error;
    }
    const spent = error instanceof CritiqueFailedError ? error.cost : 0;
    ledger.reconcile(estimate, spent);
    const redacted = error instanceof CritiqueFailedError ? error : toRedactedError(error);
    return {
      outcome: { critic: "synthesis", status: "failed", notes: `${redacted.kind}: ${redacted.message}`, cost: spent },
    };
  }
}
