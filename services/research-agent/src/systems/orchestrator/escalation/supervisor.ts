/**
 * Supervisor
 * Runs the critics one after another against the shared ledger and merges their candidates
 */

import type { MarketSnapshot, SynthesisCapability } from "../capabilities.js";
import type { ExecutionContext } from "../executor/step-executor.js";
import type { BudgetLedger } from "../ledger.js";
import { truncate, REASONING_MAX, type SynthesizeFn } from "../synthesis/synthesizer.js";
import type {
  AnalysisResult,
  Confidence,
  CriticOutcome,
  Factor,
  Plan,
  ResearchSummary,
  Step,
  VerificationReport,
} from "../types.js";
import {
  runConsistencyCritic,
  runResearchCritic,
  runSynthesisCritic,
  type CriticCandidate,
  type CriticRun,
} from "./critics.js";

const CONFIDENCE_ORDER: readonly Confidence[] = ["low", "medium", "high"];

export function median(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[mid - 1] ?? upper) + upper) / 2;
}

/**
 * Most frequent level; ties resolve to the lower level
 */
export function majorityConfidence(levels: readonly Confidence[]): Confidence {
  let best: Confidence = "low";
  let bestCount = -1;
  for (const level of CONFIDENCE_ORDER) {
    const count = levels.filter((candidate) => candidate === level).length;
    if (count > bestCount) {
      best = level;
      bestCount = count;
    }
  }
  return best;
}

export function unionFactors(...groups: ReadonlyArray<readonly Factor[]>): Factor[] {
  const seen = new Set<string>();
  const merged: Factor[] = [];
  for (const group of groups) {
    for (const factor of group) {
      if (!factor.sourceUrl || seen.has(factor.sourceUrl)) continue;
      seen.add(factor.sourceUrl);
      merged.push(factor);
    }
  }
  return merged;
}

export function aggregate(
  original: AnalysisResult,
  runs: readonly CriticRun[],
  generatedAt: Date
): AnalysisResult {
  const candidates: CriticCandidate[] = runs.flatMap((run) => (run.candidate ? [run.candidate] : []));
  const notes = runs
    .map((run) => `${run.outcome.critic} ${run.outcome.status}: ${run.outcome.notes}`)
    .join("; ");
  const reasoning = truncate(`${original.reasoning} Critic review: ${notes}.`, REASONING_MAX);

  if (candidates.length === 0) {
    return { ...original, reasoning, generatedAt: generatedAt.toISOString() };
  }

  const factors = unionFactors(original.factors, ...candidates.map((candidate) => candidate.factors));

  return {
    ...original,
    predictedProbability: Math.round(median(candidates.map((candidate) => candidate.predictedProbability))),
    confidence: majorityConfidence(candidates.map((candidate) => candidate.confidence)),
    factors,
    sources: factors.map((factor) => factor.sourceUrl),
    reasoning,
    probabilitySource: "aggregate",
    generatedAt: generatedAt.toISOString(),
  };
}

export interface SupervisorDependencies {
  synthesize: SynthesizeFn;
  synthesisCritic?: SynthesisCapability;
  now?: () => Date;
}

export interface SupervisionInput {
  plan: Plan;
  market: MarketSnapshot;
  steps: readonly Step[];
  analysis: AnalysisResult;
  summary: ResearchSummary;
  report: VerificationReport;
  ledger: BudgetLedger;
  context: ExecutionContext;
  maxConcurrency: number;
}

export interface SupervisionResult {
  analysis: AnalysisResult;
  /** Original summary extended with critic evidence */
  summary: ResearchSummary;
  critiques: CriticOutcome[];
  criticSteps: Step[];
  budgetExhausted: boolean;
}

export class Supervisor {
  private readonly now: () => Date;

  constructor(private readonly deps: SupervisorDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  async supervise(input: SupervisionInput): Promise<SupervisionResult> {
    const { plan, market, analysis, summary, ledger } = input;

    const research = await runResearchCritic({
      plan,
      market,
      steps: input.steps,
      ledger,
      context: input.context,
      synthesize: this.deps.synthesize,
      maxConcurrency: input.maxConcurrency,
      now: this.now(),
    });

    const consistency = runConsistencyCritic(analysis);

    const synthesis = await runSynthesisCritic(
      this.deps.synthesisCritic,
      {
        subjectId: analysis.subjectId,
        title: market.subject.title,
        mode: plan.mode,
        marketProbability: analysis.marketProbability,
        analysis: {
          predictedProbability: analysis.predictedProbability,
          confidence: analysis.confidence,
          reasoning: analysis.reasoning,
        },
        factors: analysis.factors,
        verificationIssues: input.report.issues,
      },
      ledger,
      input.context.signal
    );

    const runs = [research, consistency, synthesis];
    const merged = aggregate(analysis, runs, this.now());

    const criticBudgetExhausted = research.criticSteps.some((step) => step.status === "skipped");
    const extended: ResearchSummary = {
      ...summary,
      factors: unionFactors(summary.factors, research.summary?.factors ?? []),
      queriesUsed: [...new Set([...summary.queriesUsed, ...(research.summary?.queriesUsed ?? [])])],
      totalCost: ledger.actual,
    };

    return {
      analysis: merged,
      summary: extended,
      critiques: runs.map((run) => run.outcome),
      criticSteps: research.criticSteps,
      budgetExhausted: criticBudgetExhausted,
    };
  }
}
