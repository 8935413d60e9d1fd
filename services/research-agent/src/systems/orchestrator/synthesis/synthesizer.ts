/**
 * Synthesizer
 * Turns executed steps into a research summary and an analysis result
 *
 * Deterministic: identical step results give identical output apart from generatedAt.
 */

import { invariant } from "@sibyl/core";
import type { MarketSnapshot } from "../capabilities.js";
import type { BudgetLedger } from "../ledger.js";
import type {
  AnalysisResult,
  Factor,
  Plan,
  ProbabilitySource,
  ResearchSummary,
  Step,
  StepOutcome,
} from "../types.js";
import { classifyEvidence, collectEvidence } from "./factors.js";
import {
  confidenceFor,
  distinctDomains,
  firstExplicitMention,
  sentimentProbability,
  toPercent,
  type ExplicitMention,
  type MentionOrigin,
} from "./probability.js";

export const REASONING_MAX = 2000;
const NARRATIVE_MAX = 4000;
const KEY_FACTORS_IN_REASONING = 5;

export interface SynthesisInput {
  plan: Plan;
  steps: readonly Step[];
  market: MarketSnapshot;
  ledger: BudgetLedger;
  budgetExhausted: boolean;
  now?: Date;
}

export interface SynthesisOutput {
  summary: ResearchSummary;
  analysis: AnalysisResult;
}

export type SynthesizeFn = (input: SynthesisInput) => SynthesisOutput;

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

export function stepOutcome(step: Step): StepOutcome {
  return {
    id: step.id,
    phase: step.phase,
    action: step.action,
    status: step.status,
    estimatedCost: step.estimatedCost,
    cost: step.cost,
    snippetCount: step.result?.snippets.length ?? 0,
    ...(step.error ? { error: step.error } : {}),
  };
}

function queriesUsed(steps: readonly Step[]): string[] {
  const queries = new Set<string>();
  for (const step of steps) {
    if (step.status !== "completed") continue;
    if (step.action === "search" || step.action === "ask") {
      queries.add(step.params.query);
    }
  }
  return [...queries];
}

function mentionSources(
  steps: readonly Step[],
  snippetTexts: readonly string[]
): Array<{ origin: MentionOrigin; text: string }> {
  const sources: Array<{ origin: MentionOrigin; text: string }> = [];
  for (const step of steps) {
    if (step.status !== "completed" || !step.result) continue;
    if (step.result.deepOutput) sources.push({ origin: "deep_task", text: step.result.deepOutput });
    if (step.result.answerText) sources.push({ origin: "answer", text: step.result.answerText });
  }
  for (const text of snippetTexts) {
    sources.push({ origin: "snippet", text });
  }
  return sources;
}

function describeMention(mention: ExplicitMention): string {
  switch (mention.origin) {
    case "deep_task":
      return "the deep research report";
    case "answer":
      return "a provider answer";
    case "snippet":
      return "a cited source";
  }
}

function buildNarrative(factors: readonly Factor[]): string {
  if (factors.length === 0) {
    return "No sourced evidence was gathered.";
  }
  return truncate(
    factors.map((factor) => `- [${factor.stance}] ${factor.description} (${factor.sourceUrl})`).join("\n"),
    NARRATIVE_MAX
  );
}

function buildReasoning(params: {
  title: string;
  marketProbability: number;
  predicted: number;
  factors: readonly Factor[];
  domains: number;
  mention: ExplicitMention | null;
  budgetExhausted: boolean;
}): string {
  const { factors } = params;
  const count = (stance: Factor["stance"]): number => factors.filter((f) => f.stance === stance).length;

  const parts = [
    `Market "${params.title}" trades at ${(params.marketProbability * 100).toFixed(1)}%.`,
    `Research gathered ${factors.length} sourced factors from ${params.domains} domains ` +
      `(${count("bull")} bullish, ${count("bear")} bearish, ${count("neutral")} neutral).`,
    params.mention
      ? `An explicit estimate of ${params.predicted}% ("${params.mention.match}") was found in ${describeMention(params.mention)}.`
      : `Without an explicit estimate, keyword balance gives ${params.predicted}%.`,
  ];

  if (params.budgetExhausted) {
    parts.push("Research was cut short by the budget ceiling.");
  }

  const key = factors.slice(0, KEY_FACTORS_IN_REASONING).map((f) => f.description);
  if (key.length > 0) {
    parts.push(`Key factors: ${key.join(" | ")}`);
  }

  return truncate(parts.join(" "), REASONING_MAX);
}

export function synthesize(input: SynthesisInput): SynthesisOutput {
  const { plan, steps, market, ledger, budgetExhausted } = input;
  const subject = market.subject;

  const evidence = collectEvidence(steps);
  const { factors, totals } = classifyEvidence(evidence.snippets);

  invariant(
    factors.every((factor) => factor.sourceUrl.length > 0),
    "factor without source URL reached synthesis output",
    { subjectId: subject.id }
  );

  const mention = firstExplicitMention(
    mentionSources(
      steps,
      evidence.snippets.map((snippet) => snippet.text)
    )
  );
  const probability = mention?.probability ?? sentimentProbability(totals.positive, totals.negative);
  const probabilitySource: ProbabilitySource = mention ? "explicit" : "sentiment";
  const predicted = toPercent(probability);

  const sources = [...new Set(factors.map((factor) => factor.sourceUrl))];
  const domains = distinctDomains(sources);
  const marketProbability = market.price.midpointProbability;

  const summary: ResearchSummary = {
    subjectId: subject.id,
    title: subject.title,
    mode: plan.mode,
    factors,
    narrative: buildNarrative(factors),
    queriesUsed: queriesUsed(steps),
    totalSourcesFound: new Set(evidence.snippets.map((snippet) => snippet.url)).size,
    droppedUnsourced: evidence.droppedUnsourced,
    totalCost: ledger.actual,
    budgetCeiling: ledger.ceiling,
    budgetExhausted,
    steps: steps.map(stepOutcome),
  };

  const analysis: AnalysisResult = {
    subjectId: subject.id,
    marketProbability,
    predictedProbability: predicted,
    confidence: confidenceFor(mention !== null, domains),
    reasoning: buildReasoning({
      title: subject.title,
      marketProbability,
      predicted,
      factors,
      domains,
      mention,
      budgetExhausted,
    }),
    factors,
    sources,
    probabilitySource,
    generatedAt: (input.now ?? new Date()).toISOString(),
  };

  return { summary, analysis };
}
