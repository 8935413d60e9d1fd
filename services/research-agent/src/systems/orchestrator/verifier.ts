/**
 * Verifier
 * Rule-based checks on an analysis; no model involved
 */

import type { AnalysisResult, ResearchSummary, VerificationReport } from "./types.js";
import { ImpactSchema } from "./schemas.js";
import { domainOf } from "./synthesis/probability.js";

export const REASONING_MIN = 50;
export const REASONING_LIMIT = 2000;

export interface VerifierPolicy {
  minCitationDomains: number;
}

export const DEFAULT_VERIFIER_POLICY: VerifierPolicy = { minCitationDomains: 2 };

function duplicates(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) repeated.add(value);
    seen.add(value);
  }
  return [...repeated];
}

/**
 * Issues are reported in rule order
 */
export function verify(
  analysis: AnalysisResult,
  summary?: ResearchSummary,
  policy: VerifierPolicy = DEFAULT_VERIFIER_POLICY
): VerificationReport {
  const issues: string[] = [];
  const { predictedProbability: predicted, marketProbability: market } = analysis;

  if (!Number.isFinite(predicted) || predicted < 0 || predicted > 100) {
    issues.push(`predicted probability out of range [0, 100]: ${predicted}`);
  }

  if (!Number.isFinite(market) || market < 0 || market > 1) {
    issues.push(`market probability out of range [0, 1]: ${market}`);
  }

  const repeated = duplicates(analysis.sources);
  if (repeated.length > 0) {
    issues.push(`duplicate sources: ${repeated.join(", ")}`);
  }

  const factorUrls = new Set(analysis.factors.map((factor) => factor.sourceUrl));
  const orphans = analysis.sources.filter((source) => !factorUrls.has(source));
  if (orphans.length > 0) {
    issues.push(`sources not backed by any factor: ${orphans.join(", ")}`);
  }

  if (analysis.confidence !== "low") {
    const domains = new Set(
      analysis.sources.map(domainOf).filter((domain): domain is string => domain !== null)
    );
    if (domains.size < policy.minCitationDomains) {
      issues.push(
        `${analysis.confidence} confidence needs at least ${policy.minCitationDomains} distinct source domains, found ${domains.size}`
      );
    }
  }

  const length = analysis.reasoning.length;
  if (length < REASONING_MIN || length > REASONING_LIMIT) {
    issues.push(`reasoning length ${length} outside [${REASONING_MIN}, ${REASONING_LIMIT}]`);
  }

  if (analysis.confidence === "high" && predicted === Math.round(market * 100)) {
    issues.push("high-confidence prediction equals the market price");
  }

  analysis.factors.forEach((factor, index) => {
    if (!factor.sourceUrl || factor.sourceUrl.trim().length === 0) {
      issues.push(`factor ${index} has no source URL`);
    }
    if (!ImpactSchema.safeParse(factor.impact).success) {
      issues.push(`factor ${index} has invalid impact: ${String(factor.impact)}`);
    }
  });

  if (summary) {
    const gathered = new Set(summary.factors.map((factor) => factor.sourceUrl));
    const unknown = analysis.factors
      .map((factor) => factor.sourceUrl)
      .filter((url) => url && !gathered.has(url));
    if (unknown.length > 0) {
      issues.push(`factor URLs not gathered by research: ${[...new Set(unknown)].join(", ")}`);
    }
  }

  const passed = issues.length === 0;
  return {
    passed,
    issues,
    checkedSources: analysis.sources.length,
    suggestedEscalation: !passed,
  };
}
