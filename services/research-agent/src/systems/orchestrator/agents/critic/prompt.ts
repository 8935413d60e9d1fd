/**
 * Critic Prompt
 */

import type { CritiqueBundle } from "../../capabilities.js";

export const CRITIC_SYSTEM_PROMPT = `You review probability estimates for prediction markets.
You have no tools. Judge only the evidence you are given.
Reply with a single JSON object and nothing else.`;

const MAX_FACTORS_IN_PROMPT = 15;

export function getCriticPrompt(bundle: CritiqueBundle): string {
  const factors = bundle.factors
    .slice(0, MAX_FACTORS_IN_PROMPT)
    .map((factor, i) => `${i + 1}. [${factor.stance}, ${factor.impact}] ${factor.description} (${factor.sourceUrl})`)
    .join("\n");

  const issues = bundle.verificationIssues.length > 0
    ? bundle.verificationIssues.map((issue) => `- ${issue}`).join("\n")
    : "- none";

  return `Market: ${bundle.title} (${bundle.subjectId})
Research mode: ${bundle.mode}
Market-implied probability of YES: ${(bundle.marketProbability * 100).toFixed(1)}%

Current estimate: ${bundle.analysis.predictedProbability}% (${bundle.analysis.confidence} confidence)
Reasoning: ${bundle.analysis.reasoning}

Evidence:
${factors || "(no sourced evidence)"}

Verifier issues:
${issues}

Give your own estimate of the probability that this market resolves YES, using only the evidence above.
Lower the confidence when the evidence is thin or one-sided.

Respond with JSON of this shape:
{"predictedProbability": <integer 0-100>, "confidence": "low" | "medium" | "high", "notes": "<one or two sentences on what changed your view>"}`;
}
