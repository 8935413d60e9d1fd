/**
 * Probability and confidence heuristics
 *
 * The constants here are policy, not calibration results.
 */

import type { Confidence } from "../types.js";

export const SENTIMENT_SPREAD = 0.3;
export const SENTIMENT_FLOOR = 0.2;
export const SENTIMENT_CEILING = 0.8;

const NUMBER = String.raw`(\d{1,3}(?:\.\d+)?)`;

const EXPLICIT_PATTERNS: readonly RegExp[] = [
  new RegExp(String.raw`${NUMBER}\s*%\s*(?:chance|probability|likelihood|odds)\b`, "gi"),
  new RegExp(String.raw`probability\s+of\s+${NUMBER}\s*%`, "gi"),
  new RegExp(String.raw`${NUMBER}\s*percent\s+(?:chance|probability|likelihood|odds)\b`, "gi"),
];

export type MentionOrigin = "deep_task" | "answer" | "snippet";

export interface ExplicitMention {
  /** 0..1 */
  probability: number;
  origin: MentionOrigin;
  match: string;
}

/**
 * Earliest explicit probability stated in one text, if any
 */
export function findExplicitProbability(text: string): { probability: number; match: string } | null {
  let best: { index: number; probability: number; match: string } | null = null;

  for (const pattern of EXPLICIT_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const value = Number(match[1]);
      const index = match.index ?? 0;
      if (!Number.isFinite(value) || value < 0 || value > 100) continue;
      if (!best || index < best.index) {
        best = { index, probability: value / 100, match: match[0] };
      }
    }
  }

  return best ? { probability: best.probability, match: best.match } : null;
}

/**
 * First mention across sources in priority order: deep-task output, then answers, then snippets
 */
export function firstExplicitMention(
  sources: ReadonlyArray<{ origin: MentionOrigin; text: string }>
): ExplicitMention | null {
  const rank: Record<MentionOrigin, number> = { deep_task: 0, answer: 1, snippet: 2 };
  const ordered = [...sources].sort((a, b) => rank[a.origin] - rank[b.origin]);

  for (const source of ordered) {
    const found = findExplicitProbability(source.text);
    if (found) {
      return { ...found, origin: source.origin };
    }
  }
  return null;
}

/**
 * 0.5 + 0.3 × (P − N)/(P + N), clamped to [0.2, 0.8]; 0.5 without keyword hits
 */
export function sentimentProbability(positive: number, negative: number): number {
  const hits = positive + negative;
  if (hits === 0) {
    return 0.5;
  }
  const raw = 0.5 + SENTIMENT_SPREAD * ((positive - negative) / hits);
  return Math.min(SENTIMENT_CEILING, Math.max(SENTIMENT_FLOOR, raw));
}

export function confidenceFor(explicit: boolean, distinctDomains: number): Confidence {
  if (explicit && distinctDomains >= 3) return "high";
  if (distinctDomains >= 2) return "medium";
  return "low";
}

export function lowerConfidence(confidence: Confidence): Confidence {
  switch (confidence) {
    case "high":
      return "medium";
    case "medium":
    case "low":
      return "low";
  }
}

export function domainOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, "");
  } catch {
    return null;
  }
}

export function distinctDomains(urls: Iterable<string>): number {
  const domains = new Set<string>();
  for (const url of urls) {
    const domain = domainOf(url);
    if (domain) domains.add(domain);
  }
  return domains.size;
}

export function toPercent(probability: number): number {
  return Math.round(probability * 100);
}
