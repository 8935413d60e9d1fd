/**
 * Evidence collection: unsourced filtering, near-duplicate removal, stance classification
 */

import type { Factor, Impact, Snippet, Stance, Step } from "../types.js";
import { scoreText, type KeywordScore, type Lexicon } from "./lexicon.js";

export const DUPLICATE_SIMILARITY = 0.92;
export const STANCE_MARGIN = 1;
export const MAX_FACTORS = 25;
const EXCERPT_CHARS = 280;

export interface SourcedSnippet extends Snippet {
  url: string;
}

export interface CollectedEvidence {
  /** Sourced, de-duplicated snippets in plan order */
  snippets: SourcedSnippet[];
  droppedUnsourced: number;
  droppedDuplicates: number;
}

export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9]+/g, " ").trim();
}

function bigrams(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (let i = 0; i < text.length - 1; i++) {
    const gram = text.slice(i, i + 2);
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  return counts;
}

/**
 * Sørensen–Dice coefficient over character bigram multisets
 */
export function diceSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length < 2 || b.length < 2) return 0;

  const left = bigrams(a);
  const right = bigrams(b);
  let overlap = 0;
  for (const [gram, count] of left) {
    overlap += Math.min(count, right.get(gram) ?? 0);
  }
  return (2 * overlap) / (a.length - 1 + (b.length - 1));
}

function isSourced(snippet: Snippet): snippet is SourcedSnippet {
  return typeof snippet.url === "string" && snippet.url.trim().length > 0;
}

/**
 * Gather snippets from completed steps in step order
 */
export function collectEvidence(steps: readonly Step[]): CollectedEvidence {
  const kept: Array<{ snippet: SourcedSnippet; normalized: string }> = [];
  let droppedUnsourced = 0;
  let droppedDuplicates = 0;

  for (const step of steps) {
    if (step.status !== "completed") continue;

    for (const snippet of step.result?.snippets ?? []) {
      if (!isSourced(snippet)) {
        droppedUnsourced++;
        continue;
      }

      const normalized = normalizeText(snippet.text || snippet.title || "");
      const duplicate = kept.some(
        (other) =>
          (other.snippet.url === snippet.url && other.normalized === normalized) ||
          (normalized.length > 0 && diceSimilarity(other.normalized, normalized) >= DUPLICATE_SIMILARITY)
      );

      if (duplicate) {
        droppedDuplicates++;
      } else {
        kept.push({ snippet, normalized });
      }
    }
  }

  return { snippets: kept.map((entry) => entry.snippet), droppedUnsourced, droppedDuplicates };
}

export function stanceOf(score: KeywordScore, margin = STANCE_MARGIN): Stance {
  if (score.positive - score.negative >= margin) return "bull";
  if (score.negative - score.positive >= margin) return "bear";
  return "neutral";
}

export function impactOf(stance: Stance): Impact {
  switch (stance) {
    case "bull":
      return "up";
    case "bear":
      return "down";
    case "neutral":
      return "unclear";
  }
}

function excerpt(text: string): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  return collapsed.length > EXCERPT_CHARS ? `${collapsed.slice(0, EXCERPT_CHARS - 3)}...` : collapsed;
}

export function describe(snippet: SourcedSnippet): string {
  const body = excerpt(snippet.text);
  const title = snippet.title?.trim();
  if (title && body && !body.startsWith(title)) return `${title}: ${body}`;
  return body || title || snippet.url;
}

export interface ClassifiedEvidence {
  factors: Factor[];
  /** Keyword totals across every kept snippet */
  totals: KeywordScore;
}

/**
 * One factor per source URL (first snippet wins), capped at MAX_FACTORS
 */
export function classifyEvidence(snippets: readonly SourcedSnippet[], lexicon?: Lexicon): ClassifiedEvidence {
  const totals: KeywordScore = { positive: 0, negative: 0 };
  const factors: Factor[] = [];
  const seen = new Set<string>();

  for (const snippet of snippets) {
    const score = scoreText(`${snippet.title ?? ""} ${snippet.text}`, lexicon);
    totals.positive += score.positive;
    totals.negative += score.negative;

    if (seen.has(snippet.url) || factors.length >= MAX_FACTORS) continue;
    seen.add(snippet.url);

    const stance = stanceOf(score);
    factors.push({
      description: describe(snippet),
      impact: impactOf(stance),
      sourceUrl: snippet.url,
      stance,
      ...(snippet.publishedDate ? { publishedDate: snippet.publishedDate } : {}),
    });
  }

  return { factors, totals };
}
