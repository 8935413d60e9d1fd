/**
 * Keyword lexicon for stance classification
 */

import { readFileSync } from "fs";
import { z } from "zod";

const LexiconSchema = z.object({
  positive: z.array(z.string().min(1)),
  negative: z.array(z.string().min(1)),
});

export interface Lexicon {
  positive: ReadonlySet<string>;
  negative: ReadonlySet<string>;
}

export interface KeywordScore {
  positive: number;
  negative: number;
}

let cached: Lexicon | null = null;

export function loadLexicon(): Lexicon {
  if (!cached) {
    const raw = readFileSync(new URL("./sentiment-lexicon.json", import.meta.url), "utf-8");
    const parsed = LexiconSchema.parse(JSON.parse(raw));
    cached = {
      positive: new Set(parsed.positive.map((word) => word.toLowerCase())),
      negative: new Set(parsed.negative.map((word) => word.toLowerCase())),
    };
  }
  return cached;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z]+/g) ?? [];
}

/**
 * Count keyword occurrences (every occurrence counts)
 */
export function scoreText(text: string, lexicon: Lexicon = loadLexicon()): KeywordScore {
  let positive = 0;
  let negative = 0;
  for (const token of tokenize(text)) {
    if (lexicon.positive.has(token)) positive++;
    else if (lexicon.negative.has(token)) negative++;
  }
  return { positive, negative };
}
