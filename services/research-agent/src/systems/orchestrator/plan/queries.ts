/**
 * Query generation from a subject title
 */

/**
 * "Will X happen?" -> "X happen"
 */
export function cleanTitle(title: string): string {
  let clean = title.trim();
  if (clean.toLowerCase().startsWith("will ")) {
    clean = clean.slice(5);
  }
  return clean.replace(/\?+$/, "").trim();
}

/**
 * Up to three de-duplicated queries: the clean title, a news variant and an analysis variant
 */
export function generateQueries(title: string): string[] {
  const clean = cleanTitle(title);
  const queries = [clean, `${clean} news`, `${clean} analysis forecast`].filter(
    (query) => clean.length > 0 && query.length > 0
  );
  return [...new Set(queries)].slice(0, 3);
}

export function deepTaskInstructions(title: string): string {
  return `Research on ${title.replace(/\?+$/, "").trim()}`;
}
