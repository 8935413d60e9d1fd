export {
  synthesize,
  stepOutcome,
  truncate,
  REASONING_MAX,
  type SynthesisInput,
  type SynthesisOutput,
  type SynthesizeFn,
} from "./synthesizer.js";
export {
  collectEvidence,
  classifyEvidence,
  diceSimilarity,
  normalizeText,
  stanceOf,
  impactOf,
  DUPLICATE_SIMILARITY,
  MAX_FACTORS,
  type SourcedSnippet,
} from "./factors.js";
export {
  confidenceFor,
  distinctDomains,
  domainOf,
  findExplicitProbability,
  firstExplicitMention,
  lowerConfidence,
  sentimentProbability,
  toPercent,
} from "./probability.js";
export { loadLexicon, scoreText, tokenize } from "./lexicon.js";
