/**
 * Capability Interfaces
 * The orchestrator depends only on these; concrete providers live under domains/
 */

import type {
  AnalysisResult,
  CritiqueOutput,
  Factor,
  ResearchMode,
  SearchType,
} from "./types.js";

// ============================================
// MARKET DATA
// ============================================

export interface ResearchSubject {
  id: string;
  title: string;
  subtitle?: string;
  closeTime: string;
  expirationTime?: string;
}

export interface PriceSnapshot {
  /** 0..1 */
  midpointProbability: number;
  yesBid: number;
  yesAsk: number;
  spreadCents: number;
  lastPrice?: number;
  volume24h: number;
  openInterest: number;
  liquidityUsd: number;
  capturedAt: string;
}

export interface MarketSnapshot {
  subject: ResearchSubject;
  price: PriceSnapshot;
}

export interface MarketDataProvider {
  getSubject(subjectId: string): Promise<MarketSnapshot>;
}

// ============================================
// RESEARCH PROVIDER
// ============================================

/**
 * Every priced response carries the provider-reported cost in USD
 */
export interface Priced<T> {
  value: T;
  cost: number;
}

export interface SourceDocument {
  url: string | null;
  title?: string;
  text: string;
  publishedDate?: string;
}

export interface SearchQuery {
  query: string;
  numResults: number;
  searchType: SearchType;
  category?: "news";
  startPublishedDate?: string;
  includeText: boolean;
  includeHighlights: boolean;
}

export interface AnswerResult {
  answer: string;
  citations: SourceDocument[];
}

export type DeepTaskStatus = "pending" | "running" | "completed" | "failed" | "canceled";

export interface DeepTaskSnapshot {
  taskId: string;
  status: DeepTaskStatus;
  /** ISO timestamp */
  createdAt: string;
  instructions: string;
  output?: string;
  citations: SourceDocument[];
  cost?: number;
  error?: string;
}

export const TERMINAL_TASK_STATUSES: readonly DeepTaskStatus[] = ["completed", "failed", "canceled"];

export function isTerminalTaskStatus(status: DeepTaskStatus): boolean {
  return TERMINAL_TASK_STATUSES.includes(status);
}

export interface ResearchProvider {
  search(query: SearchQuery, signal?: AbortSignal): Promise<Priced<SourceDocument[]>>;
  fetchContents(
    urls: string[],
    options: { includeText: boolean },
    signal?: AbortSignal
  ): Promise<Priced<SourceDocument[]>>;
  ask(
    query: string,
    options: { includeText: boolean },
    signal?: AbortSignal
  ): Promise<Priced<AnswerResult>>;
  createDeepTask(instructions: string): Promise<DeepTaskSnapshot>;
  /** Direct lookup by id; a missing task surfaces as a ProviderError with status 404 */
  pollDeepTask(taskId: string): Promise<DeepTaskSnapshot>;
  /** Recent tasks, newest first */
  listDeepTasks(): Promise<DeepTaskSnapshot[]>;
}

// ============================================
// SYNTHESIS CRITIC
// ============================================

export interface CritiqueBundle {
  subjectId: string;
  title: string;
  mode: ResearchMode;
  marketProbability: number;
  analysis: Pick<AnalysisResult, "predictedProbability" | "confidence" | "reasoning">;
  factors: Factor[];
  verificationIssues: string[];
}

export interface SynthesisCapability {
  isAvailable(): boolean;
  /** Reserved against the ledger before each call */
  readonly estimatedCost: number;
  critique(bundle: CritiqueBundle): Promise<Priced<CritiqueOutput>>;
}

/**
 * A critique that failed after the call was billed. Messages are already redacted.
 */
export class CritiqueFailedError extends Error {
  constructor(
    message: string,
    readonly kind: "validation" | "execution" | "infra",
    readonly cost: number
  ) {
    super(message);
    this.name = "CritiqueFailedError";
  }
}
