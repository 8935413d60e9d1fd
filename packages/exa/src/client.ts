/**
 * Exa API Client
 * Search, contents, answer and research-task endpoints with retries and error mapping
 */

import type { z } from "zod";
import {
  getBaseConfig,
  logger,
  ProviderError,
  ValidationError,
  type Logger,
} from "@sibyl/core";
import {
  AnswerResponseSchema,
  ContentsResponseSchema,
  ResearchTaskListSchema,
  ResearchTaskSchema,
  SearchResponseSchema,
  type AnswerRequest,
  type AnswerResponse,
  type ContentsResponse,
  type CreateResearchTaskRequest,
  type GetContentsRequest,
  type ResearchTask,
  type ResearchTaskList,
  type SearchRequest,
  type SearchResponse,
} from "./types.js";

const PROVIDER = "exa";

export interface ExaClientOptions {
  apiKey?: string;
  baseUrl?: string;
  fetch?: typeof fetch;
  timeoutMs?: number;
  /** Total attempts per request, including the first */
  maxRetries?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

interface RequestOptions {
  body?: object;
  query?: Record<string, string | number | undefined>;
  /** Caller cancellation; combined with the per-request timeout */
  signal?: AbortSignal;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay in ms derived from a Retry-After header (seconds or HTTP date)
 */
export function parseRetryAfter(
  header: string | null,
  fallbackMs: number,
  now: number = Date.now()
): number {
  if (!header || !header.trim()) {
    return fallbackMs;
  }

  const value = header.trim();
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.ceil(seconds)) * 1000;
  }

  const retryAt = Date.parse(value);
  if (Number.isNaN(retryAt)) {
    return fallbackMs;
  }

  return Math.max(0, Math.ceil((retryAt - now) / 1000)) * 1000;
}

/**
 * Exa API client
 */
export class ExaClient {
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private log: Logger;

  constructor(options: ExaClientOptions = {}) {
    const needsConfig = options.apiKey === undefined || options.baseUrl === undefined;
    const config = needsConfig ? getBaseConfig().exa : undefined;

    this.apiKey = options.apiKey ?? config?.apiKey;
    this.baseUrl = (options.baseUrl ?? config?.baseUrl ?? "https://api.exa.ai").replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = logger.child({ component: PROVIDER });
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  /**
   * Send a request, retrying network failures, 429 and 5xx responses
   */
  async request<T>(
    method: "GET" | "POST",
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    const apiKey = this.apiKey;
    if (!apiKey) {
      throw new ProviderError("EXA_API_KEY is not set", {
        kind: "auth",
        provider: PROVIDER,
        endpoint: path,
      });
    }

    const url = this.buildUrl(path, options.query);
    const body = options.body ? JSON.stringify(options.body) : undefined;
    let lastError: ProviderError | undefined;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      const canRetry = attempt < this.maxRetries;
      this.log.debug("Exa request", { method, path, attempt });

      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method,
          headers: {
            Accept: "application/json",
            "Content-Type": "application/json",
            "x-api-key": apiKey,
          },
          body,
          signal: options.signal
            ? AbortSignal.any([options.signal, AbortSignal.timeout(this.timeoutMs)])
            : AbortSignal.timeout(this.timeoutMs),
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        lastError = new ProviderError(`Failed to reach Exa API: ${message}`, {
          kind: "network",
          provider: PROVIDER,
          endpoint: path,
          cause: error instanceof Error ? error : undefined,
        });
        if (canRetry && !options.signal?.aborted) {
          this.log.warn("Retrying Exa request", { path, attempt, error: message });
          await this.sleep(this.retryDelayMs * attempt);
          continue;
        }
        throw lastError;
      }

      if (response.status === 401 || response.status === 403) {
        throw new ProviderError("invalid API key", {
          kind: "auth",
          provider: PROVIDER,
          statusCode: response.status,
          endpoint: path,
        });
      }

      if (response.status === 429) {
        const delayMs = parseRetryAfter(response.headers.get("retry-after"), this.retryDelayMs);
        lastError = new ProviderError(`Rate limited. Retry after ${Math.ceil(delayMs / 1000)}s`, {
          kind: "rate_limit",
          provider: PROVIDER,
          statusCode: 429,
          endpoint: path,
          context: { retryAfterMs: delayMs },
        });
        if (canRetry) {
          this.log.warn("Exa rate limited", { path, attempt, delayMs });
          await this.sleep(delayMs);
          continue;
        }
        throw lastError;
      }

      if (response.status >= 500) {
        const errorText = await response.text();
        lastError = ProviderError.fromStatus(PROVIDER, response.status, errorText, path);
        if (canRetry) {
          this.log.warn("Retrying Exa request", { path, attempt, status: response.status });
          await this.sleep(this.retryDelayMs * attempt);
          continue;
        }
        throw lastError;
      }

      if (!response.ok) {
        const errorText = await response.text();
        throw ProviderError.fromStatus(PROVIDER, response.status, errorText, path);
      }

      return this.parseBody(response, path, schema);
    }

    throw lastError ?? new ProviderError(`Request failed after ${this.maxRetries} attempts`, {
      kind: "network",
      provider: PROVIDER,
      endpoint: path,
    });
  }

  private async parseBody<T>(
    response: Response,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new ProviderError("Exa response was not valid JSON", {
        kind: "api",
        provider: PROVIDER,
        statusCode: response.status,
        endpoint: path,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .slice(0, 3)
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ");
      throw new ProviderError(`Unexpected Exa response shape (${issues})`, {
        kind: "api",
        provider: PROVIDER,
        statusCode: response.status,
        endpoint: path,
      });
    }

    return parsed.data;
  }

  private buildUrl(path: string, query?: Record<string, string | number | undefined>): string {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) params.set(key, String(value));
    }
    const qs = params.toString();
    return `${this.baseUrl}${path}${qs ? `?${qs}` : ""}`;
  }

  // ============ Search / Contents / Answer ============

  async search(request: SearchRequest, signal?: AbortSignal): Promise<SearchResponse> {
    return this.request("POST", "/search", SearchResponseSchema, { body: request, signal });
  }

  async getContents(request: GetContentsRequest, signal?: AbortSignal): Promise<ContentsResponse> {
    return this.request("POST", "/contents", ContentsResponseSchema, { body: request, signal });
  }

  async answer(request: AnswerRequest, signal?: AbortSignal): Promise<AnswerResponse> {
    return this.request("POST", "/answer", AnswerResponseSchema, {
      body: { query: request.query, text: request.text ?? false, stream: false },
      signal,
    });
  }

  // ============ Research Tasks ============

  async createResearchTask(request: CreateResearchTaskRequest): Promise<ResearchTask> {
    return this.request("POST", "/research/v1", ResearchTaskSchema, {
      body: { ...request, model: request.model ?? "exa-research" },
    });
  }

  async getResearchTask(researchId: string): Promise<ResearchTask> {
    return this.request(
      "GET",
      `/research/v1/${encodeURIComponent(researchId)}`,
      ResearchTaskSchema
    );
  }

  async listResearchTasks(options: { cursor?: string; limit?: number } = {}): Promise<ResearchTaskList> {
    const limit = options.limit ?? 10;
    if (!Number.isInteger(limit) || limit < 1 || limit > 50) {
      throw new ValidationError("limit must be between 1 and 50", {
        field: "limit",
        expected: "1..50",
        received: String(limit),
      });
    }

    return this.request("GET", "/research/v1", ResearchTaskListSchema, {
      query: { limit, cursor: options.cursor },
    });
  }
}

// Singleton instance
let clientInstance: ExaClient | null = null;

/**
 * Get the Exa client instance
 */
export function getExaClient(): ExaClient {
  if (!clientInstance) {
    clientInstance = new ExaClient();
  }
  return clientInstance;
}

/**
 * Reset client (for testing)
 */
export function resetClient(): void {
  clientInstance = null;
}
