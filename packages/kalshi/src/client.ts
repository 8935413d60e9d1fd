/**
 * Kalshi API Client
 * Read-only market data client with validation and error mapping
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
  MarketResponseSchema,
  OrderbookResponseSchema,
  derivePriceSnapshot,
  normalizeMarket,
  type KalshiMarket,
  type KalshiOrderbook,
  type MarketSnapshot,
} from "./types.js";

const PROVIDER = "kalshi";
const DEFAULT_TIMEOUT_MS = 15_000;

export interface KalshiClientOptions {
  /** Defaults to the configured environment's trade API */
  baseUrl?: string;
  fetch?: typeof fetch;
  timeoutMs?: number;
}

/**
 * Kalshi public trade API client
 */
export class KalshiClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private log: Logger;

  constructor(options: KalshiClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? getBaseConfig().kalshi.baseUrl).replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = logger.child({ component: PROVIDER });
  }

  /**
   * GET a path and validate the body against a schema
   */
  async request<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    this.log.debug("Kalshi request", { path });

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError(`Failed to reach Kalshi API: ${message}`, {
        kind: "network",
        provider: PROVIDER,
        endpoint: path,
        cause: error instanceof Error ? error : undefined,
      });
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw ProviderError.fromStatus(PROVIDER, response.status, errorText, path);
    }

    const data: unknown = await response.json();
    const parsed = schema.safeParse(data);

    if (!parsed.success) {
      throw new ValidationError(`Unexpected Kalshi response for ${path}`, {
        context: {
          issues: parsed.error.issues.slice(0, 5).map((i) => `${i.path.join(".")}: ${i.message}`),
        },
      });
    }

    return parsed.data;
  }

  // ============ High-Level Methods ============

  async getMarket(ticker: string): Promise<KalshiMarket> {
    const response = await this.request(
      `/markets/${encodeURIComponent(ticker)}`,
      MarketResponseSchema
    );
    return response.market;
  }

  async getOrderbook(ticker: string): Promise<KalshiOrderbook> {
    const response = await this.request(
      `/markets/${encodeURIComponent(ticker)}/orderbook`,
      OrderbookResponseSchema
    );
    return response.orderbook;
  }

  // ============ Normalized Methods (Our Schema) ============

  /**
   * Market metadata plus a price snapshot derived from the live orderbook
   */
  async getMarketSnapshot(ticker: string): Promise<MarketSnapshot> {
    const [market, orderbook] = await Promise.all([
      this.getMarket(ticker),
      this.getOrderbook(ticker),
    ]);

    return {
      info: normalizeMarket(market),
      price: derivePriceSnapshot(market, orderbook),
    };
  }
}

// Singleton instance
let clientInstance: KalshiClient | null = null;

/**
 * Get the Kalshi client instance
 */
export function getKalshiClient(): KalshiClient {
  if (!clientInstance) {
    clientInstance = new KalshiClient();
  }
  return clientInstance;
}

/**
 * Reset client (for testing)
 */
export function resetClient(): void {
  clientInstance = null;
}
