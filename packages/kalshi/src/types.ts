/**
 * Kalshi API Types
 * Zod schemas for validating API responses, plus normalisation to our schema
 */

import { z } from "zod";

// ============ Trade API Types (Public) ============

const optionalNumber = z.number().optional().nullable();
const optionalString = z.string().optional().nullable();

export const KalshiMarketSchema = z.object({
  ticker: z.string(),
  event_ticker: z.string(),
  series_ticker: optionalString,
  title: z.string(),
  subtitle: optionalString,
  status: z.string(),
  yes_bid: optionalNumber,
  yes_ask: optionalNumber,
  no_bid: optionalNumber,
  no_ask: optionalNumber,
  last_price: optionalNumber,
  volume: optionalNumber,
  volume_24h: optionalNumber,
  open_interest: optionalNumber,
  liquidity: optionalNumber,
  open_time: optionalString,
  close_time: z.string(),
  expiration_time: optionalString,
}).passthrough();

export type KalshiMarket = z.infer<typeof KalshiMarketSchema>;

export const MarketResponseSchema = z.object({
  market: KalshiMarketSchema,
});

// [price in cents, quantity]
export const OrderbookLevelSchema = z.tuple([z.number(), z.number()]);

export const OrderbookSchema = z.object({
  yes: z.array(OrderbookLevelSchema).nullable().optional(),
  no: z.array(OrderbookLevelSchema).nullable().optional(),
});

export type KalshiOrderbook = z.infer<typeof OrderbookSchema>;

export const OrderbookResponseSchema = z.object({
  orderbook: OrderbookSchema,
});

// ============ Our Normalized Types ============

export interface MarketInfo {
  ticker: string;
  eventTicker: string;
  title: string;
  subtitle?: string;
  status: string;
  openTime?: string;
  closeTime: string;
  expirationTime?: string;
}

export interface PriceSnapshot {
  /** Yes-side midpoint, 0..1 */
  midpointProbability: number;
  yesBid: number;
  yesAsk: number;
  noBid: number;
  noAsk: number;
  spreadCents: number;
  lastPrice?: number;
  volume24h: number;
  openInterest: number;
  liquidityUsd: number;
  capturedAt: string;
}

export interface MarketSnapshot {
  info: MarketInfo;
  price: PriceSnapshot;
}

// ============ Normalization Functions ============

export function normalizeMarket(market: KalshiMarket): MarketInfo {
  return {
    ticker: market.ticker,
    eventTicker: market.event_ticker,
    title: market.title,
    subtitle: market.subtitle || undefined,
    status: market.status,
    openTime: market.open_time ?? undefined,
    closeTime: market.close_time,
    expirationTime: market.expiration_time ?? undefined,
  };
}

/**
 * Highest bid price on one side of the book, or null when that side is empty
 */
export function bestBid(levels: Array<[number, number]> | null | undefined): number | null {
  if (!levels || levels.length === 0) {
    return null;
  }
  return levels.reduce((best, [price]) => Math.max(best, price), levels[0][0]);
}

/**
 * The orderbook only carries bids; asks are implied from the opposite side
 * (yes ask = 100 - best no bid).
 */
export function derivePriceSnapshot(
  market: KalshiMarket,
  orderbook: KalshiOrderbook,
  capturedAt: Date = new Date()
): PriceSnapshot {
  const bestYesBid = bestBid(orderbook.yes);
  const bestNoBid = bestBid(orderbook.no);

  const yesBid = bestYesBid ?? 0;
  const noBid = bestNoBid ?? 0;
  const yesAsk = bestNoBid !== null ? 100 - bestNoBid : 100;
  const noAsk = bestYesBid !== null ? 100 - bestYesBid : 100;

  const midpointCents = (yesBid + yesAsk) / 2;

  return {
    midpointProbability: midpointCents / 100,
    yesBid,
    yesAsk,
    noBid,
    noAsk,
    spreadCents: yesAsk - yesBid,
    lastPrice: market.last_price ?? undefined,
    volume24h: market.volume_24h ?? 0,
    openInterest: market.open_interest ?? 0,
    // reported in cents
    liquidityUsd: (market.liquidity ?? 0) / 100,
    capturedAt: capturedAt.toISOString(),
  };
}
