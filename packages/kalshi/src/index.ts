/**
 * @sibyl/kalshi
 * Kalshi market data client
 */

export { KalshiClient, getKalshiClient, resetClient, type KalshiClientOptions } from "./client.js";

export {
  KalshiMarketSchema,
  MarketResponseSchema,
  OrderbookSchema,
  OrderbookResponseSchema,
  normalizeMarket,
  bestBid,
  derivePriceSnapshot,
  type KalshiMarket,
  type KalshiOrderbook,
  type MarketInfo,
  type PriceSnapshot,
  type MarketSnapshot,
} from "./types.js";
