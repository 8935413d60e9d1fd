/**
 * Kalshi Market Data
 * MarketDataProvider over the public Kalshi trade API
 */

import type { KalshiClient } from "@sibyl/kalshi";
import type {
  MarketDataProvider,
  MarketSnapshot,
} from "../../systems/orchestrator/capabilities.js";

export class KalshiMarketData implements MarketDataProvider {
  constructor(private readonly client: Pick<KalshiClient, "getMarketSnapshot">) {}

  async getSubject(subjectId: string): Promise<MarketSnapshot> {
    const { info, price } = await this.client.getMarketSnapshot(subjectId);

    return {
      subject: {
        id: info.ticker,
        title: info.title,
        subtitle: info.subtitle,
        closeTime: info.closeTime,
        expirationTime: info.expirationTime,
      },
      price: {
        midpointProbability: price.midpointProbability,
        yesBid: price.yesBid,
        yesAsk: price.yesAsk,
        spreadCents: price.spreadCents,
        lastPrice: price.lastPrice,
        volume24h: price.volume24h,
        openInterest: price.openInterest,
        liquidityUsd: price.liquidityUsd,
        capturedAt: price.capturedAt,
      },
    };
  }
}
