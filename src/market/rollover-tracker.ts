import type { MarketSnapshot, MarketSnapshotSource, SettlementSource, Side } from "../engine/types";
import type { OpenMarket } from "../provider/kalshi.provider";

export interface OpenMarketSource {
  getOpenMarket: (seriesTicker: string, now?: number) => Promise<OpenMarket | null>;
}

/**
 * Builds per-cycle market snapshots and follows series rollovers.
 *
 * The first market seen after start-up has no predecessor. When the open
 * ticker changes, the old ticker becomes the rollover predecessor for the
 * whole lifetime of the new market, and its result is looked up every cycle
 * until it settles. A lookup that throws leaves the tracker where it was, so
 * the next successful call still reports the rollover as newly open.
 */
export class RolloverTracker implements MarketSnapshotSource {
  private readonly markets: OpenMarketSource;
  private readonly settlements: SettlementSource;
  private readonly clock: () => number;
  private currentTicker?: string;
  private previousTicker?: string;
  private previousResult?: Side;

  constructor(params: { markets: OpenMarketSource; settlements: SettlementSource; clock?: () => number }) {
    this.markets = params.markets;
    this.settlements = params.settlements;
    this.clock = params.clock ?? Date.now;
  }

  async getMarketSnapshot(seriesTicker: string): Promise<MarketSnapshot | null> {
    const market = await this.markets.getOpenMarket(seriesTicker, this.clock());
    if (!market) return null;

    let previousTicker = this.previousTicker;
    let previousResult = this.previousResult;
    let isNewlyOpen = false;
    if (this.currentTicker !== undefined && market.ticker !== this.currentTicker) {
      previousTicker = this.currentTicker;
      previousResult = undefined;
      isNewlyOpen = true;
    }

    if (previousTicker && !previousResult) {
      const fact = await this.settlements.getSettlementFact(previousTicker);
      if (fact !== "pending") previousResult = fact;
    }

    // Only a fully built snapshot moves the rollover forward.
    this.currentTicker = market.ticker;
    this.previousTicker = previousTicker;
    this.previousResult = previousResult;

    return {
      ticker: market.ticker,
      yesAsk: market.yesAsk,
      noAsk: market.noAsk,
      closeTime: market.closeTime,
      isNewlyOpen,
      rolloverPreviousTicker: previousTicker,
      rolloverPreviousResult: previousResult,
    };
  }
}
