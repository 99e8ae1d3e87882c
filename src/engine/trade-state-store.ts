import type {
  ArbitrageState,
  EntryDecision,
  Position,
  Side,
  StrategyName,
} from "./types";

/** Votes pinned to a ticker the first time they are observed. */
export type LatchedVotes = {
  previous?: Side;
  momentum?: Side;
};

const claimKey = (strategy: StrategyName, ticker: string): string => `${strategy}|${ticker}`;

/**
 * Existence map of (strategy, ticker) claims plus the open positions.
 *
 * Claims outlive the positions they created: settling a position removes it
 * from the open set but the claim stays, so a strategy trades a ticker at
 * most once per process.
 */
export class TradeStateStore {
  private readonly claims = new Set<string>();
  private readonly open = new Map<string, Position>();
  private readonly arbitrage = new Map<string, ArbitrageState>();
  private readonly votes = new Map<string, LatchedVotes>();
  private readonly attempts = new Map<string, { strategy: StrategyName; ticker: string }>();

  hasClaim(strategy: StrategyName, ticker: string): boolean {
    return this.claims.has(claimKey(strategy, ticker));
  }

  /** Marks the slot as used without opening a position. */
  skip(strategy: StrategyName, ticker: string): void {
    this.attempts.delete(claimKey(strategy, ticker));
    this.claims.add(claimKey(strategy, ticker));
  }

  /** Records that a strategy looked at a ticker and is still waiting on a gate. */
  recordAttempt(strategy: StrategyName, ticker: string): void {
    if (this.hasClaim(strategy, ticker)) return;
    this.attempts.set(claimKey(strategy, ticker), { strategy, ticker });
  }

  /**
   * Turns attempts on tickers other than the current one into `skipped`
   * claims: a market that rolled away without an entry keeps its slot used.
   */
  expireAttempts(currentTicker: string): void {
    for (const [key, attempt] of [...this.attempts.entries()]) {
      if (attempt.ticker === currentTicker) continue;
      this.attempts.delete(key);
      this.skip(attempt.strategy, attempt.ticker);
    }
  }

  openPosition(decision: EntryDecision, openedAt: number): Position {
    const position: Position = {
      id: `${decision.label}:${decision.ticker}`,
      strategy: decision.strategy,
      label: decision.label,
      ticker: decision.ticker,
      side: decision.side,
      stake: decision.stake,
      price: decision.price,
      contracts: decision.contracts,
      feeReserved: decision.feeReserved,
      openedAt,
      previousTicker: decision.previousTicker,
      signalNote: decision.signalNote,
    };
    this.restorePosition(position);
    return position;
  }

  /** Re-registers a position loaded from the journal. */
  restorePosition(position: Position): void {
    this.open.set(position.id, position);
    this.attempts.delete(claimKey(position.strategy, position.ticker));
    this.claims.add(claimKey(position.strategy, position.ticker));

    if (position.strategy !== "ARBITRAGE") return;
    const existing = this.arbitrage.get(position.ticker);
    if (position.label === "ARBITRAGE_HEDGE") {
      if (existing) {
        existing.leg2 = position;
        existing.hedged = true;
      }
      return;
    }
    this.arbitrage.set(position.ticker, {
      leg1: position,
      leg2: existing?.leg2,
      hedged: existing?.hedged ?? false,
    });
  }

  /** Restores the claim for a trade that already settled before start-up. */
  restoreClaim(strategy: StrategyName, ticker: string): void {
    this.claims.add(claimKey(strategy, ticker));
  }

  getArbitrage(ticker: string): ArbitrageState | undefined {
    return this.arbitrage.get(ticker);
  }

  openPositions(): Position[] {
    return [...this.open.values()];
  }

  pendingTickers(): string[] {
    return [...new Set(this.openPositions().map((position) => position.ticker))];
  }

  /** Removes an open position. Closing the first arbitrage leg also drops the ticker's hedge state. */
  closePosition(id: string): Position | undefined {
    const position = this.open.get(id);
    if (!position) return undefined;
    this.open.delete(id);
    if (position.label === "ARBITRAGE") this.arbitrage.delete(position.ticker);
    return position;
  }

  latchedVotes(ticker: string): LatchedVotes {
    let latched = this.votes.get(ticker);
    if (!latched) {
      latched = {};
      this.votes.set(ticker, latched);
    }
    return latched;
  }

  /**
   * Drops per-ticker scratch state for markets that are neither current nor
   * holding open positions. Claims are kept.
   */
  pruneVotes(keepTickers: Iterable<string>): void {
    const keep = new Set(keepTickers);
    for (const ticker of [...this.votes.keys()]) {
      if (!keep.has(ticker)) this.votes.delete(ticker);
    }
  }
}
