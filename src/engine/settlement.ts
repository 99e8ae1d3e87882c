import type { BankrollLedger } from "./bankroll-ledger";
import type { RollingPerformanceTracker } from "./rolling-performance";
import type { TradeStateStore } from "./trade-state-store";
import { isConsensusFamily } from "./types";
import type { Position, SettledTrade, Side } from "./types";

/** Payout and P&L of a binary contract position once its market resolves. */
export function settlePosition(position: Position, settledSide: Side, settledAt: number): SettledTrade {
  const won = position.side === settledSide;
  const payout = won ? position.contracts : 0;
  const grossProfit = payout - position.stake;
  const fee = position.feeReserved;
  return {
    ...position,
    outcome: won ? "WIN" : "LOSS",
    payout,
    grossProfit,
    fee,
    netProfit: grossProfit - fee,
    settledAt,
  };
}

/**
 * Applies settlement facts to open positions. Consensus-family results flow
 * into the shared ledger and rolling window exactly once, because a settled
 * position leaves the open set before anything else can see it.
 */
export class SettlementEngine {
  private readonly store: TradeStateStore;
  private readonly ledger: BankrollLedger;
  private readonly rolling: RollingPerformanceTracker;

  constructor(params: { store: TradeStateStore; ledger: BankrollLedger; rolling: RollingPerformanceTracker }) {
    this.store = params.store;
    this.ledger = params.ledger;
    this.rolling = params.rolling;
  }

  settle(facts: ReadonlyMap<string, Side>, now: number): SettledTrade[] {
    const settled: SettledTrade[] = [];
    for (const position of this.store.openPositions()) {
      const side = facts.get(position.ticker);
      if (!side) continue;
      if (!this.store.closePosition(position.id)) continue;

      const trade = settlePosition(position, side, now);
      this.apply(trade);
      settled.push(trade);
    }
    return settled;
  }

  /** Feeds an already-settled trade into the shared consensus state. */
  apply(trade: SettledTrade): void {
    if (!isConsensusFamily(trade.strategy)) return;
    this.ledger.recordSettlement(trade.netProfit, trade.settledAt);
    this.rolling.record(trade.netProfit > 0, trade.netProfit);
  }
}
