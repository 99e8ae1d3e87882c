import type { StrategyName, StrategyStats, TradeLabel } from "./types";

/** Minimal trade shape the statistics need; journal rows and engine trades both fit. */
export type StatsRow = {
  label: TradeLabel;
  stake: number;
  netProfit?: number;
};

export const STRATEGY_ORDER: readonly StrategyName[] = [
  "PREVIOUS",
  "MOMENTUM",
  "CONSENSUS",
  "MOMENTUM_15",
  "PREVIOUS_2",
  "CONSENSUS_2",
  "ARBITRAGE",
];

/** The hedge leg is reported under ARBITRAGE. */
export function strategyOfLabel(label: TradeLabel): StrategyName {
  return label === "ARBITRAGE_HEDGE" ? "ARBITRAGE" : label;
}

export function emptyStats(): StrategyStats {
  return { totalStaked: 0, totalProfit: 0, wins: 0, losses: 0, pending: 0 };
}

export function calcStats(rows: readonly StatsRow[], strategy?: StrategyName): StrategyStats {
  const stats = emptyStats();
  for (const row of rows) {
    if (strategy && strategyOfLabel(row.label) !== strategy) continue;
    stats.totalStaked += row.stake;
    if (row.netProfit === undefined) {
      stats.pending += 1;
      continue;
    }
    stats.totalProfit += row.netProfit;
    if (row.netProfit > 0) {
      stats.wins += 1;
    } else {
      stats.losses += 1;
    }
  }
  return stats;
}

export function statsByStrategy(rows: readonly StatsRow[]): Record<StrategyName, StrategyStats> {
  return {
    PREVIOUS: calcStats(rows, "PREVIOUS"),
    MOMENTUM: calcStats(rows, "MOMENTUM"),
    CONSENSUS: calcStats(rows, "CONSENSUS"),
    MOMENTUM_15: calcStats(rows, "MOMENTUM_15"),
    PREVIOUS_2: calcStats(rows, "PREVIOUS_2"),
    CONSENSUS_2: calcStats(rows, "CONSENSUS_2"),
    ARBITRAGE: calcStats(rows, "ARBITRAGE"),
  };
}

export function formatSigned(value: number): string {
  return `${value < 0 ? "-" : "+"}$${Math.abs(value).toFixed(2)}`;
}
