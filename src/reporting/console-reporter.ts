import { STRATEGY_ORDER, formatSigned } from "../engine/stats";
import type { CycleStats, Position, SettledTrade, StrategyStats, TradeEventSink } from "../engine/types";
import type { Logger } from "../utils/logger.util";

const pct = (value: number): string => `${(value * 100).toFixed(1)}%`;

function formatStrategyLine(name: string, stats: StrategyStats): string {
  const settled = stats.wins + stats.losses;
  const winRate = settled ? pct(stats.wins / settled) : "n/a";
  return (
    `${name.padEnd(12)} W/L ${stats.wins}/${stats.losses} (${winRate})` +
    ` pending=${stats.pending} staked=$${stats.totalStaked.toFixed(2)} pnl=${formatSigned(stats.totalProfit)}`
  );
}

export function formatStatsLines(stats: CycleStats): string[] {
  const lines = STRATEGY_ORDER.map((name) => formatStrategyLine(name, stats.byStrategy[name]));
  lines.push(formatStrategyLine("TOTAL", stats.total));
  const { rolling } = stats;
  lines.push(
    `consensus bankroll=$${stats.consensusBankroll.toFixed(2)}` +
      ` daily_loss=$${stats.dailyRealizedLoss.toFixed(2)} weekly_loss=$${stats.weeklyRealizedLoss.toFixed(2)}` +
      ` rolling=${rolling.sampleSize}/${rolling.capacity} win=${pct(rolling.winRate)}` +
      ` breakeven=${pct(rolling.breakEvenWinRate)} gate=${rolling.gatePasses ? "open" : "closed"}`,
  );
  return lines;
}

/**
 * Prints trade events as they happen. Statistics are printed whenever a
 * trade opened or settled since the last cycle, and on demand.
 */
export class ConsoleReporter implements TradeEventSink {
  private readonly logger: Logger;
  private dirty = false;
  private last?: CycleStats;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  onTradeOpened(position: Position): void {
    this.dirty = true;
    this.logger.info(
      `[ENTRY] ${position.label} ${position.ticker} ${position.side.toUpperCase()} @ ${position.price.toFixed(2)}` +
        ` x${position.contracts.toFixed(2)} stake=$${position.stake.toFixed(2)} (${position.signalNote})`,
    );
  }

  onTradeSettled(trade: SettledTrade): void {
    this.dirty = true;
    this.logger.info(
      `[SETTLE] ${trade.label} ${trade.ticker} ${trade.side.toUpperCase()} ${trade.outcome}` +
        ` payout=$${trade.payout.toFixed(2)} net=${formatSigned(trade.netProfit)}`,
    );
  }

  onCycleStats(stats: CycleStats): void {
    this.last = stats;
    if (!this.dirty) return;
    this.dirty = false;
    this.printStats(stats);
  }

  printFinalStats(stats: CycleStats | undefined = this.last): void {
    if (!stats) {
      this.logger.info("[STATS] No cycles completed");
      return;
    }
    this.printStats(stats);
  }

  private printStats(stats: CycleStats): void {
    for (const line of formatStatsLines(stats)) {
      this.logger.info(`[STATS] ${line}`);
    }
  }
}
