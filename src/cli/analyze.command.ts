/**
 * Strategy performance report over the trade journal.
 *
 * Usage:
 *   npm run analyze
 *   npm run analyze -- --trades-csv=data/other.csv
 */

import "dotenv/config";
import { loadBotConfig, parseCliOverrides } from "../config/bot-config";
import { ConfigurationError, toError } from "../errors/app.errors";
import { TradeJournal } from "../persistence/trade-journal";
import { STRATEGY_ORDER, strategyOfLabel } from "../engine/stats";
import type { StrategyName, TradeLabel } from "../engine/types";
import { ConsoleLogger } from "../utils/logger.util";

export type StrategyAnalysis = {
  strategy: StrategyName;
  wins: number;
  losses: number;
  totalTrades: number;
  /** Percent. */
  winRate: number;
  totalProfit: number;
  totalStaked: number;
  /** Percent. */
  roi: number;
  avgProfitPerTrade: number;
};

export type AnalysisReport = {
  rows: number;
  pending: number;
  /** Sorted by win rate, highest first. */
  strategies: StrategyAnalysis[];
  totals: Omit<StrategyAnalysis, "strategy">;
};

const TRADE_LABELS: readonly TradeLabel[] = [...STRATEGY_ORDER, "ARBITRAGE_HEDGE"];

const LABEL_STRATEGY = new Map<string, StrategyName>(
  TRADE_LABELS.map((label) => [label, strategyOfLabel(label)]),
);

function derive(wins: number, losses: number, totalProfit: number, totalStaked: number): Omit<StrategyAnalysis, "strategy"> {
  const totalTrades = wins + losses;
  return {
    wins,
    losses,
    totalTrades,
    winRate: totalTrades ? (wins / totalTrades) * 100 : 0,
    totalProfit,
    totalStaked,
    roi: totalStaked ? (totalProfit / totalStaked) * 100 : 0,
    avgProfitPerTrade: totalTrades ? totalProfit / totalTrades : 0,
  };
}

/**
 * Summarises settled journal rows per strategy. Rows without an outcome are
 * counted as pending and left out; hedge legs count toward ARBITRAGE.
 */
export function analyzeStrategies(rows: readonly Partial<Record<string, string>>[]): AnalysisReport {
  const buckets = new Map<StrategyName, { wins: number; losses: number; profit: number; staked: number }>();
  let pending = 0;

  for (const row of rows) {
    const outcome = (row.outcome ?? "").trim();
    if (!outcome) {
      pending += 1;
      continue;
    }
    const strategy = LABEL_STRATEGY.get(row.strategy ?? "");
    if (!strategy) continue;
    const bucket = buckets.get(strategy) ?? { wins: 0, losses: 0, profit: 0, staked: 0 };
    bucket.profit += row.profit_usd ? Number(row.profit_usd) : 0;
    bucket.staked += row.stake_usd ? Number(row.stake_usd) : 0;
    if (outcome === "WIN") bucket.wins += 1;
    else if (outcome === "LOSS") bucket.losses += 1;
    buckets.set(strategy, bucket);
  }

  const strategies = STRATEGY_ORDER.flatMap((strategy) => {
    const bucket = buckets.get(strategy);
    return bucket ? [{ strategy, ...derive(bucket.wins, bucket.losses, bucket.profit, bucket.staked) }] : [];
  }).sort((a, b) => b.winRate - a.winRate);

  const sum = (pick: (entry: StrategyAnalysis) => number): number =>
    strategies.reduce((acc, entry) => acc + pick(entry), 0);

  return {
    rows: rows.length,
    pending,
    strategies,
    totals: derive(
      sum((entry) => entry.wins),
      sum((entry) => entry.losses),
      sum((entry) => entry.totalProfit),
      sum((entry) => entry.totalStaked),
    ),
  };
}

const RULE = "=".repeat(70);

function tableLine(name: string, entry: Omit<StrategyAnalysis, "strategy">): string {
  return (
    `${name.padEnd(12)} ${String(entry.wins).padStart(6)} ${String(entry.losses).padStart(7)}` +
    ` ${String(entry.totalTrades).padStart(6)} ${entry.winRate.toFixed(1).padStart(9)}%` +
    ` $${entry.totalProfit.toFixed(2).padStart(10)} ${entry.roi.toFixed(1).padStart(9)}%`
  );
}

function bestBy(strategies: StrategyAnalysis[], pick: (entry: StrategyAnalysis) => number): StrategyAnalysis | undefined {
  return strategies.reduce<StrategyAnalysis | undefined>(
    (best, entry) => (best === undefined || pick(entry) > pick(best) ? entry : best),
    undefined,
  );
}

export function formatAnalysisReport(report: AnalysisReport): string[] {
  const lines = [RULE, "STRATEGY PERFORMANCE ANALYSIS", RULE];
  if (report.pending) lines.push(`Note: ${report.pending} trades are pending (no outcome yet)`);
  if (!report.strategies.length) {
    lines.push("No settled trades yet.");
    return lines;
  }

  lines.push(
    `${"Strategy".padEnd(12)} ${"Wins".padStart(6)} ${"Losses".padStart(7)} ${"Total".padStart(6)}` +
      ` ${"Win Rate".padStart(10)} ${"Profit".padStart(12)} ${"ROI".padStart(10)}`,
    "-".repeat(70),
  );
  for (const entry of report.strategies) lines.push(tableLine(entry.strategy, entry));
  lines.push("-".repeat(70), tableLine("TOTALS", report.totals), "");

  const [byWinRate] = report.strategies;
  const byProfit = bestBy(report.strategies, (entry) => entry.totalProfit);
  const byRoi = bestBy(report.strategies, (entry) => entry.roi);
  lines.push(`Best Strategy by Win Rate: ${byWinRate.strategy} (${byWinRate.winRate.toFixed(1)}%)`);
  if (byProfit) lines.push(`Best Strategy by Profit: ${byProfit.strategy} ($${byProfit.totalProfit.toFixed(2)})`);
  if (byRoi) lines.push(`Best Strategy by ROI: ${byRoi.strategy} (${byRoi.roi.toFixed(1)}%)`);

  lines.push("", "DETAILED BREAKDOWN", "-".repeat(70));
  for (const entry of report.strategies) {
    lines.push(
      `${entry.strategy}:`,
      `  Total Trades: ${entry.totalTrades}`,
      `  Wins: ${entry.wins}, Losses: ${entry.losses}`,
      `  Win Rate: ${entry.winRate.toFixed(2)}%`,
      `  Total Staked: $${entry.totalStaked.toFixed(2)}`,
      `  Total Profit: $${entry.totalProfit.toFixed(2)}`,
      `  ROI: ${entry.roi.toFixed(2)}%`,
      `  Avg Profit/Trade: $${entry.avgProfitPerTrade.toFixed(2)}`,
    );
  }
  lines.push(RULE);
  return lines;
}

async function main(): Promise<number> {
  const logger = new ConsoleLogger();
  try {
    const config = loadBotConfig(parseCliOverrides(process.argv.slice(2)));
    const journal = new TradeJournal(config.tradesCsv, logger);
    const rows = await journal.loadRows();
    if (!rows.length) {
      logger.warn(`No trades found in ${config.tradesCsv}`);
      return 1;
    }
    logger.info(`Loaded ${rows.length} trades from ${config.tradesCsv}`);
    for (const line of formatAnalysisReport(analyzeStrategies(rows))) {
      console.log(line);
    }
    return 0;
  } catch (err) {
    const error = toError(err);
    logger.error(err instanceof ConfigurationError ? error.message : "Analysis failed", error);
    return 1;
  }
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      console.error(err);
      process.exit(1);
    });
}
