import { BankrollLedger } from "./bankroll-ledger";
import { PriceHistory } from "./price-history";
import { RollingPerformanceTracker } from "./rolling-performance";
import { SettlementEngine } from "./settlement";
import { momentumVote, previousVote } from "./signals";
import { calcStats, statsByStrategy } from "./stats";
import type { StatsRow } from "./stats";
import { buildStrategies } from "./strategies";
import type { CycleSignals, RiskSnapshot, StrategyConfig, StrategyEvaluator } from "./strategies";
import { TradeStateStore } from "./trade-state-store";
import type {
  CycleStats,
  DecisionAction,
  MarketSnapshot,
  Position,
  PriceSample,
  SettledTrade,
  Side,
  StrategyName,
} from "./types";

export type CoreConfig = StrategyConfig & {
  pollSeconds: number;
  momentumWindowSeconds: number;
  momentum15WindowSeconds: number;
  initialBankrollUsd: number;
  consensusDailyLossCapR: number;
  consensusWeeklyLossCapR: number;
  consensusRollingWindow: number;
};

export type CycleInput = {
  now: number;
  snapshot: MarketSnapshot | null;
  priceSample?: PriceSample;
  /** Settled side per ticker, only for tickers whose market has resolved. */
  settlements: ReadonlyMap<string, Side>;
};

export type DecisionRecord = {
  strategy: StrategyName;
  ticker: string;
  action: DecisionAction;
  reason?: string;
  positions: Position[];
};

export type CycleReport = {
  now: number;
  snapshot: MarketSnapshot | null;
  signals?: CycleSignals;
  decisions: DecisionRecord[];
  opened: Position[];
  settled: SettledTrade[];
  stats: CycleStats;
};

type TradeRecord = Position | SettledTrade;

const isSettled = (record: TradeRecord): record is SettledTrade => "netProfit" in record;

/**
 * Strategy and risk core. One call to {@link StrategyCore.runCycle} is one
 * poll cycle:
 *
 * 1. refresh signals from the snapshot and price sample;
 * 2. evaluate every strategy in fixed order against risk state frozen at the
 *    start of the cycle, committing entries as they are decided;
 * 3. apply this cycle's settlement facts;
 * 4. compute statistics.
 *
 * Entries are always sized before the same cycle's settlements land.
 */
export class StrategyCore {
  readonly store = new TradeStateStore();
  readonly ledger: BankrollLedger;
  readonly rolling: RollingPerformanceTracker;
  readonly shortHistory: PriceHistory;
  readonly longHistory: PriceHistory;
  private readonly config: CoreConfig;
  private readonly strategies: StrategyEvaluator[];
  private readonly settlement: SettlementEngine;
  private readonly trades = new Map<string, TradeRecord>();

  constructor(config: CoreConfig, strategies: StrategyEvaluator[] = buildStrategies()) {
    this.config = config;
    this.strategies = strategies;
    this.ledger = new BankrollLedger({
      baseCapitalUsd: config.initialBankrollUsd,
      riskPct: config.consensusRiskPct,
      dailyLossCapR: config.consensusDailyLossCapR,
      weeklyLossCapR: config.consensusWeeklyLossCapR,
    });
    this.rolling = new RollingPerformanceTracker(config.consensusRollingWindow);
    this.shortHistory = PriceHistory.forWindow(config.momentumWindowSeconds, config.pollSeconds);
    this.longHistory = PriceHistory.forWindow(config.momentum15WindowSeconds, config.pollSeconds);
    this.settlement = new SettlementEngine({ store: this.store, ledger: this.ledger, rolling: this.rolling });
  }

  /** Rebuilds state from trades recorded by an earlier run. Call before the first cycle. */
  restore(records: { open: Position[]; settled: SettledTrade[] }): void {
    const settled = [...records.settled].sort((a, b) => a.settledAt - b.settledAt);
    for (const trade of settled) {
      this.store.restoreClaim(trade.strategy, trade.ticker);
      this.settlement.apply(trade);
      this.trades.set(trade.id, trade);
    }
    const open = [...records.open].sort((a, b) => (a.label === "ARBITRAGE_HEDGE" ? 1 : 0) - (b.label === "ARBITRAGE_HEDGE" ? 1 : 0));
    for (const position of open) {
      this.store.restorePosition(position);
      this.trades.set(position.id, position);
    }
  }

  runCycle(input: CycleInput): CycleReport {
    const { now, snapshot } = input;
    if (input.priceSample) {
      this.shortHistory.push(input.priceSample);
      this.longHistory.push(input.priceSample);
    }

    const decisions: DecisionRecord[] = [];
    const opened: Position[] = [];
    let signals: CycleSignals | undefined;

    if (snapshot) {
      this.store.expireAttempts(snapshot.ticker);
      signals = this.readSignals(snapshot, now);
      const risk = this.riskSnapshot(now);
      for (const strategy of this.strategies) {
        const decision = this.evaluate(strategy, snapshot, signals, risk, now);
        if (!decision) continue;
        decisions.push(decision);
        opened.push(...decision.positions);
      }
      this.store.pruneVotes([snapshot.ticker, ...this.store.pendingTickers()]);
    }

    const settled = this.settlement.settle(input.settlements, now);
    for (const trade of settled) {
      this.trades.set(trade.id, trade);
    }

    return { now, snapshot, signals, decisions, opened, settled, stats: this.stats(now, snapshot?.ticker) };
  }

  stats(now: number, ticker?: string): CycleStats {
    const rows = this.statsRows();
    const ledger = this.ledger.snapshot(now);
    return {
      at: now,
      ticker,
      byStrategy: statsByStrategy(rows),
      total: calcStats(rows),
      consensusBankroll: ledger.bankrollUsd,
      dailyRealizedLoss: ledger.dailyRealizedLossUsd,
      weeklyRealizedLoss: ledger.weeklyRealizedLossUsd,
      rolling: this.rolling.metrics(),
      openPositions: this.store.openPositions().length,
    };
  }

  /** Every trade known to this run, open and settled, in insertion order. */
  tradeRecords(): TradeRecord[] {
    return [...this.trades.values()];
  }

  private statsRows(): StatsRow[] {
    return this.tradeRecords().map((record) => ({
      label: record.label,
      stake: record.stake,
      netProfit: isSettled(record) ? record.netProfit : undefined,
    }));
  }

  private readSignals(snapshot: MarketSnapshot, now: number): CycleSignals {
    const signals: CycleSignals = {
      previous: previousVote(snapshot),
      momentumShort: momentumVote(this.shortHistory, now, this.config.momentumWindowSeconds, "MOMENTUM_SHORT"),
      momentumLong: momentumVote(this.longHistory, now, this.config.momentum15WindowSeconds, "MOMENTUM_LONG"),
    };

    if (snapshot.rolloverPreviousTicker) {
      const latched = this.store.latchedVotes(snapshot.ticker);
      if (!latched.previous && signals.previous.vote !== "none") {
        latched.previous = signals.previous.vote;
      }
      if (!latched.momentum && signals.momentumShort.vote !== "none") {
        latched.momentum = signals.momentumShort.vote;
      }
    }
    return signals;
  }

  private riskSnapshot(now: number): RiskSnapshot {
    return { ledger: this.ledger.snapshot(now), rolling: this.rolling.metrics() };
  }

  private evaluate(
    strategy: StrategyEvaluator,
    snapshot: MarketSnapshot,
    signals: CycleSignals,
    risk: RiskSnapshot,
    now: number,
  ): DecisionRecord | undefined {
    const result = strategy.evaluate({
      now,
      snapshot,
      signals,
      latched: this.store.latchedVotes(snapshot.ticker),
      store: this.store,
      risk,
      config: this.config,
    });

    switch (result.action) {
      case "idle":
        return undefined;
      case "waiting":
        this.store.recordAttempt(strategy.name, snapshot.ticker);
        return { strategy: strategy.name, ticker: snapshot.ticker, action: "waiting", reason: result.reason, positions: [] };
      case "skipped":
        this.store.skip(strategy.name, snapshot.ticker);
        return { strategy: strategy.name, ticker: snapshot.ticker, action: "skipped", reason: result.reason, positions: [] };
      case "entered": {
        const positions = result.entries.map((entry) => {
          const position = this.store.openPosition(entry, now);
          this.trades.set(position.id, position);
          return position;
        });
        return { strategy: strategy.name, ticker: snapshot.ticker, action: "entered", positions };
      }
    }
  }
}
