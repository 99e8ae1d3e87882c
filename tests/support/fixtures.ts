import type { CoreConfig } from "../../src/engine/cycle";
import { RollingPerformanceTracker } from "../../src/engine/rolling-performance";
import { BankrollLedger } from "../../src/engine/bankroll-ledger";
import type { EvaluationContext } from "../../src/engine/strategies";
import { TradeStateStore } from "../../src/engine/trade-state-store";
import type { MarketSnapshot, Position, Signal } from "../../src/engine/types";
import type { Logger } from "../../src/utils/logger.util";

export class MemoryLogger implements Logger {
  readonly lines: string[] = [];

  info(msg: string): void {
    this.lines.push(`info ${msg}`);
  }

  warn(msg: string): void {
    this.lines.push(`warn ${msg}`);
  }

  error(msg: string, err?: Error): void {
    this.lines.push(err ? `error ${msg}: ${err.message}` : `error ${msg}`);
  }

  debug(msg: string): void {
    this.lines.push(`debug ${msg}`);
  }
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

export function createTestConfig(overrides: Partial<CoreConfig> = {}): CoreConfig {
  return {
    stakeUsd: 5,
    dealMaxPrice: 0.45,
    arbitrageMaxBetUsd: 10,
    consensusRiskPct: 0.01,
    consensusMaxRiskPct: 0.02,
    consensusMaxPrice: 0.55,
    consensusFeePct: 0,
    pollSeconds: 5,
    momentumWindowSeconds: 60,
    momentum15WindowSeconds: 900,
    initialBankrollUsd: 500,
    consensusDailyLossCapR: 3,
    consensusWeeklyLossCapR: 8,
    consensusRollingWindow: 30,
    ...overrides,
  };
}

export function createSnapshot(overrides: Partial<MarketSnapshot> = {}): MarketSnapshot {
  return {
    ticker: "KXBTC15M-T1",
    yesAsk: 0.4,
    noAsk: 0.62,
    isNewlyOpen: false,
    ...overrides,
  };
}

export function createPosition(overrides: Partial<Position> = {}): Position {
  const label = overrides.label ?? "PREVIOUS";
  const ticker = overrides.ticker ?? "KXBTC15M-T0";
  return {
    id: `${label}:${ticker}`,
    strategy: "PREVIOUS",
    label,
    ticker,
    side: "yes",
    stake: 5,
    price: 0.5,
    contracts: 10,
    feeReserved: 0,
    openedAt: Date.UTC(2026, 9, 13, 12, 0),
    signalNote: "yes",
    ...overrides,
  };
}

const NO_SIGNAL: Signal = { kind: "PREVIOUS", vote: "none" };

export type ContextOverrides = Partial<Omit<EvaluationContext, "signals">> & {
  signals?: Partial<EvaluationContext["signals"]>;
  ledger?: BankrollLedger;
  rolling?: RollingPerformanceTracker;
};

/** Evaluation context over a fresh store, ledger and rolling window. */
export function createContext(overrides: ContextOverrides = {}): EvaluationContext {
  const config = createTestConfig();
  const now = overrides.now ?? Date.UTC(2026, 9, 13, 12, 0);
  const ledger =
    overrides.ledger ??
    new BankrollLedger({
      baseCapitalUsd: config.initialBankrollUsd,
      riskPct: config.consensusRiskPct,
      dailyLossCapR: config.consensusDailyLossCapR,
      weeklyLossCapR: config.consensusWeeklyLossCapR,
    });
  const rolling = overrides.rolling ?? new RollingPerformanceTracker(config.consensusRollingWindow);
  return {
    now,
    snapshot: overrides.snapshot ?? createSnapshot(),
    signals: {
      previous: NO_SIGNAL,
      momentumShort: { kind: "MOMENTUM_SHORT", vote: "none" },
      momentumLong: { kind: "MOMENTUM_LONG", vote: "none" },
      ...overrides.signals,
    },
    latched: overrides.latched ?? {},
    store: overrides.store ?? new TradeStateStore(),
    risk: overrides.risk ?? { ledger: ledger.snapshot(now), rolling: rolling.metrics() },
    config: overrides.config ?? config,
  };
}

export function approxEqual(actual: number, expected: number, epsilon = 1e-9): boolean {
  return Math.abs(actual - expected) < epsilon;
}
