import type { LedgerSnapshot } from "../bankroll-ledger";
import type { LatchedVotes, TradeStateStore } from "../trade-state-store";
import type {
  EvaluationResult,
  MarketSnapshot,
  RollingMetrics,
  Signal,
  StrategyName,
} from "../types";

export type StrategyConfig = {
  stakeUsd: number;
  dealMaxPrice: number;
  arbitrageMaxBetUsd: number;
  consensusRiskPct: number;
  consensusMaxRiskPct: number;
  consensusMaxPrice: number;
  consensusFeePct: number;
};

/** Ledger and rolling-window state frozen at the start of a cycle. */
export type RiskSnapshot = {
  ledger: LedgerSnapshot;
  rolling: RollingMetrics;
};

export type CycleSignals = {
  previous: Signal;
  momentumShort: Signal;
  momentumLong: Signal;
};

export type EvaluationContext = {
  now: number;
  snapshot: MarketSnapshot;
  signals: CycleSignals;
  latched: Readonly<LatchedVotes>;
  store: Pick<TradeStateStore, "hasClaim" | "getArbitrage">;
  risk: RiskSnapshot;
  config: StrategyConfig;
};

export interface StrategyEvaluator {
  readonly name: StrategyName;
  evaluate: (ctx: EvaluationContext) => EvaluationResult;
}
