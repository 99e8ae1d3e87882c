export type Side = "yes" | "no";

export type Vote = Side | "none";

export type SettlementFact = Side | "pending";

export type StrategyName =
  | "PREVIOUS"
  | "PREVIOUS_2"
  | "MOMENTUM"
  | "MOMENTUM_15"
  | "CONSENSUS"
  | "CONSENSUS_2"
  | "ARBITRAGE";

/** Label written to the journal; the hedge leg is booked separately. */
export type TradeLabel = StrategyName | "ARBITRAGE_HEDGE";

export const CONSENSUS_FAMILY: readonly StrategyName[] = ["CONSENSUS", "CONSENSUS_2"];

export function isConsensusFamily(strategy: StrategyName): boolean {
  return CONSENSUS_FAMILY.includes(strategy);
}

export function oppositeSide(side: Side): Side {
  return side === "yes" ? "no" : "yes";
}

export type SignalKind = "PREVIOUS" | "MOMENTUM_SHORT" | "MOMENTUM_LONG";

export type Signal = {
  kind: SignalKind;
  vote: Vote;
  /** Percent move of the underlying over the lookback, momentum signals only. */
  magnitude?: number;
};

export type MarketSnapshot = {
  ticker: string;
  yesAsk: number;
  noAsk: number;
  closeTime?: number;
  isNewlyOpen: boolean;
  rolloverPreviousTicker?: string;
  rolloverPreviousResult?: Side;
};

export type PriceSample = {
  timestamp: number;
  price: number;
};

export type Position = {
  id: string;
  strategy: StrategyName;
  label: TradeLabel;
  ticker: string;
  side: Side;
  stake: number;
  price: number;
  contracts: number;
  feeReserved: number;
  openedAt: number;
  previousTicker?: string;
  /** Free-form note describing the signal that opened the trade. */
  signalNote: string;
};

export type Outcome = "WIN" | "LOSS";

export type SettledTrade = Position & {
  outcome: Outcome;
  payout: number;
  grossProfit: number;
  fee: number;
  netProfit: number;
  settledAt: number;
};

export type ArbitrageState = {
  leg1: Position;
  leg2?: Position;
  hedged: boolean;
};

export type EntryDecision = {
  strategy: StrategyName;
  label: TradeLabel;
  ticker: string;
  side: Side;
  price: number;
  contracts: number;
  stake: number;
  feeReserved: number;
  previousTicker?: string;
  signalNote: string;
};

export type DecisionAction = "entered" | "skipped" | "waiting";

/** Outcome of one evaluator for one ticker in one cycle. */
export type EvaluationResult =
  | { action: "entered"; entries: EntryDecision[] }
  | { action: "skipped"; reason: string }
  | { action: "waiting"; reason: string }
  | { action: "idle" };

export type StrategyStats = {
  totalStaked: number;
  totalProfit: number;
  wins: number;
  losses: number;
  pending: number;
};

export type RollingMetrics = {
  sampleSize: number;
  capacity: number;
  winRate: number;
  breakEvenWinRate: number;
  gatePasses: boolean;
};

export type CycleStats = {
  at: number;
  ticker?: string;
  byStrategy: Record<StrategyName, StrategyStats>;
  total: StrategyStats;
  consensusBankroll: number;
  dailyRealizedLoss: number;
  weeklyRealizedLoss: number;
  rolling: RollingMetrics;
  openPositions: number;
};

export interface MarketSnapshotSource {
  getMarketSnapshot: (seriesTicker: string) => Promise<MarketSnapshot | null>;
}

export interface PriceSource {
  getPriceSample: (asset: string) => Promise<PriceSample>;
}

export interface SettlementSource {
  getSettlementFact: (ticker: string) => Promise<SettlementFact>;
}

export interface TradeEventSink {
  onTradeOpened: (position: Position) => void;
  onTradeSettled: (trade: SettledTrade) => void;
  onCycleStats: (stats: CycleStats) => void;
}
