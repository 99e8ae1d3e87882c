import { ArbitrageStrategy } from "./arbitrage.strategy";
import { CONSENSUS, CONSENSUS_2, ConsensusStrategy } from "./consensus.strategy";
import { FixedStakeStrategy, MOMENTUM, MOMENTUM_15, PREVIOUS, PREVIOUS_2 } from "./fixed-stake.strategy";
import type { StrategyEvaluator } from "./types";

export type { EvaluationContext, RiskSnapshot, StrategyConfig, StrategyEvaluator, CycleSignals } from "./types";
export { ArbitrageStrategy, hedgeEdge } from "./arbitrage.strategy";
export { ConsensusStrategy } from "./consensus.strategy";
export { FixedStakeStrategy } from "./fixed-stake.strategy";

/** Evaluation order within a cycle. Changing it changes which entries see which claims. */
export function buildStrategies(): StrategyEvaluator[] {
  return [
    new FixedStakeStrategy(PREVIOUS),
    new FixedStakeStrategy(MOMENTUM),
    new FixedStakeStrategy(MOMENTUM_15),
    new ConsensusStrategy(CONSENSUS),
    new FixedStakeStrategy(PREVIOUS_2),
    new ConsensusStrategy(CONSENSUS_2),
    new ArbitrageStrategy(),
  ];
}
