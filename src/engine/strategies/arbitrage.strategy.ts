import { arbitrageFirstSide, askFor, isValidAsk } from "../signals";
import { computeFixedStakeContracts, computeHedgeContracts } from "../sizing";
import { oppositeSide } from "../types";
import type { EntryDecision, EvaluationResult, Side, StrategyName } from "../types";
import type { EvaluationContext, StrategyEvaluator } from "./types";

type FirstLeg = { side: Side; price: number; contracts: number };

/** `1 - (first + opposite)`: positive when both legs together cost under $1. */
export function hedgeEdge(firstPrice: number, oppositePrice: number): number {
  return 1 - (firstPrice + oppositePrice);
}

/**
 * Two-leg strategy. Leg 1 buys the cheaper side at once with the fixed stake;
 * leg 2 buys the opposite side the first time the combined cost drops below
 * $1, sized so the hedge stays under the bet ceiling. A ticker is hedged at
 * most once.
 */
export class ArbitrageStrategy implements StrategyEvaluator {
  readonly name: StrategyName = "ARBITRAGE";

  evaluate(ctx: EvaluationContext): EvaluationResult {
    const { snapshot } = ctx;
    const entries: EntryDecision[] = [];

    let firstLeg: FirstLeg | undefined;
    const existing = ctx.store.getArbitrage(snapshot.ticker);
    if (existing) {
      if (existing.hedged) return { action: "idle" };
      firstLeg = existing.leg1;
    } else if (!ctx.store.hasClaim(this.name, snapshot.ticker)) {
      const leg1 = this.openFirstLeg(ctx);
      if (!leg1) return { action: "waiting", reason: "invalid_price" };
      entries.push(leg1);
      firstLeg = leg1;
    }

    if (!firstLeg) return { action: "idle" };

    const hedge = this.hedgeFor(firstLeg, ctx);
    if (hedge) entries.push(hedge);

    if (entries.length === 0) {
      const opposite = askFor(snapshot, oppositeSide(firstLeg.side));
      return {
        action: "waiting",
        reason: `no hedge edge (${hedgeEdge(firstLeg.price, opposite).toFixed(4)})`,
      };
    }
    return { action: "entered", entries };
  }

  private openFirstLeg(ctx: EvaluationContext): EntryDecision | undefined {
    const { snapshot, config } = ctx;
    const side = arbitrageFirstSide(snapshot.yesAsk, snapshot.noAsk);
    if (!side) return undefined;
    const price = askFor(snapshot, side);
    return {
      strategy: this.name,
      label: "ARBITRAGE",
      ticker: snapshot.ticker,
      side,
      price,
      contracts: computeFixedStakeContracts(config.stakeUsd, price),
      stake: config.stakeUsd,
      feeReserved: 0,
      signalNote: "first_leg",
    };
  }

  private hedgeFor(firstLeg: FirstLeg, ctx: EvaluationContext): EntryDecision | undefined {
    const { snapshot, config } = ctx;
    const side = oppositeSide(firstLeg.side);
    const price = askFor(snapshot, side);
    if (!isValidAsk(price)) return undefined;

    const edge = hedgeEdge(firstLeg.price, price);
    if (edge <= 0) return undefined;

    const contracts = computeHedgeContracts({
      firstLegContracts: firstLeg.contracts,
      oppositePrice: price,
      maxBetUsd: config.arbitrageMaxBetUsd,
    });
    if (contracts < 1) return undefined;

    return {
      strategy: this.name,
      label: "ARBITRAGE_HEDGE",
      ticker: snapshot.ticker,
      side,
      price,
      contracts,
      stake: contracts * price,
      feeReserved: 0,
      signalNote: `hedge_of=${firstLeg.side} edge=${edge.toFixed(4)}`,
    };
  }
}
