import { askFor, formatMagnitude, isValidAsk } from "../signals";
import { computeFixedStakeContracts } from "../sizing";
import type { EvaluationResult, Side, Signal, StrategyName } from "../types";
import type { EvaluationContext, StrategyConfig, StrategyEvaluator } from "./types";

type VoteReading = { side?: Side; note: string; waitReason: string };

export type FixedStakeDescriptor = {
  name: StrategyName;
  /** Only evaluate once the series has rolled over into the current market. */
  requiresRollover: boolean;
  readVote: (ctx: EvaluationContext) => VoteReading;
  /** Highest ask the strategy accepts; `undefined` accepts any valid ask. */
  priceCeiling: (config: StrategyConfig) => number | undefined;
};

const momentumReading = (signal: Signal, label: string): VoteReading => ({
  side: signal.vote === "none" ? undefined : signal.vote,
  note: formatMagnitude(signal, label),
  waitReason: "insufficient_history",
});

export const PREVIOUS: FixedStakeDescriptor = {
  name: "PREVIOUS",
  requiresRollover: true,
  readVote: ({ signals }) => ({
    side: signals.previous.vote === "none" ? undefined : signals.previous.vote,
    note: signals.previous.vote,
    waitReason: "previous_unsettled",
  }),
  priceCeiling: () => undefined,
};

export const PREVIOUS_2: FixedStakeDescriptor = {
  name: "PREVIOUS_2",
  requiresRollover: false,
  readVote: ({ latched }) => ({
    side: latched.previous,
    note: latched.previous ?? "none",
    waitReason: "no_previous_result",
  }),
  priceCeiling: (config) => config.dealMaxPrice,
};

export const MOMENTUM: FixedStakeDescriptor = {
  name: "MOMENTUM",
  requiresRollover: true,
  readVote: ({ signals }) => momentumReading(signals.momentumShort, "BTC"),
  priceCeiling: () => undefined,
};

export const MOMENTUM_15: FixedStakeDescriptor = {
  name: "MOMENTUM_15",
  requiresRollover: true,
  readVote: ({ signals }) => momentumReading(signals.momentumLong, "BTC15"),
  priceCeiling: () => undefined,
};

/** Fee-less, fixed-stake strategies that buy the side a single signal points at. */
export class FixedStakeStrategy implements StrategyEvaluator {
  readonly name: StrategyName;
  private readonly descriptor: FixedStakeDescriptor;

  constructor(descriptor: FixedStakeDescriptor) {
    this.descriptor = descriptor;
    this.name = descriptor.name;
  }

  evaluate(ctx: EvaluationContext): EvaluationResult {
    const { snapshot, config } = ctx;
    if (ctx.store.hasClaim(this.name, snapshot.ticker)) return { action: "idle" };
    if (this.descriptor.requiresRollover && !snapshot.rolloverPreviousTicker) return { action: "idle" };

    const reading = this.descriptor.readVote(ctx);
    if (!reading.side) return { action: "waiting", reason: reading.waitReason };

    const price = askFor(snapshot, reading.side);
    if (!isValidAsk(price)) return { action: "waiting", reason: "invalid_price" };

    const ceiling = this.descriptor.priceCeiling(config);
    if (ceiling !== undefined && price > ceiling) {
      return { action: "waiting", reason: `ask ${price.toFixed(4)} > ${ceiling.toFixed(2)}` };
    }

    const contracts = computeFixedStakeContracts(config.stakeUsd, price);
    if (contracts <= 0) return { action: "waiting", reason: "zero_contracts" };

    return {
      action: "entered",
      entries: [
        {
          strategy: this.name,
          label: this.name,
          ticker: snapshot.ticker,
          side: reading.side,
          price,
          contracts,
          stake: config.stakeUsd,
          feeReserved: 0,
          previousTicker: snapshot.rolloverPreviousTicker,
          signalNote: reading.note,
        },
      ],
    };
  }
}
