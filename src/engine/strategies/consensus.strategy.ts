import { ledgerGate } from "../bankroll-ledger";
import { askFor, isValidAsk } from "../signals";
import { computeBankrollContracts } from "../sizing";
import type { EvaluationResult, StrategyName } from "../types";
import type { EvaluationContext, StrategyConfig, StrategyEvaluator } from "./types";

export type ConsensusDescriptor = {
  name: StrategyName;
  priceCeiling: (config: StrategyConfig) => number;
  /**
   * `skip` gives up the ticker on the first failed gate; `wait` keeps
   * re-checking every cycle until the market rolls over.
   */
  onGateFailure: "skip" | "wait";
};

export const CONSENSUS: ConsensusDescriptor = {
  name: "CONSENSUS",
  priceCeiling: (config) => config.consensusMaxPrice,
  onGateFailure: "skip",
};

export const CONSENSUS_2: ConsensusDescriptor = {
  name: "CONSENSUS_2",
  priceCeiling: (config) => config.dealMaxPrice,
  onGateFailure: "wait",
};

/**
 * Bankroll-sized entry when the previous-result and short momentum votes
 * agree. Reads the shared ledger and rolling window through the cycle's
 * {@link RiskSnapshot}; it never writes to them.
 */
export class ConsensusStrategy implements StrategyEvaluator {
  readonly name: StrategyName;
  private readonly descriptor: ConsensusDescriptor;

  constructor(descriptor: ConsensusDescriptor) {
    this.descriptor = descriptor;
    this.name = descriptor.name;
  }

  evaluate(ctx: EvaluationContext): EvaluationResult {
    const { snapshot, config, latched, risk } = ctx;
    if (ctx.store.hasClaim(this.name, snapshot.ticker)) return { action: "idle" };

    const previous = latched.previous;
    const momentum = latched.momentum;
    if (!previous || !momentum) return { action: "idle" };
    if (previous !== momentum) {
      return { action: "skipped", reason: `signals disagree (PREV=${previous}, MOM=${momentum})` };
    }

    const side = previous;
    const price = askFor(snapshot, side);
    if (!isValidAsk(price)) return this.blocked(`invalid price (${price})`);

    const ceiling = this.descriptor.priceCeiling(config);
    if (price > ceiling) return this.blocked(`ask ${price.toFixed(4)} > max ${ceiling.toFixed(2)}`);

    const gate = ledgerGate(risk.ledger);
    if (!gate.allowed) return this.blocked(gate.reason ?? "risk_gate");

    if (!risk.rolling.gatePasses) {
      return this.blocked(
        `rolling win rate below break-even (${(risk.rolling.winRate * 100).toFixed(1)}% < ${(risk.rolling.breakEvenWinRate * 100).toFixed(1)}%)`,
      );
    }

    const sizing = computeBankrollContracts({
      bankrollUsd: risk.ledger.bankrollUsd,
      riskPct: config.consensusRiskPct,
      maxRiskPct: config.consensusMaxRiskPct,
      price,
    });
    if (sizing.contracts < 1) {
      return this.blocked(`stake $${sizing.riskBudgetUsd.toFixed(2)} too small for ask $${price.toFixed(4)}`);
    }

    return {
      action: "entered",
      entries: [
        {
          strategy: this.name,
          label: this.name,
          ticker: snapshot.ticker,
          side,
          price,
          contracts: sizing.contracts,
          stake: sizing.stakeUsd,
          feeReserved: sizing.stakeUsd * config.consensusFeePct,
          signalNote: `PREV=${previous} MOM=${momentum}`,
        },
      ],
    };
  }

  private blocked(reason: string): EvaluationResult {
    return this.descriptor.onGateFailure === "skip"
      ? { action: "skipped", reason }
      : { action: "waiting", reason };
  }
}
