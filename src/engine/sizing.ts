// absorbs binary float error such as 0.7 / 0.1 = 6.999999999999999
const FLOOR_TOLERANCE = 1e-9;

export type BankrollSizing = {
  contracts: number;
  stakeUsd: number;
  riskBudgetUsd: number;
};

/**
 * Whole contracts affordable with `min(riskPct, maxRiskPct)` of the bankroll.
 * Returns zero contracts when the bankroll or price cannot support an entry.
 */
export function computeBankrollContracts(params: {
  bankrollUsd: number;
  riskPct: number;
  maxRiskPct: number;
  price: number;
}): BankrollSizing {
  const { bankrollUsd, price } = params;
  if (!(bankrollUsd > 0) || !(price > 0)) {
    return { contracts: 0, stakeUsd: 0, riskBudgetUsd: 0 };
  }
  const fraction = Math.max(0, Math.min(params.riskPct, params.maxRiskPct));
  const riskBudgetUsd = fraction * bankrollUsd;
  const contracts = Math.max(0, Math.floor(riskBudgetUsd / price + FLOOR_TOLERANCE));
  return { contracts, stakeUsd: contracts * price, riskBudgetUsd };
}

/** Fractional contracts for a fixed dollar stake. */
export function computeFixedStakeContracts(stakeUsd: number, price: number): number {
  if (!(stakeUsd > 0) || !(price > 0)) return 0;
  return stakeUsd / price;
}

/**
 * Whole hedge contracts that keep the hedge notional strictly under
 * `maxBetUsd` and never exceed the first leg.
 */
export function computeHedgeContracts(params: {
  firstLegContracts: number;
  oppositePrice: number;
  maxBetUsd: number;
  epsilonUsd?: number;
}): number {
  if (!(params.oppositePrice > 0)) return 0;
  const epsilon = params.epsilonUsd ?? 0.0001;
  const byBet = Math.floor((params.maxBetUsd - epsilon) / params.oppositePrice);
  return Math.max(0, Math.min(Math.floor(params.firstLegContracts), byBet));
}
