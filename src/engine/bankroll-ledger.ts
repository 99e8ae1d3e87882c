import { dayKey, isoWeekKey } from "./calendar";

export type BankrollLedgerParams = {
  baseCapitalUsd: number;
  riskPct: number;
  dailyLossCapR: number;
  weeklyLossCapR: number;
};

export type LedgerSnapshot = {
  bankrollUsd: number;
  riskUnitUsd: number;
  dailyRealizedLossUsd: number;
  weeklyRealizedLossUsd: number;
  dailyCapUsd: number;
  weeklyCapUsd: number;
  dailyCapBreached: boolean;
  weeklyCapBreached: boolean;
};

export type GateDecision = { allowed: boolean; reason?: string };

/**
 * Shared bankroll of the consensus family.
 *
 * The bankroll is never set directly: it is the base capital plus the net
 * result of every consensus-family settlement fed through
 * {@link BankrollLedger.recordSettlement}. Loss accumulators are keyed by the
 * UTC day / ISO week of the settlement timestamp and read as zero once the
 * clock has moved into a later period.
 */
export class BankrollLedger {
  private readonly baseCapitalUsd: number;
  private readonly riskPct: number;
  private readonly dailyLossCapR: number;
  private readonly weeklyLossCapR: number;
  private realizedNetPnlUsd = 0;
  private dailyRealizedLossUsd = 0;
  private weeklyRealizedLossUsd = 0;
  private currentDayKey?: string;
  private currentWeekKey?: string;

  constructor(params: BankrollLedgerParams) {
    this.baseCapitalUsd = params.baseCapitalUsd;
    this.riskPct = params.riskPct;
    this.dailyLossCapR = params.dailyLossCapR;
    this.weeklyLossCapR = params.weeklyLossCapR;
  }

  currentBankroll(): number {
    return this.baseCapitalUsd + this.realizedNetPnlUsd;
  }

  get baseCapital(): number {
    return this.baseCapitalUsd;
  }

  get realizedNetPnl(): number {
    return this.realizedNetPnlUsd;
  }

  recordSettlement(netProfitUsd: number, timestamp: number): void {
    this.realizedNetPnlUsd += netProfitUsd;

    const day = dayKey(timestamp);
    const week = isoWeekKey(timestamp);
    if (day !== this.currentDayKey) {
      this.currentDayKey = day;
      this.dailyRealizedLossUsd = 0;
    }
    if (week !== this.currentWeekKey) {
      this.currentWeekKey = week;
      this.weeklyRealizedLossUsd = 0;
    }

    if (netProfitUsd < 0) {
      this.dailyRealizedLossUsd += Math.abs(netProfitUsd);
      this.weeklyRealizedLossUsd += Math.abs(netProfitUsd);
    }
  }

  /** One R at the current bankroll. */
  riskUnit(): number {
    return this.currentBankroll() * this.riskPct;
  }

  dailyRealizedLoss(now: number): number {
    return dayKey(now) === this.currentDayKey ? this.dailyRealizedLossUsd : 0;
  }

  weeklyRealizedLoss(now: number): number {
    return isoWeekKey(now) === this.currentWeekKey ? this.weeklyRealizedLossUsd : 0;
  }

  dailyCapBreached(now: number): boolean {
    return this.dailyRealizedLoss(now) >= this.dailyLossCapR * this.riskUnit();
  }

  weeklyCapBreached(now: number): boolean {
    return this.weeklyRealizedLoss(now) >= this.weeklyLossCapR * this.riskUnit();
  }

  snapshot(now: number): LedgerSnapshot {
    const riskUnitUsd = this.riskUnit();
    return {
      bankrollUsd: this.currentBankroll(),
      riskUnitUsd,
      dailyRealizedLossUsd: this.dailyRealizedLoss(now),
      weeklyRealizedLossUsd: this.weeklyRealizedLoss(now),
      dailyCapUsd: this.dailyLossCapR * riskUnitUsd,
      weeklyCapUsd: this.weeklyLossCapR * riskUnitUsd,
      dailyCapBreached: this.dailyCapBreached(now),
      weeklyCapBreached: this.weeklyCapBreached(now),
    };
  }
}

/** Entry gate shared by CONSENSUS and CONSENSUS_2. */
export function ledgerGate(snapshot: LedgerSnapshot): GateDecision {
  if (snapshot.bankrollUsd <= 0) return { allowed: false, reason: "bankroll_depleted" };
  if (snapshot.dailyCapBreached) return { allowed: false, reason: "daily_loss_cap" };
  if (snapshot.weeklyCapBreached) return { allowed: false, reason: "weekly_loss_cap" };
  return { allowed: true };
}
