import { promises as fs } from "fs";
import path from "path";
import type { DecisionRecord } from "../engine/cycle";
import type { DecisionAction, MarketSnapshot, Side, StrategyName } from "../engine/types";

export type DecisionLogEntry = {
  ts: string;
  strategy: StrategyName;
  ticker: string;
  yes_ask: number;
  no_ask: number;
  action: DecisionAction;
  reason?: string;
  side?: Side;
  contracts?: number;
  stake_usd?: number;
};

export function toDecisionLogEntries(
  decision: DecisionRecord,
  snapshot: MarketSnapshot,
  now: number,
): DecisionLogEntry[] {
  const base = {
    ts: new Date(now).toISOString(),
    strategy: decision.strategy,
    ticker: decision.ticker,
    yes_ask: snapshot.yesAsk,
    no_ask: snapshot.noAsk,
    action: decision.action,
  };
  if (decision.action !== "entered") {
    return [{ ...base, reason: decision.reason }];
  }
  return decision.positions.map((position) => ({
    ...base,
    reason: position.label === decision.strategy ? undefined : position.label,
    side: position.side,
    contracts: position.contracts,
    stake_usd: position.stake,
  }));
}

export class DecisionLogger {
  private readonly path?: string;

  constructor(path?: string) {
    this.path = path || undefined;
  }

  async append(entries: readonly DecisionLogEntry[]): Promise<void> {
    if (!this.path || !entries.length) return;
    const lines = entries.map((entry) => `${JSON.stringify(entry)}\n`).join("");
    await fs.mkdir(path.dirname(this.path), { recursive: true });
    await fs.appendFile(this.path, lines, { encoding: "utf8" });
  }
}
