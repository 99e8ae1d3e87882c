import { promises as fs } from "fs";
import path from "path";
import type { Position, SettledTrade, Side, StrategyName, TradeLabel } from "../engine/types";
import type { Logger } from "../utils/logger.util";
import { parseCsv, serializeCsv } from "./csv";

export const JOURNAL_COLUMNS = [
  "time",
  "strategy",
  "previous_ticker",
  "previous_result",
  "buy_ticker",
  "buy_side",
  "stake_usd",
  "price_usd",
  "contracts",
  "fee_usd",
  "gross_profit_usd",
  "outcome",
  "payout_usd",
  "profit_usd",
  "settled_time",
] as const;

export type JournalColumn = (typeof JOURNAL_COLUMNS)[number];
export type JournalRow = Record<JournalColumn, string>;

export type RestoredTrades = {
  open: Position[];
  settled: SettledTrade[];
  /** Rows that could not be understood and were left out. */
  rejected: number;
};

const LABELS: readonly TradeLabel[] = [
  "PREVIOUS",
  "PREVIOUS_2",
  "MOMENTUM",
  "MOMENTUM_15",
  "CONSENSUS",
  "CONSENSUS_2",
  "ARBITRAGE",
  "ARBITRAGE_HEDGE",
];

const round4 = (value: number): string => String(Math.round(value * 10_000) / 10_000);

const isLabel = (value: string): value is TradeLabel => LABELS.some((label) => label === value);

const isSide = (value: string): value is Side => value === "yes" || value === "no";

function strategyFor(label: TradeLabel): StrategyName {
  return label === "ARBITRAGE_HEDGE" ? "ARBITRAGE" : label;
}

function isSettledTrade(record: Position | SettledTrade): record is SettledTrade {
  return "netProfit" in record;
}

export function toJournalRow(record: Position | SettledTrade): JournalRow {
  const settled = isSettledTrade(record) ? record : undefined;
  return {
    time: new Date(record.openedAt).toISOString(),
    strategy: record.label,
    previous_ticker: record.previousTicker ?? "",
    previous_result: record.signalNote,
    buy_ticker: record.ticker,
    buy_side: record.side,
    stake_usd: round4(record.stake),
    price_usd: round4(record.price),
    contracts: round4(record.contracts),
    fee_usd: round4(settled ? settled.fee : record.feeReserved),
    gross_profit_usd: settled ? round4(settled.grossProfit) : "",
    outcome: settled ? settled.outcome : "",
    payout_usd: settled ? round4(settled.payout) : "",
    profit_usd: settled ? round4(settled.netProfit) : "",
    settled_time: settled ? new Date(settled.settledAt).toISOString() : "",
  };
}

/** Rebuilds a trade from a journal row, or `undefined` if the row is unusable. */
export function fromJournalRow(row: Partial<Record<string, string>>): Position | SettledTrade | undefined {
  const label = row.strategy ?? "";
  const side = row.buy_side ?? "";
  const ticker = row.buy_ticker ?? "";
  const openedAt = Date.parse(row.time ?? "");
  const stake = Number(row.stake_usd);
  const price = Number(row.price_usd);
  const contracts = Number(row.contracts);
  if (!isLabel(label) || !isSide(side) || !ticker || Number.isNaN(openedAt)) return undefined;
  if (![stake, price, contracts].every(Number.isFinite)) return undefined;

  const fee = row.fee_usd ? Number(row.fee_usd) : 0;
  const position: Position = {
    id: `${label}:${ticker}`,
    strategy: strategyFor(label),
    label,
    ticker,
    side,
    stake,
    price,
    contracts,
    feeReserved: Number.isFinite(fee) ? fee : 0,
    openedAt,
    previousTicker: row.previous_ticker || undefined,
    signalNote: row.previous_result ?? "",
  };

  const outcome = row.outcome ?? "";
  if (outcome !== "WIN" && outcome !== "LOSS") return position;

  const payout = Number(row.payout_usd);
  const grossProfit = Number(row.gross_profit_usd || payout - stake);
  const netProfit = Number(row.profit_usd);
  if (![payout, grossProfit, netProfit].every(Number.isFinite)) return undefined;
  const settledAt = Date.parse(row.settled_time ?? "");

  return {
    ...position,
    outcome,
    payout,
    grossProfit,
    fee: position.feeReserved,
    netProfit,
    settledAt: Number.isNaN(settledAt) ? openedAt : settledAt,
  };
}

/**
 * CSV record of every simulated trade. The whole file is rewritten on each
 * save, so it always mirrors the engine's trade list.
 */
export class TradeJournal {
  private readonly filePath: string;
  private readonly logger: Logger;

  constructor(filePath: string, logger: Logger) {
    this.filePath = filePath;
    this.logger = logger;
  }

  get path(): string {
    return this.filePath;
  }

  async loadRows(): Promise<Record<string, string>[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }
    return parseCsv(raw);
  }

  async load(): Promise<RestoredTrades> {
    const rows = await this.loadRows();
    const restored: RestoredTrades = { open: [], settled: [], rejected: 0 };
    for (const row of rows) {
      const record = fromJournalRow(row);
      if (!record) {
        restored.rejected += 1;
        continue;
      }
      if (isSettledTrade(record)) {
        restored.settled.push(record);
      } else {
        restored.open.push(record);
      }
    }
    if (restored.rejected) {
      this.logger.warn(`[JOURNAL] Ignored ${restored.rejected} unreadable row(s) in ${this.filePath}`);
    }
    return restored;
  }

  async save(records: readonly (Position | SettledTrade)[]): Promise<void> {
    if (!records.length) return;
    const csv = serializeCsv(JOURNAL_COLUMNS, records.map(toJournalRow));
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, csv, "utf8");
  }
}
