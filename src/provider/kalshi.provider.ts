import axios, { type AxiosInstance } from "axios";
import type { SettlementFact, SettlementSource, Side } from "../engine/types";
import { MarketError, NetworkError, toError } from "../errors/app.errors";
import { sanitizeErrorMessage } from "../utils/sanitize-axios-error.util";

export type OpenMarket = {
  ticker: string;
  /** Dollars; 0 when the book has no ask. */
  yesAsk: number;
  noAsk: number;
  closeTime: number;
};

type RawMarket = Record<string, unknown>;

function parseTimestamp(value: unknown): number | undefined {
  if (typeof value !== "string" && typeof value !== "number") return undefined;
  const ts = typeof value === "number" ? value : Date.parse(value);
  return Number.isNaN(ts) ? undefined : ts;
}

/** Kalshi quotes asks in cents; the engine works in dollars. */
function parseAskDollars(cents: unknown): number {
  const num = typeof cents === "number" ? cents : Number(cents);
  if (!Number.isFinite(num) || num <= 0) return 0;
  return num / 100;
}

export function parseSettledSide(market: RawMarket): Side | undefined {
  const result = market.result;
  return result === "yes" || result === "no" ? result : undefined;
}

/** Open market with the earliest close time still in the future. */
export function pickNextExpiring(markets: RawMarket[], now: number): OpenMarket | null {
  let best: OpenMarket | null = null;
  for (const market of markets) {
    const closeTime = parseTimestamp(market.close_time);
    if (closeTime === undefined || closeTime <= now) continue;
    if (typeof market.ticker !== "string" || !market.ticker) continue;
    if (best && best.closeTime <= closeTime) continue;
    best = {
      ticker: market.ticker,
      yesAsk: parseAskDollars(market.yes_ask),
      noAsk: parseAskDollars(market.no_ask),
      closeTime,
    };
  }
  return best;
}

function isRecord(value: unknown): value is RawMarket {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read-only client for Kalshi's public market endpoints.
 */
export class KalshiMarketProvider implements SettlementSource {
  private readonly http: AxiosInstance;

  constructor(params: { apiBase: string; timeoutMs: number; http?: AxiosInstance }) {
    this.http = params.http ?? axios.create({ baseURL: params.apiBase, timeout: params.timeoutMs });
  }

  async getOpenMarket(seriesTicker: string, now: number = Date.now()): Promise<OpenMarket | null> {
    const data = await this.get("/markets", { series_ticker: seriesTicker, status: "open", limit: 50 });
    const markets = isRecord(data) && Array.isArray(data.markets) ? data.markets.filter(isRecord) : [];
    return pickNextExpiring(markets, now);
  }

  async getSettlementFact(ticker: string): Promise<SettlementFact> {
    const data = await this.get(`/markets/${encodeURIComponent(ticker)}`);
    if (!isRecord(data) || !isRecord(data.market)) {
      throw new MarketError(`Malformed market payload for ${ticker}`, ticker);
    }
    return parseSettledSide(data.market) ?? "pending";
  }

  private async get(path: string, params?: Record<string, string | number>): Promise<unknown> {
    try {
      const response = await this.http.get<unknown>(path, { params });
      return response.data;
    } catch (err) {
      throw new NetworkError(`Kalshi request failed: ${sanitizeErrorMessage(err)}`, path, toError(err));
    }
  }
}
