import { COINBASE_BTC_SPOT_URL, DEFAULT_CONFIG, KALSHI_API_BASE, KALSHI_SERIES_TICKER } from "../constants/kalshi.constants";
import type { CoreConfig } from "../engine/cycle";
import { ConfigurationError } from "../errors/app.errors";

export type BotConfig = CoreConfig & {
  kalshiApiBase: string;
  seriesTicker: string;
  btcSpotUrl: string;
  httpTimeoutMs: number;
  tradesCsv: string;
  decisionsLog: string;
};

export function loadBotConfig(overrides: Record<string, string | undefined> = {}): BotConfig {
  const read = (key: string): string | undefined => overrides[key] ?? process.env[key];
  const readString = (key: string, fallback: string): string => {
    const val = read(key);
    return val === undefined ? fallback : val;
  };
  const readNumber = (key: string, fallback: number): number => {
    const val = read(key);
    if (val === undefined || val === "") return fallback;
    return Number(val);
  };

  const config: BotConfig = {
    kalshiApiBase: readString("KALSHI_API_BASE", KALSHI_API_BASE),
    seriesTicker: readString("KALSHI_SERIES_TICKER", KALSHI_SERIES_TICKER),
    btcSpotUrl: readString("BTC_SPOT_URL", COINBASE_BTC_SPOT_URL),
    httpTimeoutMs: readNumber("HTTP_TIMEOUT_MS", DEFAULT_CONFIG.HTTP_TIMEOUT_MS),
    pollSeconds: readNumber("POLL_SECONDS", DEFAULT_CONFIG.POLL_SECONDS),
    stakeUsd: readNumber("STAKE_USD", DEFAULT_CONFIG.STAKE_USD),
    momentumWindowSeconds: readNumber("MOMENTUM_WINDOW_SECONDS", DEFAULT_CONFIG.MOMENTUM_WINDOW_SECONDS),
    momentum15WindowSeconds: readNumber("MOMENTUM_15_WINDOW_SECONDS", DEFAULT_CONFIG.MOMENTUM_15_WINDOW_SECONDS),
    dealMaxPrice: readNumber("DEAL_MAX_PRICE", DEFAULT_CONFIG.DEAL_MAX_PRICE),
    arbitrageMaxBetUsd: readNumber("ARBITRAGE_MAX_BET_USD", DEFAULT_CONFIG.ARBITRAGE_MAX_BET_USD),
    initialBankrollUsd: readNumber("INITIAL_BANKROLL_USD", DEFAULT_CONFIG.INITIAL_BANKROLL_USD),
    consensusRiskPct: readNumber("CONSENSUS_RISK_PCT", DEFAULT_CONFIG.CONSENSUS_RISK_PCT),
    consensusMaxRiskPct: readNumber("CONSENSUS_MAX_RISK_PCT", DEFAULT_CONFIG.CONSENSUS_MAX_RISK_PCT),
    consensusMaxPrice: readNumber("CONSENSUS_MAX_PRICE", DEFAULT_CONFIG.CONSENSUS_MAX_PRICE),
    consensusFeePct: readNumber("CONSENSUS_FEE_PCT", DEFAULT_CONFIG.CONSENSUS_FEE_PCT),
    consensusRollingWindow: readNumber("CONSENSUS_ROLLING_WINDOW", DEFAULT_CONFIG.CONSENSUS_ROLLING_WINDOW),
    consensusDailyLossCapR: readNumber("CONSENSUS_DAILY_LOSS_CAP_R", DEFAULT_CONFIG.CONSENSUS_DAILY_LOSS_CAP_R),
    consensusWeeklyLossCapR: readNumber("CONSENSUS_WEEKLY_LOSS_CAP_R", DEFAULT_CONFIG.CONSENSUS_WEEKLY_LOSS_CAP_R),
    tradesCsv: readString("TRADES_CSV", DEFAULT_CONFIG.TRADES_CSV),
    decisionsLog: readString("DECISIONS_LOG", DEFAULT_CONFIG.DECISIONS_LOG),
  };

  validateBotConfig(config);
  return config;
}

/** Throws a single {@link ConfigurationError} naming every invalid option. */
export function validateBotConfig(config: BotConfig): void {
  const problems: string[] = [];
  const positive = (key: string, value: number): void => {
    if (!Number.isFinite(value) || value <= 0) problems.push(`${key} must be a positive number (got ${value})`);
  };
  const fraction = (key: string, value: number): void => {
    if (!Number.isFinite(value) || value < 0 || value > 1) problems.push(`${key} must be between 0 and 1 (got ${value})`);
  };
  const price = (key: string, value: number): void => {
    if (!Number.isFinite(value) || value <= 0 || value > 1) problems.push(`${key} must be a price in (0, 1] (got ${value})`);
  };
  const nonNegative = (key: string, value: number): void => {
    if (!Number.isFinite(value) || value < 0) problems.push(`${key} must be zero or more (got ${value})`);
  };

  positive("POLL_SECONDS", config.pollSeconds);
  positive("HTTP_TIMEOUT_MS", config.httpTimeoutMs);
  positive("STAKE_USD", config.stakeUsd);
  positive("MOMENTUM_WINDOW_SECONDS", config.momentumWindowSeconds);
  positive("MOMENTUM_15_WINDOW_SECONDS", config.momentum15WindowSeconds);
  positive("ARBITRAGE_MAX_BET_USD", config.arbitrageMaxBetUsd);
  positive("INITIAL_BANKROLL_USD", config.initialBankrollUsd);
  positive("CONSENSUS_ROLLING_WINDOW", config.consensusRollingWindow);
  price("DEAL_MAX_PRICE", config.dealMaxPrice);
  price("CONSENSUS_MAX_PRICE", config.consensusMaxPrice);
  fraction("CONSENSUS_RISK_PCT", config.consensusRiskPct);
  fraction("CONSENSUS_MAX_RISK_PCT", config.consensusMaxRiskPct);
  fraction("CONSENSUS_FEE_PCT", config.consensusFeePct);
  nonNegative("CONSENSUS_DAILY_LOSS_CAP_R", config.consensusDailyLossCapR);
  nonNegative("CONSENSUS_WEEKLY_LOSS_CAP_R", config.consensusWeeklyLossCapR);
  if (!config.seriesTicker) problems.push("KALSHI_SERIES_TICKER must not be empty");
  if (!config.tradesCsv) problems.push("TRADES_CSV must not be empty");

  if (problems.length) {
    throw new ConfigurationError(`Invalid configuration: ${problems.join("; ")}`);
  }
}

export function parseCliOverrides(argv: string[]): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith("--")) continue;
    const [rawKey, ...rest] = arg.slice(2).split("=");
    const key = rawKey.toUpperCase().replace(/-/g, "_");
    if (rest.length) {
      overrides[key] = rest.join("=");
      continue;
    }
    const next = argv[i + 1];
    if (next && !next.startsWith("--")) {
      overrides[key] = next;
      i += 1;
    } else {
      overrides[key] = "true";
    }
  }
  return overrides;
}
