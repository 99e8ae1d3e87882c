/**
 * Public market-data endpoints. No credentials are needed for either:
 * entries are simulated and nothing is routed to the exchange.
 */
export const KALSHI_API_BASE = "https://api.elections.kalshi.com/trade-api/v2";

/** 15-minute BTC up/down series. */
export const KALSHI_SERIES_TICKER = "KXBTC15M";

export const COINBASE_BTC_SPOT_URL = "https://api.coinbase.com/v2/prices/BTC-USD/spot";

export const DEFAULT_CONFIG = {
  POLL_SECONDS: 5,
  HTTP_TIMEOUT_MS: 20_000,
  STAKE_USD: 5,
  MOMENTUM_WINDOW_SECONDS: 60,
  MOMENTUM_15_WINDOW_SECONDS: 15 * 60,
  DEAL_MAX_PRICE: 0.45,
  ARBITRAGE_MAX_BET_USD: 10,
  INITIAL_BANKROLL_USD: 500,
  CONSENSUS_RISK_PCT: 0.01,
  CONSENSUS_MAX_RISK_PCT: 0.02,
  CONSENSUS_MAX_PRICE: 0.55,
  CONSENSUS_FEE_PCT: 0,
  CONSENSUS_ROLLING_WINDOW: 30,
  CONSENSUS_DAILY_LOSS_CAP_R: 3,
  CONSENSUS_WEEKLY_LOSS_CAP_R: 8,
  TRADES_CSV: "data/mock_trades.csv",
  DECISIONS_LOG: "data/decisions.jsonl",
} as const;
