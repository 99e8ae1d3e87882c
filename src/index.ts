export { loadBotConfig, parseCliOverrides, validateBotConfig } from "./config/bot-config";
export type { BotConfig } from "./config/bot-config";
export { StrategyCore } from "./engine/cycle";
export type { CoreConfig, CycleInput, CycleReport, DecisionRecord } from "./engine/cycle";
export { BotEngine } from "./engine/engine";
export { calcStats, statsByStrategy } from "./engine/stats";
export { buildStrategies } from "./engine/strategies";
export * from "./engine/types";
export { RolloverTracker } from "./market/rollover-tracker";
export { TradeJournal } from "./persistence/trade-journal";
export { DecisionLogger } from "./persistence/decision-logger";
export { KalshiMarketProvider } from "./provider/kalshi.provider";
export { CoinbasePriceFeed } from "./provider/coinbase.price-feed";
export { ConsoleReporter } from "./reporting/console-reporter";
export { startBot } from "./app/runtime";
export * from "./errors/app.errors";
