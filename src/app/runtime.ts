import { loadBotConfig } from "../config/bot-config";
import type { BotConfig } from "../config/bot-config";
import { StrategyCore } from "../engine/cycle";
import { BotEngine } from "../engine/engine";
import { RolloverTracker } from "../market/rollover-tracker";
import { DecisionLogger } from "../persistence/decision-logger";
import { TradeJournal } from "../persistence/trade-journal";
import { CoinbasePriceFeed } from "../provider/coinbase.price-feed";
import { KalshiMarketProvider } from "../provider/kalshi.provider";
import { ConsoleReporter } from "../reporting/console-reporter";
import { ConsoleLogger } from "../utils/logger.util";
import type { Logger } from "../utils/logger.util";

export type BotRuntime = {
  config: BotConfig;
  core: StrategyCore;
  engine: BotEngine;
  reporter: ConsoleReporter;
  /** Settles when the poll loop exits. */
  done: Promise<void>;
};

function describeConfig(config: BotConfig): string {
  return (
    `[BOT] series=${config.seriesTicker} poll=${config.pollSeconds}s stake=$${config.stakeUsd}` +
    ` deal_max=${config.dealMaxPrice} arb_max_bet=$${config.arbitrageMaxBetUsd}` +
    ` bankroll=$${config.initialBankrollUsd} risk=${config.consensusRiskPct}/${config.consensusMaxRiskPct}` +
    ` consensus_max=${config.consensusMaxPrice} fee=${config.consensusFeePct}` +
    ` caps=${config.consensusDailyLossCapR}R/${config.consensusWeeklyLossCapR}R rolling=${config.consensusRollingWindow}`
  );
}

/**
 * Loads configuration, restores earlier trades from the journal and starts
 * the poll loop.
 */
export async function startBot(
  overrides: Record<string, string | undefined> = {},
  logger: Logger = new ConsoleLogger(),
): Promise<BotRuntime> {
  const config = loadBotConfig(overrides);
  logger.info(describeConfig(config));

  const journal = new TradeJournal(config.tradesCsv, logger);
  const core = new StrategyCore(config);
  const restored = await journal.load();
  core.restore(restored);
  if (restored.open.length || restored.settled.length) {
    logger.info(
      `[JOURNAL] Restored ${restored.settled.length} settled and ${restored.open.length} open trade(s) from ${journal.path}`,
    );
  }

  const kalshi = new KalshiMarketProvider({ apiBase: config.kalshiApiBase, timeoutMs: config.httpTimeoutMs });
  const prices = new CoinbasePriceFeed({ spotUrl: config.btcSpotUrl, timeoutMs: config.httpTimeoutMs });
  const reporter = new ConsoleReporter(logger);

  const engine = new BotEngine({
    core,
    markets: new RolloverTracker({ markets: kalshi, settlements: kalshi }),
    prices,
    settlements: kalshi,
    seriesTicker: config.seriesTicker,
    pollSeconds: config.pollSeconds,
    logger,
    sink: reporter,
    journal,
    decisionLogger: config.decisionsLog ? new DecisionLogger(config.decisionsLog) : undefined,
  });

  const done = engine.start();
  return { config, core, engine, reporter, done };
}
