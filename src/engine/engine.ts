import type { Logger } from "../utils/logger.util";
import type { DecisionLogger } from "../persistence/decision-logger";
import { toDecisionLogEntries } from "../persistence/decision-logger";
import type { TradeJournal } from "../persistence/trade-journal";
import { CycleFetchError, CycleInProgressError, toError } from "../errors/app.errors";
import type { CycleStage } from "../errors/app.errors";
import type { CycleReport, StrategyCore } from "./cycle";
import { STRATEGY_ORDER, formatSigned } from "./stats";
import type {
  MarketSnapshot,
  MarketSnapshotSource,
  PriceSample,
  PriceSource,
  SettlementSource,
  Side,
  StrategyName,
  TradeEventSink,
} from "./types";

export const PRICE_ASSET = "BTC";

const SHORT_NAMES: Record<StrategyName, string> = {
  PREVIOUS: "P",
  MOMENTUM: "M",
  CONSENSUS: "C",
  MOMENTUM_15: "M15",
  PREVIOUS_2: "P2",
  CONSENSUS_2: "C2",
  ARBITRAGE: "A",
};

type CycleInputs = {
  snapshot: MarketSnapshot | null;
  priceSample: PriceSample;
  settlements: Map<string, Side>;
};

/**
 * Poll loop around {@link StrategyCore}. Each cycle gathers every input
 * first; if any collaborator fails the cycle is dropped before the core sees
 * it, so strategy and risk state only move on complete inputs.
 */
export class BotEngine {
  private readonly core: StrategyCore;
  private readonly markets: MarketSnapshotSource;
  private readonly prices: PriceSource;
  private readonly settlements: SettlementSource;
  private readonly seriesTicker: string;
  private readonly pollMs: number;
  private readonly logger: Logger;
  private readonly sink?: TradeEventSink;
  private readonly journal?: TradeJournal;
  private readonly decisionLogger?: DecisionLogger;
  private readonly clock: () => number;
  private running = false;
  private inFlight?: Promise<CycleReport | null>;
  private wake?: () => void;
  private loop?: Promise<void>;

  constructor(params: {
    core: StrategyCore;
    markets: MarketSnapshotSource;
    prices: PriceSource;
    settlements: SettlementSource;
    seriesTicker: string;
    pollSeconds: number;
    logger: Logger;
    sink?: TradeEventSink;
    journal?: TradeJournal;
    decisionLogger?: DecisionLogger;
    clock?: () => number;
  }) {
    this.core = params.core;
    this.markets = params.markets;
    this.prices = params.prices;
    this.settlements = params.settlements;
    this.seriesTicker = params.seriesTicker;
    this.pollMs = params.pollSeconds * 1000;
    this.logger = params.logger;
    this.sink = params.sink;
    this.journal = params.journal;
    this.decisionLogger = params.decisionLogger;
    this.clock = params.clock ?? Date.now;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): Promise<void> {
    if (this.loop) return this.loop;
    this.running = true;
    this.logger.info(`[BOT] Engine started (series=${this.seriesTicker}, poll=${this.pollMs / 1000}s)`);
    this.loop = this.runLoop().finally(() => {
      this.loop = undefined;
      this.logger.info("[BOT] Engine stopped");
    });
    return this.loop;
  }

  stop(): void {
    this.running = false;
    this.wake?.();
  }

  /** Resolves once the loop has exited and no cycle is running. */
  async whenIdle(): Promise<void> {
    if (this.loop) await this.loop;
    if (this.inFlight) await this.inFlight;
  }

  /**
   * Runs one poll cycle. Returns `null` when the cycle was skipped because an
   * input could not be fetched.
   */
  runCycle(): Promise<CycleReport | null> {
    if (this.inFlight) {
      return Promise.reject(new CycleInProgressError());
    }
    const cycle = this.executeCycle().finally(() => {
      this.inFlight = undefined;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private async runLoop(): Promise<void> {
    while (this.running) {
      const startedAt = this.clock();
      try {
        await this.runCycle();
      } catch (err) {
        this.logger.error("[BOT] Cycle failed", toError(err));
      }
      const elapsed = this.clock() - startedAt;
      await this.sleep(Math.max(0, this.pollMs - elapsed));
    }
  }

  private sleep(ms: number): Promise<void> {
    if (!this.running) return Promise.resolve();
    return new Promise((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wake = done;
    });
  }

  private async executeCycle(): Promise<CycleReport | null> {
    const now = this.clock();
    let inputs: CycleInputs;
    try {
      inputs = await this.fetchInputs();
    } catch (err) {
      if (err instanceof CycleFetchError) {
        this.logger.warn(`[BOT] Cycle skipped (${err.stage}): ${err.message}`);
        return null;
      }
      throw err;
    }

    const report = this.core.runCycle({ now, ...inputs });
    this.logger.info(this.statusLine(report));
    for (const decision of report.decisions) {
      if (decision.action === "entered") continue;
      this.logger.debug(`[BOT] ${decision.strategy} ${decision.action} on ${decision.ticker}: ${decision.reason ?? "-"}`);
    }
    for (const position of report.opened) this.sink?.onTradeOpened(position);
    for (const trade of report.settled) this.sink?.onTradeSettled(trade);
    this.sink?.onCycleStats(report.stats);

    await this.persist(report);
    return report;
  }

  private async fetchInputs(): Promise<CycleInputs> {
    const priceSample = await this.fetchStage("price", () => this.prices.getPriceSample(PRICE_ASSET));
    const settlements = await this.fetchStage("settlement", async () => {
      const facts = new Map<string, Side>();
      for (const ticker of this.core.store.pendingTickers()) {
        const fact = await this.settlements.getSettlementFact(ticker);
        if (fact !== "pending") facts.set(ticker, fact);
      }
      return facts;
    });
    // Last, so a snapshot source that tracks rollovers only advances on cycles that run.
    const snapshot = await this.fetchStage("market", () => this.markets.getMarketSnapshot(this.seriesTicker));
    return { snapshot, priceSample, settlements };
  }

  private async fetchStage<T>(stage: CycleStage, fetch: () => Promise<T>): Promise<T> {
    try {
      return await fetch();
    } catch (err) {
      const error = toError(err);
      throw new CycleFetchError(`${stage} fetch failed: ${error.message}`, stage, error);
    }
  }

  private async persist(report: CycleReport): Promise<void> {
    if (this.journal && (report.opened.length || report.settled.length)) {
      try {
        await this.journal.save(this.core.tradeRecords());
      } catch (err) {
        this.logger.error(`[JOURNAL] Failed to write ${this.journal.path}`, toError(err));
      }
    }
    const { snapshot } = report;
    if (this.decisionLogger && snapshot && report.decisions.length) {
      const entries = report.decisions.flatMap((decision) => toDecisionLogEntries(decision, snapshot, report.now));
      try {
        await this.decisionLogger.append(entries);
      } catch (err) {
        this.logger.error("[BOT] Failed to append decision log", toError(err));
      }
    }
  }

  private statusLine(report: CycleReport): string {
    const { snapshot, stats } = report;
    const price = this.core.shortHistory.latest();
    const btc = price ? `$${price.price.toFixed(2)}` : "n/a";
    if (!snapshot) {
      return `[BOT] No open ${this.seriesTicker} market | BTC=${btc} | open=${stats.openPositions}`;
    }
    const previous = snapshot.rolloverPreviousTicker
      ? `${snapshot.rolloverPreviousTicker}=${snapshot.rolloverPreviousResult ?? "pending"}`
      : "none";
    const toClose =
      snapshot.closeTime === undefined ? "?" : `${Math.max(0, Math.round((snapshot.closeTime - report.now) / 1000))}s`;
    const pnl = STRATEGY_ORDER.map((name) => `${SHORT_NAMES[name]}:${formatSigned(stats.byStrategy[name].totalProfit)}`).join(" ");
    return (
      `[BOT] ${snapshot.ticker} (${toClose}) yes=${snapshot.yesAsk.toFixed(2)} no=${snapshot.noAsk.toFixed(2)}` +
      ` | BTC=${btc} | prev=${previous} | ${pnl} | open=${stats.openPositions}` +
      ` | bankroll=$${stats.consensusBankroll.toFixed(2)}`
    );
  }
}
