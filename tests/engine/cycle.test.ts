import { describe, test } from "node:test";
import assert from "node:assert/strict";
import { StrategyCore } from "../../src/engine/cycle";
import type { MarketSnapshot, SettledTrade, Side } from "../../src/engine/types";
import { createPosition, createTestConfig } from "../support/fixtures";

const T0 = "KXBTC15M-T0";
const T1 = "KXBTC15M-T1";
const T2 = "KXBTC15M-T2";
const START = Date.UTC(2026, 9, 13, 12, 0);

const snapshotT1: MarketSnapshot = {
  ticker: T1,
  yesAsk: 0.5,
  noAsk: 0.52,
  isNewlyOpen: true,
  rolloverPreviousTicker: T0,
  rolloverPreviousResult: "yes",
};

/** Core holding an open CONSENSUS position on T0 and one minute of price history. */
function primedCore(): StrategyCore {
  const core = new StrategyCore(createTestConfig());
  core.restore({
    open: [
      createPosition({ strategy: "CONSENSUS", label: "CONSENSUS", ticker: T0, side: "yes", stake: 5, price: 0.05, contracts: 100 }),
    ],
    settled: [],
  });
  core.runCycle({ now: START, snapshot: null, priceSample: { timestamp: START, price: 100 }, settlements: new Map() });
  return core;
}

function runRollover(core: StrategyCore): ReturnType<StrategyCore["runCycle"]> {
  const now = START + 60_000;
  return core.runCycle({
    now,
    snapshot: snapshotT1,
    priceSample: { timestamp: now, price: 101 },
    settlements: new Map<string, Side>([[T0, "yes"]]),
  });
}

describe("StrategyCore.runCycle", () => {
  test("evaluates strategies in fixed order", () => {
    const report = runRollover(primedCore());

    assert.deepEqual(
      report.decisions.map((decision) => [decision.strategy, decision.action]),
      [
        ["PREVIOUS", "entered"],
        ["MOMENTUM", "entered"],
        ["MOMENTUM_15", "waiting"],
        ["CONSENSUS", "entered"],
        ["PREVIOUS_2", "waiting"],
        ["CONSENSUS_2", "waiting"],
        ["ARBITRAGE", "entered"],
      ],
    );
    assert.deepEqual(
      report.opened.map((position) => position.id),
      [`PREVIOUS:${T1}`, `MOMENTUM:${T1}`, `CONSENSUS:${T1}`, `ARBITRAGE:${T1}`],
    );
  });

  test("sizes entries before the same cycle's settlements land", () => {
    const core = primedCore();
    const report = runRollover(core);

    const entry = report.opened.find((position) => position.strategy === "CONSENSUS");
    // 1% of the pre-settlement $500 at $0.50; the $95 win would have made it 11
    assert.equal(entry?.contracts, 10);
    assert.equal(report.settled.length, 1);
    assert.equal(report.settled[0].netProfit, 95);
    assert.equal(report.stats.consensusBankroll, 595);
    assert.equal(core.ledger.currentBankroll(), 595);
  });

  test("reports statistics after settlement", () => {
    const report = runRollover(primedCore());

    assert.deepEqual(report.stats.byStrategy.CONSENSUS, {
      totalStaked: 10,
      totalProfit: 95,
      wins: 1,
      losses: 0,
      pending: 1,
    });
    assert.equal(report.stats.openPositions, 4);
    assert.equal(report.stats.rolling.sampleSize, 1);
  });

  test("trades each ticker at most once per strategy", () => {
    const core = primedCore();
    runRollover(core);
    const now = START + 65_000;
    const report = core.runCycle({
      now,
      snapshot: { ...snapshotT1, isNewlyOpen: false },
      priceSample: { timestamp: now, price: 101 },
      settlements: new Map(),
    });

    assert.deepEqual(report.opened, []);
    assert.deepEqual(
      report.decisions.map((decision) => [decision.strategy, decision.action, decision.reason]),
      [
        ["MOMENTUM_15", "waiting", "insufficient_history"],
        ["PREVIOUS_2", "waiting", "ask 0.5000 > 0.45"],
        ["CONSENSUS_2", "waiting", "ask 0.5000 > max 0.45"],
        ["ARBITRAGE", "waiting", "no hedge edge (-0.0200)"],
      ],
    );
  });

  test("a market that rolls away keeps the slots of strategies still waiting on it", () => {
    const core = primedCore();
    runRollover(core);
    const now = START + 15 * 60_000;
    core.runCycle({
      now,
      snapshot: { ticker: T2, yesAsk: 0.5, noAsk: 0.5, isNewlyOpen: true, rolloverPreviousTicker: T1 },
      priceSample: { timestamp: now, price: 102 },
      settlements: new Map(),
    });

    assert.equal(core.store.hasClaim("CONSENSUS_2", T1), true);
    assert.equal(core.store.hasClaim("PREVIOUS_2", T1), true);
    assert.deepEqual(
      core.store.openPositions().filter((position) => position.ticker === T1).map((position) => position.id),
      [`PREVIOUS:${T1}`, `MOMENTUM:${T1}`, `CONSENSUS:${T1}`, `ARBITRAGE:${T1}`],
    );
  });

  test("settles without a snapshot", () => {
    const core = primedCore();
    const report = core.runCycle({
      now: START + 5_000,
      snapshot: null,
      settlements: new Map<string, Side>([[T0, "no"]]),
    });

    assert.deepEqual(report.decisions, []);
    assert.equal(report.settled[0].outcome, "LOSS");
    assert.equal(core.ledger.currentBankroll(), 495);
  });
});

describe("StrategyCore.restore", () => {
  test("replays settled consensus trades into the ledger and rolling window", () => {
    const core = new StrategyCore(createTestConfig());
    const trade: SettledTrade = {
      ...createPosition({ strategy: "CONSENSUS", label: "CONSENSUS", ticker: T0 }),
      outcome: "LOSS",
      payout: 0,
      grossProfit: -5,
      fee: 0,
      netProfit: -5,
      settledAt: START,
    };
    core.restore({ open: [], settled: [trade] });

    assert.equal(core.ledger.currentBankroll(), 495);
    assert.equal(core.rolling.size, 1);
    assert.equal(core.store.hasClaim("CONSENSUS", T0), true);
    assert.equal(core.tradeRecords().length, 1);
  });

  test("re-links a hedge listed before its first leg", () => {
    const core = new StrategyCore(createTestConfig());
    core.restore({
      open: [
        createPosition({ strategy: "ARBITRAGE", label: "ARBITRAGE_HEDGE", ticker: T1, side: "no" }),
        createPosition({ strategy: "ARBITRAGE", label: "ARBITRAGE", ticker: T1, side: "yes" }),
      ],
      settled: [],
    });

    assert.equal(core.store.getArbitrage(T1)?.hedged, true);
  });
});

describe("StrategyCore price history", () => {
  test("a sub-second poll interval still keeps the long momentum lookback", () => {
    const core = new StrategyCore(createTestConfig({ pollSeconds: 0.5 }));
    const end = START + 1_000_000;
    for (let now = START; now <= end; now += 500) {
      core.runCycle({ now, snapshot: null, priceSample: { timestamp: now, price: 100 }, settlements: new Map() });
    }

    assert.equal(core.longHistory.atOrBefore(end - 900_000)?.timestamp, START + 100_000);
  });
});
