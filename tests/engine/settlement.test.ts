import { describe, test } from "node:test";
import assert from "node:assert/strict";
import { BankrollLedger } from "../../src/engine/bankroll-ledger";
import { RollingPerformanceTracker } from "../../src/engine/rolling-performance";
import { SettlementEngine, settlePosition } from "../../src/engine/settlement";
import { TradeStateStore } from "../../src/engine/trade-state-store";
import type { Side } from "../../src/engine/types";
import { approxEqual, createPosition } from "../support/fixtures";

const SETTLED_AT = Date.UTC(2026, 9, 13, 12, 15);

function createEngine(): {
  engine: SettlementEngine;
  store: TradeStateStore;
  ledger: BankrollLedger;
  rolling: RollingPerformanceTracker;
} {
  const store = new TradeStateStore();
  const ledger = new BankrollLedger({ baseCapitalUsd: 500, riskPct: 0.01, dailyLossCapR: 3, weeklyLossCapR: 8 });
  const rolling = new RollingPerformanceTracker(30);
  return { engine: new SettlementEngine({ store, ledger, rolling }), store, ledger, rolling };
}

describe("settlePosition", () => {
  test("a win pays one dollar per contract, less the reserved fee", () => {
    const position = createPosition({
      strategy: "CONSENSUS",
      label: "CONSENSUS",
      stake: 5,
      contracts: 12,
      price: 5 / 12,
      feeReserved: 5 * 0.02,
    });
    const trade = settlePosition(position, "yes", SETTLED_AT);

    assert.equal(trade.outcome, "WIN");
    assert.equal(trade.payout, 12);
    assert.equal(trade.grossProfit, 7);
    assert.ok(approxEqual(trade.fee, 0.1));
    assert.ok(approxEqual(trade.netProfit, 6.9));
    assert.equal(trade.settledAt, SETTLED_AT);
  });

  test("a loss pays nothing", () => {
    const trade = settlePosition(createPosition({ side: "no", stake: 5, contracts: 10 }), "yes", SETTLED_AT);

    assert.equal(trade.outcome, "LOSS");
    assert.equal(trade.payout, 0);
    assert.equal(trade.netProfit, -5);
  });
});

describe("SettlementEngine", () => {
  test("settles only tickers with a fact", () => {
    const { engine, store } = createEngine();
    store.restorePosition(createPosition({ ticker: "KXBTC15M-T0" }));
    store.restorePosition(createPosition({ ticker: "KXBTC15M-T1" }));

    const settled = engine.settle(new Map<string, Side>([["KXBTC15M-T0", "yes"]]), SETTLED_AT);
    assert.deepEqual(
      settled.map((trade) => trade.ticker),
      ["KXBTC15M-T0"],
    );
    assert.deepEqual(store.pendingTickers(), ["KXBTC15M-T1"]);
  });

  test("applies a consensus result to the ledger exactly once", () => {
    const { engine, store, ledger, rolling } = createEngine();
    store.restorePosition(
      createPosition({ strategy: "CONSENSUS_2", label: "CONSENSUS_2", stake: 4, contracts: 10, side: "no" }),
    );
    const facts = new Map<string, Side>([["KXBTC15M-T0", "yes"]]);

    assert.equal(engine.settle(facts, SETTLED_AT).length, 1);
    assert.equal(engine.settle(facts, SETTLED_AT).length, 0);
    assert.equal(ledger.currentBankroll(), 496);
    assert.equal(ledger.dailyRealizedLoss(SETTLED_AT), 4);
    assert.equal(rolling.size, 1);
  });

  test("other strategies leave the consensus ledger alone", () => {
    const { engine, store, ledger, rolling } = createEngine();
    store.restorePosition(createPosition({ strategy: "MOMENTUM", label: "MOMENTUM" }));

    engine.settle(new Map<string, Side>([["KXBTC15M-T0", "no"]]), SETTLED_AT);
    assert.equal(ledger.currentBankroll(), 500);
    assert.equal(rolling.size, 0);
  });
});
