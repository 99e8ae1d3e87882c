import { describe, test } from "node:test";
import assert from "node:assert/strict";
import { ArbitrageStrategy, hedgeEdge } from "../../../src/engine/strategies/arbitrage.strategy";
import { TradeStateStore } from "../../../src/engine/trade-state-store";
import { approxEqual, createContext, createPosition, createSnapshot, createTestConfig } from "../../support/fixtures";

const strategy = new ArbitrageStrategy();

function storeWithFirstLeg(): TradeStateStore {
  const store = new TradeStateStore();
  store.restorePosition(
    createPosition({
      strategy: "ARBITRAGE",
      label: "ARBITRAGE",
      ticker: "KXBTC15M-T1",
      side: "yes",
      price: 0.48,
      contracts: 5 / 0.48,
      signalNote: "first_leg",
    }),
  );
  return store;
}

describe("hedgeEdge", () => {
  test("is positive when both legs cost under a dollar", () => {
    assert.ok(approxEqual(hedgeEdge(0.48, 0.5), 0.02));
    assert.ok(approxEqual(hedgeEdge(0.48, 0.55), -0.03));
  });
});

describe("ArbitrageStrategy", () => {
  test("opens the cheaper side and hedges in the same cycle when the edge is there", () => {
    const ctx = createContext({ snapshot: createSnapshot({ ticker: "KXBTC15M-T1", yesAsk: 0.48, noAsk: 0.5 }) });
    const result = strategy.evaluate(ctx);

    assert.equal(result.action, "entered");
    if (result.action !== "entered") return;
    const [leg1, hedge] = result.entries;
    assert.equal(leg1.label, "ARBITRAGE");
    assert.equal(leg1.side, "yes");
    assert.equal(leg1.stake, 5);
    assert.equal(hedge.label, "ARBITRAGE_HEDGE");
    assert.equal(hedge.strategy, "ARBITRAGE");
    assert.equal(hedge.side, "no");
    assert.equal(hedge.contracts, 10);
    assert.equal(hedge.stake, 5);
    assert.equal(hedge.signalNote, "hedge_of=yes edge=0.0200");
  });

  test("opens only the first leg without an edge", () => {
    const ctx = createContext({ snapshot: createSnapshot({ ticker: "KXBTC15M-T1", yesAsk: 0.48, noAsk: 0.55 }) });
    const result = strategy.evaluate(ctx);

    assert.equal(result.action, "entered");
    if (result.action !== "entered") return;
    assert.equal(result.entries.length, 1);
    assert.equal(result.entries[0].signalNote, "first_leg");
  });

  test("keeps waiting for the edge on later cycles", () => {
    const ctx = createContext({
      store: storeWithFirstLeg(),
      snapshot: createSnapshot({ ticker: "KXBTC15M-T1", yesAsk: 0.46, noAsk: 0.55 }),
    });
    assert.deepEqual(strategy.evaluate(ctx), { action: "waiting", reason: "no hedge edge (-0.0300)" });
  });

  test("hedges an existing first leg once the edge appears", () => {
    const ctx = createContext({
      store: storeWithFirstLeg(),
      snapshot: createSnapshot({ ticker: "KXBTC15M-T1", yesAsk: 0.46, noAsk: 0.5 }),
    });
    const result = strategy.evaluate(ctx);

    assert.equal(result.action, "entered");
    if (result.action !== "entered") return;
    assert.equal(result.entries.length, 1);
    assert.equal(result.entries[0].label, "ARBITRAGE_HEDGE");
    assert.equal(result.entries[0].contracts, 10);
  });

  test("keeps the hedge under the bet ceiling and the first leg", () => {
    const ctx = createContext({
      snapshot: createSnapshot({ ticker: "KXBTC15M-T1", yesAsk: 0.3, noAsk: 0.5 }),
      config: createTestConfig({ arbitrageMaxBetUsd: 3 }),
    });
    const result = strategy.evaluate(ctx);

    assert.equal(result.action, "entered");
    if (result.action !== "entered") return;
    const [leg1, hedge] = result.entries;
    assert.equal(hedge.contracts, 5);
    assert.ok(hedge.contracts * hedge.price < 3);
    assert.ok(hedge.contracts <= leg1.contracts);
  });

  test("does nothing more once hedged", () => {
    const store = storeWithFirstLeg();
    store.restorePosition(
      createPosition({ strategy: "ARBITRAGE", label: "ARBITRAGE_HEDGE", ticker: "KXBTC15M-T1", side: "no" }),
    );
    const ctx = createContext({ store, snapshot: createSnapshot({ ticker: "KXBTC15M-T1", yesAsk: 0.2, noAsk: 0.2 }) });
    assert.deepEqual(strategy.evaluate(ctx), { action: "idle" });
  });

  test("stays idle on a ticker whose first leg already settled", () => {
    const store = new TradeStateStore();
    store.restoreClaim("ARBITRAGE", "KXBTC15M-T1");
    const ctx = createContext({ store, snapshot: createSnapshot({ ticker: "KXBTC15M-T1" }) });
    assert.deepEqual(strategy.evaluate(ctx), { action: "idle" });
  });
});
