import { describe, test } from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import type { DecisionRecord } from "../../src/engine/cycle";
import { DecisionLogger, toDecisionLogEntries } from "../../src/persistence/decision-logger";
import { createPosition, createSnapshot } from "../support/fixtures";

const NOW = Date.UTC(2026, 9, 13, 12, 0);
const snapshot = createSnapshot({ ticker: "KXBTC15M-T1", yesAsk: 0.48, noAsk: 0.5 });

describe("toDecisionLogEntries", () => {
  test("writes one entry per opened leg", () => {
    const decision: DecisionRecord = {
      strategy: "ARBITRAGE",
      ticker: "KXBTC15M-T1",
      action: "entered",
      positions: [
        createPosition({ strategy: "ARBITRAGE", label: "ARBITRAGE", ticker: "KXBTC15M-T1", side: "yes", stake: 5, contracts: 10 }),
        createPosition({ strategy: "ARBITRAGE", label: "ARBITRAGE_HEDGE", ticker: "KXBTC15M-T1", side: "no", stake: 5, contracts: 10 }),
      ],
    };

    const entries = toDecisionLogEntries(decision, snapshot, NOW);
    assert.deepEqual(
      entries.map((entry) => [entry.side, entry.reason]),
      [
        ["yes", undefined],
        ["no", "ARBITRAGE_HEDGE"],
      ],
    );
    assert.equal(entries[0].ts, "2026-10-13T12:00:00.000Z");
    assert.equal(entries[0].yes_ask, 0.48);
  });

  test("keeps the reason of a skipped decision", () => {
    const entries = toDecisionLogEntries(
      { strategy: "CONSENSUS", ticker: "KXBTC15M-T1", action: "skipped", reason: "daily_loss_cap", positions: [] },
      snapshot,
      NOW,
    );
    assert.deepEqual(entries, [
      {
        ts: "2026-10-13T12:00:00.000Z",
        strategy: "CONSENSUS",
        ticker: "KXBTC15M-T1",
        yes_ask: 0.48,
        no_ask: 0.5,
        action: "skipped",
        reason: "daily_loss_cap",
      },
    ]);
  });
});

describe("DecisionLogger", () => {
  test("appends JSON lines", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "decision-log-"));
    const file = path.join(dir, "decisions.jsonl");
    const logger = new DecisionLogger(file);
    const entries = toDecisionLogEntries(
      { strategy: "CONSENSUS_2", ticker: "KXBTC15M-T1", action: "waiting", reason: "ask 0.5000 > max 0.45", positions: [] },
      snapshot,
      NOW,
    );

    await logger.append(entries);
    await logger.append(entries);

    const lines = (await fs.readFile(file, "utf8")).trim().split("\n");
    assert.equal(lines.length, 2);
    assert.equal(JSON.parse(lines[1]).reason, "ask 0.5000 > max 0.45");
    await fs.rm(dir, { recursive: true, force: true });
  });

  test("does nothing without a path", async () => {
    await new DecisionLogger("").append([]);
  });
});
