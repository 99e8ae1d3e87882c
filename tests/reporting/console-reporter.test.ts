import { describe, test } from "node:test";
import assert from "node:assert/strict";
import { StrategyCore } from "../../src/engine/cycle";
import { settlePosition } from "../../src/engine/settlement";
import { ConsoleReporter, formatStatsLines } from "../../src/reporting/console-reporter";
import { MemoryLogger, createPosition, createTestConfig } from "../support/fixtures";

const NOW = Date.UTC(2026, 9, 13, 12, 0);

describe("formatStatsLines", () => {
  test("lists every strategy, the total and the consensus risk state", () => {
    const lines = formatStatsLines(new StrategyCore(createTestConfig()).stats(NOW));

    assert.equal(lines.length, 9);
    assert.equal(lines[0], "PREVIOUS     W/L 0/0 (n/a) pending=0 staked=$0.00 pnl=+$0.00");
    assert.equal(lines[7], "TOTAL        W/L 0/0 (n/a) pending=0 staked=$0.00 pnl=+$0.00");
    assert.equal(
      lines[8],
      "consensus bankroll=$500.00 daily_loss=$0.00 weekly_loss=$0.00 rolling=0/30 win=0.0% breakeven=0.0% gate=open",
    );
  });
});

describe("ConsoleReporter", () => {
  test("logs entries and settlements", () => {
    const logger = new MemoryLogger();
    const reporter = new ConsoleReporter(logger);
    const position = createPosition({ signalNote: "yes" });

    reporter.onTradeOpened(position);
    reporter.onTradeSettled(settlePosition(position, "no", NOW));

    assert.deepEqual(logger.lines, [
      "info [ENTRY] PREVIOUS KXBTC15M-T0 YES @ 0.50 x10.00 stake=$5.00 (yes)",
      "info [SETTLE] PREVIOUS KXBTC15M-T0 YES LOSS payout=$0.00 net=-$5.00",
    ]);
  });

  test("prints statistics only after trade activity", () => {
    const logger = new MemoryLogger();
    const reporter = new ConsoleReporter(logger);
    const stats = new StrategyCore(createTestConfig()).stats(NOW);

    reporter.onCycleStats(stats);
    assert.equal(logger.lines.length, 0);

    reporter.onTradeOpened(createPosition());
    reporter.onCycleStats(stats);
    reporter.onCycleStats(stats);
    assert.equal(logger.lines.filter((line) => line.startsWith("info [STATS]")).length, 9);
  });

  test("final statistics fall back to the last cycle", () => {
    const logger = new MemoryLogger();
    const reporter = new ConsoleReporter(logger);

    reporter.printFinalStats();
    assert.deepEqual(logger.lines, ["info [STATS] No cycles completed"]);

    reporter.onCycleStats(new StrategyCore(createTestConfig()).stats(NOW));
    reporter.printFinalStats();
    assert.equal(logger.lines.length, 10);
  });
});
