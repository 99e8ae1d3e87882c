import type { RollingMetrics } from "./types";

type RollingEntry = { win: boolean; netProfitUsd: number };

/**
 * Fixed-capacity window over the most recent consensus-family settlements.
 * The break-even gate only engages once the window is full.
 */
export class RollingPerformanceTracker {
  private readonly capacity: number;
  private entries: RollingEntry[] = [];

  constructor(capacity: number) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  record(win: boolean, netProfitUsd: number): void {
    this.entries.push({ win, netProfitUsd });
    while (this.entries.length > this.capacity) {
      this.entries.shift();
    }
  }

  get size(): number {
    return this.entries.length;
  }

  get maxSize(): number {
    return this.capacity;
  }

  isFull(): boolean {
    return this.entries.length >= this.capacity;
  }

  winRate(): number {
    if (this.entries.length === 0) return 0;
    return this.entries.filter((entry) => entry.win).length / this.entries.length;
  }

  /**
   * Win rate needed to break even given the average win and loss in the
   * window. Undefined when there is nothing to compare (no wins and no losses
   * of any size).
   */
  breakEvenWinRate(): number | undefined {
    const wins = this.entries.filter((entry) => entry.win).map((entry) => entry.netProfitUsd);
    const losses = this.entries.filter((entry) => !entry.win).map((entry) => entry.netProfitUsd);
    const avgWin = wins.length ? wins.reduce((sum, value) => sum + value, 0) / wins.length : 0;
    const avgLoss = losses.length ? Math.abs(losses.reduce((sum, value) => sum + value, 0) / losses.length) : 0;
    if (avgWin + avgLoss === 0) return undefined;
    return avgLoss / (avgWin + avgLoss);
  }

  gatePasses(): boolean {
    if (!this.isFull()) return true;
    const breakEven = this.breakEvenWinRate();
    if (breakEven === undefined) return true;
    return this.winRate() >= breakEven;
  }

  metrics(): RollingMetrics {
    return {
      sampleSize: this.entries.length,
      capacity: this.capacity,
      winRate: this.winRate(),
      breakEvenWinRate: this.breakEvenWinRate() ?? 0,
      gatePasses: this.gatePasses(),
    };
  }
}
