import type { PriceSample } from "./types";

/**
 * Bounded, time-ordered buffer of underlying price samples.
 * Oldest samples are dropped once capacity is reached.
 */
export class PriceHistory {
  private readonly capacity: number;
  private samples: PriceSample[] = [];

  constructor(capacity: number) {
    this.capacity = Math.max(2, Math.floor(capacity));
  }

  /**
   * Capacity large enough to cover `windowSeconds` at the given poll cadence,
   * with headroom for slow cycles.
   */
  static forWindow(windowSeconds: number, pollSeconds: number, minimum = 100, headroom = 20): PriceHistory {
    const perWindow = pollSeconds > 0 ? Math.ceil(windowSeconds / pollSeconds) : windowSeconds;
    return new PriceHistory(Math.max(minimum, perWindow + headroom));
  }

  push(sample: PriceSample): void {
    const last = this.samples[this.samples.length - 1];
    if (last && sample.timestamp < last.timestamp) return;
    this.samples.push(sample);
    if (this.samples.length > this.capacity) {
      this.samples = this.samples.slice(this.samples.length - this.capacity);
    }
  }

  latest(): PriceSample | undefined {
    return this.samples[this.samples.length - 1];
  }

  /** Most recent sample taken at or before `cutoff`. */
  atOrBefore(cutoff: number): PriceSample | undefined {
    for (let i = this.samples.length - 1; i >= 0; i -= 1) {
      if (this.samples[i].timestamp <= cutoff) return this.samples[i];
    }
    return undefined;
  }

  get size(): number {
    return this.samples.length;
  }

  get maxSize(): number {
    return this.capacity;
  }
}
