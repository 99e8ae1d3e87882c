import type { PriceHistory } from "./price-history";
import type { MarketSnapshot, Side, Signal, Vote } from "./types";

export function isValidAsk(price: number | undefined): price is number {
  return typeof price === "number" && Number.isFinite(price) && price > 0;
}

export function askFor(snapshot: Pick<MarketSnapshot, "yesAsk" | "noAsk">, side: Side): number {
  return side === "yes" ? snapshot.yesAsk : snapshot.noAsk;
}

/**
 * Result of the market that closed in the rollover that opened this one.
 * `none` until a rollover happened and the previous market has settled.
 */
export function previousVote(snapshot: MarketSnapshot): Signal {
  if (!snapshot.rolloverPreviousTicker || !snapshot.rolloverPreviousResult) {
    return { kind: "PREVIOUS", vote: "none" };
  }
  return { kind: "PREVIOUS", vote: snapshot.rolloverPreviousResult };
}

/**
 * Direction of the underlying over `windowSeconds`: `yes` when the latest
 * price is strictly above the last sample taken at or before the cutoff.
 */
export function momentumVote(
  history: PriceHistory,
  now: number,
  windowSeconds: number,
  kind: "MOMENTUM_SHORT" | "MOMENTUM_LONG" = "MOMENTUM_SHORT",
): Signal {
  const current = history.latest();
  const reference = history.atOrBefore(now - windowSeconds * 1000);
  if (!current || !reference || reference.price <= 0) {
    return { kind, vote: "none" };
  }
  const vote: Vote = current.price > reference.price ? "yes" : "no";
  const magnitude = ((current.price - reference.price) / reference.price) * 100;
  return { kind, vote, magnitude };
}

/** Cheaper side for the first arbitrage leg; ties go to `yes`. */
export function arbitrageFirstSide(yesAsk: number, noAsk: number): Side | undefined {
  if (!isValidAsk(yesAsk) || !isValidAsk(noAsk)) return undefined;
  return yesAsk <= noAsk ? "yes" : "no";
}

export function formatMagnitude(signal: Signal, label: string): string {
  const pct = signal.magnitude ?? 0;
  return `${label} ${pct >= 0 ? "+" : ""}${pct.toFixed(3)}%`;
}
