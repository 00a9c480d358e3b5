import { AlertKind } from './types';

const SUMMARY_BUCKET_MS = 60_000;

export const floorToBucket = (timeMs: number, bucketMs = SUMMARY_BUCKET_MS): number =>
  Math.floor(timeMs / bucketMs) * bucketMs;

/** One key per wall-clock minute, e.g. `summary:2024-03-04T15:07:00.000Z`. */
export const summaryBucketKey = (nowMs: number): string =>
  `summary:${new Date(floorToBucket(nowMs)).toISOString()}`;

const ledgerKey = (symbol: string, kind: AlertKind): string => `${kind}:${symbol}`;

/**
 * Last-fired timestamps per (symbol, kind). `allow` is the only gate through
 * which an alert may be sent: true records `now`, false leaves state untouched.
 */
export class AlertLedger {
  private readonly lastFired = new Map<string, number>();

  constructor(private readonly cooldownMs: number) {}

  allow(symbol: string, kind: AlertKind, nowMs: number): boolean {
    const key = ledgerKey(symbol, kind);
    const prior = this.lastFired.get(key);
    if (prior !== undefined && nowMs - prior < this.cooldownMs) return false;

    this.lastFired.set(key, nowMs);
    return true;
  }

  lastFiredAt(symbol: string, kind: AlertKind): number | undefined {
    return this.lastFired.get(ledgerKey(symbol, kind));
  }

  /** Drops entries whose cooldown has elapsed; returns how many were removed. */
  prune(nowMs: number): number {
    let removed = 0;
    for (const [key, firedAt] of this.lastFired) {
      if (nowMs - firedAt >= this.cooldownMs) {
        this.lastFired.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  size(): number {
    return this.lastFired.size;
  }
}
