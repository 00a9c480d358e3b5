/**
 * Symbols kept under secondary monitoring after a bid match. Entries expire
 * `ttlMs` after their last `add`.
 */
export class Watchlist {
  private readonly entries = new Map<string, number>();

  constructor(private readonly ttlMs: number) {}

  add(symbol: string, nowMs: number): void {
    this.entries.set(symbol, nowMs);
  }

  has(symbol: string, nowMs: number): boolean {
    const addedAt = this.entries.get(symbol);
    return addedAt !== undefined && nowMs - addedAt < this.ttlMs;
  }

  /** Sorted copy of the live symbols; expired entries are evicted first. */
  snapshot(nowMs: number): string[] {
    this.prune(nowMs);
    return Array.from(this.entries.keys()).sort();
  }

  prune(nowMs: number): number {
    let removed = 0;
    for (const [symbol, addedAt] of this.entries) {
      if (nowMs - addedAt >= this.ttlMs) {
        this.entries.delete(symbol);
        removed += 1;
      }
    }
    return removed;
  }

  size(): number {
    return this.entries.size;
  }
}
