import { AlertLedger, MarketState, VolumeBaselineTracker, Watchlist } from '@libs/alerts';
import type { AlertSettings } from './alert-settings';

/**
 * Everything the tasks share. One instance per worker, handed to each service
 * through the container.
 */
export class AlertState {
  readonly baseline: VolumeBaselineTracker;
  readonly ledger: AlertLedger;
  readonly watchlist: Watchlist;
  readonly market = new MarketState();

  constructor(settings: AlertSettings) {
    this.baseline = new VolumeBaselineTracker(settings.baseline);
    this.ledger = new AlertLedger(settings.cooldownMs);
    this.watchlist = new Watchlist(settings.watchlistTtlMs);
  }

  prune(nowMs: number): { ledger: number; watchlist: number } {
    return {
      ledger: this.ledger.prune(nowMs),
      watchlist: this.watchlist.prune(nowMs),
    };
  }
}
