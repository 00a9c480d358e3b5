import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '@libs/core';
import { findLargeInsiderTrade } from '@libs/alerts';
import { MARKET_DATA_SOURCE } from '@libs/market-data';
import type { MarketDataSource } from '@libs/market-data';
import { formatLargeSaleAlert } from '@libs/telegram';
import { AlertDispatcher, emptyScanReport, ScanReport, tally } from '../alerts/alert-dispatcher.service';
import { ALERT_SETTINGS } from '../alerts/alert-settings';
import type { AlertSettings } from '../alerts/alert-settings';
import { AlertState } from '../alerts/alert-state';

/** Looks for large insider sales on symbols that recently produced a bid match. */
@Injectable()
export class WatchlistSweepService {
  private readonly logger = new Logger(WatchlistSweepService.name);

  constructor(
    @Inject(MARKET_DATA_SOURCE) private readonly source: MarketDataSource,
    @Inject(ALERT_SETTINGS) private readonly settings: AlertSettings,
    private readonly state: AlertState,
    private readonly dispatcher: AlertDispatcher,
  ) {}

  async run(now: Date): Promise<ScanReport> {
    const nowMs = now.getTime();
    const symbols = this.state.watchlist.snapshot(nowMs);
    const report = emptyScanReport(symbols.length);

    for (const symbol of symbols) {
      try {
        const trades = await this.source.fetchInsiderTrades(symbol);
        const sale = findLargeInsiderTrade(trades, this.settings.thresholds.insiderMinShares, 'SELL');
        if (!sale) continue;
        tally(
          report,
          await this.dispatcher.dispatch(symbol, 'large-sale', nowMs, () => formatLargeSaleAlert(sale)),
        );
      } catch (error) {
        report.errors += 1;
        this.logger.warn(`Watchlist sweep failed for ${symbol}: ${errorMessage(error)}`);
      }
    }

    return report;
  }
}
