import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '@libs/core';
import { evaluateSnapshot, findLargeInsiderTrade } from '@libs/alerts';
import { MARKET_DATA_SOURCE } from '@libs/market-data';
import type { InstrumentSnapshot, MarketDataSource } from '@libs/market-data';
import {
  formatBidMatchAlert,
  formatHaltAlert,
  formatInsiderAlert,
  formatVolumeSpikeAlert,
} from '@libs/telegram';
import { AlertDispatcher, emptyScanReport, ScanReport, tally } from '../alerts/alert-dispatcher.service';
import { ALERT_SETTINGS } from '../alerts/alert-settings';
import type { AlertSettings } from '../alerts/alert-settings';
import { AlertState } from '../alerts/alert-state';

/**
 * Top movers pass: volume spikes, bid matches (with the follow-up halt check)
 * and insider activity for movers without a bid match.
 */
@Injectable()
export class PrimaryScanService {
  private readonly logger = new Logger(PrimaryScanService.name);

  constructor(
    @Inject(MARKET_DATA_SOURCE) private readonly source: MarketDataSource,
    @Inject(ALERT_SETTINGS) private readonly settings: AlertSettings,
    private readonly state: AlertState,
    private readonly dispatcher: AlertDispatcher,
  ) {}

  async run(now: Date): Promise<ScanReport> {
    const nowMs = now.getTime();
    const snapshots = await this.source.fetchTopMovers(this.settings.topMoversLimit);
    const report = emptyScanReport(snapshots.length);

    for (const snapshot of snapshots) {
      try {
        await this.scanSnapshot(snapshot, nowMs, report);
      } catch (error) {
        report.errors += 1;
        this.logger.warn(`Primary scan failed for ${snapshot.symbol}: ${errorMessage(error)}`);
      }
    }

    this.logger.debug(
      `Primary scan: ${report.symbols} symbols, ${report.sent} sent, ${report.suppressed} suppressed`,
    );
    return report;
  }

  private async scanSnapshot(
    snapshot: InstrumentSnapshot,
    nowMs: number,
    report: ScanReport,
  ): Promise<void> {
    // the spike compares against the history before this sample joins it
    const average = this.state.baseline.average(snapshot.symbol);
    this.state.baseline.observe(snapshot.symbol, snapshot.volume);

    const evaluation = evaluateSnapshot(snapshot, average, this.settings.thresholds);

    const spike = evaluation.volumeSpike;
    if (spike) {
      tally(
        report,
        await this.dispatcher.dispatch(snapshot.symbol, 'volume-spike', nowMs, () =>
          formatVolumeSpikeAlert(snapshot, spike),
        ),
      );
    }

    const bidMatch = evaluation.bidMatch;
    if (bidMatch) {
      const outcome = await this.dispatcher.dispatch(
        snapshot.symbol,
        bidMatch,
        nowMs,
        () => formatBidMatchAlert(snapshot, bidMatch),
        () => this.state.watchlist.add(snapshot.symbol, nowMs),
      );
      tally(report, outcome);
      if (outcome !== 'suppressed') await this.checkHalt(snapshot, nowMs, report);
      return;
    }

    if (evaluation.checkInsider) {
      const trades = await this.source.fetchInsiderTrades(snapshot.symbol);
      const trade = findLargeInsiderTrade(trades, this.settings.thresholds.insiderMinShares);
      if (trade) {
        tally(
          report,
          await this.dispatcher.dispatch(snapshot.symbol, 'unusual-insider-activity', nowMs, () =>
            formatInsiderAlert(snapshot, trade),
          ),
        );
      }
    }
  }

  private async checkHalt(snapshot: InstrumentSnapshot, nowMs: number, report: ScanReport): Promise<void> {
    const halted = await this.source.fetchHaltStatus(snapshot.symbol);
    if (!halted) return;
    tally(
      report,
      await this.dispatcher.dispatch(snapshot.symbol, 'halt', nowMs, () => formatHaltAlert(snapshot)),
    );
  }
}
