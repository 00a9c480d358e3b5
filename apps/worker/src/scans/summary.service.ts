import { Inject, Injectable, Logger } from '@nestjs/common';
import { rankTopMovers, summaryBucketKey } from '@libs/alerts';
import { MARKET_DATA_SOURCE } from '@libs/market-data';
import type { MarketDataSource } from '@libs/market-data';
import { formatTopMoversSummary } from '@libs/telegram';
import { AlertDispatcher, DispatchOutcome } from '../alerts/alert-dispatcher.service';
import { ALERT_SETTINGS } from '../alerts/alert-settings';
import type { AlertSettings } from '../alerts/alert-settings';

@Injectable()
export class SummaryService {
  private readonly logger = new Logger(SummaryService.name);

  constructor(
    @Inject(MARKET_DATA_SOURCE) private readonly source: MarketDataSource,
    @Inject(ALERT_SETTINGS) private readonly settings: AlertSettings,
    private readonly dispatcher: AlertDispatcher,
  ) {}

  /** Resolves to null when the feed returned nothing to rank. */
  async run(now: Date): Promise<DispatchOutcome | null> {
    const nowMs = now.getTime();
    const snapshots = await this.source.fetchTopMovers(this.settings.topMoversLimit);
    const ranked = rankTopMovers(snapshots, this.settings.summaryTopK);
    if (ranked.length === 0) {
      this.logger.debug('Summary skipped: no movers');
      return null;
    }

    return this.dispatcher.dispatch(summaryBucketKey(nowMs), 'periodic-summary', nowMs, () =>
      formatTopMoversSummary(ranked, nowMs),
    );
  }
}
