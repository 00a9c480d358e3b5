import { Inject, Injectable, Logger } from '@nestjs/common';
import { evaluateDerivativeEvents } from '@libs/alerts';
import { MARKET_DATA_SOURCE } from '@libs/market-data';
import type { MarketDataSource } from '@libs/market-data';
import { formatOptionsAlert } from '@libs/telegram';
import { AlertDispatcher, emptyScanReport, ScanReport, tally } from '../alerts/alert-dispatcher.service';
import { ALERT_SETTINGS } from '../alerts/alert-settings';
import type { AlertSettings } from '../alerts/alert-settings';

@Injectable()
export class OptionsScanService {
  private readonly logger = new Logger(OptionsScanService.name);

  constructor(
    @Inject(MARKET_DATA_SOURCE) private readonly source: MarketDataSource,
    @Inject(ALERT_SETTINGS) private readonly settings: AlertSettings,
    private readonly dispatcher: AlertDispatcher,
  ) {}

  async run(now: Date): Promise<ScanReport> {
    const nowMs = now.getTime();
    const events = await this.source.fetchUnusualDerivativeActivity();
    const unusual = evaluateDerivativeEvents(events, this.settings.thresholds);
    const report = emptyScanReport(unusual.length);

    for (const event of unusual) {
      tally(
        report,
        await this.dispatcher.dispatch(event.underlying, 'unusual-options-activity', nowMs, () =>
          formatOptionsAlert(event),
        ),
      );
    }

    this.logger.debug(`Options scan: ${events.length} contracts, ${unusual.length} unusual`);
    return report;
  }
}
