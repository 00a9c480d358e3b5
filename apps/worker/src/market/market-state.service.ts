import { Inject, Injectable, Logger } from '@nestjs/common';
import { isMarketActive, MarketTransition } from '@libs/alerts';
import { formatHeartbeat, formatMarketOpenNotice } from '@libs/telegram';
import { AlertDispatcher } from '../alerts/alert-dispatcher.service';
import { ALERT_SETTINGS } from '../alerts/alert-settings';
import type { AlertSettings } from '../alerts/alert-settings';
import { AlertState } from '../alerts/alert-state';

@Injectable()
export class MarketStateService {
  private readonly logger = new Logger(MarketStateService.name);

  constructor(
    @Inject(ALERT_SETTINGS) private readonly settings: AlertSettings,
    private readonly state: AlertState,
    private readonly dispatcher: AlertDispatcher,
  ) {}

  /**
   * Updates the open/closed flag before any await, so tasks launched later in
   * the same tick see the new state.
   */
  async check(now: Date): Promise<MarketTransition | null> {
    const { marketHours, closedHeartbeatChecks } = this.settings;
    const market = this.state.market;
    const transition = market.update(isMarketActive(now, marketHours));

    if (transition) {
      this.logger.log(`Market ${transition} (${marketHours.timezone})`);
    }

    if (market.needsStartupNotice) {
      market.markStartupNoticeSent();
      await this.dispatcher.notify(
        formatMarketOpenNotice(marketHours.timezone, marketHours.openHour, marketHours.closeHour),
        'market-open',
      );
    } else if (market.isHeartbeatDue(closedHeartbeatChecks)) {
      await this.dispatcher.notify(formatHeartbeat(market.checks), 'heartbeat');
    }

    return transition;
  }
}
