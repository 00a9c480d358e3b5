import { Inject, Injectable, Logger } from '@nestjs/common';
import type { AlertKind } from '@libs/alerts';
import { ALERT_SINK } from '@libs/telegram';
import type { AlertSink, NoticeKind } from '@libs/telegram';
import { AlertState } from './alert-state';

export type DispatchOutcome = 'sent' | 'failed' | 'suppressed';

export interface ScanReport {
  symbols: number;
  sent: number;
  failed: number;
  suppressed: number;
  errors: number;
}

export const emptyScanReport = (symbols = 0): ScanReport => ({
  symbols,
  sent: 0,
  failed: 0,
  suppressed: 0,
  errors: 0,
});

export const tally = (report: ScanReport, outcome: DispatchOutcome): void => {
  report[outcome] += 1;
};

@Injectable()
export class AlertDispatcher {
  private readonly logger = new Logger(AlertDispatcher.name);

  constructor(
    private readonly state: AlertState,
    @Inject(ALERT_SINK) private readonly sink: AlertSink,
  ) {}

  /**
   * Sends an alert only when the ledger admits it. `onAllowed` runs between the
   * ledger decision and the send, and never for a suppressed alert.
   */
  async dispatch(
    symbol: string,
    kind: AlertKind,
    nowMs: number,
    render: () => string,
    onAllowed?: () => void,
  ): Promise<DispatchOutcome> {
    if (!this.state.ledger.allow(symbol, kind, nowMs)) {
      this.logger.debug(`${kind} for ${symbol} suppressed (cooldown)`);
      return 'suppressed';
    }

    onAllowed?.();
    const delivered = await this.sink.send(render(), kind);
    if (!delivered) {
      this.logger.warn(`${kind} alert for ${symbol} was not delivered`);
      return 'failed';
    }
    this.logger.log(`${kind} alert sent for ${symbol}`);
    return 'sent';
  }

  /** Lifecycle notices bypass the ledger. */
  async notify(text: string, kind: NoticeKind): Promise<boolean> {
    const delivered = await this.sink.send(text, kind);
    if (!delivered) this.logger.warn(`${kind} notice was not delivered`);
    return delivered;
  }
}
