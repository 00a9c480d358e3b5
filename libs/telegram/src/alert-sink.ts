import type { AlertKind } from '@libs/alerts';

export const ALERT_SINK = Symbol('ALERT_SINK');

export type NoticeKind = 'startup' | 'market-open' | 'heartbeat' | 'shutdown' | 'crash';

export type NotificationKind = AlertKind | NoticeKind;

/** Outbound message channel. `send` resolves false instead of rejecting. */
export interface AlertSink {
  send(text: string, kind: NotificationKind): Promise<boolean>;
}
