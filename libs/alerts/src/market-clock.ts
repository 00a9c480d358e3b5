import { DateTime } from 'luxon';

export interface MarketHours {
  timezone: string;
  openHour: number;
  closeHour: number;
}

export type MarketTransition = 'opened' | 'closed';

const toLocal = (now: Date, timezone: string): DateTime => {
  const zoned = DateTime.fromJSDate(now, { zone: timezone });
  return zoned.isValid ? zoned : DateTime.fromJSDate(now, { zone: 'UTC' });
};

/**
 * Weekday (Mon-Fri) and local hour within `[openHour, closeHour)`. Holidays,
 * half days and DST edge cases are not modelled.
 */
export const isMarketActive = (now: Date, hours: MarketHours): boolean => {
  const local = toLocal(now, hours.timezone);
  if (local.weekday > 5) return false;
  return local.hour >= hours.openHour && local.hour < hours.closeHour;
};

export class MarketState {
  private open = false;
  private startupNoticeSent = false;
  private closedChecks = 0;
  private totalChecks = 0;

  get isOpen(): boolean {
    return this.open;
  }

  get needsStartupNotice(): boolean {
    return this.open && !this.startupNoticeSent;
  }

  get checks(): number {
    return this.totalChecks;
  }

  update(active: boolean): MarketTransition | null {
    this.totalChecks += 1;
    const wasOpen = this.open;
    this.open = active;
    this.closedChecks = active ? 0 : this.closedChecks + 1;

    if (active === wasOpen) return null;
    this.startupNoticeSent = false;
    return active ? 'opened' : 'closed';
  }

  markStartupNoticeSent(): void {
    this.startupNoticeSent = true;
  }

  /** True on every `every`-th consecutive closed check; 0 disables. */
  isHeartbeatDue(every: number): boolean {
    return !this.open && every > 0 && this.closedChecks > 0 && this.closedChecks % every === 0;
  }
}
