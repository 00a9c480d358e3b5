import { ConfigService } from '@nestjs/config';
import {
  AlertThresholds,
  DEFAULT_ALERT_THRESHOLDS,
  DEFAULT_VOLUME_BASELINE,
  MarketHours,
  VolumeBaselineOptions,
} from '@libs/alerts';

export const ALERT_SETTINGS = Symbol('ALERT_SETTINGS');

export interface TaskIntervals {
  primaryScanMs: number;
  optionsScanMs: number;
  summaryMs: number;
  watchlistSweepMs: number;
  marketCheckMs: number;
  housekeepingMs: number;
}

export interface AlertSettings {
  appName: string;
  thresholds: AlertThresholds;
  marketHours: MarketHours;
  baseline: VolumeBaselineOptions;
  cooldownMs: number;
  watchlistTtlMs: number;
  topMoversLimit: number;
  summaryTopK: number;
  closedHeartbeatChecks: number;
  notifyTaskErrors: boolean;
  tickMs: number;
  intervals: TaskIntervals;
}

export const DEFAULT_ALERT_SETTINGS: Readonly<AlertSettings> = {
  appName: 'market-alerts-bot',
  thresholds: DEFAULT_ALERT_THRESHOLDS,
  marketHours: { timezone: 'America/New_York', openHour: 6, closeHour: 18 },
  baseline: DEFAULT_VOLUME_BASELINE,
  cooldownMs: 300_000,
  watchlistTtlMs: 86_400_000,
  topMoversLimit: 25,
  summaryTopK: 5,
  closedHeartbeatChecks: 30,
  notifyTaskErrors: true,
  tickMs: 1000,
  intervals: {
    primaryScanMs: 30_000,
    optionsScanMs: 180_000,
    summaryMs: 300_000,
    watchlistSweepMs: 30_000,
    marketCheckMs: 60_000,
    housekeepingMs: 600_000,
  },
};

export const resolveAlertSettings = (config: ConfigService): AlertSettings => {
  const defaults = DEFAULT_ALERT_SETTINGS;
  const seconds = (key: string, fallbackMs: number): number =>
    config.get<number>(key, fallbackMs / 1000) * 1000;

  return {
    appName: config.get<string>('APP_NAME', defaults.appName),
    thresholds: {
      minPercentMove: config.get<number>('MIN_PERCENT_MOVE', defaults.thresholds.minPercentMove),
      exactBidPrice: config.get<number>('BID_EXACT_PRICE', defaults.thresholds.exactBidPrice),
      exactBidShares: config.get<number>('BID_EXACT_SHARES', defaults.thresholds.exactBidShares),
      highValueBidPrice: config.get<number>('BID_HIGH_VALUE_PRICE', defaults.thresholds.highValueBidPrice),
      highValueBidShares: config.get<number>('BID_HIGH_VALUE_SHARES', defaults.thresholds.highValueBidShares),
      insiderMinShares: config.get<number>('INSIDER_MIN_SHARES', defaults.thresholds.insiderMinShares),
      optionsMinVolOiRatio: config.get<number>('OPTIONS_MIN_VOL_OI_RATIO', defaults.thresholds.optionsMinVolOiRatio),
      optionsMinVolume: config.get<number>('OPTIONS_MIN_VOLUME', defaults.thresholds.optionsMinVolume),
    },
    marketHours: {
      timezone: config.get<string>('MARKET_TIMEZONE', defaults.marketHours.timezone),
      openHour: config.get<number>('MARKET_OPEN_HOUR', defaults.marketHours.openHour),
      closeHour: config.get<number>('MARKET_CLOSE_HOUR', defaults.marketHours.closeHour),
    },
    baseline: {
      capacity: config.get<number>('VOLUME_HISTORY_SIZE', defaults.baseline.capacity),
      minSamples: config.get<number>('VOLUME_MIN_SAMPLES', defaults.baseline.minSamples),
    },
    cooldownMs: seconds('ALERT_COOLDOWN_SECONDS', defaults.cooldownMs),
    watchlistTtlMs: seconds('WATCHLIST_TTL_SECONDS', defaults.watchlistTtlMs),
    topMoversLimit: config.get<number>('TOP_MOVERS_LIMIT', defaults.topMoversLimit),
    summaryTopK: config.get<number>('SUMMARY_TOP_K', defaults.summaryTopK),
    closedHeartbeatChecks: config.get<number>('CLOSED_HEARTBEAT_CHECKS', defaults.closedHeartbeatChecks),
    notifyTaskErrors: config.get<boolean>('NOTIFY_TASK_ERRORS', defaults.notifyTaskErrors),
    tickMs: config.get<number>('SCHEDULER_TICK_MS', defaults.tickMs),
    intervals: {
      primaryScanMs: seconds('PRIMARY_SCAN_INTERVAL_SECONDS', defaults.intervals.primaryScanMs),
      optionsScanMs: seconds('OPTIONS_SCAN_INTERVAL_SECONDS', defaults.intervals.optionsScanMs),
      summaryMs: seconds('SUMMARY_INTERVAL_SECONDS', defaults.intervals.summaryMs),
      watchlistSweepMs: seconds('WATCHLIST_SWEEP_INTERVAL_SECONDS', defaults.intervals.watchlistSweepMs),
      marketCheckMs: seconds('MARKET_CHECK_INTERVAL_SECONDS', defaults.intervals.marketCheckMs),
      housekeepingMs: seconds('HOUSEKEEPING_INTERVAL_SECONDS', defaults.intervals.housekeepingMs),
    },
  };
};
