export const ALERT_KINDS = [
  'bid-match-exact',
  'bid-match-high-value',
  'volume-spike',
  'unusual-insider-activity',
  'unusual-options-activity',
  'halt',
  'large-sale',
  'periodic-summary',
  'task-error',
] as const;

export type AlertKind = (typeof ALERT_KINDS)[number];

export type BidMatchKind = Extract<AlertKind, 'bid-match-exact' | 'bid-match-high-value'>;

export interface AlertThresholds {
  /** Absolute percent change below which only the volume spike rule runs. */
  minPercentMove: number;
  exactBidPrice: number;
  exactBidShares: number;
  highValueBidPrice: number;
  highValueBidShares: number;
  insiderMinShares: number;
  optionsMinVolOiRatio: number;
  optionsMinVolume: number;
}

export const DEFAULT_ALERT_THRESHOLDS: Readonly<AlertThresholds> = {
  minPercentMove: 5,
  exactBidPrice: 199_999,
  exactBidShares: 100,
  highValueBidPrice: 2000,
  highValueBidShares: 20,
  insiderMinShares: 10_000,
  optionsMinVolOiRatio: 5,
  optionsMinVolume: 5000,
};

export interface VolumeSpike {
  volume: number;
  average: number;
  multiplier: number;
  threshold: number;
}

export interface SnapshotEvaluation {
  symbol: string;
  percentMove: number;
  volumeSpike: VolumeSpike | null;
  passesMoveGate: boolean;
  bidMatch: BidMatchKind | null;
  /** Insider trades are only looked up when the gate passed and no bid matched. */
  checkInsider: boolean;
}
