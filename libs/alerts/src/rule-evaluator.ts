import type {
  DerivativeEvent,
  InsiderTrade,
  InstrumentSnapshot,
  TradeSide,
} from '@libs/market-data';
import { AlertThresholds, BidMatchKind, SnapshotEvaluation, VolumeSpike } from './types';

/** Lower bound of the absolute percent move (inclusive) and its volume multiplier. */
export const SPIKE_MULTIPLIER_STEPS: ReadonlyArray<{ minPercent: number; multiplier: number }> = [
  { minPercent: 200, multiplier: 100 },
  { minPercent: 100, multiplier: 50 },
  { minPercent: 50, multiplier: 30 },
  { minPercent: 10, multiplier: 20 },
  { minPercent: 1, multiplier: 10 },
];

export const DEFAULT_SPIKE_MULTIPLIER = 10;

export const selectSpikeMultiplier = (percentMove: number): number => {
  const pct = Math.abs(percentMove);
  const step = SPIKE_MULTIPLIER_STEPS.find((candidate) => pct >= candidate.minPercent);
  return step ? step.multiplier : DEFAULT_SPIKE_MULTIPLIER;
};

/**
 * Compares the snapshot's volume with `average * multiplier`. Runs regardless
 * of the minimum-move gate; an undefined or non-positive average never fires.
 */
export const evaluateVolumeSpike = (
  snapshot: InstrumentSnapshot,
  average: number | undefined,
): VolumeSpike | null => {
  if (average === undefined || !(average > 0)) return null;

  const multiplier = selectSpikeMultiplier(snapshot.changePercent);
  const threshold = average * multiplier;
  if (!(snapshot.volume > threshold)) return null;

  return { volume: snapshot.volume, average, multiplier, threshold };
};

/** Exact match wins; at most one bid match per snapshot. */
export const matchBid = (
  snapshot: InstrumentSnapshot,
  thresholds: AlertThresholds,
): BidMatchKind | null => {
  if (snapshot.bid === thresholds.exactBidPrice && snapshot.bidSize === thresholds.exactBidShares) {
    return 'bid-match-exact';
  }
  if (
    snapshot.bid >= thresholds.highValueBidPrice &&
    snapshot.bidSize >= thresholds.highValueBidShares
  ) {
    return 'bid-match-high-value';
  }
  return null;
};

export const evaluateSnapshot = (
  snapshot: InstrumentSnapshot,
  baselineAverage: number | undefined,
  thresholds: AlertThresholds,
): SnapshotEvaluation => {
  const percentMove = Math.abs(snapshot.changePercent);
  const passesMoveGate = percentMove >= thresholds.minPercentMove;
  const bidMatch = passesMoveGate ? matchBid(snapshot, thresholds) : null;

  return {
    symbol: snapshot.symbol,
    percentMove,
    volumeSpike: evaluateVolumeSpike(snapshot, baselineAverage),
    passesMoveGate,
    bidMatch,
    checkInsider: passesMoveGate && bidMatch === null,
  };
};

export const findLargeInsiderTrade = (
  trades: readonly InsiderTrade[],
  minShares: number,
  side?: TradeSide,
): InsiderTrade | null =>
  trades.find((trade) => trade.shares >= minShares && (side === undefined || trade.side === side)) ??
  null;

const isUnusualDerivative = (event: DerivativeEvent, thresholds: AlertThresholds): boolean =>
  event.volOiRatio > thresholds.optionsMinVolOiRatio || event.volume > thresholds.optionsMinVolume;

/** First qualifying contract per underlying, in feed order. */
export const evaluateDerivativeEvents = (
  events: readonly DerivativeEvent[],
  thresholds: AlertThresholds,
): DerivativeEvent[] => {
  const byUnderlying = new Map<string, DerivativeEvent>();
  for (const event of events) {
    if (byUnderlying.has(event.underlying)) continue;
    if (isUnusualDerivative(event, thresholds)) byUnderlying.set(event.underlying, event);
  }
  return Array.from(byUnderlying.values());
};

/** Top `k` distinct symbols by percent change, highest first. */
export const rankTopMovers = (
  snapshots: readonly InstrumentSnapshot[],
  k: number,
): InstrumentSnapshot[] => {
  const seen = new Set<string>();
  const unique = snapshots.filter((snapshot) => {
    if (seen.has(snapshot.symbol)) return false;
    seen.add(snapshot.symbol);
    return true;
  });
  return unique
    .map((snapshot, index) => ({ snapshot, index }))
    .sort((a, b) => b.snapshot.changePercent - a.snapshot.changePercent || a.index - b.index)
    .slice(0, Math.max(0, k))
    .map(({ snapshot }) => snapshot);
};
