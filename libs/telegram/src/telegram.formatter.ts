import type { BidMatchKind, VolumeSpike } from '@libs/alerts';
import type { DerivativeEvent, InsiderTrade, InstrumentSnapshot } from '@libs/market-data';

export const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');

export const formatPrice = (value: number | null | undefined): string =>
  value === null || value === undefined || !Number.isFinite(value)
    ? 'N/A'
    : `$${value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;

export const formatShares = (value: number): string =>
  Math.round(value).toLocaleString('en-US');

export const formatPercent = (value: number): string =>
  `${value > 0 ? '+' : ''}${value.toFixed(2)}%`;

const formatRatio = (value: number): string => (Number.isFinite(value) ? value.toFixed(1) : 'n/a');

const formatUtcTimestamp = (timestamp: number): string => {
  const iso = new Date(timestamp).toISOString();
  return `${iso.slice(0, 19).replace('T', ' ')} (UTC)`;
};

const quoteLine = (snapshot: InstrumentSnapshot): string =>
  `<b>Price:</b> ${formatPrice(snapshot.price)} (${formatPercent(snapshot.changePercent)})`;

export const formatBidMatchAlert = (snapshot: InstrumentSnapshot, kind: BidMatchKind): string => {
  const title = kind === 'bid-match-exact' ? 'EXACT BID MATCH' : 'HIGH VALUE BID';
  return [
    `⚡ <b>${title}: ${escapeHtml(snapshot.symbol)}</b>`,
    `<b>Bid:</b> ${formatPrice(snapshot.bid)} × ${formatShares(snapshot.bidSize)} shares`,
    quoteLine(snapshot),
  ].join('\n');
};

export const formatVolumeSpikeAlert = (snapshot: InstrumentSnapshot, spike: VolumeSpike): string =>
  [
    `📊 <b>VOLUME SPIKE: ${escapeHtml(snapshot.symbol)}</b>`,
    `<b>Volume:</b> ${formatShares(spike.volume)}`,
    `<b>Average:</b> ${formatShares(spike.average)} (×${spike.multiplier} → ${formatShares(spike.threshold)})`,
    quoteLine(snapshot),
  ].join('\n');

const tradeLines = (trade: InsiderTrade): string[] => [
  `<b>Insider:</b> ${escapeHtml(trade.insiderName)}`,
  `<b>Shares:</b> ${formatShares(trade.shares)} (${trade.side})`,
  `<b>Trade price:</b> ${formatPrice(trade.price)}`,
  ...(trade.transactionDate ? [`<b>Date:</b> ${escapeHtml(trade.transactionDate)}`] : []),
];

export const formatInsiderAlert = (snapshot: InstrumentSnapshot, trade: InsiderTrade): string =>
  [
    `🕵️ <b>UNUSUAL INSIDER ACTIVITY: ${escapeHtml(snapshot.symbol)}</b>`,
    ...tradeLines(trade),
    quoteLine(snapshot),
  ].join('\n');

export const formatLargeSaleAlert = (trade: InsiderTrade): string =>
  [`🔻 <b>LARGE INSIDER SALE: ${escapeHtml(trade.symbol)}</b>`, ...tradeLines(trade)].join('\n');

export const formatOptionsAlert = (event: DerivativeEvent): string =>
  [
    `🎯 <b>UNUSUAL OPTIONS ACTIVITY: ${escapeHtml(event.underlying)}</b>`,
    `<b>Contract:</b> ${escapeHtml(event.contract)}`,
    `<b>Volume:</b> ${formatShares(event.volume)}`,
    `<b>Open interest:</b> ${formatShares(event.openInterest)}`,
    `<b>Vol/OI:</b> ${formatRatio(event.volOiRatio)}`,
  ].join('\n');

export const formatHaltAlert = (snapshot: InstrumentSnapshot): string =>
  [
    `⛔ <b>TRADING HALT: ${escapeHtml(snapshot.symbol)}</b>`,
    `<b>Last bid:</b> ${formatPrice(snapshot.bid)} × ${formatShares(snapshot.bidSize)} shares`,
    quoteLine(snapshot),
  ].join('\n');

export const formatTopMoversSummary = (
  snapshots: readonly InstrumentSnapshot[],
  timestamp: number = Date.now(),
): string => {
  const lines = [`🏆 <b>TOP ${snapshots.length} GAINERS</b>`, formatUtcTimestamp(timestamp)];
  snapshots.forEach((snapshot, index) => {
    lines.push(
      `${index + 1}. ${escapeHtml(snapshot.symbol)}: ${formatPrice(snapshot.price)} (${formatPercent(snapshot.changePercent)})`,
    );
  });
  return lines.join('\n');
};

export const formatStartupNotice = (appName: string): string =>
  `🤖 <b>${escapeHtml(appName)}</b> started`;

export const formatMarketOpenNotice = (timezone: string, openHour: number, closeHour: number): string =>
  `🔔 <b>Market session open</b>\nScanning ${openHour}:00–${closeHour}:00 ${escapeHtml(timezone)}`;

export const formatHeartbeat = (checks: number): string =>
  `💤 Bot alive - market closed\nChecks: ${checks}`;

export const formatShutdownNotice = (appName: string): string =>
  `🛑 <b>${escapeHtml(appName)}</b> stopped`;

export const formatCrashNotice = (appName: string, message: string): string =>
  `💥 <b>${escapeHtml(appName)}</b> crashed: ${escapeHtml(message.slice(0, 100))}`;

export const formatTaskErrorNotice = (task: string, message: string): string =>
  `⚠️ <b>Task failed:</b> ${escapeHtml(task)}\n${escapeHtml(message.slice(0, 200))}`;
