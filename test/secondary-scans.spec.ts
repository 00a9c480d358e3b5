import { describe, expect, it } from 'vitest';
import { OptionsScanService } from '../apps/worker/src/scans/options-scan.service';
import { SummaryService } from '../apps/worker/src/scans/summary.service';
import { WatchlistSweepService } from '../apps/worker/src/scans/watchlist-sweep.service';
import { createHarness, insiderTrade, snapshot } from './support/fakes';

const now = new Date('2024-03-06T15:30:10Z');

describe('watchlist sweep', () => {
  it('alerts on large sales of watched symbols only', async () => {
    const harness = createHarness();
    harness.state.watchlist.add('XYZ', now.getTime());
    harness.source.insiderTrades.set('XYZ', [
      insiderTrade({ symbol: 'XYZ', side: 'BUY', shares: 50_000 }),
      insiderTrade({ symbol: 'XYZ', side: 'SELL', shares: 12_000, price: 9.75 }),
    ]);
    harness.source.insiderTrades.set('ABC', [insiderTrade({ symbol: 'ABC', side: 'SELL', shares: 90_000 })]);

    const sweep = new WatchlistSweepService(harness.source, harness.settings, harness.state, harness.dispatcher);
    const report = await sweep.run(now);

    expect(harness.source.insiderLookups).toEqual(['XYZ']);
    expect(harness.sink.sent).toEqual([
      {
        kind: 'large-sale',
        text: [
          '🔻 <b>LARGE INSIDER SALE: XYZ</b>',
          '<b>Insider:</b> Jane Doe',
          '<b>Shares:</b> 12,000 (SELL)',
          '<b>Trade price:</b> $9.75',
        ].join('\n'),
      },
    ]);
    expect(report.sent).toBe(1);
  });

  it('skips expired symbols', async () => {
    const harness = createHarness({ watchlistTtlMs: 60_000 });
    harness.state.watchlist.add('XYZ', now.getTime() - 60_000);

    const sweep = new WatchlistSweepService(harness.source, harness.settings, harness.state, harness.dispatcher);
    const report = await sweep.run(now);

    expect(report.symbols).toBe(0);
    expect(harness.source.insiderLookups).toEqual([]);
  });
});

describe('options scan', () => {
  it('alerts once per underlying', async () => {
    const harness = createHarness();
    harness.source.derivatives = [
      { contract: 'XYZ|20240621|50.00C', underlying: 'XYZ', volume: 6000, openInterest: 2000, volOiRatio: 3 },
      { contract: 'XYZ|20240621|55.00C', underlying: 'XYZ', volume: 8000, openInterest: 100, volOiRatio: 80 },
      { contract: 'QQQ|20240621|400.00P', underlying: 'QQQ', volume: 100, openInterest: 100, volOiRatio: 1 },
    ];

    const scan = new OptionsScanService(harness.source, harness.settings, harness.dispatcher);
    const report = await scan.run(now);

    expect(harness.sink.kinds()).toEqual(['unusual-options-activity']);
    expect(harness.sink.sent[0].text).toContain('<b>Contract:</b> XYZ|20240621|50.00C');
    expect(report).toEqual({ symbols: 1, sent: 1, failed: 0, suppressed: 0, errors: 0 });
  });
});

describe('summary', () => {
  it('sends the top movers once per minute', async () => {
    const harness = createHarness({ summaryTopK: 2 });
    harness.source.movers = [
      snapshot({ symbol: 'AAA', price: 3.25, changePercent: 12.5 }),
      snapshot({ symbol: 'BBB', price: 5, changePercent: 40 }),
      snapshot({ symbol: 'CCC', price: 1, changePercent: 2 }),
    ];
    const summary = new SummaryService(harness.source, harness.settings, harness.dispatcher);

    await expect(summary.run(now)).resolves.toBe('sent');
    await expect(summary.run(new Date('2024-03-06T15:30:50Z'))).resolves.toBe('suppressed');
    await expect(summary.run(new Date('2024-03-06T15:31:00Z'))).resolves.toBe('sent');

    expect(harness.sink.sent[0].text).toBe(
      [
        '🏆 <b>TOP 2 GAINERS</b>',
        '2024-03-06 15:30:10 (UTC)',
        '1. BBB: $5.00 (+40.00%)',
        '2. AAA: $3.25 (+12.50%)',
      ].join('\n'),
    );
  });

  it('sends nothing without movers', async () => {
    const harness = createHarness();
    const summary = new SummaryService(harness.source, harness.settings, harness.dispatcher);

    await expect(summary.run(now)).resolves.toBeNull();
    expect(harness.sink.sent).toEqual([]);
  });
});
