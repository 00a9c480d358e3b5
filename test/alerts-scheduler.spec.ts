import { describe, expect, it } from 'vitest';
import { AlertsScheduler } from '../apps/worker/src/scheduler/alerts.scheduler';
import { MarketStateService } from '../apps/worker/src/market/market-state.service';
import { OptionsScanService } from '../apps/worker/src/scans/options-scan.service';
import { PrimaryScanService } from '../apps/worker/src/scans/primary-scan.service';
import { SummaryService } from '../apps/worker/src/scans/summary.service';
import { WatchlistSweepService } from '../apps/worker/src/scans/watchlist-sweep.service';
import { AlertSettings } from '../apps/worker/src/alerts/alert-settings';
import { createHarness, Harness } from './support/fakes';

const createScheduler = (overrides: Partial<AlertSettings> = {}): { harness: Harness; scheduler: AlertsScheduler } => {
  const harness = createHarness(overrides);
  const { settings, state, source, dispatcher } = harness;
  const scheduler = new AlertsScheduler(
    settings,
    source,
    state,
    dispatcher,
    new MarketStateService(settings, state, dispatcher),
    new PrimaryScanService(source, settings, state, dispatcher),
    new OptionsScanService(source, settings, dispatcher),
    new WatchlistSweepService(source, settings, state, dispatcher),
    new SummaryService(source, settings, dispatcher),
  );
  return { harness, scheduler };
};

describe('alerts scheduler', () => {
  it('builds the task table with the market check first', () => {
    const { scheduler } = createScheduler();

    expect(scheduler.buildTasks().map((t) => [t.name, t.intervalMs, t.requiresOpenMarket])).toEqual([
      ['market-check', 60_000, false],
      ['primary-scan', 30_000, true],
      ['options-scan', 180_000, true],
      ['watchlist-sweep', 30_000, true],
      ['summary', 300_000, true],
      ['housekeeping', 600_000, false],
    ]);
  });

  it('prunes expired state during housekeeping', async () => {
    const { harness, scheduler } = createScheduler({ cooldownMs: 1_000, watchlistTtlMs: 60_000 });
    harness.state.ledger.allow('XYZ', 'halt', 0);
    harness.state.watchlist.add('XYZ', 0);
    const housekeeping = scheduler.buildTasks().find((t) => t.name === 'housekeeping');

    await expect(housekeeping?.run(new Date(60_000))).resolves.toEqual({ ledger: 1, watchlist: 1 });
    expect(harness.state.ledger.size()).toBe(0);
  });

  it('rate limits task failure notices per task', async () => {
    const { harness, scheduler } = createScheduler();

    await scheduler.notifyTaskError('primary-scan', new Error('boom'));
    await scheduler.notifyTaskError('primary-scan', new Error('boom again'));
    await scheduler.notifyTaskError('summary', new Error('boom'));

    expect(harness.sink.sent).toEqual([
      { kind: 'task-error', text: '⚠️ <b>Task failed:</b> primary-scan\nboom' },
      { kind: 'task-error', text: '⚠️ <b>Task failed:</b> summary\nboom' },
    ]);
  });

  it('can keep task failures out of the chat', async () => {
    const { harness, scheduler } = createScheduler({ notifyTaskErrors: false });

    await scheduler.notifyTaskError('primary-scan', new Error('boom'));

    expect(harness.sink.sent).toEqual([]);
  });

  it('announces startup and shutdown around the task loop', async () => {
    const { harness, scheduler } = createScheduler({ appName: 'test-bot' });

    await scheduler.onApplicationBootstrap();
    await scheduler.onApplicationShutdown('SIGTERM');

    const sent = harness.sink.sent;
    expect(sent[0]).toEqual({ kind: 'startup', text: '🤖 <b>test-bot</b> started' });
    expect(sent[sent.length - 1]).toEqual({ kind: 'shutdown', text: '🛑 <b>test-bot</b> stopped' });
  });
});
