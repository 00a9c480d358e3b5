import { describe, expect, it, vi } from 'vitest';
import { ScheduledTask, TaskScheduler } from '../apps/worker/src/scheduler/task-scheduler';

const task = (name: string, overrides: Partial<ScheduledTask> = {}): ScheduledTask => ({
  name,
  intervalMs: 1_000,
  requiresOpenMarket: false,
  run: vi.fn(async () => undefined),
  ...overrides,
});

describe('TaskScheduler', () => {
  it('runs due tasks and reschedules them by interval', async () => {
    const fast = task('fast');
    const slow = task('slow', { intervalMs: 5_000 });
    const scheduler = new TaskScheduler([fast, slow], { isMarketOpen: () => true, clock: () => 0 });

    await scheduler.runDue(0);
    await scheduler.runDue(500);
    await scheduler.runDue(1_000);

    expect(fast.run).toHaveBeenCalledTimes(2);
    expect(slow.run).toHaveBeenCalledTimes(1);
    expect(scheduler.stats().map((s) => [s.name, s.nextDueAt, s.runs])).toEqual([
      ['fast', 2_000, 2],
      ['slow', 5_000, 1],
    ]);
  });

  it('skips market tasks while the market is closed', async () => {
    const gated = task('gated', { requiresOpenMarket: true });
    const scheduler = new TaskScheduler([gated], { isMarketOpen: () => false, clock: () => 0 });

    await scheduler.runDue(0);

    expect(gated.run).not.toHaveBeenCalled();
    expect(scheduler.stats()[0].nextDueAt).toBe(1_000);
  });

  it('lets an earlier task open the market for the same tick', async () => {
    let open = false;
    const marketCheck = task('market-check', {
      run: async () => {
        open = true;
      },
    });
    const gated = task('gated', { requiresOpenMarket: true });
    const scheduler = new TaskScheduler([marketCheck, gated], { isMarketOpen: () => open, clock: () => 0 });

    await scheduler.runDue(0);

    expect(gated.run).toHaveBeenCalledTimes(1);
  });

  it('reports a failing task without affecting the others', async () => {
    const failure = new Error('boom');
    const broken = task('broken', { run: async () => Promise.reject(failure) });
    const healthy = task('healthy');
    const onTaskError = vi.fn(async () => undefined);
    const scheduler = new TaskScheduler([broken, healthy], {
      isMarketOpen: () => true,
      onTaskError,
      clock: () => 0,
    });

    await scheduler.runDue(0);

    expect(healthy.run).toHaveBeenCalledTimes(1);
    expect(onTaskError).toHaveBeenCalledWith('broken', failure);
    expect(scheduler.stats().map((s) => [s.name, s.runs, s.failures])).toEqual([
      ['broken', 0, 1],
      ['healthy', 1, 0],
    ]);
  });

  it('survives a failing error reporter', async () => {
    const scheduler = new TaskScheduler([task('broken', { run: async () => Promise.reject(new Error('boom')) })], {
      isMarketOpen: () => true,
      onTaskError: async () => Promise.reject(new Error('telegram down')),
      clock: () => 0,
    });

    await expect(scheduler.runDue(0)).resolves.toBeUndefined();
  });

  it('skips a slot while the previous run is still going', async () => {
    let finish: () => void = () => undefined;
    const slow = task('slow', {
      run: vi.fn(
        () =>
          new Promise<void>((resolve) => {
            finish = resolve;
          }),
      ),
    });
    const scheduler = new TaskScheduler([slow], { isMarketOpen: () => true, clock: () => 0 });

    const first = scheduler.runDue(0);
    await scheduler.runDue(1_000);
    expect(slow.run).toHaveBeenCalledTimes(1);
    expect(scheduler.stats()[0]).toMatchObject({ running: true, skipped: 1, nextDueAt: 2_000 });

    finish();
    await first;
    const third = scheduler.runDue(2_000);
    expect(slow.run).toHaveBeenCalledTimes(2);
    finish();
    await third;
    expect(scheduler.stats()[0]).toMatchObject({ running: false, runs: 2, skipped: 1 });
  });

  it('starts immediately and stops without waiting for the next tick', async () => {
    const heartbeat = task('heartbeat', { intervalMs: 60_000 });
    const scheduler = new TaskScheduler([heartbeat], { isMarketOpen: () => true, tickMs: 60_000 });

    scheduler.start();
    expect(scheduler.isRunning).toBe(true);
    expect(heartbeat.run).toHaveBeenCalledTimes(1);

    await scheduler.stop();
    expect(scheduler.isRunning).toBe(false);
    expect(heartbeat.run).toHaveBeenCalledTimes(1);
  });
});
