import { Logger } from '@nestjs/common';
import { errorMessage } from '@libs/core';

export interface ScheduledTask {
  name: string;
  intervalMs: number;
  /** Skipped (but still rescheduled) while the market is closed. */
  requiresOpenMarket: boolean;
  run(now: Date): Promise<unknown>;
}

export interface TaskSchedulerOptions {
  isMarketOpen: () => boolean;
  onTaskError?: (task: string, error: unknown) => Promise<void>;
  tickMs?: number;
  clock?: () => number;
}

export interface TaskStats {
  name: string;
  nextDueAt: number;
  running: boolean;
  runs: number;
  failures: number;
  skipped: number;
}

interface TaskEntry extends TaskStats {
  task: ScheduledTask;
}

const MIN_TICK_MS = 1000;

/**
 * Single loop over a fixed task table. Due tasks are launched without waiting
 * for each other; a task still running from its previous slot is skipped.
 */
export class TaskScheduler {
  private readonly logger = new Logger(TaskScheduler.name);
  private readonly entries: TaskEntry[];
  private readonly inFlight = new Set<Promise<void>>();
  private readonly tickMs: number;
  private readonly clock: () => number;
  private active = false;
  private loop: Promise<void> | null = null;
  private sleepTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;

  constructor(
    tasks: readonly ScheduledTask[],
    private readonly options: TaskSchedulerOptions,
  ) {
    this.tickMs = Math.max(MIN_TICK_MS, options.tickMs ?? MIN_TICK_MS);
    this.clock = options.clock ?? Date.now;
    const startedAt = this.clock();
    this.entries = tasks.map((task) => ({
      task,
      name: task.name,
      nextDueAt: startedAt,
      running: false,
      runs: 0,
      failures: 0,
      skipped: 0,
    }));
  }

  get isRunning(): boolean {
    return this.active;
  }

  stats(): TaskStats[] {
    return this.entries.map((entry) => ({
      name: entry.name,
      nextDueAt: entry.nextDueAt,
      running: entry.running,
      runs: entry.runs,
      failures: entry.failures,
      skipped: entry.skipped,
    }));
  }

  /**
   * Launches every task whose slot has come. Tasks run in table order up to
   * their first await. Resolves once the launched tasks have settled.
   */
  runDue(nowMs: number = this.clock()): Promise<void> {
    const launched: Promise<void>[] = [];

    for (const entry of this.entries) {
      if (entry.nextDueAt > nowMs) continue;
      entry.nextDueAt = nowMs + entry.task.intervalMs;

      if (entry.running) {
        entry.skipped += 1;
        this.logger.debug(`Task ${entry.name} still running, slot skipped`);
        continue;
      }
      if (entry.task.requiresOpenMarket && !this.options.isMarketOpen()) continue;

      launched.push(this.execute(entry, nowMs));
    }

    return Promise.all(launched).then(() => undefined);
  }

  start(): void {
    if (this.loop) return;
    this.active = true;
    this.loop = this.runLoop();
    this.logger.log(`Scheduler started with ${this.entries.length} tasks`);
  }

  /** Ends the loop, interrupting its sleep, then waits for running tasks. */
  async stop(): Promise<void> {
    this.active = false;
    if (this.sleepTimer) clearTimeout(this.sleepTimer);
    this.sleepTimer = null;
    this.wake?.();
    this.wake = null;

    if (this.loop) await this.loop;
    this.loop = null;
    await Promise.allSettled(Array.from(this.inFlight));
    this.logger.log('Scheduler stopped');
  }

  private async runLoop(): Promise<void> {
    while (this.active) {
      const nowMs = this.clock();
      // tasks settle on their own; execute() never rejects
      void this.runDue(nowMs);
      await this.sleep(this.delayUntilNextDue(nowMs));
    }
  }

  private delayUntilNextDue(nowMs: number): number {
    const nextDueAt = Math.min(...this.entries.map((entry) => entry.nextDueAt));
    return Number.isFinite(nextDueAt) ? Math.max(this.tickMs, nextDueAt - nowMs) : this.tickMs;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      if (!this.active) {
        resolve();
        return;
      }
      this.wake = resolve;
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }

  private execute(entry: TaskEntry, nowMs: number): Promise<void> {
    entry.running = true;
    const settled = this.runTask(entry, nowMs).finally(() => {
      entry.running = false;
      this.inFlight.delete(settled);
    });
    this.inFlight.add(settled);
    return settled;
  }

  private async runTask(entry: TaskEntry, nowMs: number): Promise<void> {
    try {
      await entry.task.run(new Date(nowMs));
      entry.runs += 1;
    } catch (error) {
      entry.failures += 1;
      this.logger.error(
        `Task ${entry.name} failed`,
        error instanceof Error ? error.stack : String(error),
      );
      await this.reportError(entry.name, error);
    }
  }

  private async reportError(task: string, error: unknown): Promise<void> {
    if (!this.options.onTaskError) return;
    try {
      await this.options.onTaskError(task, error);
    } catch (reportError) {
      this.logger.warn(`Could not report failure of ${task}: ${errorMessage(reportError)}`);
    }
  }
}
