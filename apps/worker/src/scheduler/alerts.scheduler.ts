import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { errorMessage } from '@libs/core';
import { MARKET_DATA_SOURCE } from '@libs/market-data';
import type { MarketDataSource } from '@libs/market-data';
import { formatShutdownNotice, formatStartupNotice, formatTaskErrorNotice } from '@libs/telegram';
import { AlertDispatcher } from '../alerts/alert-dispatcher.service';
import { ALERT_SETTINGS } from '../alerts/alert-settings';
import type { AlertSettings } from '../alerts/alert-settings';
import { AlertState } from '../alerts/alert-state';
import { MarketStateService } from '../market/market-state.service';
import { OptionsScanService } from '../scans/options-scan.service';
import { PrimaryScanService } from '../scans/primary-scan.service';
import { SummaryService } from '../scans/summary.service';
import { WatchlistSweepService } from '../scans/watchlist-sweep.service';
import { ScheduledTask, TaskScheduler } from './task-scheduler';

@Injectable()
export class AlertsScheduler implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(AlertsScheduler.name);
  private readonly scheduler: TaskScheduler;

  constructor(
    @Inject(ALERT_SETTINGS) private readonly settings: AlertSettings,
    @Inject(MARKET_DATA_SOURCE) private readonly source: MarketDataSource,
    private readonly state: AlertState,
    private readonly dispatcher: AlertDispatcher,
    private readonly marketState: MarketStateService,
    private readonly primaryScan: PrimaryScanService,
    private readonly optionsScan: OptionsScanService,
    private readonly watchlistSweep: WatchlistSweepService,
    private readonly summary: SummaryService,
  ) {
    this.scheduler = new TaskScheduler(this.buildTasks(), {
      isMarketOpen: () => this.state.market.isOpen,
      onTaskError: (task, error) => this.notifyTaskError(task, error),
      tickMs: settings.tickMs,
    });
  }

  /** Market check comes first so the gated tasks of a tick see its result. */
  buildTasks(): ScheduledTask[] {
    const { intervals } = this.settings;
    return [
      {
        name: 'market-check',
        intervalMs: intervals.marketCheckMs,
        requiresOpenMarket: false,
        run: (now) => this.marketState.check(now),
      },
      {
        name: 'primary-scan',
        intervalMs: intervals.primaryScanMs,
        requiresOpenMarket: true,
        run: (now) => this.primaryScan.run(now),
      },
      {
        name: 'options-scan',
        intervalMs: intervals.optionsScanMs,
        requiresOpenMarket: true,
        run: (now) => this.optionsScan.run(now),
      },
      {
        name: 'watchlist-sweep',
        intervalMs: intervals.watchlistSweepMs,
        requiresOpenMarket: true,
        run: (now) => this.watchlistSweep.run(now),
      },
      {
        name: 'summary',
        intervalMs: intervals.summaryMs,
        requiresOpenMarket: true,
        run: (now) => this.summary.run(now),
      },
      {
        name: 'housekeeping',
        intervalMs: intervals.housekeepingMs,
        requiresOpenMarket: false,
        run: async (now) => this.housekeeping(now),
      },
    ];
  }

  async onApplicationBootstrap(): Promise<void> {
    await this.dispatcher.notify(formatStartupNotice(this.settings.appName), 'startup');
    this.scheduler.start();
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    this.logger.log(`Shutting down${signal ? ` (${signal})` : ''}`);
    await this.scheduler.stop();

    for (const task of this.scheduler.stats()) {
      this.logger.log(
        `${task.name}: runs=${task.runs} failures=${task.failures} skipped=${task.skipped}`,
      );
    }
    const source = this.source.getSnapshot();
    this.logger.log(
      `${source.source}: requests=${source.requests} failures=${source.failures} dropped=${source.droppedRecords}`,
    );

    await this.dispatcher.notify(formatShutdownNotice(this.settings.appName), 'shutdown');
  }

  private housekeeping(now: Date): { ledger: number; watchlist: number } {
    const removed = this.state.prune(now.getTime());
    this.logger.debug(
      `Housekeeping: ${removed.ledger} ledger entries, ${removed.watchlist} watchlist symbols expired`,
    );
    return removed;
  }

  /** Failure notices share the alert cooldown, keyed by task name. */
  async notifyTaskError(task: string, error: unknown): Promise<void> {
    if (!this.settings.notifyTaskErrors) return;
    await this.dispatcher.dispatch(task, 'task-error', Date.now(), () =>
      formatTaskErrorNotice(task, errorMessage(error)),
    );
  }
}
