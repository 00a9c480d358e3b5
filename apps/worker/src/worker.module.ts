import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CoreModule } from '@libs/core';
import { MarketDataModule } from '@libs/market-data';
import { TelegramModule } from '@libs/telegram';
import { AlertDispatcher } from './alerts/alert-dispatcher.service';
import { ALERT_SETTINGS, AlertSettings, resolveAlertSettings } from './alerts/alert-settings';
import { AlertState } from './alerts/alert-state';
import { MarketStateService } from './market/market-state.service';
import { OptionsScanService } from './scans/options-scan.service';
import { PrimaryScanService } from './scans/primary-scan.service';
import { SummaryService } from './scans/summary.service';
import { WatchlistSweepService } from './scans/watchlist-sweep.service';
import { AlertsScheduler } from './scheduler/alerts.scheduler';

@Module({
  imports: [CoreModule, MarketDataModule, TelegramModule],
  providers: [
    {
      provide: ALERT_SETTINGS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => resolveAlertSettings(configService),
    },
    {
      provide: AlertState,
      inject: [ALERT_SETTINGS],
      useFactory: (settings: AlertSettings) => new AlertState(settings),
    },
    AlertDispatcher,
    MarketStateService,
    PrimaryScanService,
    OptionsScanService,
    WatchlistSweepService,
    SummaryService,
    AlertsScheduler,
  ],
})
export class WorkerModule {}
