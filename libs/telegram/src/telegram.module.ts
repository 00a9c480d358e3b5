import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { ALERT_SINK } from './alert-sink';
import { TelegramService } from './telegram.service';

@Module({
  imports: [CoreModule],
  providers: [TelegramService, { provide: ALERT_SINK, useExisting: TelegramService }],
  exports: [ALERT_SINK],
})
export class TelegramModule {}
