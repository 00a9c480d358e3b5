import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Telegraf } from 'telegraf';
import type { Telegram } from 'telegraf';
import type { ParseMode } from 'telegraf/types';
import { errorMessage, withTimeout } from '@libs/core';
import type { AlertSink, NotificationKind } from './alert-sink';

export const TELEGRAM_API = Symbol('TELEGRAM_API');

type SendMessageExtra = Parameters<Telegram['sendMessage']>[2];

/** The part of the Bot API the service calls; `Telegraf#telegram` satisfies it. */
export interface TelegramApi {
  sendMessage(chatId: string, text: string, extra: SendMessageExtra): Promise<unknown>;
}

@Injectable()
export class TelegramService implements AlertSink {
  private readonly logger = new Logger(TelegramService.name);
  private readonly telegram: TelegramApi;
  private readonly chatId: string;
  private readonly parseMode: ParseMode;
  private readonly disableWebPreview: boolean;
  private readonly timeoutMs: number;

  constructor(
    configService: ConfigService,
    @Optional() @Inject(TELEGRAM_API) telegram?: TelegramApi,
  ) {
    this.chatId = configService.get<string>('TELEGRAM_CHAT_ID', '');
    if (!this.chatId) throw new Error('TELEGRAM_CHAT_ID is required');

    this.parseMode = configService.get<ParseMode>('TELEGRAM_PARSE_MODE', 'HTML');
    this.disableWebPreview = configService.get<boolean>('TELEGRAM_DISABLE_WEB_PAGE_PREVIEW', true);
    this.timeoutMs = configService.get<number>('TELEGRAM_SEND_TIMEOUT_MS', 10_000);

    if (telegram) {
      this.telegram = telegram;
    } else {
      const token = configService.get<string>('TELEGRAM_BOT_TOKEN');
      if (!token) throw new Error('TELEGRAM_BOT_TOKEN is required');
      this.telegram = new Telegraf(token).telegram;
    }
  }

  async send(text: string, kind: NotificationKind): Promise<boolean> {
    try {
      const delivered = await withTimeout(
        this.telegram
          .sendMessage(this.chatId, text, {
            parse_mode: this.parseMode,
            link_preview_options: { is_disabled: this.disableWebPreview },
          })
          .then(() => true),
        this.timeoutMs,
        false,
      );
      if (!delivered) {
        this.logger.warn(`Telegram ${kind} message timed out after ${this.timeoutMs}ms`);
      }
      return delivered;
    } catch (error) {
      this.logger.warn(`Telegram ${kind} message failed: ${errorMessage(error)}`);
      return false;
    }
  }
}
