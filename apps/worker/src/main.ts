import 'reflect-metadata';
import 'dotenv/config';
import { Logger, LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { Env, envSchemaWithRefinements, errorMessage, formatEnvIssues } from '@libs/core';
import { formatCrashNotice, TelegramService } from '@libs/telegram';
import { WorkerModule } from './worker.module';

const LOG_LEVELS: Record<Env['LOG_LEVEL'], LogLevel[]> = {
  error: ['fatal', 'error'],
  warn: ['fatal', 'error', 'warn'],
  log: ['fatal', 'error', 'warn', 'log'],
  debug: ['fatal', 'error', 'warn', 'log', 'debug'],
  verbose: ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'],
};

async function sendCrashNotice(env: Env, error: unknown): Promise<void> {
  try {
    const telegram = new TelegramService(new ConfigService(env));
    await telegram.send(formatCrashNotice(env.APP_NAME, errorMessage(error)), 'crash');
  } catch (notifyError) {
    new Logger('WorkerBootstrap').warn(`Crash notice not sent: ${errorMessage(notifyError)}`);
  }
}

async function bootstrap(): Promise<void> {
  const logger = new Logger('WorkerBootstrap');

  const parsed = envSchemaWithRefinements.safeParse(process.env);
  if (!parsed.success) {
    for (const line of formatEnvIssues(parsed.error)) logger.error(line);
    logger.error('Invalid configuration, worker not started');
    process.exit(1);
  }
  const env = parsed.data;

  try {
    const app = await NestFactory.createApplicationContext(WorkerModule, {
      logger: LOG_LEVELS[env.LOG_LEVEL],
    });
    app.enableShutdownHooks();
    logger.log(`${env.APP_NAME} running (market hours ${env.MARKET_OPEN_HOUR}-${env.MARKET_CLOSE_HOUR} ${env.MARKET_TIMEZONE})`);
  } catch (error) {
    logger.error('Worker failed to start', error instanceof Error ? error.stack : String(error));
    await sendCrashNotice(env, error);
    process.exit(1);
  }
}

void bootstrap();
