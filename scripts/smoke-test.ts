import 'dotenv/config';
import axios from 'axios';
import { Telegraf } from 'telegraf';

const requireEnv = (key: string): string => {
  const value = process.env[key];
  if (!value) {
    throw new Error(`${key} is required`);
  }
  return value;
};

const checkMboum = async (): Promise<void> => {
  const apiKey = requireEnv('MBOUM_API_KEY');
  const baseURL = process.env.MBOUM_BASE_URL ?? 'https://api.mboum.com';
  const path = process.env.MBOUM_SCREENER_PATH ?? '/v1/screener';

  const response = await axios.get<unknown>(path, {
    baseURL,
    timeout: 10_000,
    headers: { Authorization: apiKey },
    params: { metricType: 'overview', filter: 'day_gainers', limit: '1' },
  });
  console.info(`✅ Mboum screener reachable (HTTP ${response.status})`);
};

const sendTelegramTest = async (): Promise<void> => {
  const token = process.env.TELEGRAM_BOT_TOKEN;
  if (!token) {
    console.warn('TELEGRAM_BOT_TOKEN is not set. Skipping Telegram test.');
    return;
  }

  const chatId = process.env.TELEGRAM_CHAT_ID;
  if (!chatId) {
    console.warn('TELEGRAM_CHAT_ID is not set. Skipping Telegram test.');
    return;
  }

  const bot = new Telegraf(token);
  await bot.telegram.sendMessage(chatId, `✅ Smoke test (${new Date().toISOString()})`, {
    parse_mode: 'HTML',
    link_preview_options: { is_disabled: true },
  });
  console.info('✅ Telegram test completed');
};

const main = async (): Promise<void> => {
  await checkMboum();
  await sendTelegramTest();
};

main().catch((error) => {
  console.error('Smoke test failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
