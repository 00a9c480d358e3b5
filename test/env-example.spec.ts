import { describe, expect, it } from 'vitest';
import { envSchema } from '@libs/core';
import fs from 'fs';
import path from 'path';

const readEnvExample = (): Map<string, string> => {
  const envPath = path.join(process.cwd(), '.env.example');
  const content = fs.readFileSync(envPath, 'utf8');
  const entries = new Map<string, string>();

  content.split('\n').forEach((line) => {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      return;
    }

    const match = trimmed.match(/^([A-Z0-9_]+)=(.*)$/);
    if (match) {
      entries.set(match[1], match[2]);
    }
  });

  return entries;
};

describe('.env.example alignment', () => {
  it('includes all env.schema keys', () => {
    const envKeys = readEnvExample();
    const missing = Object.keys(envSchema.shape).filter((key) => !envKeys.has(key));

    expect(missing).toEqual([]);
  });

  it('parses once credentials are filled in', () => {
    const example = Object.fromEntries(readEnvExample());
    const parsed = envSchema.safeParse({
      ...example,
      MBOUM_API_KEY: 'test-secret',
      TELEGRAM_BOT_TOKEN: 'test-token',
      TELEGRAM_CHAT_ID: 'test-chat',
    });

    expect(parsed.success).toBe(true);
  });
});
