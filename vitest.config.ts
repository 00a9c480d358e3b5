import { resolve } from 'path';
import { defineConfig } from 'vitest/config';

const lib = (name: string): string => resolve(__dirname, 'libs', name, 'src');

export default defineConfig({
  resolve: {
    alias: {
      '@libs/core': lib('core'),
      '@libs/market-data': lib('market-data'),
      '@libs/telegram': lib('telegram'),
      '@libs/alerts': lib('alerts'),
    },
  },
  test: {
    environment: 'node',
    include: ['test/**/*.spec.ts'],
  },
});
