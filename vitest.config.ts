import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@cinefeed/shared': fileURLToPath(new URL('./packages/shared/src/index.ts', import.meta.url)),
      '@cinefeed/scraper': fileURLToPath(new URL('./packages/scraper/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/src/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
