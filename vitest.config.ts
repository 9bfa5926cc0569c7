import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const alias = {
  '@libs/resilient-http-core': fileURLToPath(new URL('./libs/resilient-http-core/src/index.ts', import.meta.url)),
  '@libs/market-guide-client': fileURLToPath(new URL('./libs/market-guide-client/src/index.ts', import.meta.url)),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
