import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@turbinetrack/shared': fileURLToPath(new URL('./shared/src/index.ts', import.meta.url)),
      '@turbinetrack/store': fileURLToPath(new URL('./store/src/index.ts', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['shared/src/**/*.test.ts', 'store/src/**/*.test.ts', 'backend-api/src/**/*.test.ts'],
    env: {
      TURBINETRACK_LOG_MODE: 'silent',
    },
  },
});
