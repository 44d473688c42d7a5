import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**'],
    env: {
      LOG_LEVEL: 'silent'
    },
    testTimeout: 10000
  }
});
