import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts', 'tests/integration/**/*.test.ts'],
    testTimeout: 30000,
    env: {
      LOG_LEVEL: 'silent',
      LOG_PRETTY: 'false',
    },
  },
});
