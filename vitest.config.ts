import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['integration-tests/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 30000,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
