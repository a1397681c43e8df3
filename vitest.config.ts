import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    isolate: true,
    testTimeout: 10000,
    env: {
      LOG_LEVEL: 'ERROR',
    },
  },
});
