import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    // Logger reads these at import time
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
    },

    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      exclude: ['node_modules/', 'dist/', '**/*.d.ts', '**/*.test.ts', '**/test-utils/**'],
    },

    testTimeout: 10000,
  },
});
