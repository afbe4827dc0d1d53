import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Set NODE_ENV for test detection (silences the pino logger)
    env: {
      NODE_ENV: 'test',
    },

    include: ['packages/*/test/**/*.test.ts'],

    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],

    // Enable global APIs like describe, it, expect, vi
    globals: true,

    testTimeout: 10000,
    retry: 0,
    reporters: ['default'],
  },
});
