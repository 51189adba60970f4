import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'unit',
    globals: true,
    environment: 'node',
    // End-to-end scenarios live in tests/integration, see vitest.integration.config.ts
    include: ['tests/unit/**/*.test.ts'],
    pool: 'threads',
    // Orchestrator and executor tests use real timers with short delays
    testTimeout: 10_000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['**/index.ts', '**/types.ts'],
    },
  },
});
