import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'integration',
    globals: true,
    environment: 'node',
    include: ['tests/integration/**/*.test.ts'],
    testTimeout: 15_000,
    // Deadline scenarios measure wall-clock time; keep them off a busy pool
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    coverage: {
      provider: 'v8',
      reporter: ['lcov'],
      reportsDirectory: './coverage/integration',
      include: ['src/**/*.ts'],
      exclude: ['**/index.ts', '**/types.ts'],
    },
  },
});
