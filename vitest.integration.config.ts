import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Requires DATABASE_URL; suites skip themselves otherwise
    include: ['src/**/*.int.{test,spec}.ts'],
    pool: 'forks',
    maxWorkers: 1,
    maxConcurrency: 1,
    testTimeout: 15000,
  },
});
