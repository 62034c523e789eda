import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // In-process tests only. Postgres-backed suites live in *.int.test.ts
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/*.int.{test,spec}.ts'],
    // argon2 hashing dominates the HTTP suites
    testTimeout: 15000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/__tests__/**', 'src/test/**'],
    },
  },
});
