import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    reporters: ['default'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/__helpers__/**', 'src/main.ts'],
      reporter: ['text', 'lcov', 'json-summary'],
      reportsDirectory: 'reports/coverage',
    },
    testTimeout: 10_000,
  },
});
