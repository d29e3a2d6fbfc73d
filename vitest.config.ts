import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    exclude: ['test-fixtures/**'],
    // Scenarios switch the process working directory; keep each file in its own process
    pool: 'forks',
    testTimeout: process.env['CI'] ? 60000 : 30000,
    hookTimeout: process.env['CI'] ? 60000 : 30000,
    env: {
      PACKCHECK_LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      exclude: ['test/**', 'test-fixtures/**', 'dist/**'],
    },
  },
});
