import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // PostgreSQL suites only; they are skipped when DATABASE_URL is unset
    include: ['src/**/*.int.{test,spec}.ts'],
    pool: 'forks',
    // Suites share one database
    fileParallelism: false,
  },
});
