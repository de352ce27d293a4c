import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Needs DATABASE_URL and migrated tables (`npm run migrate`); skipped otherwise
    include: ['src/**/*.int.{test,spec}.ts'],
    pool: 'forks',
    maxWorkers: 1,
    maxConcurrency: 1,
    testTimeout: 20000,
  },
});
