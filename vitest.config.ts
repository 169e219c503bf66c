import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Specs share process.env and the cached runtime config; keep them in one worker.
    pool: 'forks',
    maxWorkers: 1,
    minWorkers: 1,
    include: ['src/tests/**/*.spec.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    testTimeout: 20000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'lcov'],
      reportsDirectory: 'coverage',
      include: ['src/cli/**', 'src/config/**', 'src/services/**', 'src/utils/**'],
      exclude: ['**/*.d.ts', 'src/tests/**'],
    },
  },
});
