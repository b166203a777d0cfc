import { defineConfig } from 'vitest/config';

/**
 * Workspace test configuration: every package under packages/ is a
 * Vitest project with its own vitest.config.ts.
 */

// Unix-like systems use forks for isolation; Windows uses threads
const pool = process.platform === 'win32' ? 'threads' : 'forks';

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',
    pool,

    // No retries - surface issues immediately
    retry: 0,
    fileParallelism: !isCI,

    // Extended timeouts for property-based testing
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,
    teardownTimeout: 5000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.test.ts',
        'packages/*/src/**/__tests__/**',
      ],
    },

    projects: ['packages/*'],
  },
});
