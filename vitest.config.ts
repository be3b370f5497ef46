import { defineConfig } from 'vitest/config';

/**
 * Deterministic test configuration for every workspace package plus the
 * cross-package property tests under test/.
 */

// Windows uses threads; Unix-like systems use forks for isolation
const pool = process.platform === 'win32' ? 'threads' : 'forks';

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',
    pool,
    setupFiles: ['./test/setup.ts'],

    include: ['packages/*/src/**/*.{test,spec}.ts', 'test/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // No retries - surface issues immediately
    retry: 0,
    fileParallelism: !isCI,

    // Property-based tests draw many instances
    testTimeout: isCI ? 30000 : 15000,
    hookTimeout: 10000,

    reporters: ['default'],

    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '500' : '100',
    },
  },
});
