import { defineConfig } from 'vitest/config';

/**
 * recordgen testing configuration
 *
 * - Deterministic property runs: TEST_SEED and FC_NUM_RUNS feed the
 *   fast-check globals configured in test/setup.ts
 * - No retries, so a failing property surfaces on the first run
 * - Extended timeouts: every property run compiles Ajv validators
 */

// Windows uses threads, Unix-like systems use forks
const getPoolConfig = (): { pool: 'threads' | 'forks' } => ({
  pool: process.platform === 'win32' ? 'threads' : 'forks',
});

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    // ========================================================================
    // EXECUTION ENVIRONMENT
    // ========================================================================

    environment: 'node',
    ...getPoolConfig(),
    setupFiles: ['./test/setup.ts'],

    // ========================================================================
    // TEST DISCOVERY AND EXECUTION
    // ========================================================================

    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    retry: 0,
    fileParallelism: !isCI,
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    // ========================================================================
    // REPORTING
    // ========================================================================

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/__tests__/**',
        'packages/*/src/**/types.ts',
      ],
      thresholds: {
        branches: 85,
        functions: 85,
        lines: 85,
        statements: 85,
      },
    },

    // ========================================================================
    // ENVIRONMENT VARIABLES
    // ========================================================================

    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
