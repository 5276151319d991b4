import fc from 'fast-check';

// ============================================================================
// FAST-CHECK GLOBAL CONFIGURATION
// ============================================================================

/**
 * Deterministic property runs: every suite shares the seed and run count
 * from vitest.config.ts, so a failure reproduces with the same environment.
 */
export function getTestConfig(): { seed: number; numRuns: number } {
  const seed = Number.parseInt(process.env.TEST_SEED ?? '424242', 10);
  const numRuns = Number.parseInt(process.env.FC_NUM_RUNS ?? '100', 10);
  if (Number.isNaN(seed)) {
    throw new Error(`Invalid TEST_SEED: ${process.env.TEST_SEED}`);
  }
  if (Number.isNaN(numRuns) || numRuns < 1) {
    throw new Error(`Invalid FC_NUM_RUNS: ${process.env.FC_NUM_RUNS}`);
  }
  return { seed, numRuns };
}

const config = getTestConfig();

fc.configureGlobal({
  seed: config.seed,
  numRuns: config.numRuns,
  endOnFailure: true,
});

/**
 * Run a fast-check property under the global configuration, naming the
 * property and the seed in the failure message.
 */
export function propertyTest<Ts>(
  name: string,
  property: fc.IProperty<Ts>,
  params: fc.Parameters<Ts> = {}
): void {
  const details = fc.check(property, params);
  if (details.failed) {
    throw new Error(
      `Property "${name}" failed (seed ${details.seed}, path ${details.counterexamplePath ?? 'n/a'}):\n` +
        fc.defaultReportMessage(details)
    );
  }
}
