const PREFIX = '[recordgen]';

/** True when RECORDGEN_DEBUG is set to '1' or 'true'. */
export function isDebugEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  const flag = env.RECORDGEN_DEBUG;
  return flag === '1' || flag === 'true';
}

/**
 * Write a single diagnostic line to stderr.
 * Intended to be used behind the `debug` generator option.
 */
export function debugLog(enabled: boolean, message: string): void {
  if (!enabled) return;
  process.stderr.write(`${PREFIX} ${message}\n`);
}
