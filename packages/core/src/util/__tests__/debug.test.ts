import { describe, it, expect, vi, afterEach } from 'vitest';
import { debugLog, isDebugEnv } from '../debug';

describe('debug logging', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reads RECORDGEN_DEBUG', () => {
    expect(isDebugEnv({ RECORDGEN_DEBUG: '1' })).toBe(true);
    expect(isDebugEnv({ RECORDGEN_DEBUG: 'true' })).toBe(true);
    expect(isDebugEnv({ RECORDGEN_DEBUG: '0' })).toBe(false);
    expect(isDebugEnv({})).toBe(false);
  });

  it('writes one prefixed line when enabled', () => {
    const write = vi
      .spyOn(process.stderr, 'write')
      .mockImplementation(() => true);

    debugLog(true, 'hello');
    debugLog(false, 'ignored');

    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith('[recordgen] hello\n');
  });
});
