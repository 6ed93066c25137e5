import { afterEach, describe, it, expect, vi } from 'vitest';
import { debug, debugEnabled } from '../log.js';

describe('debug', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('is silent unless HOSTCHECK_DEBUG is set', () => {
    vi.stubEnv('HOSTCHECK_DEBUG', '0');
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    debug('dispatch', 'hidden');

    expect(debugEnabled()).toBe(false);
    expect(error).not.toHaveBeenCalled();
  });

  it('writes scoped lines to stderr when enabled', () => {
    vi.stubEnv('HOSTCHECK_DEBUG', '1');
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    debug('dispatch', 'Retrieving package resource');

    expect(error).toHaveBeenCalledWith('[DEBUG] dispatch: Retrieving package resource');
  });
});
