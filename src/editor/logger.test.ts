import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, isLogLevel } from './logger';

describe('createLogger()', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger().warn('disk full', 3);
    expect(warn).toHaveBeenCalledWith('[termpix] disk full', 3);
  });

  it('prefixes non-string first arguments separately', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('boom');
    createLogger().error(failure);
    expect(error).toHaveBeenCalledWith('[termpix]', failure);
  });

  it('gates debug and trace by level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    createLogger('off').debug('hidden');
    createLogger('debug').trace('hidden');
    expect(debug).not.toHaveBeenCalled();

    createLogger('debug').debug('shown');
    createLogger('trace').trace('traced');
    expect(debug).toHaveBeenCalledTimes(2);
    expect(debug).toHaveBeenLastCalledWith('[termpix] traced');
  });

  it('recognizes level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
