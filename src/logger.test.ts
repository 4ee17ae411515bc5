import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, getLogLevel, setLogLevel } from './logger.js';

describe('createLogger', () => {
  afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('writes scoped lines to stderr', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-04T05:06:07.000Z'));
    try {
      createLogger('provisioner').info('Fetching source');
    } finally {
      vi.useRealTimers();
    }

    expect(spy).toHaveBeenCalledWith(
      '2026-03-04T05:06:07.000Z - INFO - [provisioner] Fetching source'
    );
  });

  it('drops messages below the current level', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('cli');

    logger.debug('hidden');
    setLogLevel('debug');
    logger.debug('shown');

    expect(getLogLevel()).toBe('debug');
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0]?.[0]).toMatch(/ - DEBUG - \[cli\] shown$/);
  });
});
