import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger, SilentLogger, createLogger } from './index.js';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes prefixed messages to stderr', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    new ConsoleLogger('idlc').info('Compiled 1 file(s)', 42);

    expect(spy).toHaveBeenCalledWith('[idlc] Compiled 1 file(s)', 42);
  });

  it('drops messages below the minimum level', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ConsoleLogger(undefined, 'warn');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('also shown');

    expect(spy.mock.calls).toEqual([['shown'], ['also shown']]);
  });
});

describe('createLogger', () => {
  it('returns a silent logger when asked', () => {
    expect(createLogger('idlc', true)).toBeInstanceOf(SilentLogger);
  });

  it('returns a console logger by default', () => {
    expect(createLogger('idlc')).toBeInstanceOf(ConsoleLogger);
  });
});
