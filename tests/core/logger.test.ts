import { afterEach, describe, expect, it, vi } from 'vitest';

import { Logger, resolveLogLevel } from '../../src/core/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages below its level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = new Logger('warn');

    logger.debug('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('shown');
  });

  it('prefixes nested scopes and passes metadata through', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = new Logger('debug').child('session').child('memory');

    logger.info('compacted', { turns: 4 });

    expect(info).toHaveBeenCalledWith('[session:memory] compacted', { turns: 4 });
  });

  it('shares the parent level with children', () => {
    expect(new Logger('error').child('x').isEnabled('warn')).toBe(false);
  });
});

describe('resolveLogLevel', () => {
  it('accepts known levels in any case', () => {
    expect(resolveLogLevel(' Debug ')).toBe('debug');
  });

  it('falls back for unknown values', () => {
    expect(resolveLogLevel('verbose', 'warn')).toBe('warn');
    expect(resolveLogLevel(undefined)).toBe('info');
  });
});
