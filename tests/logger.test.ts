import { afterEach, describe, expect, it, vi } from 'vitest';
import { resetConfig } from '../src/ts/config';
import { getLogger, log, resetLogger } from '../src/ts/logger';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    resetConfig();
    resetLogger();
  });

  it('takes its level from the config', () => {
    vi.stubEnv('TYPED_DATA_LOG_LEVEL', 'debug');
    resetConfig();
    resetLogger();
    expect(getLogger().level).toBe('debug');
  });

  it('keeps its level until reset', () => {
    vi.stubEnv('TYPED_DATA_LOG_LEVEL', 'info');
    resetConfig();
    resetLogger();
    const first = getLogger();

    vi.stubEnv('TYPED_DATA_LOG_LEVEL', 'verbose');
    resetConfig();
    expect(getLogger()).toBe(first);
    expect(getLogger().level).toBe('info');

    resetLogger();
    expect(getLogger()).not.toBe(first);
    expect(getLogger().level).toBe('verbose');
  });

  it('forwards level, message and metadata to winston', () => {
    vi.stubEnv('TYPED_DATA_LOG_LEVEL', 'error');
    resetConfig();
    resetLogger();
    const spy = vi.spyOn(getLogger(), 'log');

    log.warn('Default domain set', { domain: 'EIP712Domain(string name)' });
    log.debug('Resolved struct type');

    expect(spy).toHaveBeenNthCalledWith(1, 'warn', 'Default domain set', {
      domain: 'EIP712Domain(string name)',
    });
    expect(spy).toHaveBeenNthCalledWith(2, 'debug', 'Resolved struct type', {});
  });
});
