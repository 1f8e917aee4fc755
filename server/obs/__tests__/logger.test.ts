import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from '../logger';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger({ observability: { logLevel: 'warn' } });

    logger.info('hidden');
    logger.warn('shown', { count: 2 });

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    const payload = JSON.parse(String(warn.mock.calls[0][0]));
    expect(payload).toMatchObject({ level: 'warn', message: 'shown', count: 2 });
  });

  it('binds child context into every line', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createLogger({ observability: { logLevel: 'debug' } }).child({ runId: 'run-1' });

    logger.child({ category: 'india' }).debug('step', { index: 3 });

    const payload = JSON.parse(String(log.mock.calls[0][0]));
    expect(payload).toMatchObject({ level: 'debug', message: 'step', runId: 'run-1', category: 'india', index: 3 });
  });

  it('always emits errors', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger({ observability: { logLevel: 'error' } }).error('boom');
    expect(error).toHaveBeenCalledTimes(1);
  });
});
