import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AbortedError, sleep, withTimeout } from '../async';

describe('withTimeout', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves when the task settles first', async () => {
    const result = withTimeout(Promise.resolve('done'), 1_000, () => new Error('late'));
    await expect(result).resolves.toBe('done');
  });

  it('rejects with the supplied error when the timer fires first', async () => {
    const never = new Promise<string>(() => {});
    const result = withTimeout(never, 500, () => new Error('too slow'));
    const assertion = expect(result).rejects.toThrow('too slow');
    await vi.advanceTimersByTimeAsync(500);
    await assertion;
  });

  it('passes task rejections through', async () => {
    const result = withTimeout(Promise.reject(new Error('broken')), 500, () => new Error('late'));
    await expect(result).rejects.toThrow('broken');
  });
});

describe('sleep', () => {
  it('rejects immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(10, controller.signal)).rejects.toBeInstanceOf(AbortedError);
  });
});
