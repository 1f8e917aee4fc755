import { describe, expect, it } from 'vitest';
import { AbortedError } from '../async';
import { Semaphore } from '../concurrency';

describe('Semaphore', () => {
  it('queues acquirers beyond capacity in FIFO order', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];

    const releaseFirst = await semaphore.acquire();
    const second = semaphore.acquire().then((release) => {
      order.push('second');
      return release;
    });
    const third = semaphore.acquire().then((release) => {
      order.push('third');
      return release;
    });

    expect(semaphore.waiting).toBe(2);
    releaseFirst();
    (await second)();
    (await third)();

    expect(order).toEqual(['second', 'third']);
    expect(semaphore.waiting).toBe(0);
  });

  it('ignores a repeated release', async () => {
    const semaphore = new Semaphore(1);
    const release = await semaphore.acquire();
    release();
    release();

    await semaphore.acquire();
    const controller = new AbortController();
    const pending = semaphore.acquire(controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(AbortedError);
    expect(semaphore.waiting).toBe(0);
  });
});
