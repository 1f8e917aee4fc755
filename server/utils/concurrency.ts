import { AbortedError } from './async';

/** Counting semaphore with FIFO waiters; a waiter whose signal aborts leaves the queue. */
export class Semaphore {
  private readonly waiters: Array<() => void> = [];
  private available: number;

  constructor(readonly capacity: number) {
    this.available = Math.max(0, Math.floor(capacity));
  }

  get waiting(): number {
    return this.waiters.length;
  }

  async acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      throw new AbortedError();
    }

    if (this.available > 0) {
      this.available -= 1;
      return this.releaser();
    }

    return await new Promise<() => void>((resolve, reject) => {
      const onAbort = () => {
        this.removeWaiter(notify);
        reject(new AbortedError());
      };

      const notify = () => {
        signal?.removeEventListener('abort', onAbort);
        this.available -= 1;
        resolve(this.releaser());
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(notify);
    });
  }

  // Releasing twice must not inflate capacity.
  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private removeWaiter(waiter: () => void) {
    const idx = this.waiters.indexOf(waiter);
    if (idx >= 0) {
      this.waiters.splice(idx, 1);
    }
  }

  private release() {
    this.available += 1;
    const next = this.waiters.shift();
    if (next) {
      next();
    }
  }
}
