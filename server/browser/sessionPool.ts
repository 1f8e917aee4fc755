import type { AppConfig } from '../../shared/config';
import type { Logger } from '../obs/logger';
import { Semaphore } from '../utils/concurrency';
import { createPlaywrightSessionFactory } from './playwrightSession';
import { createStaticSessionFactory } from './staticSession';
import type { BrowserSession, SessionFactory } from './types';

export type SessionPoolStats = {
  size: number;
  /** Sessions opened over the pool's lifetime, including retired ones. */
  created: number;
  live: number;
  idle: number;
  inUse: number;
  acquisitions: number;
};

/**
 * Fixed-size set of renderer sessions. A session is lent to exactly one caller at a time and goes
 * back to the idle list on release. `close` shuts only the sessions this pool opened; the factory
 * may be shared by other pools, so shutting it down is left to its owner.
 */
export class SessionPool {
  private readonly semaphore: Semaphore;
  private readonly idle: BrowserSession[] = [];
  private readonly all = new Set<BrowserSession>();
  private readonly leased = new Set<BrowserSession>();
  private acquisitions = 0;
  private created = 0;
  private closed = false;

  constructor(
    private readonly factory: SessionFactory,
    readonly size: number,
    private readonly logger?: Logger,
  ) {
    this.semaphore = new Semaphore(Math.max(1, Math.floor(size)));
  }

  get engine(): string {
    return this.factory.engine;
  }

  async acquire(signal?: AbortSignal): Promise<{ session: BrowserSession; release: () => Promise<void> }> {
    if (this.closed) {
      throw new Error('Session pool is closed');
    }
    const releaseSlot = await this.semaphore.acquire(signal);
    let session: BrowserSession;
    try {
      session = this.idle.pop() ?? (await this.createSession());
    } catch (error) {
      releaseSlot();
      throw error;
    }
    this.leased.add(session);
    this.acquisitions += 1;

    let released = false;
    const release = async () => {
      if (released) return;
      released = true;
      this.leased.delete(session);
      try {
        const retired = !this.all.has(session);
        if (retired) return;
        if (this.closed) {
          await this.discard(session);
        } else {
          this.idle.push(session);
        }
      } finally {
        releaseSlot();
      }
    };
    return { session, release };
  }

  /** Runs `task` with a borrowed session and returns it on every exit path. */
  async withSession<T>(task: (session: BrowserSession) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const { session, release } = await this.acquire(signal);
    try {
      return await task(session);
    } finally {
      await release();
    }
  }

  /** Drops a session that is no longer trustworthy (for example after a timeout left it mid-navigation). */
  async recycle(session: BrowserSession): Promise<void> {
    if (!this.all.has(session)) return;
    const idx = this.idle.indexOf(session);
    if (idx >= 0) {
      this.idle.splice(idx, 1);
    }
    await this.discard(session);
  }

  stats(): SessionPoolStats {
    return {
      size: this.size,
      created: this.created,
      live: this.all.size,
      idle: this.idle.length,
      inUse: this.leased.size,
      acquisitions: this.acquisitions,
    };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const idle = this.idle.splice(0, this.idle.length);
    const results = await Promise.allSettled(idle.map((session) => this.discard(session)));
    const failures = results.filter((result) => result.status === 'rejected').length;
    if (failures) {
      this.logger?.warn('Some sessions failed to close', { failures });
    }
    this.logger?.debug('Session pool closed', this.stats());
  }

  private async createSession(): Promise<BrowserSession> {
    const session = await this.factory.create();
    this.all.add(session);
    this.created += 1;
    this.logger?.debug('Session created', { sessionId: session.id, total: this.all.size });
    return session;
  }

  private async discard(session: BrowserSession): Promise<void> {
    this.all.delete(session);
    await session.close();
  }
}

export const createSessionFactory = (config: AppConfig, logger: Logger): SessionFactory =>
  config.browser.engine === 'static'
    ? createStaticSessionFactory(config)
    : createPlaywrightSessionFactory(config, logger);
