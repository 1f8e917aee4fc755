import { describe, expect, it, vi } from 'vitest';
import { SessionPool } from '../sessionPool';
import type { BrowserSession, SessionFactory } from '../types';

const buildFactory = () => {
  const sessions: Array<BrowserSession & { close: ReturnType<typeof vi.fn> }> = [];
  const factory: SessionFactory & { shutdown: ReturnType<typeof vi.fn> } = {
    engine: 'fake',
    create: async () => {
      const session = {
        id: `s${sessions.length + 1}`,
        navigate: vi.fn(),
        close: vi.fn(async () => {}),
      };
      sessions.push(session);
      return session;
    },
    shutdown: vi.fn(async () => {}),
  };
  return { factory, sessions };
};

describe('SessionPool', () => {
  it('reuses a released session instead of creating another', async () => {
    const { factory, sessions } = buildFactory();
    const pool = new SessionPool(factory, 2);

    const first = await pool.withSession(async (session) => session.id);
    const second = await pool.withSession(async (session) => session.id);

    expect(first).toBe('s1');
    expect(second).toBe('s1');
    expect(sessions).toHaveLength(1);
    expect(pool.stats()).toMatchObject({ created: 1, idle: 1, inUse: 0, acquisitions: 2 });
  });

  it('never lends one session to two callers at once', async () => {
    const { factory } = buildFactory();
    const pool = new SessionPool(factory, 2);
    const inFlight = new Set<string>();
    let maxConcurrent = 0;

    await Promise.all(
      Array.from({ length: 6 }, () =>
        pool.withSession(async (session) => {
          expect(inFlight.has(session.id)).toBe(false);
          inFlight.add(session.id);
          maxConcurrent = Math.max(maxConcurrent, inFlight.size);
          await new Promise((resolve) => setTimeout(resolve, 5));
          inFlight.delete(session.id);
        }),
      ),
    );

    expect(maxConcurrent).toBe(2);
    expect(pool.stats().created).toBe(2);
  });

  it('releases the session when the task throws', async () => {
    const { factory } = buildFactory();
    const pool = new SessionPool(factory, 1);

    await expect(
      pool.withSession(async () => {
        throw new Error('extraction failed');
      }),
    ).rejects.toThrow('extraction failed');

    expect(pool.stats()).toMatchObject({ idle: 1, inUse: 0 });
    await expect(pool.withSession(async (session) => session.id)).resolves.toBe('s1');
  });

  it('retires recycled sessions and creates a fresh one next time', async () => {
    const { factory, sessions } = buildFactory();
    const pool = new SessionPool(factory, 1);

    await pool.withSession(async (session) => {
      await pool.recycle(session);
    });
    const next = await pool.withSession(async (session) => session.id);

    expect(sessions[0].close).toHaveBeenCalledTimes(1);
    expect(next).toBe('s2');
  });

  it('closes its own sessions and leaves the shared engine running', async () => {
    const { factory, sessions } = buildFactory();
    const pool = new SessionPool(factory, 2);
    await pool.withSession(async () => {});

    await pool.close();

    expect(sessions[0].close).toHaveBeenCalledTimes(1);
    expect(factory.shutdown).not.toHaveBeenCalled();
    await expect(pool.acquire()).rejects.toThrow('Session pool is closed');
  });
});
