import { describe, expect, it } from 'vitest';
import { SessionLock, SessionStore } from './sessionStore.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const tick = () => new Promise<void>((r) => setTimeout(r, 0));

describe('SessionLock', () => {
  it('runs waiters strictly in call order', async () => {
    const lock = new SessionLock();
    const order: number[] = [];
    const gate = deferred();

    const first = lock.runExclusive(async () => {
      await gate.promise;
      order.push(1);
    });
    const second = lock.runExclusive(async () => {
      order.push(2);
    });
    const third = lock.runExclusive(async () => {
      order.push(3);
    });

    await tick();
    expect(order).toEqual([]);
    expect(lock.busy).toBe(true);

    gate.resolve();
    await Promise.all([first, second, third]);
    expect(order).toEqual([1, 2, 3]);
    expect(lock.busy).toBe(false);
  });

  it('releases after a failing task', async () => {
    const lock = new SessionLock();
    await expect(
      lock.runExclusive(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(lock.runExclusive(async () => 'next')).resolves.toBe('next');
  });
});

describe('SessionStore', () => {
  it('creates a session on first use and reuses it afterwards', async () => {
    const store = new SessionStore({ now: () => 1000 });

    const first = await store.withSession('abc', async (session) => session);
    const second = await store.withSession('abc', async (session) => session);

    expect(first).toBe(second);
    expect(first).toMatchObject({ id: 'abc', createdAt: 1000, messageCount: 0, finalized: false, notes: '' });
    expect(store.size).toBe(1);
  });

  it('never overlaps two runs for the same session', async () => {
    const store = new SessionStore();
    const events: string[] = [];
    const gate = deferred();

    const a = store.withSession('same', async (session) => {
      events.push('a:start');
      await gate.promise;
      session.messageCount += 1;
      events.push('a:end');
    });
    const b = store.withSession('same', async (session) => {
      events.push(`b:start:${session.messageCount}`);
    });

    await tick();
    expect(events).toEqual(['a:start']);

    gate.resolve();
    await Promise.all([a, b]);
    expect(events).toEqual(['a:start', 'a:end', 'b:start:1']);
  });

  it('lets different sessions run side by side', async () => {
    const store = new SessionStore();
    const events: string[] = [];
    const gate = deferred();

    const a = store.withSession('one', async () => {
      events.push('one:start');
      await gate.promise;
      events.push('one:end');
    });
    const b = store.withSession('two', async () => {
      events.push('two:start');
      await gate.promise;
      events.push('two:end');
    });

    await tick();
    expect(events).toEqual(['one:start', 'two:start']);

    gate.resolve();
    await Promise.all([a, b]);
    expect(store.size).toBe(2);
  });

  it('counts finalized sessions', async () => {
    const store = new SessionStore();
    await store.withSession('one', async (session) => {
      session.finalized = true;
    });
    await store.withSession('two', async () => undefined);

    expect(store.finalizedCount).toBe(1);
    expect(store.peek('one')?.finalized).toBe(true);
    expect(store.peek('missing')).toBeUndefined();
  });

  describe('sweep', () => {
    it('keeps everything when no TTL is set', async () => {
      const store = new SessionStore({ now: () => 0 });
      await store.withSession('old', async () => undefined);

      expect(store.sweep(10_000_000)).toEqual([]);
      expect(store.size).toBe(1);
    });

    it('drops idle sessions past the TTL', async () => {
      const store = new SessionStore({ ttlMs: 1000, now: () => 0 });
      await store.withSession('old', async () => undefined);
      await store.withSession('fresh', async (session) => {
        session.updatedAt = 5000;
      });

      expect(store.sweep(5500)).toEqual(['old']);
      expect(store.peek('old')).toBeUndefined();
      expect(store.peek('fresh')).toBeDefined();
    });

    it('skips a session whose lock is held', async () => {
      const store = new SessionStore({ ttlMs: 1000, now: () => 0 });
      const gate = deferred();
      const running = store.withSession('busy', async () => {
        await gate.promise;
      });

      expect(store.sweep(5000)).toEqual([]);

      gate.resolve();
      await running;
      expect(store.sweep(5000)).toEqual(['busy']);
    });
  });
});
