import { emptyEvidence, type Session } from '../types.js';

/**
 * FIFO mutex. Each caller chains onto the previous holder's release, so
 * waiters run strictly in the order they called {@link runExclusive}.
 */
export class SessionLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get busy(): boolean {
    return this.pending > 0;
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }
}

interface Entry {
  session: Session;
  lock: SessionLock;
}

export interface SessionStoreOptions {
  /** Idle time after which {@link SessionStore.sweep} may drop a session. 0 keeps sessions forever. */
  ttlMs?: number;
  now?: () => number;
}

export function createSession(id: string, now: number): Session {
  return {
    id,
    createdAt: now,
    updatedAt: now,
    messageCount: 0,
    finalized: false,
    notes: '',
    evidence: emptyEvidence(),
  };
}

/**
 * In-memory registry of sessions, one lock per session id.
 *
 * Registry access is synchronous, so resolving or creating an entry can never
 * interleave with another request; that is the structural lock. The
 * per-session {@link SessionLock} is the only thing held across an await.
 */
export class SessionStore {
  private readonly entries = new Map<string, Entry>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get finalizedCount(): number {
    let count = 0;
    for (const { session } of this.entries.values()) {
      if (session.finalized) count++;
    }
    return count;
  }

  /** Read-only lookup; callers that mutate must go through {@link withSession}. */
  peek(id: string): Session | undefined {
    return this.entries.get(id)?.session;
  }

  async withSession<T>(id: string, fn: (session: Session) => Promise<T>): Promise<T> {
    const entry = this.resolve(id);
    return entry.lock.runExclusive(() => fn(entry.session));
  }

  /**
   * Drops sessions idle for longer than the TTL whose lock nobody holds or
   * waits on. A dropped finalized session that comes back starts fresh and
   * can be reported again.
   */
  sweep(now: number = this.now()): string[] {
    if (this.ttlMs <= 0) return [];

    const evicted: string[] = [];
    for (const [id, entry] of this.entries) {
      if (!entry.lock.busy && now - entry.session.updatedAt > this.ttlMs) {
        this.entries.delete(id);
        evicted.push(id);
      }
    }
    return evicted;
  }

  private resolve(id: string): Entry {
    let entry = this.entries.get(id);
    if (!entry) {
      entry = { session: createSession(id, this.now()), lock: new SessionLock() };
      this.entries.set(id, entry);
    }
    return entry;
  }
}
