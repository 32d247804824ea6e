/**
 * Per-connection session state.
 *
 * A session lives exactly as long as one protocol connection. Read-mostly
 * data (Tempo accounts, work attributes) is cached in typed slots scoped to
 * the session, so a long-lived process never serves one client's cached
 * data to another connection and a reconnect always starts fresh.
 */

import { randomUUID } from 'crypto';

/**
 * A typed cache slot. Declare one per cached value and load it through a
 * session; values are stored per session, never globally.
 */
export class SessionSlot<T> {
  private readonly values = new WeakMap<Session, Promise<T>>();

  constructor(readonly name: string) {}

  /**
   * Return the session's value, calling `loader` only on first use.
   * Concurrent first reads share one load. A rejected load is evicted so
   * the next caller retries it.
   */
  load(session: Session, loader: () => Promise<T>): Promise<T> {
    const existing = this.values.get(session);
    if (existing) {return existing;}

    const pending = loader().catch((err: unknown) => {
      if (this.values.get(session) === pending) {
        this.values.delete(session);
      }
      throw err;
    });
    this.values.set(session, pending);
    return pending;
  }

  has(session: Session): boolean {
    return this.values.has(session);
  }

  invalidate(session: Session): void {
    this.values.delete(session);
  }
}

export class Session {
  readonly id: string;
  readonly startedAt: number;

  constructor(startedAt: number = Date.now(), id: string = randomUUID()) {
    this.id = id;
    this.startedAt = startedAt;
  }

  cached<T>(slot: SessionSlot<T>, loader: () => Promise<T>): Promise<T> {
    return slot.load(this, loader);
  }
}
