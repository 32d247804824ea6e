/**
 * Unit tests for session-scoped caching
 */

import { describe, it, expect, vi } from 'vitest';
import { Session, SessionSlot } from '../session.js';

describe('SessionSlot', () => {
  it('should call the loader once per session', async () => {
    const slot = new SessionSlot<string[]>('accounts');
    const session = new Session(0, 'one');
    const loader = vi.fn(async () => ['ACME']);

    const first = await session.cached(slot, loader);
    const second = await session.cached(slot, loader);

    expect(first).toEqual(['ACME']);
    expect(second).toBe(first);
    expect(loader).toHaveBeenCalledTimes(1);
    expect(slot.has(session)).toBe(true);
  });

  it('should share a load that is still in progress', async () => {
    const slot = new SessionSlot<number>('count');
    const session = new Session(0, 'one');
    const loader = vi.fn(async () => 7);

    const results = await Promise.all([slot.load(session, loader), slot.load(session, loader)]);

    expect(results).toEqual([7, 7]);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('should keep values apart between sessions', async () => {
    const slot = new SessionSlot<string>('name');
    const a = new Session(0, 'a');
    const b = new Session(0, 'b');

    await slot.load(a, async () => 'first');
    const value = await slot.load(b, async () => 'second');

    expect(value).toBe('second');
    await expect(slot.load(a, async () => 'ignored')).resolves.toBe('first');
  });

  it('should forget a failed load', async () => {
    const slot = new SessionSlot<string>('flaky');
    const session = new Session(0, 'one');
    const loader = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValueOnce('ok');

    await expect(slot.load(session, loader)).rejects.toThrow('boom');
    expect(slot.has(session)).toBe(false);
    await expect(slot.load(session, loader)).resolves.toBe('ok');
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it('should load again after invalidation', async () => {
    const slot = new SessionSlot<number>('count');
    const session = new Session(0, 'one');
    let calls = 0;

    await slot.load(session, async () => ++calls);
    slot.invalidate(session);
    const value = await slot.load(session, async () => ++calls);

    expect(value).toBe(2);
  });
});

describe('Session', () => {
  it('should get a random id by default', () => {
    expect(new Session().id).not.toBe(new Session().id);
  });

  it('should keep the given start time and id', () => {
    const session = new Session(1234, 'fixed');

    expect(session.startedAt).toBe(1234);
    expect(session.id).toBe('fixed');
  });
});
