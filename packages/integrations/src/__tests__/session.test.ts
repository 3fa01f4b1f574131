/**
 * Session Cache Tests
 * TTL expiry and explicit invalidation of the shared ledger token
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_SESSION_TTL_MS, SessionTokenCache } from '../ledger/session.js';

function createClock(start = 1_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe('SessionTokenCache', () => {
  it('defaults to a 14 minute TTL', () => {
    expect(new SessionTokenCache().ttlMs).toBe(840_000);
    expect(DEFAULT_SESSION_TTL_MS).toBe(840_000);
  });

  it('returns the token right after it is set', () => {
    const cache = new SessionTokenCache();
    cache.set('token-a');

    expect(cache.get()).toBe('token-a');
  });

  it('returns null when nothing is cached', () => {
    expect(new SessionTokenCache().get()).toBeNull();
  });

  it('stops returning the token once the TTL has elapsed', () => {
    const clock = createClock();
    const cache = new SessionTokenCache({ ttlMs: 1000, now: clock.now });
    cache.set('token-a');

    clock.advance(999);
    expect(cache.get()).toBe('token-a');

    clock.advance(1);
    expect(cache.get()).toBeNull();
  });

  it('does not clear the entry when reporting it expired', () => {
    const clock = createClock();
    const cache = new SessionTokenCache({ ttlMs: 1000, now: clock.now });
    cache.set('token-a');
    clock.advance(5000);

    expect(cache.get()).toBeNull();
    expect(cache.remainingMs()).toBe(0);
  });

  it('returns null immediately after invalidate regardless of age', () => {
    const cache = new SessionTokenCache();
    cache.set('token-a');
    cache.invalidate();

    expect(cache.get()).toBeNull();
  });

  it('overwrites the previous token and restarts its age', () => {
    const clock = createClock();
    const cache = new SessionTokenCache({ ttlMs: 1000, now: clock.now });
    cache.set('token-a');
    clock.advance(800);
    cache.set('token-b');
    clock.advance(800);

    expect(cache.get()).toBe('token-b');
    expect(cache.remainingMs()).toBe(200);
  });
});
