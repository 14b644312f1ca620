import { describe, it, expect } from 'vitest';
import { TtlCache } from '../ttl-cache';
import { commentsKey, statsKey, userKey, RECENT_TICKETS_KEY } from '../keys';

function manualClock(start = 1_000_000) {
  let now = start;
  return {
    clock: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('TtlCache', () => {
  it('returns a stored value before the ttl elapses', () => {
    const { clock, advance } = manualClock();
    const cache = new TtlCache<string>({ ttlMs: 1000, clock });

    cache.put('a', 'alpha');
    advance(999);

    expect(cache.get('a')).toBe('alpha');
  });

  it('treats an entry as absent once the ttl has elapsed', () => {
    const { clock, advance } = manualClock();
    const cache = new TtlCache<string>({ ttlMs: 1000, clock });

    cache.put('a', 'alpha');
    advance(1000);

    expect(cache.get('a')).toBeUndefined();
  });

  it('keeps expired entries readable through peek', () => {
    const { clock, advance } = manualClock(5000);
    const cache = new TtlCache<string>({ ttlMs: 1000, clock });

    cache.put('a', 'alpha');
    advance(2500);

    expect(cache.peek('a')).toEqual({ value: 'alpha', insertedAt: 5000, expired: true });
    expect(cache.size).toBe(1);
  });

  it('honors a per-entry ttl', () => {
    const { clock, advance } = manualClock();
    const cache = new TtlCache<string>({ ttlMs: 1000, clock });

    cache.put('short', 's', 100);
    cache.put('long', 'l');
    advance(500);

    expect(cache.get('short')).toBeUndefined();
    expect(cache.get('long')).toBe('l');
  });

  it('overwrites a key and restarts its ttl', () => {
    const { clock, advance } = manualClock();
    const cache = new TtlCache<number>({ ttlMs: 1000, clock });

    cache.put('n', 1);
    advance(800);
    cache.put('n', 2);
    advance(800);

    expect(cache.get('n')).toBe(2);
  });

  it('invalidate removes a key and reports whether it existed', () => {
    const cache = new TtlCache<string>({ ttlMs: 1000 });
    cache.put('a', 'alpha');

    expect(cache.invalidate('a')).toBe(true);
    expect(cache.invalidate('a')).toBe(false);
    expect(cache.peek('a')).toBeUndefined();
  });

  it('evicts the least recently used key beyond maxEntries', () => {
    const cache = new TtlCache<string>({ ttlMs: 60_000, maxEntries: 2 });

    cache.put('a', 'alpha');
    cache.put('b', 'beta');
    cache.get('a');
    cache.put('c', 'gamma');

    expect(cache.peek('b')).toBeUndefined();
    expect(cache.get('a')).toBe('alpha');
    expect(cache.get('c')).toBe('gamma');
    expect(cache.size).toBe(2);
  });

  it('tracks hits, misses and hit rate', () => {
    const cache = new TtlCache<string>({ ttlMs: 60_000 });
    cache.put('a', 'alpha');

    cache.get('a');
    cache.get('a');
    cache.get('a');
    cache.get('missing');

    expect(cache.stats()).toEqual({ size: 1, hits: 3, misses: 1, hitRate: 75 });
  });

  it('peek does not count as a lookup', () => {
    const cache = new TtlCache<string>({ ttlMs: 60_000 });
    cache.put('a', 'alpha');
    cache.peek('a');

    expect(cache.stats()).toEqual({ size: 1, hits: 0, misses: 0, hitRate: 0 });
  });

  it('clear empties entries and counters', () => {
    const cache = new TtlCache<string>({ ttlMs: 60_000 });
    cache.put('a', 'alpha');
    cache.get('a');
    cache.clear();

    expect(cache.stats()).toEqual({ size: 0, hits: 0, misses: 0, hitRate: 0 });
  });

  it('rejects a non-positive ttl or maxEntries', () => {
    expect(() => new TtlCache({ ttlMs: 0 })).toThrow('ttlMs must be positive');
    expect(() => new TtlCache({ ttlMs: 10, maxEntries: 0 })).toThrow('maxEntries must be at least 1');
  });
});

describe('cache keys', () => {
  it('builds namespaced keys', () => {
    expect(RECENT_TICKETS_KEY).toBe('tickets:recent');
    expect(commentsKey(4021)).toBe('comments:4021');
    expect(userKey(7)).toBe('users:7');
    expect(statsKey('2026-01-01', '2026-01-31')).toBe('stats:2026-01-01:2026-01-31');
  });
});
