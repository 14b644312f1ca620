/**
 * In-process TTL cache.
 *
 * An entry is valid while `now - insertedAt < ttlMs`. Expired entries are
 * reported absent by `get` but are not swept; they stay readable through
 * `peek` until overwritten, invalidated or evicted by the optional LRU bound.
 * Each write replaces the whole entry with a single `Map.set`, so readers see
 * either the previous entry or the new one.
 */

export type Clock = () => number;

export interface CacheEntry<V> {
  value: V;
  insertedAt: number;
  ttlMs: number;
}

export interface PeekResult<V> {
  value: V;
  insertedAt: number;
  expired: boolean;
}

export interface TtlCacheOptions {
  /** Default time-to-live for `put` calls that do not pass one. */
  ttlMs: number;
  /** Evict least recently used keys beyond this many entries. Unbounded when omitted. */
  maxEntries?: number;
  clock?: Clock;
}

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  /** Percentage of `get` calls served from the cache, 0 when there were none. */
  hitRate: number;
}

export class TtlCache<V> {
  private readonly entries = new Map<string, Readonly<CacheEntry<V>>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number | undefined;
  private readonly clock: Clock;
  private hits = 0;
  private misses = 0;

  constructor(options: TtlCacheOptions) {
    if (options.ttlMs <= 0) throw new Error('ttlMs must be positive');
    if (options.maxEntries !== undefined && options.maxEntries < 1) {
      throw new Error('maxEntries must be at least 1');
    }
    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries;
    this.clock = options.clock ?? Date.now;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry || this.isExpired(entry)) {
      this.misses++;
      return undefined;
    }
    this.touch(key, entry);
    this.hits++;
    return entry.value;
  }

  /** Entry regardless of expiry; does not count as a lookup or refresh recency. */
  peek(key: string): PeekResult<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    return { value: entry.value, insertedAt: entry.insertedAt, expired: this.isExpired(entry) };
  }

  put(key: string, value: V, ttlMs: number = this.ttlMs): void {
    const entry: Readonly<CacheEntry<V>> = Object.freeze({ value, insertedAt: this.clock(), ttlMs });
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.evictOverflow();
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups === 0 ? 0 : (this.hits / lookups) * 100,
    };
  }

  private isExpired(entry: Readonly<CacheEntry<V>>): boolean {
    return this.clock() - entry.insertedAt >= entry.ttlMs;
  }

  // Map iteration order doubles as recency order: re-inserting moves a key to the end
  private touch(key: string, entry: Readonly<CacheEntry<V>>): void {
    if (this.maxEntries === undefined) return;
    this.entries.delete(key);
    this.entries.set(key, entry);
  }

  private evictOverflow(): void {
    if (this.maxEntries === undefined) return;
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
    }
  }
}
