// TTL cache for optimized contexts
//
// Reads take no lock. Population is insert-if-absent on the pending
// promise, so concurrent first accesses for one key share a single
// computation. A failed computation is evicted so the next caller retries.

export const DEFAULT_MAX_CACHE_ENTRIES = 500;

type CacheEntry<T> = {
  value: Promise<T>;
  expiresAt: number;
};

export type ContextCacheOptions = {
  ttlMs: number;
  maxEntries?: number;
  now?: () => number;
};

export type CacheMetrics = {
  hits: number;
  misses: number;
  hitRate: number;
  size: number;
};

export class ContextCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(options: ContextCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_CACHE_ENTRIES;
    this.now = options.now ?? Date.now;
  }

  /**
   * Return the cached value for `key`, computing it at most once while fresh.
   * @returns the value and whether it came from the cache
   */
  async getOrCompute(key: string, compute: () => Promise<T>): Promise<{ value: T; hit: boolean }> {
    const existing = this.entries.get(key);
    if (existing && existing.expiresAt > this.now()) {
      this.hits++;
      return { value: await existing.value, hit: true };
    }
    if (existing) {
      this.entries.delete(key);
    }

    this.misses++;
    const entry: CacheEntry<T> = {
      value: compute(),
      expiresAt: this.now() + this.ttlMs,
    };
    this.insertIfAbsent(key, entry);

    try {
      return { value: await entry.value, hit: false };
    } catch (error) {
      if (this.entries.get(key) === entry) {
        this.entries.delete(key);
      }
      throw error;
    }
  }

  /**
   * Drop entries whose key starts with `prefix`, or all entries
   */
  invalidate(prefix?: string): number {
    let removed = 0;
    for (const key of Array.from(this.entries.keys())) {
      if (prefix === undefined || key.startsWith(prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Remove expired entries
   */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of Array.from(this.entries)) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  metrics(): CacheMetrics {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      hitRate: total === 0 ? 0 : this.hits / total,
      size: this.entries.size,
    };
  }

  private insertIfAbsent(key: string, entry: CacheEntry<T>): void {
    if (this.entries.has(key)) return;

    if (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, entry);
  }
}
