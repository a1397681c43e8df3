/**
 * In-memory key-value cache with per-entry expiry
 */

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export interface TtlCacheOptions {
  ttlMs: number;
  now?: () => number;
}

export class TtlCache<T> {
  private readonly store = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  get(key: string): T | null {
    const entry = this.store.get(key);
    if (!entry) return null;
    if (this.now() >= entry.expiresAt) {
      this.store.delete(key);
      return null;
    }
    return entry.value;
  }

  set(key: string, value: T): void {
    if (this.ttlMs <= 0) return;
    this.store.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  /**
   * Return the live entry for `key`, or compute and store it.
   * Null results, and results rejected by `isCacheable`, are returned but not stored.
   */
  async getOrCompute(
    key: string,
    compute: () => Promise<T | null>,
    isCacheable: (value: T) => boolean = () => true
  ): Promise<T | null> {
    const cached = this.get(key);
    if (cached !== null) {
      return cached;
    }

    const value = await compute();
    if (value !== null && isCacheable(value)) {
      this.set(key, value);
    }
    return value;
  }

  clear(prefix?: string): number {
    if (!prefix) {
      const cleared = this.store.size;
      this.store.clear();
      return cleared;
    }

    let cleared = 0;
    for (const key of [...this.store.keys()]) {
      if (key.startsWith(prefix) && this.store.delete(key)) cleared += 1;
    }
    return cleared;
  }

  get size(): number {
    return this.store.size;
  }
}
