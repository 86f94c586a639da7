/**
 * Bounded in-memory response cache with a time-to-live.
 *
 * Expiry is checked lazily on read; there is no sweeper timer. When a new key
 * would push the store past `maxEntries`, the single entry with the oldest
 * `storedAt` is evicted first. Overwriting an existing key never evicts.
 */

export interface CacheEntry<T> {
  key: string;
  value: T;
  storedAt: number;
}

export interface TtlCacheOptions {
  ttlMs?: number;
  maxEntries?: number;
}

const DEFAULT_TTL_MS = 5 * 60 * 1000; // 5 minutes
const DEFAULT_MAX_ENTRIES = 500;

export class TtlCache<T = string> {
  private readonly store = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;

  constructor(options: TtlCacheOptions = {}) {
    const { ttlMs = DEFAULT_TTL_MS, maxEntries = DEFAULT_MAX_ENTRIES } = options;

    if (!Number.isFinite(ttlMs) || ttlMs < 0) {
      throw new Error('Cache TTL must be a non-negative number of milliseconds');
    }
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new Error('Cache max entries must be a positive integer');
    }

    this.ttlMs = ttlMs;
    this.maxEntries = maxEntries;
  }

  get(key: string): T | undefined {
    const entry = this.store.get(key);
    if (!entry) {
      return undefined;
    }

    if (Date.now() - entry.storedAt >= this.ttlMs) {
      this.store.delete(key);
      return undefined;
    }

    return entry.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  set(key: string, value: T): void {
    if (!this.store.has(key) && this.store.size >= this.maxEntries) {
      this.evictOldest();
    }

    this.store.set(key, { key, value, storedAt: Date.now() });
  }

  clear(): void {
    this.store.clear();
  }

  /** Number of stored entries, expired-but-unread ones included. */
  get size(): number {
    return this.store.size;
  }

  private evictOldest(): void {
    let oldest: CacheEntry<T> | undefined;
    for (const entry of this.store.values()) {
      if (!oldest || entry.storedAt < oldest.storedAt) {
        oldest = entry;
      }
    }
    if (oldest) {
      this.store.delete(oldest.key);
    }
  }
}
