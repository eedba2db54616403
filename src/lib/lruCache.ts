/**
 * Guildhall — src/lib/lruCache.ts
 * WHAT: Generic LRU cache with TTL.
 * WHY: Onboarding sessions and per-guild invite snapshots would otherwise grow with
 *      every member who walks away mid-flow or every guild the bot ever joined.
 * DOCS:
 *  - Map iteration order: https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Map
 *
 * IMPLEMENTATION NOTES:
 *  - Map keeps insertion order; delete + re-insert moves an entry to "most recent"
 *  - The first key is the eviction victim
 *  - Expiry is lazy (checked on get/has)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

type Entry<V> = { value: V; storedAt: number };

/**
 * @example
 * const sessions = new LRUCache<string, OnboardingSession>(5_000, 30 * 60 * 1000);
 * sessions.set(`${guildId}:${userId}`, session);
 */
export class LRUCache<K, V> {
  private readonly entries = new Map<K, Entry<V>>();

  /**
   * @param now - clock source; tests pass a fake
   * @throws Error if maxSize or ttlMs are not positive
   */
  constructor(
    private readonly maxSize: number,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {
    if (maxSize <= 0) {
      throw new Error("LRUCache maxSize must be a positive number");
    }
    if (ttlMs <= 0) {
      throw new Error("LRUCache ttlMs must be a positive number");
    }
  }

  private isExpired(entry: Entry<V>): boolean {
    return this.now() - entry.storedAt > this.ttlMs;
  }

  /**
   * Returns undefined when missing or expired. A hit becomes most recently used,
   * but does not refresh the TTL; only set() does.
   */
  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: K, value: V): void {
    this.entries.delete(key);

    if (this.entries.size >= this.maxSize) {
      const oldestKey = this.entries.keys().next();
      if (!oldestKey.done) {
        this.entries.delete(oldestKey.value);
      }
    }

    this.entries.set(key, { value, storedAt: this.now() });
  }

  /** Does NOT update LRU order. */
  has(key: K): boolean {
    const entry = this.entries.get(key);
    if (!entry) return false;
    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return false;
    }
    return true;
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** May include expired entries that haven't been lazily cleaned. */
  get size(): number {
    return this.entries.size;
  }
}
