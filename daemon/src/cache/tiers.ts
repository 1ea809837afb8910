export type TierName = "hot" | "warm";

export interface CacheEntry<V> {
  key: string;
  value: V;
  insertedAt: number;
  /** Epoch ms after which the entry is dead; null never expires. */
  expiresAt: number | null;
  /** Files the value was read from; re-stat'ed before every reuse. */
  files: readonly string[];
  /** mtime+size of those files when the value was computed; null when not file-backed. */
  fingerprint: string | null;
}

export interface TierCounters {
  evictions: number;
  expirations: number;
}

export interface TierStats extends TierCounters {
  entries: number;
  capacity: number;
}

/**
 * Bounded map with least-recently-used eviction. Entries may carry an expiry,
 * which is checked lazily on read and by sweep().
 */
export class CacheTier<V> {
  readonly name: TierName;
  readonly capacity: number;
  private entries = new Map<string, CacheEntry<V>>();
  private counters: TierCounters = { evictions: 0, expirations: 0 };

  constructor(name: TierName, capacity: number) {
    this.name = name;
    this.capacity = Math.max(1, capacity);
  }

  /** Live entry for key, refreshed as most recently used. */
  get(key: string, now = Date.now()): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== null && now >= entry.expiresAt) {
      this.entries.delete(key);
      this.counters.expirations++;
      return undefined;
    }
    // Map keeps insertion order; re-inserting moves the key to the young end
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry;
  }

  set(entry: CacheEntry<V>): void {
    this.entries.delete(entry.key);
    this.entries.set(entry.key, entry);
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.counters.evictions++;
    }
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Remove every key the predicate accepts. Returns how many were removed. */
  deleteWhere(predicate: (key: string) => boolean): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (predicate(key)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Drop expired entries. Returns how many were removed. */
  sweep(now = Date.now()): number {
    let removed = 0;
    for (const [key, entry] of [...this.entries]) {
      if (entry.expiresAt !== null && now >= entry.expiresAt) {
        this.entries.delete(key);
        removed++;
      }
    }
    this.counters.expirations += removed;
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): TierStats {
    return { entries: this.entries.size, capacity: this.capacity, ...this.counters };
  }
}
