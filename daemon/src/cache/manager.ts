import type { FastifyBaseLogger } from "fastify";
import { CacheComputeError, ViewerError } from "../errors.js";
import { fingerprint } from "./fingerprint.js";
import { SingleFlight } from "./single-flight.js";
import { CacheTier, type TierName, type TierStats } from "./tiers.js";

export interface CacheManagerOptions {
  hotCapacity: number;
  warmCapacity: number;
  warmTtlMs: number;
  /** Period of the expired-entry sweep; 0 disables it. */
  sweepIntervalMs: number;
}

export interface ComputeOptions<V> {
  tier?: TierName;
  /** Overrides the tier default: none for hot, warmTtlMs for warm. */
  ttlMs?: number;
  /**
   * Backing files re-stat'ed before every reuse of the entry. A function
   * derives them from the computed value, for listings whose files are only
   * known after the scan.
   */
  files?: readonly string[] | ((value: V) => readonly string[]);
  /** Whether to store the computed value; a value returned with keep false still reaches every waiter. */
  keep?: (value: V) => boolean;
}

export interface CacheStats {
  hits: number;
  misses: number;
  entries: number;
  inFlight: number;
  tiers: Record<TierName, TierStats & { hits: number; misses: number }>;
}

/**
 * Two-tier cache shared by every reader of normalized logs.
 *
 * Lifecycle: constructed once at startup, startSweep() when the optional
 * expiry sweep is wanted, dispose() at shutdown.
 */
export class CacheManager<V> {
  private log: FastifyBaseLogger;
  private options: CacheManagerOptions;
  private tiers: Record<TierName, CacheTier<V>>;
  private counters: Record<TierName, { hits: number; misses: number }> = {
    hot: { hits: 0, misses: 0 },
    warm: { hits: 0, misses: 0 },
  };
  private flights = new SingleFlight<V>();
  // In-flight keys invalidated before their compute finished; their result is not stored
  private dirty = new Set<string>();
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: CacheManagerOptions, log: FastifyBaseLogger) {
    this.log = log.child({ module: "cache" });
    this.options = options;
    this.tiers = {
      hot: new CacheTier<V>("hot", options.hotCapacity),
      warm: new CacheTier<V>("warm", options.warmCapacity),
    };
  }

  /**
   * Cached value for key, or the result of compute() stored under it.
   * Concurrent calls for one key share a single lookup and computation.
   * A failed compute reaches every waiter and leaves nothing cached.
   */
  getOrCompute(
    key: string,
    compute: () => Promise<V>,
    options: ComputeOptions<V> = {},
  ): Promise<V> {
    const tierName = options.tier ?? "hot";

    return this.flights.run(key, async () => {
      const tier = this.tiers[tierName];
      const counters = this.counters[tierName];

      const entry = tier.get(key);
      if (entry) {
        const fresh =
          entry.fingerprint === null || (await fingerprint(entry.files)) === entry.fingerprint;
        if (fresh) {
          counters.hits++;
          return entry.value;
        }
        tier.delete(key);
        this.log.debug({ key }, "Backing files changed, recomputing");
      }
      counters.misses++;

      // Known files are stat'ed before reading so a write during compute is caught next time
      const known = typeof options.files === "function" ? null : options.files ?? [];
      const before = known && known.length > 0 ? await fingerprint(known) : null;

      let value: V;
      try {
        value = await compute();
      } catch (err) {
        this.dirty.delete(key);
        if (err instanceof ViewerError) throw err;
        this.log.warn({ err, key }, "Cache compute failed");
        throw new CacheComputeError(key, err);
      }

      const files = known ?? (typeof options.files === "function" ? options.files(value) : []);
      const print = before ?? (known === null && files.length > 0 ? await fingerprint(files) : null);

      if (this.dirty.delete(key)) {
        this.log.debug({ key }, "Invalidated while computing, not stored");
        return value;
      }
      if (options.keep && !options.keep(value)) {
        this.log.debug({ key }, "Incomplete value, not stored");
        return value;
      }

      const now = Date.now();
      const ttlMs = options.ttlMs ?? (tierName === "warm" ? this.options.warmTtlMs : null);
      tier.set({
        key,
        value,
        insertedAt: now,
        expiresAt: ttlMs !== null ? now + ttlMs : null,
        files,
        fingerprint: print,
      });
      return value;
    });
  }

  /**
   * Drop key and every key below it: "messages:claude:p" removes
   * "messages:claude:p" and "messages:claude:p:*" but not "messages:claude:p2".
   */
  invalidate(keyOrPrefix: string): number {
    const matches = matcher(keyOrPrefix);
    let removed = 0;
    for (const tier of Object.values(this.tiers)) {
      removed += tier.deleteWhere(matches);
    }
    for (const key of this.flights.keys()) {
      if (matches(key)) this.dirty.add(key);
    }
    if (removed > 0) {
      this.log.debug({ keyOrPrefix, removed }, "Invalidated cache entries");
    }
    return removed;
  }

  clear(tier: TierName | "all" = "all"): void {
    const names: TierName[] = tier === "all" ? ["hot", "warm"] : [tier];
    for (const name of names) {
      this.tiers[name].clear();
    }
    for (const key of this.flights.keys()) this.dirty.add(key);
    this.log.info({ tier }, "Cache cleared");
  }

  /** Remove expired entries from both tiers. */
  sweep(now = Date.now()): number {
    return this.tiers.hot.sweep(now) + this.tiers.warm.sweep(now);
  }

  startSweep(): void {
    if (this.sweepTimer || this.options.sweepIntervalMs <= 0) return;
    this.sweepTimer = setInterval(() => {
      const removed = this.sweep();
      if (removed > 0) this.log.debug({ removed }, "Swept expired cache entries");
    }, this.options.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  dispose(): void {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.sweepTimer = null;
    this.tiers.hot.clear();
    this.tiers.warm.clear();
  }

  has(key: string, tier: TierName = "hot"): boolean {
    return this.tiers[tier].has(key);
  }

  stats(): CacheStats {
    const hot = { ...this.tiers.hot.stats(), ...this.counters.hot };
    const warm = { ...this.tiers.warm.stats(), ...this.counters.warm };
    return {
      hits: hot.hits + warm.hits,
      misses: hot.misses + warm.misses,
      entries: hot.entries + warm.entries,
      inFlight: this.flights.size,
      tiers: { hot, warm },
    };
  }
}

function matcher(keyOrPrefix: string): (key: string) => boolean {
  const below = keyOrPrefix.endsWith(":") ? keyOrPrefix : `${keyOrPrefix}:`;
  return (key) => key === keyOrPrefix || key.startsWith(below);
}
