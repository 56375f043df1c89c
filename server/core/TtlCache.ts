type Entry<V> = {
  value: V;
  expiresAt: number;
};

export type TtlCacheOptions = {
  ttlMs: number;
  /** Periodic eviction of expired entries; 0 disables the timer. */
  sweepIntervalMs?: number;
  now?: () => number;
};

export type TtlCacheStats = {
  size: number;
  inflight: number;
  hits: number;
  misses: number;
  computations: number;
};

/**
 * TTL Cache - expiring key/value store with singleflight lookups
 *
 * - A live entry is returned without running the computation
 * - Concurrent misses for one key share a single computation (value or error)
 * - Failures are never stored, the next caller retries
 * - Expired entries are dropped on lookup and by the sweep timer
 * - ttl <= 0 keeps singleflight but never stores
 */
export class TtlCache<V> {
  private entries = new Map<string, Entry<V>>();
  private inflight = new Map<string, Promise<V>>();
  private generation = 0;
  private hits = 0;
  private misses = 0;
  private computations = 0;
  private sweeper?: NodeJS.Timeout;

  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
    const interval = options.sweepIntervalMs ?? 60_000;
    if (interval > 0) {
      this.sweeper = setInterval(() => this.sweep(), interval);
      this.sweeper.unref?.();
    }
  }

  private lookup(key: string): Entry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  get(key: string): V | undefined {
    return this.lookup(key)?.value;
  }

  has(key: string): boolean {
    return this.lookup(key) !== undefined;
  }

  set(key: string, value: V, ttlMs = this.ttlMs): void {
    if (!(ttlMs > 0)) return;
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  getOrCompute(key: string, compute: () => Promise<V>, ttlMs = this.ttlMs): Promise<V> {
    const live = this.lookup(key);
    if (live) {
      this.hits += 1;
      return Promise.resolve(live.value);
    }

    this.misses += 1;
    const pending = this.inflight.get(key);
    if (pending) return pending;

    this.computations += 1;
    const generation = this.generation;
    const flight: Promise<V> = Promise.resolve()
      .then(compute)
      .then((value) => {
        // A clear() while computing means the caller's view is stale; hand it out but don't store it.
        if (generation === this.generation) this.set(key, value, ttlMs);
        return value;
      })
      .finally(() => {
        if (this.inflight.get(key) === flight) this.inflight.delete(key);
      });
    this.inflight.set(key, flight);
    return flight;
  }

  /** Drop expired entries, returns how many were removed. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.inflight.clear();
    this.generation += 1;
  }

  size(): number {
    this.sweep();
    return this.entries.size;
  }

  stats(): TtlCacheStats {
    return {
      size: this.size(),
      inflight: this.inflight.size,
      hits: this.hits,
      misses: this.misses,
      computations: this.computations,
    };
  }

  dispose(): void {
    if (this.sweeper) clearInterval(this.sweeper);
    this.sweeper = undefined;
  }
}
