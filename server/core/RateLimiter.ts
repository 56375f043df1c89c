export type RateLimiterOptions = {
  limit: number; // admitted requests per window
  windowMs: number;
  /** Periodic removal of clients with no hits inside the window; 0 disables. */
  pruneIntervalMs?: number;
  now?: () => number;
};

/**
 * Per-client sliding-window admission gate.
 * Each client keeps the timestamps of its admitted requests inside the trailing
 * window, so no window of `windowMs` ever holds more than `limit` admissions.
 */
export class RateLimiter {
  private clients = new Map<string, number[]>();
  private rejected = 0;
  private pruner?: NodeJS.Timeout;

  private readonly limit: number;
  private readonly windowMs: number;
  private readonly now: () => number;

  constructor(options: RateLimiterOptions) {
    this.limit = Math.max(1, Math.floor(options.limit));
    this.windowMs = Math.max(1, options.windowMs);
    this.now = options.now ?? Date.now;
    const interval = options.pruneIntervalMs ?? 60_000;
    if (interval > 0) {
      this.pruner = setInterval(() => this.pruneIdle(), interval);
      this.pruner.unref?.();
    }
  }

  private window(clientId: string, now: number): number[] {
    let hits = this.clients.get(clientId);
    if (!hits) {
      hits = [];
      this.clients.set(clientId, hits);
    }
    while (hits.length > 0 && now - hits[0] >= this.windowMs) hits.shift();
    return hits;
  }

  allow(clientId: string): boolean {
    const now = this.now();
    const hits = this.window(clientId, now);
    if (hits.length >= this.limit) {
      this.rejected += 1;
      return false;
    }
    hits.push(now);
    return true;
  }

  /** Milliseconds until the client gets a free slot again (0 when one is free now). */
  retryAfterMs(clientId: string): number {
    const now = this.now();
    const hits = this.window(clientId, now);
    if (hits.length < this.limit) return 0;
    return Math.max(0, hits[0] + this.windowMs - now);
  }

  pruneIdle(): number {
    const now = this.now();
    let removed = 0;
    for (const [clientId, hits] of this.clients) {
      if (hits.length === 0 || now - hits[hits.length - 1] >= this.windowMs) {
        this.clients.delete(clientId);
        removed += 1;
      }
    }
    return removed;
  }

  clientCount(): number {
    return this.clients.size;
  }

  rejectedCount(): number {
    return this.rejected;
  }

  reset(clientId?: string): void {
    if (clientId === undefined) this.clients.clear();
    else this.clients.delete(clientId);
  }

  dispose(): void {
    if (this.pruner) clearInterval(this.pruner);
    this.pruner = undefined;
  }
}
