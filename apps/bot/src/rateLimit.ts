export type RateDecision = { allowed: true } | { allowed: false; retryAfterMs: number };

/**
 * Sliding-window limiter: at most `burst` hits per key within any `intervalMs` span.
 * Rejected hits are not recorded, so a throttled user recovers once the oldest hit ages out.
 */
export class SlidingWindowLimiter {
  private readonly hits = new Map<number, number[]>();

  constructor(
    private readonly intervalMs: number,
    private readonly burst: number,
    private readonly clock: () => number = Date.now
  ) {}

  hit(key: number): RateDecision {
    const now = this.clock();
    const windowStart = now - this.intervalMs;
    const recent = (this.hits.get(key) ?? []).filter((t) => t > windowStart);
    const oldest = recent[0];
    if (recent.length >= this.burst && oldest !== undefined) {
      this.hits.set(key, recent);
      return { allowed: false, retryAfterMs: oldest + this.intervalMs - now };
    }
    recent.push(now);
    this.hits.set(key, recent);
    return { allowed: true };
  }

  /** Drops keys with no hit inside the window. */
  prune() {
    const windowStart = this.clock() - this.intervalMs;
    for (const [key, times] of this.hits) {
      if (!times.some((t) => t > windowStart)) this.hits.delete(key);
    }
  }
}
