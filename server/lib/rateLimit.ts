export type RateLimitDecision = {
  blocked: boolean;
  limit: number;
  remaining: number;
  resetAt: number;
};

export type FixedWindowOptions = {
  maxRequests: number;
  windowMs: number;
  now?: () => number;
};

type Window = {
  count: number;
  resetAt: number;
};

/**
 * Counts hits per key in fixed windows. Expired windows are swept at most
 * once per window length, so the map holds only keys seen in the last
 * window or two.
 */
export class FixedWindowLimiter {
  private readonly windows = new Map<string, Window>();
  private readonly now: () => number;
  private nextSweepAt: number;

  constructor(private readonly options: FixedWindowOptions) {
    this.now = options.now ?? Date.now;
    this.nextSweepAt = this.now() + options.windowMs;
  }

  get size(): number {
    return this.windows.size;
  }

  hit(key: string): RateLimitDecision {
    const now = this.now();
    if (now >= this.nextSweepAt) this.sweep(now);

    let entry = this.windows.get(key);
    if (!entry || entry.resetAt <= now) {
      entry = { count: 0, resetAt: now + this.options.windowMs };
      this.windows.set(key, entry);
    }
    entry.count += 1;

    return {
      blocked: entry.count > this.options.maxRequests,
      limit: this.options.maxRequests,
      remaining: Math.max(0, this.options.maxRequests - entry.count),
      resetAt: entry.resetAt,
    };
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.windows) {
      if (entry.resetAt <= now) this.windows.delete(key);
    }
    this.nextSweepAt = now + this.options.windowMs;
  }
}
