interface Bucket {
  tokens: number;
  ceiling: number;
  lastRefill: number;
}

export interface RateLimiterOptions {
  windowSeconds: number;
  /** Milliseconds since epoch; injectable for tests */
  clock?: () => number;
}

/**
 * Token bucket rate limiter with continuous refill.
 *
 * Each key owns a bucket holding up to `ceiling` tokens which refills at
 * `ceiling / windowSeconds` tokens per second. Buckets are created full on
 * first use. All methods are synchronous, so a call runs to completion on
 * the event loop without interleaving with other requests.
 */
export class RateLimiter {
  private readonly buckets = new Map<string, Bucket>();
  private readonly windowSeconds: number;
  private readonly clock: () => number;

  constructor(options: RateLimiterOptions) {
    if (!(options.windowSeconds > 0)) {
      throw new Error('Rate limit window must be positive');
    }
    this.windowSeconds = options.windowSeconds;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Refills the bucket for `key` and consumes one token when available.
   */
  allow(key: string, ceiling: number): boolean {
    const bucket = this.refill(key, ceiling);
    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return true;
    }
    return false;
  }

  /** Whole tokens left; 0 for a key never seen. */
  remaining(key: string): number {
    const bucket = this.buckets.get(key);
    return bucket ? Math.floor(bucket.tokens) : 0;
  }

  /** Seconds until the next whole token is available (at least 1). */
  retryAfterSeconds(key: string): number {
    const bucket = this.buckets.get(key);
    if (!bucket || bucket.tokens >= 1) {
      return 1;
    }
    const seconds = ((1 - bucket.tokens) * this.windowSeconds) / bucket.ceiling;
    return Math.max(1, Math.ceil(seconds));
  }

  /**
   * Drops buckets whose last refill is older than `retentionMs`.
   * Returns the number of buckets removed.
   */
  sweep(retentionMs: number): number {
    const cutoff = this.clock() - retentionMs;
    let removed = 0;
    for (const [key, bucket] of this.buckets) {
      if (bucket.lastRefill < cutoff) {
        this.buckets.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.buckets.size;
  }

  private refill(key: string, ceiling: number): Bucket {
    const now = this.clock();
    const existing = this.buckets.get(key);
    if (!existing) {
      const bucket: Bucket = { tokens: ceiling, ceiling, lastRefill: now };
      this.buckets.set(key, bucket);
      return bucket;
    }

    // A changed ceiling (token limit edited) applies from this call on
    existing.ceiling = ceiling;
    const elapsedSeconds = Math.max(0, now - existing.lastRefill) / 1000;
    existing.tokens = Math.min(
      ceiling,
      existing.tokens + elapsedSeconds * (ceiling / this.windowSeconds),
    );
    existing.lastRefill = now;
    return existing;
  }
}
