import type { RequestHandler } from 'express';

import { incrementCounter } from '@utils/metrics.js';

export interface TokenBucketOptions {
  /** Refill rate; zero or less disables limiting. */
  ratePerSecond: number;
  burst: number;
}

interface Bucket {
  tokens: number;
  updatedAt: number;
}

/**
 * Per-key token buckets kept in process memory. A bucket that has refilled
 * to capacity is the same as no bucket, so such buckets are swept once per
 * full-refill period.
 */
export class TokenBucketLimiter {
  private readonly buckets = new Map<string, Bucket>();
  private lastSweep: number;

  constructor(
    private readonly options: TokenBucketOptions,
    private readonly now: () => number = Date.now,
  ) {
    this.lastSweep = now();
  }

  get enabled(): boolean {
    return this.options.ratePerSecond > 0;
  }

  get size(): number {
    return this.buckets.size;
  }

  take(key: string): boolean {
    if (!this.enabled) return true;
    const capacity = Math.max(1, this.options.burst);
    const at = this.now();
    this.sweep(at, capacity);
    const bucket = this.buckets.get(key) ?? { tokens: capacity, updatedAt: at };
    const refilled = Math.min(capacity, bucket.tokens + ((at - bucket.updatedAt) / 1000) * this.options.ratePerSecond);
    if (refilled < 1) {
      this.buckets.set(key, { tokens: refilled, updatedAt: at });
      return false;
    }
    this.buckets.set(key, { tokens: refilled - 1, updatedAt: at });
    return true;
  }

  private sweep(at: number, capacity: number): void {
    const rate = this.options.ratePerSecond;
    if (at - this.lastSweep < (capacity / rate) * 1000) return;
    this.lastSweep = at;
    for (const [key, bucket] of this.buckets) {
      if (bucket.tokens + ((at - bucket.updatedAt) / 1000) * rate >= capacity) this.buckets.delete(key);
    }
  }
}

/** Keys on the authenticated client, falling back to the caller address. */
export function rateLimitMiddleware(limiter: TokenBucketLimiter): RequestHandler {
  return (req, res, next) => {
    const key = req.apiClient?.key ?? req.ip ?? 'anon';
    if (!limiter.take(key)) {
      incrementCounter('api_rate_limited');
      res.status(429).json({ message: 'Too many requests' });
      return;
    }
    next();
  };
}
