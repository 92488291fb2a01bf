/**
 * HTTP Middleware — Read Throttling & Errors
 *
 * The read API is throttled per client with a token bucket: each client may
 * burst up to `maxRequests` lookups, refilled at `maxRequests` per `windowMs`.
 * Rejections and unhandled errors share the `{ error: { code, message } }`
 * body shape.
 */

import type { Request, Response, NextFunction } from 'express';
import type { Logger } from '../utils/index.js';

// =============================================================================
// TOKEN BUCKET
// =============================================================================

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
}

export type RateLimitDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; retryAfterMs: number };

interface Bucket {
  tokens: number;
  updatedAt: number;
}

export class TokenBucketRateLimiter {
  private buckets = new Map<string, Bucket>();
  private sweeper: ReturnType<typeof setInterval>;

  constructor(
    private readonly config: RateLimitConfig,
    private readonly now: () => number = Date.now
  ) {
    if (config.maxRequests < 1 || config.windowMs <= 0) {
      throw new Error('rate limit needs maxRequests >= 1 and a positive windowMs');
    }
    // Full buckets carry no state worth keeping.
    this.sweeper = setInterval(() => this.sweep(), config.windowMs);
    this.sweeper.unref();
  }

  /** Spend one token for `key` if one is available. */
  take(key: string): RateLimitDecision {
    const bucket = this.refill(key);
    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return { allowed: true, remaining: Math.floor(bucket.tokens) };
    }
    const missing = 1 - bucket.tokens;
    return {
      allowed: false,
      retryAfterMs: Math.ceil((missing * this.config.windowMs) / this.config.maxRequests),
    };
  }

  /** Clients currently tracked. */
  size(): number {
    return this.buckets.size;
  }

  destroy(): void {
    clearInterval(this.sweeper);
    this.buckets.clear();
  }

  private refill(key: string): Bucket {
    const now = this.now();
    const bucket = this.buckets.get(key) ?? { tokens: this.config.maxRequests, updatedAt: now };
    const earned = ((now - bucket.updatedAt) * this.config.maxRequests) / this.config.windowMs;
    bucket.tokens = Math.min(this.config.maxRequests, bucket.tokens + earned);
    bucket.updatedAt = now;
    this.buckets.set(key, bucket);
    return bucket;
  }

  private sweep(): void {
    for (const key of [...this.buckets.keys()]) {
      if (this.refill(key).tokens >= this.config.maxRequests) {
        this.buckets.delete(key);
      }
    }
  }
}

/**
 * Express middleware throttling requests by client address.
 * Allowed responses carry `RateLimit-Remaining`; rejected ones `Retry-After`.
 */
export function rateLimit(limiter: TokenBucketRateLimiter) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const client = req.ip ?? req.socket.remoteAddress ?? 'unknown';
    const decision = limiter.take(client);

    if (!decision.allowed) {
      res.setHeader('Retry-After', String(Math.ceil(decision.retryAfterMs / 1000)));
      res.status(429).json({
        error: { code: 'RATE_LIMIT_EXCEEDED', message: 'Too many lookups, slow down' },
      });
      return;
    }

    res.setHeader('RateLimit-Remaining', String(decision.remaining));
    next();
  };
}

// =============================================================================
// ERROR HANDLER
// =============================================================================

export function errorHandler(logger: Logger) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    logger.error({ error: err, path: req.path }, 'Unhandled error');
    res.status(500).json({
      error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
    });
  };
}
