/**
 * @daybook/server-hono - Rate limiting middleware for sync endpoints
 *
 * Fixed-window, per-key request counting held in process memory.
 */

import { logSyncEvent } from '@daybook/core';
import type { Context, MiddlewareHandler } from 'hono';
import { errorResponse } from './errors';

/**
 * Rate limit configuration
 */
export interface RateLimitConfig {
  /**
   * Maximum requests per window (default: 120)
   */
  maxRequests: number;

  /**
   * Time window in milliseconds (default: 60000 = 1 minute)
   */
  windowMs: number;

  /**
   * Extract the rate limit key from a request, typically the user id.
   * Return null to skip rate limiting for this request.
   */
  keyGenerator: (c: Context) => string | null | Promise<string | null>;

  /**
   * Whether to include rate limit headers in responses (default: true)
   */
  includeHeaders?: boolean;
}

export type SyncRateLimitConfig = Omit<RateLimitConfig, 'keyGenerator'>;

export const DEFAULT_SYNC_RATE_LIMIT: SyncRateLimitConfig = {
  maxRequests: 120, // 2 requests per second average
  windowMs: 60_000,
  includeHeaders: true,
};

interface RateLimitEntry {
  /** Request count in current window */
  count: number;
  /** Window start timestamp */
  windowStart: number;
}

/**
 * In-memory rate limiter store
 *
 * Note: This is suitable for single-instance deployments.
 */
class RateLimitStore {
  private entries = new Map<string, RateLimitEntry>();
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;

  constructor(private windowMs: number) {
    this.cleanupInterval = setInterval(
      () => this.cleanup(),
      Math.max(windowMs, 60_000)
    );
    // The sweep alone never keeps the process alive.
    this.cleanupInterval.unref();
  }

  check(
    key: string,
    maxRequests: number
  ): {
    allowed: boolean;
    current: number;
    remaining: number;
    resetAt: number;
  } {
    const now = Date.now();
    let entry = this.entries.get(key);

    if (!entry || now - entry.windowStart >= this.windowMs) {
      entry = { count: 0, windowStart: now };
      this.entries.set(key, entry);
    }

    const resetAt = entry.windowStart + this.windowMs;
    const allowed = entry.count < maxRequests;

    if (allowed) {
      entry.count++;
    }

    return {
      allowed,
      current: entry.count,
      remaining: Math.max(0, maxRequests - entry.count),
      resetAt,
    };
  }

  cleanup(): void {
    const now = Date.now();
    for (const [key, entry] of this.entries) {
      if (now - entry.windowStart >= this.windowMs) {
        this.entries.delete(key);
      }
    }
  }

  stop(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }

  get size(): number {
    return this.entries.size;
  }
}

// Track created stores so tests and shutdown can stop their timers.
const activeStores = new Set<RateLimitStore>();

/**
 * Stop every limiter's cleanup timer and forget its counters.
 */
export function resetRateLimitStore(): void {
  for (const store of activeStores) {
    store.stop();
  }
  activeStores.clear();
}

/**
 * Create a rate limiting middleware for Hono.
 *
 * @example
 * ```typescript
 * const rateLimiter = createRateLimiter({
 *   maxRequests: 120,
 *   windowMs: 60_000,
 *   keyGenerator: (c) => c.req.header('x-user-id') ?? null,
 * });
 *
 * app.use('/sync/*', rateLimiter);
 * ```
 */
export function createRateLimiter(
  config: Partial<RateLimitConfig> & Pick<RateLimitConfig, 'keyGenerator'>
): MiddlewareHandler {
  const {
    maxRequests = DEFAULT_SYNC_RATE_LIMIT.maxRequests,
    windowMs = DEFAULT_SYNC_RATE_LIMIT.windowMs,
    keyGenerator,
    includeHeaders = true,
  } = config;

  const store = new RateLimitStore(windowMs);
  activeStores.add(store);

  return async (c, next) => {
    const key = await keyGenerator(c);
    if (key === null) {
      return next();
    }

    const result = store.check(key, maxRequests);

    if (includeHeaders) {
      c.header('X-RateLimit-Limit', String(maxRequests));
      c.header('X-RateLimit-Remaining', String(result.remaining));
      c.header('X-RateLimit-Reset', String(Math.ceil(result.resetAt / 1000)));
    }

    if (!result.allowed) {
      const retryAfterMs = result.resetAt - Date.now();
      const retryAfterSec = Math.ceil(retryAfterMs / 1000);

      logSyncEvent({
        event: 'sync.rate_limit',
        level: 'warn',
        key,
        current: result.current,
        maxRequests,
        retryAfterMs,
      });

      c.header('Retry-After', String(retryAfterSec));
      return errorResponse(
        c,
        429,
        'RATE_LIMITED',
        'Too many requests. Please try again later.'
      );
    }

    return next();
  };
}
