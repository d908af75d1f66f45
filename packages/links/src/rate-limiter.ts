/**
 * Fixed-Window Rate Limiter
 *
 * One counter per (identity, bucket) where bucket = floor(now / window).
 * INCR is the only coordination point, so concurrent callers on the same
 * bucket are linearized by the fast store.
 *
 * Fixed windows admit up to 2x the limit across a bucket boundary
 * (end of one window + start of the next). That is accepted behavior.
 *
 * Fast-store failure or timeout follows `failureMode`:
 * - "open" (default): admit, so the write path stays available
 * - "closed": deny
 * Either way a warning is logged.
 */

import type { FastStore } from "@linkpulse/cache";
import { createLogger, type Logger } from "@linkpulse/logger";
import {
  LINK_DEFAULTS,
  RATE_LIMIT_DEFAULTS,
  systemClock,
  windowKey,
  withTimeout,
  type Clock,
} from "@linkpulse/shared";

// =============================================================================
// Types
// =============================================================================

export type RateLimitFailureMode = "open" | "closed";

export interface RateLimitResult {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Seconds until the current window rolls over */
  resetInSeconds: number;
}

export interface RateLimiterOptions {
  /** Requests admitted per window (default: 60) */
  limit?: number;
  /** Window length in seconds (default: 60) */
  windowSeconds?: number;
  /** Bound on the fast-store round-trip (default: 50ms) */
  timeoutMs?: number;
  failureMode?: RateLimitFailureMode;
  clock?: Clock;
  logger?: Logger;
}

// =============================================================================
// Rate Limiter
// =============================================================================

export class FixedWindowRateLimiter {
  private readonly fast: FastStore;
  private readonly limit: number;
  private readonly windowSeconds: number;
  private readonly timeoutMs: number;
  private readonly failureMode: RateLimitFailureMode;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(fast: FastStore, options: RateLimiterOptions = {}) {
    this.fast = fast;
    this.limit = options.limit ?? RATE_LIMIT_DEFAULTS.LIMIT;
    this.windowSeconds = options.windowSeconds ?? RATE_LIMIT_DEFAULTS.WINDOW_SECONDS;
    this.timeoutMs = options.timeoutMs ?? LINK_DEFAULTS.FAST_STORE_TIMEOUT_MS;
    this.failureMode = options.failureMode ?? "open";
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger("rate-limiter");
  }

  /**
   * Count one request for `identity` and decide whether to admit it.
   */
  async admit(identity: string): Promise<RateLimitResult> {
    const nowMs = this.clock().getTime();
    const windowMs = this.windowSeconds * 1000;
    const bucket = Math.floor(nowMs / windowMs);
    const resetInSeconds = Math.max(1, Math.ceil(((bucket + 1) * windowMs - nowMs) / 1000));
    const key = windowKey(identity, bucket);

    let count: number | null;
    try {
      count = await withTimeout(this.countRequest(key), this.timeoutMs);
    } catch (err) {
      this.logger.warn({ err, identity, failureMode: this.failureMode }, "Rate limiter store error");
      return this.degraded(resetInSeconds);
    }

    if (count === null) {
      this.logger.warn(
        { identity, timeoutMs: this.timeoutMs, failureMode: this.failureMode },
        "Rate limiter store timed out"
      );
      return this.degraded(resetInSeconds);
    }

    return {
      allowed: count <= this.limit,
      limit: this.limit,
      remaining: Math.max(0, this.limit - count),
      resetInSeconds,
    };
  }

  private async countRequest(key: string): Promise<number> {
    const count = await this.fast.incr(key);
    // Every request re-asserts the TTL; a no-op once set, so a lost first
    // EXPIRE cannot leave the window without one
    await this.fast.expireIfUnset(key, this.windowSeconds);
    return count;
  }

  private degraded(resetInSeconds: number): RateLimitResult {
    const allowed = this.failureMode === "open";
    return {
      allowed,
      limit: this.limit,
      remaining: allowed ? this.limit : 0,
      resetInSeconds,
    };
  }
}
