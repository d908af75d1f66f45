/**
 * Expiry and cache TTL arithmetic.
 *
 * Expiry is logical: nothing is deleted, reads compare against the clock.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * `now + days`, or null (never expires) when days is zero, negative or not finite.
 */
export function computeExpiresAt(days: number, now: Date): Date | null {
  if (!Number.isFinite(days) || days <= 0) return null;
  return new Date(now.getTime() + days * MS_PER_DAY);
}

/**
 * A mapping is expired from its expiry instant onward.
 */
export function isExpired(expiresAt: Date | null, now: Date): boolean {
  return expiresAt !== null && expiresAt.getTime() <= now.getTime();
}

/**
 * Cache TTL for a mapping: seconds until expiry, clamped to at least 1
 * (SETEX rejects 0 and negative values), or the configured default for
 * mappings that never expire.
 */
export function cacheTtlSeconds(expiresAt: Date | null, defaultTtlSeconds: number, now: Date): number {
  if (expiresAt === null) return defaultTtlSeconds;
  return Math.max(1, Math.floor((expiresAt.getTime() - now.getTime()) / 1000));
}
