/**
 * Normalise a TTL for SETEX/EXPIRE.
 *
 * Redis rejects 0 and negative expiry times, so anything below one second
 * (or non-finite) becomes 1.
 */
export function toTtlSeconds(ttlSeconds: number): number {
  if (!Number.isFinite(ttlSeconds)) return 1;
  return Math.max(1, Math.floor(ttlSeconds));
}
