/**
 * Fast-store key scheme.
 *
 * Every component derives its keys here, so changing the layout is a
 * single-point edit. Bump the version segment when a value format changes;
 * old keys then simply age out.
 *
 * Key Schema:
 *   lp:v1:link:{code}            - cached destination URL (string, TTL)
 *   lp:v1:hits:{code}            - pending click counter (integer, no TTL)
 *   lp:v1:rl:{identity}:{bucket} - rate limit window counter (integer, TTL)
 */

export const CACHE_KEYS = {
  LINK_PREFIX: "lp:v1:link:",
  HITS_PREFIX: "lp:v1:hits:",
  RATE_LIMIT_PREFIX: "lp:v1:rl:",
} as const;

export function entryKey(code: string): string {
  return CACHE_KEYS.LINK_PREFIX + code;
}

export function hitKey(code: string): string {
  return CACHE_KEYS.HITS_PREFIX + code;
}

export function windowKey(identity: string, bucket: string | number): string {
  return `${CACHE_KEYS.RATE_LIMIT_PREFIX}${identity}:${bucket}`;
}

/**
 * Inverse of {@link hitKey}. Returns null for keys outside the hits namespace.
 */
export function codeFromHitKey(key: string): string | null {
  if (!key.startsWith(CACHE_KEYS.HITS_PREFIX)) return null;
  const code = key.slice(CACHE_KEYS.HITS_PREFIX.length);
  return code.length > 0 ? code : null;
}
