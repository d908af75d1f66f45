/**
 * Fast Store Type Definitions
 */

/**
 * Minimal key-value contract the core needs from the fast store.
 *
 * Only individual commands are atomic: INCR returns the post-increment value
 * and fetchAndDelete claims a batch of keys in one indivisible step. Nothing
 * else is transactional, and any key may vanish at any time.
 */
export interface FastStore {
  /** GET. null when absent or expired. */
  get(key: string): Promise<string | null>;

  /** SET with expiry. ttlSeconds is clamped to at least 1. */
  setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void>;

  /** Atomic INCR; creates the key at 1 when absent. */
  incr(key: string): Promise<number>;

  /** Attach a TTL only when the key has none. Returns true if applied. */
  expireIfUnset(key: string, ttlSeconds: number): Promise<boolean>;

  /**
   * Incremental enumeration of keys starting with `prefix`.
   * Pages may repeat keys; callers dedupe.
   */
  scanByPrefix(prefix: string, pageSize?: number): AsyncIterable<string[]>;

  /**
   * Atomically read and delete each key. Values align with `keys`;
   * absent keys yield null.
   */
  fetchAndDelete(keys: string[]): Promise<Array<string | null>>;

  ping(): Promise<boolean>;
  disconnect(): Promise<void>;
}
