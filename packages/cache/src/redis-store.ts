/**
 * Redis Fast Store
 *
 * ioredis-backed implementation of {@link FastStore}.
 *
 * Design Decisions:
 * - Plain string values: cached destinations and counters need no JSON
 * - SCAN, never KEYS: enumeration stays incremental at high key counts
 * - GETDEL inside MULTI: fetch and delete are one atomic step per batch,
 *   so a concurrent INCR lands either before the claim (and is flushed)
 *   or after it (and starts a fresh counter). Requires Redis >= 6.2.
 * - EXPIRE ... NX for "TTL if unset". Requires Redis >= 7.0.
 *
 * Errors propagate; callers decide whether a failure is absorbed.
 */

import type Redis from "ioredis";
import { createLogger, type Logger } from "@linkpulse/logger";
import type { FastStore } from "./types.js";
import { toTtlSeconds } from "./ttl.js";

const DEFAULT_SCAN_COUNT = 500;

export class RedisFastStore implements FastStore {
  private readonly client: Redis;
  private readonly logger: Logger;

  constructor(client: Redis, logger: Logger = createLogger("cache")) {
    this.client = client;
    this.logger = logger;
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.setex(key, toTtlSeconds(ttlSeconds), value);
  }

  async incr(key: string): Promise<number> {
    return this.client.incr(key);
  }

  async expireIfUnset(key: string, ttlSeconds: number): Promise<boolean> {
    const applied = await this.client.expire(key, toTtlSeconds(ttlSeconds), "NX");
    return applied === 1;
  }

  async *scanByPrefix(prefix: string, pageSize = DEFAULT_SCAN_COUNT): AsyncIterable<string[]> {
    const pattern = `${escapeGlob(prefix)}*`;
    let cursor = "0";

    do {
      const [next, keys] = await this.client.scan(cursor, "MATCH", pattern, "COUNT", pageSize);
      cursor = next;
      if (keys.length > 0) {
        yield keys;
      }
    } while (cursor !== "0");
  }

  async fetchAndDelete(keys: string[]): Promise<Array<string | null>> {
    if (keys.length === 0) return [];

    const tx = this.client.multi();
    for (const key of keys) {
      tx.getdel(key);
    }

    const results = await tx.exec();
    if (!results) {
      throw new Error("fetchAndDelete transaction was aborted");
    }

    return results.map(([err, value], i) => {
      if (err) {
        // e.g. WRONGTYPE; the key is left untouched
        this.logger.warn({ err: err.message, key: keys[i] }, "GETDEL failed inside batch");
        return null;
      }
      return typeof value === "string" ? value : null;
    });
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === "PONG";
    } catch {
      return false;
    }
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
  }
}

/**
 * Escape Redis glob metacharacters so the prefix matches literally.
 */
function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\^]/g, "\\$&");
}
