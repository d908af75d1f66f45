/**
 * In-process Fast Store
 *
 * Map-backed {@link FastStore} with Redis semantics for the commands the
 * core uses: lazy TTL expiry, INCR on a non-integer throws, GETDEL batches
 * are atomic (single-threaded). Time comes from an injectable clock so tests
 * can step across TTLs and rate-limit windows.
 *
 * Used by tests and single-process development runs.
 */

import type { FastStore } from "./types.js";
import { toTtlSeconds } from "./ttl.js";

interface Entry {
  value: string;
  /** Absolute expiry (ms since epoch), null = no TTL */
  expiresAtMs: number | null;
}

const INTEGER = /^-?\d+$/;

export class MemoryFastStore implements FastStore {
  private readonly entries = new Map<string, Entry>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, {
      value,
      expiresAtMs: this.now() + toTtlSeconds(ttlSeconds) * 1000,
    });
  }

  async incr(key: string): Promise<number> {
    const entry = this.live(key);
    if (!entry) {
      this.entries.set(key, { value: "1", expiresAtMs: null });
      return 1;
    }

    if (!INTEGER.test(entry.value)) {
      throw new Error("ERR value is not an integer or out of range");
    }

    const next = Number(entry.value) + 1;
    entry.value = String(next);
    return next;
  }

  async expireIfUnset(key: string, ttlSeconds: number): Promise<boolean> {
    const entry = this.live(key);
    if (!entry || entry.expiresAtMs !== null) return false;
    entry.expiresAtMs = this.now() + toTtlSeconds(ttlSeconds) * 1000;
    return true;
  }

  async *scanByPrefix(prefix: string, pageSize = 500): AsyncIterable<string[]> {
    const keys = [...this.entries.keys()].filter(
      (key) => key.startsWith(prefix) && this.live(key) !== undefined
    );

    for (let i = 0; i < keys.length; i += pageSize) {
      yield keys.slice(i, i + pageSize);
    }
  }

  async fetchAndDelete(keys: string[]): Promise<Array<string | null>> {
    return keys.map((key) => {
      const value = this.live(key)?.value ?? null;
      this.entries.delete(key);
      return value;
    });
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async disconnect(): Promise<void> {
    this.entries.clear();
  }

  // ===========================================================================
  // Inspection helpers (not part of FastStore)
  // ===========================================================================

  /**
   * Redis TTL semantics: -2 missing, -1 no expiry, else whole seconds left.
   */
  ttl(key: string): number {
    const entry = this.live(key);
    if (!entry) return -2;
    if (entry.expiresAtMs === null) return -1;
    return Math.ceil((entry.expiresAtMs - this.now()) / 1000);
  }

  /** Raw SET without expiry. */
  set(key: string, value: string): void {
    this.entries.set(key, { value, expiresAtMs: null });
  }

  /** Live keys, in insertion order. */
  keys(): string[] {
    return [...this.entries.keys()].filter((key) => this.live(key) !== undefined);
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
