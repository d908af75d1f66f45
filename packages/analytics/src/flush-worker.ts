/**
 * Click Flush Worker
 *
 * Drains per-code hit counters from Redis into url_map.hit_count.
 *
 * ┌─────────────┐  SCAN   ┌─────────────┐  UPDATE  ┌─────────────┐
 * │    Redis    │────────▶│   Flush     │─────────▶│  PostgreSQL │
 * │ lp:v1:hits:*│ GETDEL  │   Worker    │ += delta │   url_map   │
 * └─────────────┘         └─────────────┘          └─────────────┘
 *
 * Each SCAN page is claimed with one MULTI of GETDEL, so a value is read
 * and removed in the same step: hits arriving afterwards start a fresh
 * counter for the next cycle and nothing is read twice.
 *
 * A delta whose UPDATE fails is logged and lost (best-effort counting);
 * the cycle continues with the next code.
 */

import type { FastStore } from "@linkpulse/cache";
import type { MappingStore } from "@linkpulse/db";
import { createLogger, type Logger } from "@linkpulse/logger";
import {
  CACHE_KEYS,
  FLUSH_DEFAULTS,
  codeFromHitKey,
  parseCounter,
  systemClock,
  type Clock,
} from "@linkpulse/shared";
import type { FlushWorkerMetrics, FlushWorkerOptions, FlushWorkerState } from "./types.js";

export class FlushWorker {
  private readonly fast: FastStore;
  private readonly store: MappingStore;
  private readonly scanCount: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private state: FlushWorkerState = "idle";
  private stopped = false;
  private sleepTimer: ReturnType<typeof setTimeout> | null = null;
  private wake: (() => void) | null = null;

  // Metrics
  private cycles = 0;
  private hitsApplied = 0;
  private hitsOrphaned = 0;
  private invalidValues = 0;
  private failedUpdates = 0;
  private lastFlushAt: Date | null = null;

  constructor(fast: FastStore, store: MappingStore, options: FlushWorkerOptions = {}) {
    this.fast = fast;
    this.store = store;
    this.scanCount = options.scanCount ?? FLUSH_DEFAULTS.SCAN_COUNT;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger("flush-worker");
  }

  /**
   * Run one cycle. Returns the number of hits applied to existing mappings.
   * Returns 0 without doing anything while another cycle is in progress.
   */
  async flushOnce(): Promise<number> {
    if (this.state === "flushing") {
      this.logger.debug("Flush already in progress, skipping");
      return 0;
    }

    this.state = "flushing";
    try {
      const applied = await this.drain();
      this.cycles++;
      this.lastFlushAt = this.clock();
      return applied;
    } finally {
      this.state = "idle";
    }
  }

  /**
   * Flush, sleep, repeat until {@link stop}. Cycle errors are logged and
   * retried on the next tick. Returns at once if already stopped.
   */
  async runForever(intervalMs: number = FLUSH_DEFAULTS.INTERVAL_MS): Promise<void> {
    if (this.stopped) return;
    this.logger.info({ intervalMs, scanCount: this.scanCount }, "Flush worker started");

    while (!this.stopped) {
      try {
        const applied = await this.flushOnce();
        if (applied > 0) {
          this.logger.info({ applied }, "Flushed hits");
        }
      } catch (err) {
        this.logger.error({ err }, "Flush cycle failed");
      }

      if (this.stopped) break;
      await this.sleep(intervalMs);
    }

    this.logger.info("Flush worker stopped");
  }

  /**
   * Stop {@link runForever} after the current cycle; cancels a pending sleep.
   */
  stop(): void {
    this.stopped = true;
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    this.wake?.();
  }

  getState(): FlushWorkerState {
    return this.state;
  }

  getMetrics(): FlushWorkerMetrics {
    return {
      state: this.state,
      cycles: this.cycles,
      hitsApplied: this.hitsApplied,
      hitsOrphaned: this.hitsOrphaned,
      invalidValues: this.invalidValues,
      failedUpdates: this.failedUpdates,
      lastFlushAt: this.lastFlushAt,
    };
  }

  // ===========================================================================
  // Cycle
  // ===========================================================================

  private async drain(): Promise<number> {
    const now = this.clock();
    // SCAN may return a key more than once
    const seen = new Set<string>();
    let applied = 0;

    for await (const page of this.fast.scanByPrefix(CACHE_KEYS.HITS_PREFIX, this.scanCount)) {
      const keys = page.filter((key) => !seen.has(key));
      if (keys.length === 0) continue;
      for (const key of keys) seen.add(key);

      const values = await this.fast.fetchAndDelete(keys);

      for (const [index, key] of keys.entries()) {
        applied += await this.applyClaimed(key, values[index] ?? null, now);
      }
    }

    return applied;
  }

  /**
   * Apply one claimed counter. Returns the hits that landed on a mapping.
   */
  private async applyClaimed(key: string, value: string | null, now: Date): Promise<number> {
    const code = codeFromHitKey(key);
    // null: the key vanished between SCAN and GETDEL
    if (code === null || value === null) return 0;

    const delta = parseCounter(value);
    if (delta <= 0) {
      this.invalidValues++;
      this.logger.warn({ key, value }, "Discarding invalid hit counter");
      return 0;
    }

    try {
      const affected = await this.store.applyDelta(code, delta, now);
      if (affected === 0) {
        this.hitsOrphaned += delta;
        this.logger.debug({ code, delta }, "No mapping for hit counter, dropped");
        return 0;
      }
      this.hitsApplied += delta;
      return delta;
    } catch (err) {
      this.failedUpdates++;
      this.logger.error({ err, code, delta }, "Failed to apply hit delta");
      return 0;
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        this.sleepTimer = null;
        this.wake = null;
        resolve();
      };
      this.wake = done;
      this.sleepTimer = setTimeout(done, ms);
    });
  }
}
