/**
 * Click Accumulator
 *
 * Hot-path hit recording: one INCR per redirect, never awaited by the
 * caller. A slow or failing Redis drops the hit and logs a warning; the
 * redirect is never delayed beyond the timeout.
 */

import type { FastStore } from "@linkpulse/cache";
import { createLogger, type Logger } from "@linkpulse/logger";
import { LINK_DEFAULTS, hitKey, parseCounter, withTimeout } from "@linkpulse/shared";
import type { ClickAccumulatorOptions } from "./types.js";

export class ClickAccumulator {
  private readonly fast: FastStore;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(fast: FastStore, options: ClickAccumulatorOptions = {}) {
    this.fast = fast;
    this.timeoutMs = options.timeoutMs ?? LINK_DEFAULTS.FAST_STORE_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger("clicks");
  }

  /**
   * Count one hit for `code`. Fire-and-forget.
   */
  recordHit(code: string): void {
    withTimeout(this.fast.incr(hitKey(code)), this.timeoutMs)
      .then((count) => {
        if (count === null) {
          this.logger.warn({ code, timeoutMs: this.timeoutMs }, "Hit increment timed out, hit may be lost");
        }
      })
      .catch((err: unknown) => {
        this.logger.warn({ err, code }, "Hit increment failed, hit dropped");
      });
  }

  /**
   * Hits recorded since the last flush. 0 when absent, unreadable or unparsable.
   */
  async pendingCount(code: string): Promise<number> {
    try {
      const value = await withTimeout(this.fast.get(hitKey(code)), this.timeoutMs);
      return parseCounter(value);
    } catch (err) {
      this.logger.warn({ err, code }, "Pending hit count unavailable");
      return 0;
    }
  }
}
