/**
 * @linkpulse/analytics - Type Definitions
 *
 * Click counting is two-phase:
 * 1. Redirects INCR a per-code counter in Redis (lp:v1:hits:{code})
 * 2. The flush worker periodically claims every counter with GETDEL and
 *    adds it to url_map.hit_count
 *
 * A hit is durable only after a flush. Counters lost with Redis are lost
 * hits; nothing is ever counted twice.
 */

import type { Logger } from "@linkpulse/logger";
import type { Clock } from "@linkpulse/shared";

// =============================================================================
// Click Accumulator
// =============================================================================

export interface ClickAccumulatorOptions {
  /** Bound on each Redis round-trip (default: 50ms) */
  timeoutMs?: number;
  logger?: Logger;
}

// =============================================================================
// Flush Worker
// =============================================================================

export type FlushWorkerState = "idle" | "flushing";

export interface FlushWorkerOptions {
  /** SCAN COUNT hint per page (default: 500) */
  scanCount?: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Cumulative counters since the worker was created.
 */
export interface FlushWorkerMetrics {
  state: FlushWorkerState;
  /** Completed flush cycles */
  cycles: number;
  /** Hits added to existing mappings */
  hitsApplied: number;
  /** Hits whose code has no mapping */
  hitsOrphaned: number;
  /** Counter values that were not positive integers */
  invalidValues: number;
  /** applyDelta calls that threw */
  failedUpdates: number;
  lastFlushAt: Date | null;
}

// =============================================================================
// Worker Process Config
// =============================================================================

export interface WorkerProcessConfig {
  redisUrl: string;
  databaseUrl: string;
  /** pg statement/query timeout */
  dbTimeoutMs: number;
  intervalMs: number;
  scanCount: number;
}
