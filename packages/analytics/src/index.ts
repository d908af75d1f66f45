/**
 * @linkpulse/analytics - Click Counting Package
 *
 * ┌─────────────┐  INCR   ┌─────────────┐  flush   ┌─────────────┐
 * │  Redirect   │────────▶│    Redis    │─────────▶│  PostgreSQL │
 * │  Handler    │         │ hit counters│ (worker) │  hit_count  │
 * └─────────────┘         └─────────────┘          └─────────────┘
 *
 * Usage:
 * ```ts
 * import { ClickAccumulator, FlushWorker } from "@linkpulse/analytics";
 *
 * const clicks = new ClickAccumulator(fastStore);
 * clicks.recordHit("aB3xY9k"); // never blocks the redirect
 *
 * const worker = new FlushWorker(fastStore, mappingStore);
 * await worker.runForever(10_000);
 * ```
 */

export type {
  ClickAccumulatorOptions,
  FlushWorkerOptions,
  FlushWorkerState,
  FlushWorkerMetrics,
  WorkerProcessConfig,
} from "./types.js";

export { ClickAccumulator } from "./clicks.js";
export { FlushWorker } from "./flush-worker.js";
export { loadWorkerConfig } from "./config.js";
