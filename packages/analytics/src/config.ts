/**
 * Flush worker process configuration, from environment variables.
 */

import { FLUSH_DEFAULTS, optionalInt, required } from "@linkpulse/shared";
import type { WorkerProcessConfig } from "./types.js";

export function loadWorkerConfig(env: NodeJS.ProcessEnv = process.env): WorkerProcessConfig {
  return {
    redisUrl: required("REDIS_URL", env),
    databaseUrl: required("DATABASE_URL", env),
    dbTimeoutMs: optionalInt("DB_TIMEOUT_MS", 2000, env),
    intervalMs: optionalInt("FLUSH_INTERVAL_SECONDS", FLUSH_DEFAULTS.INTERVAL_MS / 1000, env) * 1000,
    scanCount: optionalInt("FLUSH_SCAN_COUNT", FLUSH_DEFAULTS.SCAN_COUNT, env),
  };
}
