/**
 * Flush Worker Entrypoint
 *
 * Standalone process draining Redis hit counters into PostgreSQL.
 * Run with: npm run start:worker
 *
 * Environment Variables:
 *   REDIS_URL              - Redis connection URL (required)
 *   DATABASE_URL           - PostgreSQL connection URL (required)
 *   DB_TIMEOUT_MS          - Query timeout (default: 2000)
 *   FLUSH_INTERVAL_SECONDS - Pause between cycles (default: 10)
 *   FLUSH_SCAN_COUNT       - SCAN page size hint (default: 500)
 *
 * SIGINT/SIGTERM stop the loop, run one final flush, then close connections.
 */

import { RedisFastStore, createRedisClient } from "@linkpulse/cache";
import { PgMappingStore, createPool } from "@linkpulse/db";
import { createLogger } from "@linkpulse/logger";
import { loadWorkerConfig } from "./config.js";
import { FlushWorker } from "./flush-worker.js";

const logger = createLogger("flush-worker");

async function main(): Promise<void> {
  const config = loadWorkerConfig();

  logger.info(
    { intervalMs: config.intervalMs, scanCount: config.scanCount },
    "Starting flush worker"
  );

  const fast = new RedisFastStore(createRedisClient({ url: config.redisUrl, logger }), logger);
  const store = new PgMappingStore(
    createPool({ connectionString: config.databaseUrl, queryTimeoutMs: config.dbTimeoutMs, logger })
  );
  const worker = new FlushWorker(fast, store, { scanCount: config.scanCount, logger });

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutdown signal received");
    worker.stop();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  await worker.runForever(config.intervalMs);

  try {
    const applied = await worker.flushOnce();
    logger.info({ applied, ...worker.getMetrics() }, "Final flush complete");
  } finally {
    await fast.disconnect();
    await store.close();
  }
}

main()
  .then(() => {
    logger.info("Clean shutdown complete");
    process.exit(0);
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, "Flush worker failed");
    process.exit(1);
  });
