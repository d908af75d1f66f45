/**
 * HTTP Server Entrypoint
 *
 * Wires Redis, PostgreSQL, the link services and the Hono app, then
 * listens. Run with: npm start
 *
 * Graceful Shutdown:
 * 1. Stop accepting connections
 * 2. Let in-flight requests finish
 * 3. Close Redis and PostgreSQL
 */

import { serve } from "@hono/node-server";
import { ClickAccumulator } from "@linkpulse/analytics";
import { RedisFastStore, createRedisClient } from "@linkpulse/cache";
import { PgMappingStore, createPool } from "@linkpulse/db";
import { FixedWindowRateLimiter, LinkService } from "@linkpulse/links";
import { createLogger } from "@linkpulse/logger";
import { RATE_LIMIT_DEFAULTS } from "@linkpulse/shared";
import { createApp } from "./app.js";
import { loadConfig, validateConfig } from "./config.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger("server", { level: config.logLevel });
  validateConfig(config, logger);

  const fast = new RedisFastStore(createRedisClient({ url: config.redisUrl, logger }), logger);
  const store = new PgMappingStore(
    createPool({ connectionString: config.databaseUrl, queryTimeoutMs: config.dbTimeoutMs, logger })
  );

  const clicks = new ClickAccumulator(fast, { timeoutMs: config.redisTimeoutMs, logger });
  const links = new LinkService({
    fast,
    store,
    pending: clicks,
    logger,
    config: {
      codeLength: config.codeLength,
      defaultExpiryDays: config.defaultExpiryDays,
      cacheTtlSeconds: config.cacheTtlSeconds,
      fastStoreTimeoutMs: config.redisTimeoutMs,
    },
  });
  const rateLimiter = new FixedWindowRateLimiter(fast, {
    limit: config.rateLimitPerMinute,
    windowSeconds: RATE_LIMIT_DEFAULTS.WINDOW_SECONDS,
    timeoutMs: config.redisTimeoutMs,
    failureMode: config.rateLimitFailOpen ? "open" : "closed",
    logger,
  });

  const app = createApp({
    links,
    rateLimiter,
    clicks,
    fast,
    store,
    baseUrl: config.baseUrl,
    trustProxy: config.trustProxy,
    logger,
  });

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    logger.info({ port: info.port, host: config.host, baseUrl: config.baseUrl }, "Server listening");
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutdown signal received");

    server.close(() => {
      Promise.all([fast.disconnect(), store.close()])
        .then(() => {
          logger.info("Clean shutdown complete");
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, "Error during shutdown");
          process.exit(1);
        });
    });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  createLogger("server").fatal({ err }, "Server failed to start");
  process.exit(1);
});
