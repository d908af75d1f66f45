/**
 * Redis Client Factory
 *
 * Creates and configures Redis client instances using ioredis.
 */

import Redis from "ioredis";
import { createLogger, type Logger } from "@linkpulse/logger";

export interface RedisClientOptions {
  /** Redis connection URL */
  url: string;
  /** Connection timeout in ms (default: 5000) */
  connectTimeout?: number;
  /** Command timeout in ms (default: 1000) */
  commandTimeout?: number;
  /** Max retries per request (default: 1) */
  maxRetries?: number;
  logger?: Logger;
}

/**
 * Create a configured Redis client.
 *
 * Fails fast while disconnected (no offline queue): callers on hot paths
 * degrade instead of queueing behind a dead connection.
 */
export function createRedisClient(options: RedisClientOptions): Redis {
  const {
    url,
    connectTimeout = 5000,
    commandTimeout = 1000,
    maxRetries = 1,
    logger = createLogger("redis"),
  } = options;

  const client = new Redis(url, {
    connectTimeout,
    commandTimeout,
    maxRetriesPerRequest: maxRetries,
    enableReadyCheck: true,
    enableOfflineQueue: false,
    keepAlive: 10000,

    // Reconnect forever with capped backoff; the process must outlive outages
    retryStrategy: (times) => Math.min(times * 100, 2000),
  });

  client.on("connect", () => logger.info("Redis connected"));
  client.on("error", (err: Error) => logger.warn({ err: err.message }, "Redis error"));
  client.on("close", () => logger.debug("Redis connection closed"));

  return client;
}
