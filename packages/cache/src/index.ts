/**
 * Cache Package Exports
 *
 * Fast key-value store used for cached destinations, pending click
 * counters and rate-limit windows. Redis in production, a Map in tests.
 */

export { RedisFastStore } from "./redis-store.js";
export { MemoryFastStore } from "./memory-store.js";
export { createRedisClient, type RedisClientOptions } from "./client.js";
export { toTtlSeconds } from "./ttl.js";
export type { FastStore } from "./types.js";
