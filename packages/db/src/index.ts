/**
 * @linkpulse/db - Durable Store Package
 *
 * PostgreSQL is the source of truth for mappings and flushed hit counts.
 *
 * Usage:
 * ```ts
 * import { createPool, PgMappingStore } from "@linkpulse/db";
 *
 * const store = new PgMappingStore(createPool({ connectionString }));
 * const mapping = await store.getByCode("aB3xY9k");
 * ```
 */

export { createPool, type SqlClient, type PoolOptions } from "./client.js";
export { PgMappingStore } from "./mappings.js";
export { MemoryMappingStore, type RecordedDelta } from "./memory.js";
export * from "./types.js";
