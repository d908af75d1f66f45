/**
 * @linkpulse/server - HTTP Service
 *
 * Library surface for embedding or testing the app; the process
 * entrypoint is server.ts.
 */

export { createApp } from "./app.js";
export { createHandlers, getClientIdentity, ERROR_STATUS, type Handlers } from "./handler.js";
export { loadConfig, validateConfig } from "./config.js";
export * as metrics from "./metrics.js";
export type { AppDeps, AppEnv, Config } from "./types.js";
