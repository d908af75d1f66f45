/**
 * Server Type Definitions
 */

import type { HttpBindings } from "@hono/node-server";
import type { ClickAccumulator } from "@linkpulse/analytics";
import type { FastStore } from "@linkpulse/cache";
import type { MappingStore } from "@linkpulse/db";
import type { FixedWindowRateLimiter, LinkService } from "@linkpulse/links";
import type { LogLevel, Logger } from "@linkpulse/logger";

// =============================================================================
// Configuration
// =============================================================================

export interface Config {
  // Server
  port: number;
  host: string;
  /** Public origin used to build short URLs, without trailing slash */
  baseUrl: string;
  /** Behind a proxy that sets the forwarding headers */
  trustProxy: boolean;

  // Redis
  redisUrl: string;
  /** Bound on hot-path Redis round-trips */
  redisTimeoutMs: number;

  // Database
  databaseUrl: string;
  dbTimeoutMs: number;

  // Links
  codeLength: number;
  defaultExpiryDays: number;
  cacheTtlSeconds: number;

  // Rate limiting
  rateLimitPerMinute: number;
  rateLimitFailOpen: boolean;

  // Logging
  logLevel: LogLevel;
}

// =============================================================================
// App Wiring
// =============================================================================

/**
 * Everything the HTTP layer needs, constructed by server.ts (or a test).
 */
export interface AppDeps {
  links: LinkService;
  rateLimiter: FixedWindowRateLimiter;
  clicks: ClickAccumulator;
  /** Pinged by the readiness check */
  fast: FastStore;
  store: MappingStore;
  baseUrl: string;
  /** Read client identity from proxy headers. Off unless set. */
  trustProxy?: boolean;
  logger?: Logger;
}

/**
 * Node bindings are absent when the app is driven through `app.request`.
 */
export type AppEnv = { Bindings: Partial<HttpBindings> };
