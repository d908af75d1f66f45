/**
 * Configuration Module
 *
 * Loads configuration from environment variables.
 *
 * Design Decision: Fail fast on startup if required vars are missing.
 */

import { createLogger, type LogLevel, type Logger } from "@linkpulse/logger";
import {
  LINK_DEFAULTS,
  RATE_LIMIT_DEFAULTS,
  SHORTCODE_CONFIG,
  optional,
  optionalBool,
  optionalInt,
  required,
} from "@linkpulse/shared";
import type { Config } from "./types.js";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

/**
 * Load configuration from environment.
 * Call once at startup.
 *
 * @throws Error if required variables are missing
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const port = optionalInt("PORT", 3000, env);

  return {
    // Server
    port,
    host: optional("HOST", "0.0.0.0", env),
    baseUrl: optional("BASE_URL", `http://localhost:${port}`, env).replace(/\/+$/, ""),
    trustProxy: optionalBool("TRUST_PROXY", false, env),

    // Redis
    redisUrl: required("REDIS_URL", env),
    redisTimeoutMs: optionalInt("REDIS_TIMEOUT_MS", LINK_DEFAULTS.FAST_STORE_TIMEOUT_MS, env),

    // Database
    databaseUrl: required("DATABASE_URL", env),
    dbTimeoutMs: optionalInt("DB_TIMEOUT_MS", 2000, env),

    // Links
    codeLength: optionalInt("CODE_LENGTH", SHORTCODE_CONFIG.DEFAULT_LENGTH, env),
    defaultExpiryDays: optionalInt("DEFAULT_EXPIRY_DAYS", LINK_DEFAULTS.EXPIRY_DAYS, env),
    cacheTtlSeconds: optionalInt("CACHE_TTL_SECONDS", LINK_DEFAULTS.CACHE_TTL_SECONDS, env),

    // Rate limiting
    rateLimitPerMinute: optionalInt("RATE_LIMIT_PER_MINUTE", RATE_LIMIT_DEFAULTS.LIMIT, env),
    rateLimitFailOpen: optionalBool("RATE_LIMIT_FAIL_OPEN", true, env),

    // Logging
    logLevel: parseLogLevel(optional("LOG_LEVEL", "info", env)),
  };
}

function parseLogLevel(level: string): LogLevel {
  const normalized = level.trim().toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === normalized) ?? "info";
}

/**
 * Log warnings for suboptimal settings. Returns the warnings.
 */
export function validateConfig(config: Config, logger: Logger = createLogger("config")): string[] {
  const warnings: string[] = [];

  if (config.codeLength < 6) {
    warnings.push(`CODE_LENGTH=${config.codeLength} leaves a small code space; expect collisions.`);
  }

  if (config.redisTimeoutMs > 100) {
    warnings.push(`REDIS_TIMEOUT_MS=${config.redisTimeoutMs}ms is high. Consider <=50ms for low latency.`);
  }

  if (config.cacheTtlSeconds < 60) {
    warnings.push(`CACHE_TTL_SECONDS=${config.cacheTtlSeconds}s is short. This may cause high DB load.`);
  }

  if (!config.rateLimitFailOpen) {
    warnings.push("RATE_LIMIT_FAIL_OPEN=false: link creation stops whenever Redis is unavailable.");
  }

  for (const warning of warnings) {
    logger.warn({ config: "validate" }, warning);
  }

  return warnings;
}
