/**
 * @linkpulse/logger - Structured Logging Package
 *
 * Uses pino for JSON logging; pino-pretty in development.
 *
 * Usage:
 * ```ts
 * import { createLogger } from "@linkpulse/logger";
 *
 * const httpLogger = createLogger("http");
 * httpLogger.info({ code: "aB3xY9k" }, "Link created");
 *
 * const flushLogger = createLogger("flush-worker");
 * flushLogger.error({ err }, "Flush cycle failed");
 * ```
 */

import pino from "pino";

// ============================================================================
// Configuration
// ============================================================================

const LOG_LEVEL = process.env.LOG_LEVEL || "info";
const NODE_ENV = process.env.NODE_ENV || "development";
const SERVICE_NAME = process.env.SERVICE_NAME || "linkpulse";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface CreateLoggerOptions {
  /** Overrides LOG_LEVEL */
  level?: LogLevel;
  /** Force pretty output on or off (default: on in development) */
  pretty?: boolean;
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Create a logger instance for a specific service/component
 */
export function createLogger(name: string, options: CreateLoggerOptions = {}): pino.Logger {
  const pretty = options.pretty ?? NODE_ENV === "development";

  return pino({
    name: `${SERVICE_NAME}:${name}`,
    level: options.level ?? LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    transport: pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : undefined,
    base: {
      service: name,
      env: NODE_ENV,
    },
  });
}

export type { Logger } from "pino";
