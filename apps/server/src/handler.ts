/**
 * Request Handlers
 *
 * Thin HTTP adapters over the link service: parse, call, map the typed
 * outcome to a status code. No business logic lives here.
 *
 * Redirect flow:
 * 1. Resolve code (cache, then database on miss)
 * 2. Record the hit (fire-and-forget INCR)
 * 3. 302 with Cache-Control: no-store so every hit reaches us
 */

import type { Context } from "hono";
import { z } from "zod";
import { createLogger } from "@linkpulse/logger";
import { ErrorCode, URL_CONFIG, withTimeout, type Failure } from "@linkpulse/shared";
import * as metrics from "./metrics.js";
import type { AppDeps, AppEnv } from "./types.js";

// =============================================================================
// Validation
// =============================================================================

const shortenSchema = z.object({
  url: z.string().min(1).max(URL_CONFIG.MAX_LENGTH),
  customAlias: z.string().min(1).optional(),
  /** <= 0 disables expiry */
  expiresInDays: z.number().int().max(3650).optional(),
});

// =============================================================================
// Response Helpers
// =============================================================================

type ErrorStatus = 400 | 404 | 409 | 429 | 500 | 503;

export const ERROR_STATUS: Record<ErrorCode, ErrorStatus> = {
  [ErrorCode.INVALID_URL]: 400,
  [ErrorCode.INVALID_ALIAS]: 400,
  [ErrorCode.ALIAS_TAKEN]: 409,
  [ErrorCode.CODE_SPACE_EXHAUSTED]: 500,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.RATE_LIMITED]: 429,
  [ErrorCode.STORE_UNAVAILABLE]: 503,
};

const NO_STORE = "no-store";
const PING_TIMEOUT_MS = 1000;

function sendFailure(c: Context<AppEnv>, result: Failure): Response {
  const status = ERROR_STATUS[result.errorCode];
  if (status === 503) {
    c.header("Retry-After", "5");
  }
  return c.json({ success: false, error: result.error, errorCode: result.errorCode }, status);
}

/**
 * Client identity for rate limiting.
 * With `trustProxy`, proxy headers first (in priority order), then the socket.
 * Without it the headers are client-controlled and ignored.
 */
export function getClientIdentity(c: Context<AppEnv>, trustProxy = false): string {
  const socketAddress = c.env?.incoming?.socket.remoteAddress ?? "unknown";
  if (!trustProxy) return socketAddress;

  const cfConnecting = c.req.header("cf-connecting-ip");
  if (cfConnecting) return cfConnecting;

  const xForwardedFor = c.req.header("x-forwarded-for");
  if (xForwardedFor) {
    // X-Forwarded-For can be comma-separated, first is the client
    const firstIP = xForwardedFor.split(",")[0]?.trim();
    if (firstIP) return firstIP;
  }

  const xRealIP = c.req.header("x-real-ip");
  if (xRealIP) return xRealIP;

  return socketAddress;
}

// =============================================================================
// Handlers
// =============================================================================

export function createHandlers(deps: AppDeps) {
  const logger = deps.logger ?? createLogger("http");

  /**
   * POST /shorten
   */
  async function shorten(c: Context<AppEnv>): Promise<Response> {
    const admission = await deps.rateLimiter.admit(getClientIdentity(c, deps.trustProxy));
    c.header("X-RateLimit-Limit", String(admission.limit));
    c.header("X-RateLimit-Remaining", String(admission.remaining));
    c.header("X-RateLimit-Reset", String(admission.resetInSeconds));

    if (!admission.allowed) {
      metrics.increment("rate_limited");
      c.header("Retry-After", String(admission.resetInSeconds));
      return c.json(
        { success: false, error: "Too many requests, slow down", errorCode: ErrorCode.RATE_LIMITED },
        ERROR_STATUS[ErrorCode.RATE_LIMITED]
      );
    }

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ success: false, error: "Request body must be JSON" }, 400);
    }

    const parseResult = shortenSchema.safeParse(body);
    if (!parseResult.success) {
      return c.json(
        {
          success: false,
          error: "Validation failed",
          details: parseResult.error.flatten().fieldErrors,
        },
        400
      );
    }

    const { url, customAlias, expiresInDays } = parseResult.data;
    const result = await deps.links.register({ destination: url, customCode: customAlias, expiresInDays });

    if (!result.success) {
      if (result.errorCode === ErrorCode.STORE_UNAVAILABLE) metrics.increment("store_unavailable");
      return sendFailure(c, result);
    }

    metrics.increment("links_created");
    const { link } = result;

    return c.json(
      {
        success: true,
        data: {
          code: link.code,
          shortUrl: `${deps.baseUrl}/${link.code}`,
          url: link.destination,
          createdAt: link.createdAt.toISOString(),
          expiresAt: link.expiresAt?.toISOString() ?? null,
        },
      },
      201
    );
  }

  /**
   * GET /:code
   */
  async function redirect(c: Context<AppEnv>): Promise<Response> {
    const start = performance.now();
    const code = c.req.param("code") ?? "";

    const result = await deps.links.resolve(code);

    if (!result.success) {
      const status = ERROR_STATUS[result.errorCode];
      metrics.recordRedirect(status === 503 ? 503 : 404, null, performance.now() - start);
      c.header("Cache-Control", NO_STORE);
      return sendFailure(c, result);
    }

    // Fire-and-forget: never delays the redirect
    deps.clicks.recordHit(code);

    metrics.recordRedirect(302, result.source, performance.now() - start);
    c.header("Cache-Control", NO_STORE);
    return c.redirect(result.destination, 302);
  }

  /**
   * GET /stats/:code
   */
  async function stats(c: Context<AppEnv>): Promise<Response> {
    const result = await deps.links.getStats(c.req.param("code") ?? "");

    if (!result.success) {
      if (result.errorCode === ErrorCode.STORE_UNAVAILABLE) metrics.increment("store_unavailable");
      return sendFailure(c, result);
    }

    const { stats } = result;
    return c.json({
      success: true,
      data: {
        code: stats.code,
        shortUrl: `${deps.baseUrl}/${stats.code}`,
        url: stats.destination,
        createdAt: stats.createdAt.toISOString(),
        expiresAt: stats.expiresAt?.toISOString() ?? null,
        hitCount: stats.hitCount,
        lastAccessedAt: stats.lastAccessedAt?.toISOString() ?? null,
      },
    });
  }

  /**
   * GET /health - liveness
   */
  function health(c: Context<AppEnv>): Response {
    return c.json({ status: "ok" });
  }

  /**
   * GET /health/ready - database required, cache reported
   */
  async function ready(c: Context<AppEnv>): Promise<Response> {
    const [cacheUp, dbUp] = await Promise.all([
      withTimeout(deps.fast.ping(), PING_TIMEOUT_MS),
      withTimeout(deps.store.ping(), PING_TIMEOUT_MS),
    ]);

    const checks = {
      cache: cacheUp === true ? "ok" : "down",
      db: dbUp === true ? "ok" : "down",
    };

    if (dbUp !== true) {
      logger.warn({ checks }, "Readiness check failed");
      return c.json({ status: "unavailable", checks }, 503);
    }

    return c.json({ status: cacheUp === true ? "ok" : "degraded", checks });
  }

  /**
   * GET /metrics - Prometheus text
   */
  function metricsText(c: Context<AppEnv>): Response {
    return c.text(metrics.getMetrics(), 200, { "Content-Type": "text/plain; version=0.0.4" });
  }

  return { shorten, redirect, stats, health, ready, metrics: metricsText };
}

export type Handlers = ReturnType<typeof createHandlers>;
