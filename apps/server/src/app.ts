/**
 * Hono application: routes and error handling.
 *
 * Routes:
 *   POST /shorten       create a link (rate limited)
 *   GET  /health        liveness
 *   GET  /health/ready  readiness (database required)
 *   GET  /metrics       Prometheus text
 *   GET  /stats/:code   link details and hit count
 *   GET  /:code         302 redirect
 */

import { Hono } from "hono";
import { createLogger } from "@linkpulse/logger";
import { createHandlers } from "./handler.js";
import type { AppDeps, AppEnv } from "./types.js";

export function createApp(deps: AppDeps): Hono<AppEnv> {
  const logger = deps.logger ?? createLogger("http");
  const handlers = createHandlers({ ...deps, logger });
  const app = new Hono<AppEnv>();

  // Fixed paths before the catch-all code route
  app.get("/health", handlers.health);
  app.get("/health/ready", handlers.ready);
  app.get("/metrics", handlers.metrics);
  app.get("/stats/:code", handlers.stats);
  app.post("/shorten", handlers.shorten);
  app.get("/:code", handlers.redirect);

  app.notFound((c) => c.json({ success: false, error: "Not Found" }, 404));

  app.onError((err, c) => {
    logger.error({ err, method: c.req.method, path: c.req.path }, "Unhandled request error");
    return c.json({ success: false, error: "Internal Server Error" }, 500);
  });

  return app;
}
