/**
 * Shortlink Server - Hono Router
 */

import { Hono } from "hono";
import { logger } from "hono/logger";
import type { HealthController } from "./controllers/health.ts";
import type { LinksController } from "./controllers/links.ts";
import { log } from "./util/log.ts";

// ============================================================================
// Types
// ============================================================================

export type RouterDeps = {
  // Controllers
  health: HealthController;
  links: LinksController;

  /** Log one line per request */
  logRequests?: boolean;
};

// ============================================================================
// Router Factory
// ============================================================================

export const createRouter = (deps: RouterDeps): Hono => {
  const app = new Hono();

  // Storage failures and anything else unexpected end up here
  app.onError((err, c) => {
    log.error("Unhandled error:", err);
    return c.text("Internal Server Error", 500);
  });

  if (deps.logRequests) {
    app.use("*", logger((line) => log.info(line)));
  }

  // ============================================================================
  // Health
  // ============================================================================

  app.get("/api/health", deps.health.check);

  // ============================================================================
  // Links
  // ============================================================================

  // The identifier is the last path segment, whatever comes before it
  app.get("*", deps.links.resolve);
  // The path of a POST is ignored
  app.post("*", deps.links.shorten);

  // ============================================================================
  // 404 Handler
  // ============================================================================

  app.notFound((c) => c.body(null, 404));

  return app;
};
