/**
 * Shortlink Server - Application Assembly
 *
 * Pure assembly function that wires up all dependencies.
 */

import type { ContentStore } from "@shortlink/content-store";
import type { Hono } from "hono";
import { createHealthController, createLinksController } from "./controllers/index.ts";
import { createRouter } from "./router.ts";

export type { AppConfig, ConfigOverrides } from "./config.ts";
export { ConfigError, DEFAULT_CONFIG, loadConfig, resolveConfig } from "./config.ts";

// ============================================================================
// Types
// ============================================================================

export type AppDependencies = {
  store: ContentStore;
  /** Log one line per request (default: false) */
  logRequests?: boolean;
};

// ============================================================================
// App Factory
// ============================================================================

/**
 * Create the Hono app with all dependencies wired up.
 */
export const createApp = (deps: AppDependencies): Hono => {
  const { store, logRequests = false } = deps;

  const health = createHealthController({ store });
  const links = createLinksController({ store });

  return createRouter({ health, links, logRequests });
};
