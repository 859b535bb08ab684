/**
 * Shortlink - Server entry point
 *
 * Configuration comes from flags, then environment variables
 * (SHORTLINK_PORT, SHORTLINK_HASH_ALGORITHM, SHORTLINK_HASH_LENGTH,
 * SHORTLINK_STATE_DIR, SHORTLINK_CACHE_SIZE, SHORTLINK_QUIET), then defaults.
 */

import { resolve } from "node:path";
import { serve } from "@hono/node-server";
import {
  createShortlinkStore,
  isContentStoreError,
  type ShortlinkStore,
} from "@shortlink/content-store";
import { Command } from "commander";
import { createApp } from "./src/app.ts";
import { type AppConfig, ConfigError, type ConfigOverrides, resolveConfig } from "./src/config.ts";
import { log } from "./src/util/log.ts";

// ============================================================================
// Command line
// ============================================================================

const program = new Command();

program
  .name("shortlink")
  .description("Run the content-addressed URL shortener")
  .version("0.1.0")
  .option("--port <number>", "port number for the server to listen on (default: 8080)")
  .option("--hash-algorithm <name>", "hash algorithm used to derive identifiers (default: sha256)")
  .option("--hash-length <number>", "number of hex characters kept from each digest (default: 5)")
  .option("--state-dir <path>", "where shortened URLs are stored (default: goto_state)")
  .option("--cache-size <number>", "how many URLs to keep in memory (default: 100)")
  .option("-q, --quiet", "do not log each request");

program.parse(process.argv);

// ============================================================================
// Configuration
// ============================================================================

const startup = (): { config: AppConfig; store: ShortlinkStore } => {
  try {
    const config = resolveConfig(program.opts<ConfigOverrides>());
    const store = createShortlinkStore({
      algorithm: config.hashAlgorithm,
      hashLength: config.hashLength,
      stateDir: resolve(config.stateDir),
      cacheSize: config.cacheSize,
    });
    return { config, store };
  } catch (error: unknown) {
    if (error instanceof ConfigError || isContentStoreError(error)) {
      log.error(error.message);
      process.exit(1);
    }
    throw error;
  }
};

const { config, store } = startup();

// ============================================================================
// Start Server
// ============================================================================

const app = createApp({ store, logRequests: config.logRequests });

log.info("Starting server...");
log.info(`Storage: file system (${resolve(config.stateDir)})`);
log.info(`Hash: ${config.hashAlgorithm}, truncated to ${config.hashLength} characters`);
log.info(`Cache: ${config.cacheSize} entries in memory`);

// No hostname: listen on all interfaces
const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  log.info(`Listening on http://localhost:${info.port}`);
});

// ============================================================================
// Shutdown
// ============================================================================

const shutdown = (signal: NodeJS.Signals): void => {
  log.info(`Received ${signal}, closing server...`);
  // Stops accepting connections; in-flight requests run to completion
  server.close((error?: Error) => {
    if (error) {
      log.error("Error while closing server:", error);
      process.exit(1);
    }
    log.info("Server closed");
    process.exit(0);
  });
};

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
