/**
 * Shortlink Server - Configuration
 *
 * Precedence: command-line flags, then environment variables, then defaults.
 */

import { z } from "zod";

// ============================================================================
// Schema
// ============================================================================

const ConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535),
  hashAlgorithm: z.string().min(1),
  hashLength: z.coerce.number().int().positive(),
  stateDir: z.string().min(1),
  cacheSize: z.coerce.number().int().positive(),
  logRequests: z.boolean(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: AppConfig = {
  port: 8080,
  hashAlgorithm: "sha256",
  hashLength: 5,
  stateDir: "goto_state",
  cacheSize: 100,
  logRequests: true,
};

/**
 * Raw values as they arrive from the command line
 */
export type ConfigOverrides = {
  port?: string;
  hashAlgorithm?: string;
  hashLength?: string;
  stateDir?: string;
  cacheSize?: string;
  quiet?: boolean;
};

type Env = Record<string, string | undefined>;

// ============================================================================
// Errors
// ============================================================================

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// ============================================================================
// Loading
// ============================================================================

const parseConfig = (raw: Record<string, unknown>): AppConfig => {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((e) => {
        const path = e.path.join(".");
        return path ? `${path}: ${e.message}` : e.message;
      })
    );
  }
  return result.data;
};

/**
 * Load configuration from environment variables only.
 *
 * Environment variables:
 * - SHORTLINK_PORT (falls back to PORT)
 * - SHORTLINK_HASH_ALGORITHM
 * - SHORTLINK_HASH_LENGTH
 * - SHORTLINK_STATE_DIR
 * - SHORTLINK_CACHE_SIZE
 * - SHORTLINK_QUIET=true to disable request logging
 */
export const loadConfig = (env: Env = process.env): AppConfig => resolveConfig({}, env);

/**
 * Lay command-line overrides over the environment and defaults
 */
export const resolveConfig = (overrides: ConfigOverrides, env: Env = process.env): AppConfig => {
  const quiet = overrides.quiet ?? env.SHORTLINK_QUIET === "true";

  return parseConfig({
    port: overrides.port ?? env.SHORTLINK_PORT ?? env.PORT ?? DEFAULT_CONFIG.port,
    hashAlgorithm:
      overrides.hashAlgorithm ?? env.SHORTLINK_HASH_ALGORITHM ?? DEFAULT_CONFIG.hashAlgorithm,
    hashLength: overrides.hashLength ?? env.SHORTLINK_HASH_LENGTH ?? DEFAULT_CONFIG.hashLength,
    stateDir: overrides.stateDir ?? env.SHORTLINK_STATE_DIR ?? DEFAULT_CONFIG.stateDir,
    cacheSize: overrides.cacheSize ?? env.SHORTLINK_CACHE_SIZE ?? DEFAULT_CONFIG.cacheSize,
    logRequests: !quiet,
  });
};
