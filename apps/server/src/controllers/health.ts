/**
 * Health check controller
 *
 * Reports the hash configuration and the on-disk layout it produces.
 */

import type { ContentStore } from "@shortlink/content-store";
import { toStoragePath } from "@shortlink/storage-core";
import type { Context } from "hono";

export type HealthController = {
  check: (c: Context) => Response;
};

type HealthControllerDeps = {
  store: ContentStore;
};

export type HealthReport = {
  status: "ok";
  algorithm: string;
  hashLength: number;
  /** Sharded path of an all-zero identifier, relative to the state dir */
  layout: string;
};

export const createHealthController = (deps: HealthControllerDeps): HealthController => {
  const { algorithm, hashLength } = deps.store;
  const report: HealthReport = {
    status: "ok",
    algorithm,
    hashLength,
    layout: toStoragePath(algorithm, hashLength, "0".repeat(hashLength)),
  };

  return {
    check: (c) => c.json(report),
  };
};
