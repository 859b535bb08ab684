/**
 * Unit tests for createCachedStorage
 *
 * Uses two in-memory StorageProviders (cache + remote) to verify:
 * - get: cache hit / cache miss + backfill / remote miss
 * - put: write-through to remote, then cache
 * - errors from either tier reach the caller
 */

import type { StorageProvider } from "@shortlink/storage-core";
import { describe, expect, it } from "vitest";
import { createCachedStorage } from "./cached-storage.ts";

// ============================================================================
// In-memory storage helper (observable)
// ============================================================================

type Call = { method: string; args: unknown[] };

function createSpyStorage(
  initial: Map<string, Uint8Array> = new Map()
): StorageProvider & { calls: Call[]; store: Map<string, Uint8Array> } {
  const store = new Map(initial);
  const calls: Call[] = [];

  return {
    calls,
    store,
    async get(key) {
      calls.push({ method: "get", args: [key] });
      return store.get(key) ?? null;
    },
    async put(key, value) {
      calls.push({ method: "put", args: [key, value] });
      store.set(key, value);
    },
  };
}

const KEY = "abcde";
const DATA = new Uint8Array([1, 2, 3, 4]);

// ============================================================================
// Tests — get
// ============================================================================

describe("createCachedStorage", () => {
  describe("get", () => {
    it("should return from cache on hit without touching remote", async () => {
      const cache = createSpyStorage(new Map([[KEY, DATA]]));
      const remote = createSpyStorage();

      const storage = createCachedStorage({ cache, remote });
      const result = await storage.get(KEY);

      expect(result).toEqual(DATA);
      expect(cache.calls).toEqual([{ method: "get", args: [KEY] }]);
      expect(remote.calls).toHaveLength(0);
    });

    it("should fetch from remote on cache miss and backfill", async () => {
      const cache = createSpyStorage();
      const remote = createSpyStorage(new Map([[KEY, DATA]]));

      const storage = createCachedStorage({ cache, remote });
      const result = await storage.get(KEY);

      expect(result).toEqual(DATA);
      expect(cache.calls).toEqual([
        { method: "get", args: [KEY] },
        { method: "put", args: [KEY, DATA] },
      ]);
      expect(remote.calls).toEqual([{ method: "get", args: [KEY] }]);
      expect(cache.store.get(KEY)).toEqual(DATA);
    });

    it("should return null when neither tier has the key", async () => {
      const cache = createSpyStorage();
      const remote = createSpyStorage();

      const storage = createCachedStorage({ cache, remote });

      expect(await storage.get(KEY)).toBeNull();
      expect(cache.calls).toEqual([{ method: "get", args: [KEY] }]);
    });

    it("should surface remote read failures", async () => {
      const cache = createSpyStorage();
      const remote: StorageProvider = {
        get: async () => {
          throw new Error("disk on fire");
        },
        put: async () => {},
      };

      const storage = createCachedStorage({ cache, remote });

      await expect(storage.get(KEY)).rejects.toThrow("disk on fire");
    });
  });

  // ==========================================================================
  // Tests — put
  // ==========================================================================

  describe("put", () => {
    it("should write to remote then cache", async () => {
      const order: string[] = [];
      const cache = createSpyStorage();
      const remote = createSpyStorage();
      const storage = createCachedStorage({
        cache: {
          get: cache.get,
          put: async (k, v) => {
            order.push("cache");
            await cache.put(k, v);
          },
        },
        remote: {
          get: remote.get,
          put: async (k, v) => {
            order.push("remote");
            await remote.put(k, v);
          },
        },
      });

      await storage.put(KEY, DATA);

      expect(order).toEqual(["remote", "cache"]);
      expect(cache.store.get(KEY)).toEqual(DATA);
      expect(remote.store.get(KEY)).toEqual(DATA);
    });

    it("should leave the cache untouched when the remote write fails", async () => {
      const cache = createSpyStorage();
      const remote: StorageProvider = {
        get: async () => null,
        put: async () => {
          throw new Error("ENOSPC");
        },
      };

      const storage = createCachedStorage({ cache, remote });

      await expect(storage.put(KEY, DATA)).rejects.toThrow("ENOSPC");
      expect(cache.store.has(KEY)).toBe(false);
      expect(await storage.get(KEY)).toBeNull();
    });
  });
});
