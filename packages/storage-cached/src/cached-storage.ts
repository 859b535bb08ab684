/**
 * Cached StorageProvider — composes a local cache with an authoritative backend.
 *
 * The backend is the source of truth; the cache only holds a recency-ordered
 * subset of it and may drop entries at any time.
 *
 * Read path:
 *   cache.get → hit? return : backend.get → backfill cache → return
 *
 * Write path (write-through):
 *   backend.put → cache.put (the cache never gets ahead of the backend)
 *
 * Typical pairing:
 *   - Memory (bounded LRU) + FS   (warm process cache over disk)
 *
 * @packageDocumentation
 */

import type { StorageProvider } from "@shortlink/storage-core";

export type CachedStorageConfig = {
  /** Local cache layer (e.g., bounded memory) */
  cache: StorageProvider;
  /** Authoritative backend (e.g., FS) */
  remote: StorageProvider;
};

/**
 * Create a cached StorageProvider that layers a local cache over a backend.
 */
export const createCachedStorage = (config: CachedStorageConfig): StorageProvider => {
  const { cache, remote } = config;

  return {
    async get(key: string): Promise<Uint8Array | null> {
      const cached = await cache.get(key);
      if (cached) return cached;

      const data = await remote.get(key);
      if (data) {
        await cache.put(key, data);
      }
      return data;
    },

    async put(key: string, value: Uint8Array): Promise<void> {
      await remote.put(key, value);
      await cache.put(key, value);
    },
  };
};
