/**
 * In-Memory Storage Provider
 *
 * Bounded by an LRU cache; serves as the hot tier in front of disk.
 */

import { createLRUCache, DEFAULT_CACHE_SIZE, type StorageProvider } from "@shortlink/storage-core";

/**
 * Memory Storage configuration
 */
export type MemoryStorageConfig = {
  /** Maximum number of entries kept (default: 100) */
  maxSize?: number;
};

/**
 * Create an in-memory storage provider
 */
export const createMemoryStorage = (config: MemoryStorageConfig = {}): StorageProvider => {
  const { get, put } = createMemoryStorageWithInspection(config);
  return { get, put };
};

/**
 * Create memory storage with inspection methods (for testing)
 */
export const createMemoryStorageWithInspection = (config: MemoryStorageConfig = {}) => {
  const data = createLRUCache<string, Uint8Array>(config.maxSize ?? DEFAULT_CACHE_SIZE);

  const storage: StorageProvider = {
    get: async (key) => data.get(key) ?? null,
    put: async (key, value) => {
      data.set(key, value);
    },
  };

  return {
    ...storage,
    /** Check residency without touching recency */
    has: (key: string) => data.has(key),
    /** Clear all stored data */
    clear: () => data.clear(),
    /** Get number of stored items */
    size: () => data.size(),
    /** Get all stored keys, least recently used first */
    keys: () => data.keys(),
  };
};

export type InspectableMemoryStorage = ReturnType<typeof createMemoryStorageWithInspection>;
