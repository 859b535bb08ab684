/**
 * Shortlink Storage Core
 *
 * Core types and utilities for storage providers.
 */

// Key utilities
export { isValidIdentifier, toShardSegments, toStoragePath } from "./key.ts";
// LRU Cache
export { createLRUCache, DEFAULT_CACHE_SIZE, type LRUCache } from "./lru-cache.ts";
// Types
export type { StorageLayout, StorageProvider } from "./types.ts";
