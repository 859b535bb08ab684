/**
 * Shortlink Storage Memory
 *
 * Bounded in-memory storage provider.
 */

export {
  createMemoryStorage,
  createMemoryStorageWithInspection,
  type InspectableMemoryStorage,
  type MemoryStorageConfig,
} from "./memory-storage.ts";
