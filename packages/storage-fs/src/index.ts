/**
 * Shortlink File System Storage
 *
 * File system-backed storage provider.
 */

export { atomicWriteFile, createFsStorage, type FsStorageConfig } from "./fs-storage.ts";
