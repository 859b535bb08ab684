/**
 * File System Storage Provider
 *
 * Implements StorageProvider with:
 * - Sharded directory layout derived from the identifier
 * - Automatic directory creation
 * - Atomic writes (temp file + rename), serialized per key
 */

import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { StorageLayout, StorageProvider } from "@shortlink/storage-core";
import { toStoragePath } from "@shortlink/storage-core";

/**
 * File System Storage configuration
 */
export type FsStorageConfig = StorageLayout & {
  /** Root directory for storage */
  basePath: string;
};

const isMissingFileError = (error: unknown): boolean => {
  if (typeof error !== "object" || error === null || !("code" in error)) return false;
  return error.code === "ENOENT" || error.code === "ENOTDIR";
};

/**
 * Write a file atomically (via temp file + rename)
 *
 * Readers see either the previous content or the new content, never a
 * partial file. The temp file is removed if the write fails.
 */
export const atomicWriteFile = async (path: string, content: Uint8Array): Promise<void> => {
  const tempPath = join(dirname(path), `.${basename(path)}.${randomUUID()}.tmp`);
  try {
    await writeFile(tempPath, content);
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
};

/**
 * Create a file system-backed storage provider
 */
export const createFsStorage = (config: FsStorageConfig): StorageProvider => {
  const { basePath, algorithm, hashLength } = config;

  // Tail of the write chain for each key currently being written
  const pendingWrites = new Map<string, Promise<void>>();

  const toFilePath = (key: string): string => {
    return join(basePath, toStoragePath(algorithm, hashLength, key));
  };

  const get = async (key: string): Promise<Uint8Array | null> => {
    try {
      const buffer = await readFile(toFilePath(key));
      return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }
  };

  const write = async (key: string, value: Uint8Array): Promise<void> => {
    const filePath = toFilePath(key);
    await mkdir(dirname(filePath), { recursive: true });
    await atomicWriteFile(filePath, value);
  };

  const put = (key: string, value: Uint8Array): Promise<void> => {
    const previous = pendingWrites.get(key) ?? Promise.resolve();
    // A failed earlier write must not block later ones; its caller already got the error
    const current = previous.catch(() => undefined).then(() => write(key, value));
    pendingWrites.set(key, current);

    const release = () => {
      if (pendingWrites.get(key) === current) {
        pendingWrites.delete(key);
      }
    };
    return current.finally(release);
  };

  return { get, put };
};
