/**
 * Content Store
 *
 * Content-addressed byte store: the identifier of a blob is its digest,
 * truncated to `hashLength` hex characters.
 *
 * Truncated digests can collide. Nothing detects that: a later save of
 * different content with the same identifier replaces the earlier one.
 */

import { createCachedStorage } from "@shortlink/storage-cached";
import type { StorageProvider } from "@shortlink/storage-core";
import { createFsStorage } from "@shortlink/storage-fs";
import {
  createMemoryStorageWithInspection,
  type InspectableMemoryStorage,
} from "@shortlink/storage-memory";
import { createContentStoreError } from "./errors.ts";
import { resolveDigest } from "./hash.ts";

export type ContentStoreConfig = {
  /** Hash algorithm name (e.g. "sha256", "md5", "blake3") */
  algorithm: string;
  /** Hex characters kept from each digest */
  hashLength: number;
  /** Where content lives, keyed by identifier */
  storage: StorageProvider;
};

export type ContentStore = {
  readonly algorithm: string;
  readonly hashLength: number;
  hash: (content: Uint8Array) => string;
  save: (content: Uint8Array) => Promise<string>;
  load: (identifier: string) => Promise<Uint8Array>;
};

/**
 * Create a content store.
 *
 * Throws `UnsupportedAlgorithm` or `InvalidConfig` immediately, so a bad
 * configuration is caught at startup rather than on the first request.
 */
export const createContentStore = (config: ContentStoreConfig): ContentStore => {
  const { algorithm, hashLength, storage } = config;

  const digest = resolveDigest(algorithm);
  if (!digest) {
    throw createContentStoreError(
      "UnsupportedAlgorithm",
      `Unsupported hash algorithm: ${algorithm}`
    );
  }

  const digestLength = digest(new Uint8Array(0)).length;
  if (!Number.isInteger(hashLength) || hashLength < 1 || hashLength > digestLength) {
    throw createContentStoreError(
      "InvalidConfig",
      `Hash length must be an integer between 1 and ${digestLength} for ${algorithm}, got ${hashLength}`
    );
  }

  const hash = (content: Uint8Array): string => digest(content).slice(0, hashLength);

  return {
    algorithm,
    hashLength,
    hash,

    async save(content: Uint8Array): Promise<string> {
      const identifier = hash(content);
      await storage.put(identifier, content);
      return identifier;
    },

    async load(identifier: string): Promise<Uint8Array> {
      const content = await storage.get(identifier);
      if (content === null) {
        throw createContentStoreError("NotFound", `No content stored for ${identifier}`);
      }
      return content;
    },
  };
};

// ============================================================================
// Standard assembly: bounded memory cache over sharded disk
// ============================================================================

export type ShortlinkStoreConfig = {
  algorithm: string;
  hashLength: number;
  /** Root directory of the on-disk layout */
  stateDir: string;
  /** Entries kept in memory */
  cacheSize: number;
};

export type ShortlinkStore = ContentStore & {
  /** The memory tier, exposed for diagnostics */
  cache: InspectableMemoryStorage;
};

export const createShortlinkStore = (config: ShortlinkStoreConfig): ShortlinkStore => {
  const { algorithm, hashLength, stateDir, cacheSize } = config;

  const cache = createMemoryStorageWithInspection({ maxSize: cacheSize });
  const disk = createFsStorage({ basePath: stateDir, algorithm, hashLength });
  const store = createContentStore({
    algorithm,
    hashLength,
    storage: createCachedStorage({ cache, remote: disk }),
  });

  return { ...store, cache };
};
