/**
 * Shortlink Content Store
 *
 * Hashing, saving and loading of content-addressed entries.
 */

export {
  type ContentStore,
  type ContentStoreConfig,
  createContentStore,
  createShortlinkStore,
  type ShortlinkStore,
  type ShortlinkStoreConfig,
} from "./content-store.ts";
export {
  type ContentStoreError,
  type ContentStoreErrorCode,
  createContentStoreError,
  isContentStoreError,
} from "./errors.ts";
export { type HexDigest, resolveDigest, supportedAlgorithms } from "./hash.ts";
