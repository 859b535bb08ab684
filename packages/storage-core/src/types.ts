/**
 * Storage Provider interface
 *
 * Byte storage keyed by content identifiers (truncated hex digests).
 */
export type StorageProvider = {
  /**
   * Get content by key
   * Returns null if not found
   */
  get: (key: string) => Promise<Uint8Array | null>;

  /**
   * Store content, overwriting whatever the key held before
   */
  put: (key: string, value: Uint8Array) => Promise<void>;
};

/**
 * Where a storage layout places content for one hash configuration
 */
export type StorageLayout = {
  /** Hash algorithm name, used as the top-level directory */
  algorithm: string;
  /** Number of hex characters kept from each digest */
  hashLength: number;
};
