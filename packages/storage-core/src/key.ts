/**
 * Identifier and storage path utilities
 *
 * Identifiers are lowercase hex digests truncated to a configured length.
 */

/**
 * Check that an identifier is exactly `length` lowercase hex characters
 */
export const isValidIdentifier = (identifier: string, length: number): boolean => {
  return identifier.length === length && /^[0-9a-f]+$/.test(identifier);
};

/**
 * Split a digest into its 2-char shard directories.
 *
 * Slices start at 0, 2, 4, ... while the index is below `length - 2`,
 * so short lengths produce no shards at all.
 */
export const toShardSegments = (length: number, digest: string): string[] => {
  const segments: string[] = [];
  for (let i = 0; i < length - 2; i += 2) {
    segments.push(digest.slice(i, i + 2));
  }
  return segments;
};

/**
 * Create storage path from a digest.
 * Keeps every directory at no more than 256 children.
 *
 * Example: ("sha256", 5, "abcde") -> sha256/l5/ab/cd/abcde
 */
export const toStoragePath = (algorithm: string, length: number, digest: string): string => {
  return [algorithm, `l${length}`, ...toShardSegments(length, digest), digest].join("/");
};
