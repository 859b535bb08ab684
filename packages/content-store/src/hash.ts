/**
 * Digest provider
 *
 * Resolves an algorithm name to a function producing the full lowercase hex
 * digest. Node's crypto covers everything `getHashes()` lists; blake3 comes
 * from @noble/hashes.
 */

import { createHash, getHashes } from "node:crypto";
import { blake3 } from "@noble/hashes/blake3";
import { bytesToHex } from "@noble/hashes/utils";

export type HexDigest = (data: Uint8Array) => string;

const NOBLE_DIGESTS: Record<string, HexDigest> = {
  blake3: (data) => bytesToHex(blake3(data)),
};

/**
 * Names accepted by `resolveDigest`
 */
export const supportedAlgorithms = (): string[] => {
  return [...getHashes(), ...Object.keys(NOBLE_DIGESTS)];
};

/**
 * Returns null when no provider knows the algorithm
 */
export const resolveDigest = (algorithm: string): HexDigest | null => {
  const noble = NOBLE_DIGESTS[algorithm];
  if (noble) return noble;

  if (!getHashes().includes(algorithm)) return null;
  return (data) => createHash(algorithm).update(data).digest("hex");
};
