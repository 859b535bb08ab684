/**
 * Unit tests for identifier and storage path utilities
 */

import { describe, expect, it } from "vitest";
import { isValidIdentifier, toShardSegments, toStoragePath } from "../src/key.ts";

describe("toStoragePath", () => {
  it("shards a 5-char digest into two segments", () => {
    expect(toShardSegments(5, "abcde")).toEqual(["ab", "cd"]);
    expect(toStoragePath("sha256", 5, "abcde")).toBe("sha256/l5/ab/cd/abcde");
  });

  it("stops before the last full pair for even lengths", () => {
    expect(toStoragePath("sha256", 6, "abcdef")).toBe("sha256/l6/ab/cd/abcdef");
    expect(toStoragePath("md5", 4, "0f1e")).toBe("md5/l4/0f/0f1e");
  });

  it("produces no shards for lengths of two or less", () => {
    expect(toShardSegments(2, "ab")).toEqual([]);
    expect(toStoragePath("sha256", 2, "ab")).toBe("sha256/l2/ab");
    expect(toStoragePath("sha256", 1, "a")).toBe("sha256/l1/a");
  });

  it("uses only the identifier and length", () => {
    expect(toStoragePath("blake3", 3, "9f0")).toBe("blake3/l3/9f/9f0");
    expect(toStoragePath("blake3", 8, "0123abcd")).toBe("blake3/l8/01/23/ab/0123abcd");
  });
});

describe("isValidIdentifier", () => {
  it("accepts lowercase hex of the configured length", () => {
    expect(isValidIdentifier("a1b2c", 5)).toBe(true);
  });

  it("rejects wrong lengths", () => {
    expect(isValidIdentifier("", 5)).toBe(false);
    expect(isValidIdentifier("a1b2", 5)).toBe(false);
    expect(isValidIdentifier("a1b2c3", 5)).toBe(false);
  });

  it("rejects non-hex and path characters", () => {
    expect(isValidIdentifier("A1B2C", 5)).toBe(false);
    expect(isValidIdentifier("..abc", 5)).toBe(false);
    expect(isValidIdentifier("ab/cd", 5)).toBe(false);
    expect(isValidIdentifier("healt", 5)).toBe(false);
  });
});
