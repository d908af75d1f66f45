/**
 * Key Scheme Tests
 */

import { describe, it, expect } from "@jest/globals";
import { CACHE_KEYS, entryKey, hitKey, windowKey, codeFromHitKey } from "../src/index.js";

describe("Key Scheme", () => {
  it("should use versioned prefixes", () => {
    expect(entryKey("abc123")).toBe("lp:v1:link:abc123");
    expect(hitKey("abc123")).toBe("lp:v1:hits:abc123");
    expect(windowKey("203.0.113.7", 29000000)).toBe("lp:v1:rl:203.0.113.7:29000000");
  });

  it("should keep namespaces disjoint", () => {
    expect(entryKey("x")).not.toBe(hitKey("x"));
    expect(hitKey("x").startsWith(CACHE_KEYS.HITS_PREFIX)).toBe(true);
    expect(entryKey("x").startsWith(CACHE_KEYS.HITS_PREFIX)).toBe(false);
  });

  describe("codeFromHitKey", () => {
    it("should invert hitKey", () => {
      expect(codeFromHitKey(hitKey("my-link_01"))).toBe("my-link_01");
    });

    it("should return null outside the hits namespace", () => {
      expect(codeFromHitKey(entryKey("abc"))).toBeNull();
      expect(codeFromHitKey("random")).toBeNull();
    });

    it("should return null for a bare prefix", () => {
      expect(codeFromHitKey(CACHE_KEYS.HITS_PREFIX)).toBeNull();
    });
  });
});
