/**
 * In-process Fast Store Tests
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { MemoryFastStore } from "../src/index.js";

describe("MemoryFastStore", () => {
  let nowMs: number;
  let store: MemoryFastStore;

  beforeEach(() => {
    nowMs = Date.UTC(2026, 0, 1, 12, 0, 0);
    store = new MemoryFastStore(() => nowMs);
  });

  describe("get / setWithTtl", () => {
    it("should return null for missing keys", async () => {
      await expect(store.get("missing")).resolves.toBeNull();
    });

    it("should expire values after their TTL", async () => {
      await store.setWithTtl("k", "v", 5);

      nowMs += 4999;
      await expect(store.get("k")).resolves.toBe("v");

      nowMs += 1;
      await expect(store.get("k")).resolves.toBeNull();
    });

    it("should clamp non-positive TTLs to one second", async () => {
      await store.setWithTtl("zero", "v", 0);
      await store.setWithTtl("negative", "v", -30);

      expect(store.ttl("zero")).toBe(1);
      expect(store.ttl("negative")).toBe(1);
    });
  });

  describe("incr", () => {
    it("should create missing counters at 1 without TTL", async () => {
      await expect(store.incr("c")).resolves.toBe(1);
      await expect(store.incr("c")).resolves.toBe(2);
      expect(store.ttl("c")).toBe(-1);
    });

    it("should reject non-integer values", async () => {
      store.set("c", "abc");
      await expect(store.incr("c")).rejects.toThrow("ERR value is not an integer");
    });

    it("should restart a counter whose TTL elapsed", async () => {
      await store.incr("c");
      await store.expireIfUnset("c", 60);

      nowMs += 60_000;
      await expect(store.incr("c")).resolves.toBe(1);
    });
  });

  describe("expireIfUnset", () => {
    it("should only apply a TTL once", async () => {
      await store.incr("c");

      await expect(store.expireIfUnset("c", 60)).resolves.toBe(true);
      nowMs += 10_000;
      await expect(store.expireIfUnset("c", 60)).resolves.toBe(false);
      expect(store.ttl("c")).toBe(50);
    });

    it("should ignore missing keys", async () => {
      await expect(store.expireIfUnset("missing", 60)).resolves.toBe(false);
      expect(store.ttl("missing")).toBe(-2);
    });
  });

  describe("scanByPrefix", () => {
    it("should page through matching keys only", async () => {
      for (let i = 0; i < 5; i++) store.set(`hits:${i}`, "1");
      store.set("other:1", "1");

      const pages: string[][] = [];
      for await (const page of store.scanByPrefix("hits:", 2)) {
        pages.push(page);
      }

      expect(pages).toEqual([["hits:0", "hits:1"], ["hits:2", "hits:3"], ["hits:4"]]);
    });

    it("should yield nothing when no key matches", async () => {
      const pages: string[][] = [];
      for await (const page of store.scanByPrefix("hits:")) {
        pages.push(page);
      }
      expect(pages).toEqual([]);
    });
  });

  describe("fetchAndDelete", () => {
    it("should return aligned values and delete the keys", async () => {
      store.set("a", "3");
      store.set("b", "7");

      await expect(store.fetchAndDelete(["a", "missing", "b"])).resolves.toEqual(["3", null, "7"]);
      expect(store.keys()).toEqual([]);
    });

    it("should let a later increment start a fresh counter", async () => {
      await store.incr("a");
      await store.incr("a");

      await expect(store.fetchAndDelete(["a"])).resolves.toEqual(["2"]);
      await expect(store.incr("a")).resolves.toBe(1);
    });
  });
});
