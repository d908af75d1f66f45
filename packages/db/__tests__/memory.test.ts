import { describe, it, expect } from "@jest/globals";
import { MemoryMappingStore } from "../src/memory.js";

const createdAt = new Date("2026-01-01T00:00:00Z");

describe("MemoryMappingStore", () => {
  it("inserts once and reports conflict afterwards", async () => {
    const store = new MemoryMappingStore();
    const mapping = { code: "abc", destination: "https://a.example", createdAt, expiresAt: null };

    await expect(store.insertIfAbsent(mapping)).resolves.toBe("inserted");
    await expect(
      store.insertIfAbsent({ ...mapping, destination: "https://b.example" })
    ).resolves.toBe("conflict");

    const stored = await store.getByCode("abc");
    expect(stored?.destination).toBe("https://a.example");
    expect(stored?.hitCount).toBe(0);
    expect(stored?.lastAccessedAt).toBeNull();
  });

  it("applies deltas to existing rows only", async () => {
    const store = new MemoryMappingStore();
    const now = new Date("2026-01-02T00:00:00Z");
    await store.insertIfAbsent({ code: "abc", destination: "https://a.example", createdAt, expiresAt: null });

    await expect(store.applyDelta("abc", 4, now)).resolves.toBe(1);
    await expect(store.applyDelta("nope", 2, now)).resolves.toBe(0);

    const stored = await store.getByCode("abc");
    expect(stored?.hitCount).toBe(4);
    expect(stored?.lastAccessedAt).toEqual(now);
    expect(store.deltas).toHaveLength(2);
  });

  it("returns copies so callers cannot mutate stored rows", async () => {
    const store = new MemoryMappingStore();
    store.put({
      code: "abc",
      destination: "https://a.example",
      createdAt,
      expiresAt: null,
      hitCount: 7,
      lastAccessedAt: null,
    });

    const first = await store.getByCode("abc");
    if (first) first.hitCount = 100;

    const second = await store.getByCode("abc");
    expect(second?.hitCount).toBe(7);
    expect(store.size).toBe(1);
  });
});
