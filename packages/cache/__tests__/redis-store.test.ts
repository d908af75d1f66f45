/**
 * Redis Fast Store Tests
 *
 * The ioredis client is replaced by a hand-built fake of the commands
 * RedisFastStore issues.
 */

import { describe, it, expect, jest, beforeEach } from "@jest/globals";
import type Redis from "ioredis";
import { createLogger } from "@linkpulse/logger";
import { RedisFastStore } from "../src/index.js";

type ExecResult = Array<[Error | null, unknown]> | null;

function createFakeRedis() {
  const tx = {
    getdel: jest.fn<(key: string) => unknown>(),
    exec: jest.fn<() => Promise<ExecResult>>(),
  };

  const client = {
    get: jest.fn<(key: string) => Promise<string | null>>(),
    setex: jest.fn<(key: string, seconds: number, value: string) => Promise<"OK">>(),
    incr: jest.fn<(key: string) => Promise<number>>(),
    expire: jest.fn<(key: string, seconds: number, mode: "NX") => Promise<number>>(),
    scan: jest.fn<
      (
        cursor: string,
        matchToken: "MATCH",
        pattern: string,
        countToken: "COUNT",
        count: number
      ) => Promise<[string, string[]]>
    >(),
    multi: jest.fn(() => tx),
    ping: jest.fn<() => Promise<string>>(),
    quit: jest.fn<() => Promise<"OK">>(),
  };

  return { client, tx };
}

describe("RedisFastStore", () => {
  const logger = createLogger("test", { level: "silent", pretty: false });
  let fake: ReturnType<typeof createFakeRedis>;
  let store: RedisFastStore;

  beforeEach(() => {
    fake = createFakeRedis();
    store = new RedisFastStore(fake.client as unknown as Redis, logger);
  });

  it("should SETEX with a clamped TTL", async () => {
    fake.client.setex.mockResolvedValue("OK");

    await store.setWithTtl("lp:v1:link:abc", "https://example.com", 0.4);

    expect(fake.client.setex).toHaveBeenCalledWith("lp:v1:link:abc", 1, "https://example.com");
  });

  it("should report whether EXPIRE NX applied", async () => {
    fake.client.expire.mockResolvedValueOnce(1).mockResolvedValueOnce(0);

    await expect(store.expireIfUnset("k", 60)).resolves.toBe(true);
    await expect(store.expireIfUnset("k", 60)).resolves.toBe(false);
    expect(fake.client.expire).toHaveBeenCalledWith("k", 60, "NX");
  });

  it("should follow the SCAN cursor until it returns to 0", async () => {
    fake.client.scan
      .mockResolvedValueOnce(["17", ["lp:v1:hits:a", "lp:v1:hits:b"]])
      .mockResolvedValueOnce(["42", []])
      .mockResolvedValueOnce(["0", ["lp:v1:hits:c"]]);

    const pages: string[][] = [];
    for await (const page of store.scanByPrefix("lp:v1:hits:", 100)) {
      pages.push(page);
    }

    expect(pages).toEqual([["lp:v1:hits:a", "lp:v1:hits:b"], ["lp:v1:hits:c"]]);
    expect(fake.client.scan).toHaveBeenNthCalledWith(1, "0", "MATCH", "lp:v1:hits:*", "COUNT", 100);
    expect(fake.client.scan).toHaveBeenNthCalledWith(2, "17", "MATCH", "lp:v1:hits:*", "COUNT", 100);
    expect(fake.client.scan).toHaveBeenNthCalledWith(3, "42", "MATCH", "lp:v1:hits:*", "COUNT", 100);
  });

  it("should escape glob characters in the prefix", async () => {
    fake.client.scan.mockResolvedValueOnce(["0", []]);

    const pages: string[][] = [];
    for await (const page of store.scanByPrefix("odd*[prefix]?")) {
      pages.push(page);
    }

    expect(pages).toEqual([]);
    expect(fake.client.scan).toHaveBeenCalledWith(
      "0",
      "MATCH",
      "odd\\*\\[prefix\\]\\?*",
      "COUNT",
      500
    );
  });

  describe("fetchAndDelete", () => {
    it("should GETDEL every key in one transaction", async () => {
      fake.tx.exec.mockResolvedValue([
        [null, "5"],
        [null, null],
        [new Error("WRONGTYPE"), null],
      ]);

      const values = await store.fetchAndDelete(["k1", "k2", "k3"]);

      expect(values).toEqual(["5", null, null]);
      expect(fake.client.multi).toHaveBeenCalledTimes(1);
      expect(fake.tx.getdel.mock.calls).toEqual([["k1"], ["k2"], ["k3"]]);
    });

    it("should skip the round-trip for an empty batch", async () => {
      await expect(store.fetchAndDelete([])).resolves.toEqual([]);
      expect(fake.client.multi).not.toHaveBeenCalled();
    });

    it("should throw when the transaction is aborted", async () => {
      fake.tx.exec.mockResolvedValue(null);

      await expect(store.fetchAndDelete(["k1"])).rejects.toThrow(
        "fetchAndDelete transaction was aborted"
      );
    });
  });

  describe("ping", () => {
    it("should return true on PONG", async () => {
      fake.client.ping.mockResolvedValue("PONG");
      await expect(store.ping()).resolves.toBe(true);
    });

    it("should return false when Redis is unreachable", async () => {
      fake.client.ping.mockRejectedValue(new Error("ECONNREFUSED"));
      await expect(store.ping()).resolves.toBe(false);
    });
  });

  it("should pass get and incr through", async () => {
    fake.client.get.mockResolvedValue("https://example.com");
    fake.client.incr.mockResolvedValue(3);

    await expect(store.get("k")).resolves.toBe("https://example.com");
    await expect(store.incr("c")).resolves.toBe(3);
  });
});
