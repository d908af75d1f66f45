/**
 * Fixed-window rate limiter tests
 */

import { describe, it, expect, jest, beforeEach } from "@jest/globals";
import { MemoryFastStore } from "@linkpulse/cache";
import { createLogger } from "@linkpulse/logger";
import { windowKey } from "@linkpulse/shared";
import { FixedWindowRateLimiter, type RateLimiterOptions } from "../src/index.js";

const silent = createLogger("test", { level: "silent" });

describe("FixedWindowRateLimiter", () => {
  let nowMs: number;
  let fast: MemoryFastStore;

  const limiter = (options: RateLimiterOptions = {}) =>
    new FixedWindowRateLimiter(fast, {
      limit: 3,
      windowSeconds: 60,
      clock: () => new Date(nowMs),
      logger: silent,
      ...options,
    });

  beforeEach(() => {
    // Aligned to a window boundary
    nowMs = Date.UTC(2026, 0, 1, 12, 0, 0);
    fast = new MemoryFastStore(() => nowMs);
  });

  it("should admit the limit, deny the next call, and admit again in the next window", async () => {
    const rl = limiter();

    const first = await rl.admit("203.0.113.7");
    const second = await rl.admit("203.0.113.7");
    const third = await rl.admit("203.0.113.7");
    const fourth = await rl.admit("203.0.113.7");

    expect([first, second, third].map((r) => r.allowed)).toEqual([true, true, true]);
    expect([first, second, third].map((r) => r.remaining)).toEqual([2, 1, 0]);
    expect(fourth).toEqual({ allowed: false, limit: 3, remaining: 0, resetInSeconds: 60 });

    nowMs += 60_000;
    const nextWindow = await rl.admit("203.0.113.7");
    expect(nextWindow.allowed).toBe(true);
    expect(nextWindow.remaining).toBe(2);
  });

  it("should count identities independently", async () => {
    const rl = limiter({ limit: 1 });

    expect((await rl.admit("a")).allowed).toBe(true);
    expect((await rl.admit("b")).allowed).toBe(true);
    expect((await rl.admit("a")).allowed).toBe(false);
  });

  it("should give the window counter a TTL of one window", async () => {
    await limiter().admit("203.0.113.7");

    const bucket = Math.floor(nowMs / 60_000);
    expect(fast.ttl(windowKey("203.0.113.7", bucket))).toBe(60);
  });

  it("should not extend the TTL on later requests in the same window", async () => {
    const rl = limiter();
    const bucket = Math.floor(nowMs / 60_000);

    await rl.admit("x");
    nowMs += 20_000;
    await rl.admit("x");

    expect(fast.ttl(windowKey("x", bucket))).toBe(40);
  });

  it("should report seconds until the window rolls over", async () => {
    nowMs += 15_000;

    const result = await limiter().admit("x");

    expect(result.resetInSeconds).toBe(45);
  });

  it("should serialize concurrent callers on one bucket", async () => {
    const rl = limiter({ limit: 5 });

    const results = await Promise.all(Array.from({ length: 8 }, () => rl.admit("burst")));

    expect(results.filter((r) => r.allowed)).toHaveLength(5);
  });

  describe("store failures", () => {
    it("should admit when failing open", async () => {
      jest.spyOn(fast, "incr").mockRejectedValue(new Error("ECONNREFUSED"));

      const result = await limiter().admit("x");

      expect(result).toEqual({ allowed: true, limit: 3, remaining: 3, resetInSeconds: 60 });
    });

    it("should deny when failing closed", async () => {
      jest.spyOn(fast, "incr").mockRejectedValue(new Error("ECONNREFUSED"));

      const result = await limiter({ failureMode: "closed" }).admit("x");

      expect(result.allowed).toBe(false);
      expect(result.remaining).toBe(0);
    });

    it("should apply the failure mode on timeout", async () => {
      jest.spyOn(fast, "incr").mockReturnValue(new Promise<number>(() => undefined));

      const open = await limiter({ timeoutMs: 10 }).admit("x");
      const closed = await limiter({ timeoutMs: 10, failureMode: "closed" }).admit("x");

      expect(open.allowed).toBe(true);
      expect(closed.allowed).toBe(false);
    });

    it("should attach the TTL on a later request when the first expire fails", async () => {
      const rl = limiter();
      const bucket = Math.floor(nowMs / 60_000);
      jest.spyOn(fast, "expireIfUnset").mockRejectedValueOnce(new Error("ECONNRESET"));

      await rl.admit("a");
      nowMs += 5_000;
      const second = await rl.admit("a");

      expect(second.remaining).toBe(1);
      expect(fast.ttl(windowKey("a", bucket))).toBe(60);
    });

    it("should log a warning", async () => {
      const logger = createLogger("test", { level: "silent" });
      const warn = jest.spyOn(logger, "warn");
      jest.spyOn(fast, "incr").mockRejectedValue(new Error("ECONNREFUSED"));

      await limiter({ logger }).admit("x");

      expect(warn).toHaveBeenCalledTimes(1);
    });
  });
});
