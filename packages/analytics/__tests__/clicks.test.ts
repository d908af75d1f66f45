/**
 * Click accumulator tests
 */

import { describe, it, expect, jest, beforeEach } from "@jest/globals";
import { MemoryFastStore } from "@linkpulse/cache";
import { createLogger } from "@linkpulse/logger";
import { hitKey } from "@linkpulse/shared";
import { ClickAccumulator } from "../src/index.js";

/** Let fire-and-forget callbacks settle */
const settle = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("ClickAccumulator", () => {
  let fast: MemoryFastStore;
  let logger: ReturnType<typeof createLogger>;

  beforeEach(() => {
    fast = new MemoryFastStore();
    logger = createLogger("test", { level: "silent" });
  });

  it("should increment the pending counter per hit", async () => {
    const clicks = new ClickAccumulator(fast, { logger });

    clicks.recordHit("abc");
    clicks.recordHit("abc");
    clicks.recordHit("xyz");
    await settle();

    await expect(clicks.pendingCount("abc")).resolves.toBe(2);
    await expect(clicks.pendingCount("xyz")).resolves.toBe(1);
    await expect(fast.get(hitKey("abc"))).resolves.toBe("2");
  });

  it("should not expire pending counters", async () => {
    new ClickAccumulator(fast, { logger }).recordHit("abc");
    await settle();

    expect(fast.ttl(hitKey("abc"))).toBe(-1);
  });

  it("should drop the hit and warn when the increment fails", async () => {
    const warn = jest.spyOn(logger, "warn");
    jest.spyOn(fast, "incr").mockRejectedValue(new Error("ECONNREFUSED"));
    const clicks = new ClickAccumulator(fast, { logger });

    expect(() => clicks.recordHit("abc")).not.toThrow();
    await settle();

    expect(warn).toHaveBeenCalledTimes(1);
    await expect(clicks.pendingCount("abc")).resolves.toBe(0);
  });

  it("should warn that the hit may be lost when the increment times out", async () => {
    const warn = jest.spyOn(logger, "warn");
    jest.spyOn(fast, "incr").mockReturnValue(new Promise<number>(() => undefined));
    const clicks = new ClickAccumulator(fast, { logger, timeoutMs: 5 });

    clicks.recordHit("abc");
    await new Promise<void>((resolve) => setTimeout(resolve, 30));

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith({ code: "abc", timeoutMs: 5 }, "Hit increment timed out, hit may be lost");
  });

  describe("pendingCount", () => {
    it("should read 0 for absent counters", async () => {
      await expect(new ClickAccumulator(fast, { logger }).pendingCount("none")).resolves.toBe(0);
    });

    it("should read 0 for unparsable counters", async () => {
      fast.set(hitKey("abc"), "not-a-number");

      await expect(new ClickAccumulator(fast, { logger }).pendingCount("abc")).resolves.toBe(0);
    });

    it("should read 0 when the store fails", async () => {
      jest.spyOn(fast, "get").mockRejectedValue(new Error("ECONNRESET"));

      await expect(new ClickAccumulator(fast, { logger }).pendingCount("abc")).resolves.toBe(0);
    });
  });
});
