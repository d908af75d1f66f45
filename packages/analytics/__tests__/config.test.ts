import { describe, it, expect } from "@jest/globals";
import { loadWorkerConfig } from "../src/config.js";

describe("loadWorkerConfig", () => {
  const base = { REDIS_URL: "redis://localhost:6379", DATABASE_URL: "postgres://test@localhost/test" };

  it("should apply defaults", () => {
    expect(loadWorkerConfig(base)).toEqual({
      redisUrl: "redis://localhost:6379",
      databaseUrl: "postgres://test@localhost/test",
      dbTimeoutMs: 2000,
      intervalMs: 10_000,
      scanCount: 500,
    });
  });

  it("should read the flush interval in seconds", () => {
    const config = loadWorkerConfig({ ...base, FLUSH_INTERVAL_SECONDS: "3", FLUSH_SCAN_COUNT: "50" });

    expect(config.intervalMs).toBe(3000);
    expect(config.scanCount).toBe(50);
  });

  it("should require both store URLs", () => {
    expect(() => loadWorkerConfig({ REDIS_URL: "redis://localhost:6379" })).toThrow(
      "Missing required environment variable: DATABASE_URL"
    );
  });
});
