import { describe, expect, it } from "vitest";
import { getEnvBool, getEnvInt, getEnvString, loadWorkerConfig } from "./config.js";

describe("env helpers", () => {
  it("parses integers and falls back on garbage", () => {
    expect(getEnvInt("N", 7, { N: "42" })).toBe(42);
    expect(getEnvInt("N", 7, { N: "forty" })).toBe(7);
    expect(getEnvInt("N", 7, {})).toBe(7);
  });

  it("accepts the usual truthy spellings", () => {
    expect(["1", "true", "TRUE", "yes"].map((v) => getEnvBool("B", false, { B: v }))).toEqual([true, true, true, true]);
    expect(getEnvBool("B", true, { B: "0" })).toBe(false);
    expect(getEnvBool("B", true, {})).toBe(true);
  });

  it("trims strings and treats blanks as unset", () => {
    expect(getEnvString("S", "d", { S: "  x  " })).toBe("x");
    expect(getEnvString("S", "d", { S: "   " })).toBe("d");
  });
});

describe("loadWorkerConfig", () => {
  it("defaults to a disabled, localhost-only worker", () => {
    expect(loadWorkerConfig({})).toEqual({
      tasksEnabled: false,
      dbPath: ".data/tasks.db",
      eventsPath: ".data/task-events.jsonl",
      workerId: `runner-${process.pid}`,
      lockTtlMs: 30_000,
      pollIntervalMs: 1_000,
      maxClaimsPerTick: 1,
      concurrency: 4,
      retentionMs: 3_600_000,
      pruneIntervalMs: 60_000,
      leaseTtlMs: 300_000,
      port: 3000,
      bindHost: "127.0.0.1",
      gatewayUrl: "http://127.0.0.1:8080",
      gatewayTimeoutMs: 60_000,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadWorkerConfig({
      TASKS_ENABLED: "1",
      TASK_WORKER_ID: "w-1",
      TASK_WORKER_CONCURRENCY: "8",
      CHAIN_LEASE_TTL_MS: "60000",
    });
    expect(config).toMatchObject({ tasksEnabled: true, workerId: "w-1", concurrency: 8, leaseTtlMs: 60_000 });
  });

  it("rejects unusable limits", () => {
    expect(() => loadWorkerConfig({ TASK_LOCK_TTL_MS: "500" })).toThrow("TASK_LOCK_TTL_MS must be >= 1000");
    expect(() => loadWorkerConfig({ TASK_WORKER_CONCURRENCY: "0" })).toThrow(
      "TASK_WORKER_CONCURRENCY must be >= 1"
    );
    expect(() => loadWorkerConfig({ TASK_RETENTION_MS: "-1" })).toThrow("TASK_RETENTION_MS must be >= 0");
  });
});
