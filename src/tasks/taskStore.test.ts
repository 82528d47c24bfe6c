import { describe, expect, it } from "vitest";
import { memoryDb } from "../testing/fakes.js";
import {
  SqliteTaskQueue,
  claimNextTask,
  completeTask,
  computeBackoffMs,
  countTasksInState,
  enqueueTask,
  failTask,
  getTaskById,
  pruneTasks,
  renewTaskLock,
} from "./taskStore.js";
import type { TaskCall } from "./types.js";

const T = 1_700_000_000_000;
const call: TaskCall = { user: "alice", args: ["b-1"], kwargs: {} };
const claimOpts = { workerId: "w", lockTtlMs: 30_000 };

describe("computeBackoffMs", () => {
  it("triples from 5s and caps at 5 minutes", () => {
    expect([1, 2, 3, 4, 5, 9].map(computeBackoffMs)).toEqual([5_000, 15_000, 45_000, 135_000, 300_000, 300_000]);
  });
});

describe("task store", () => {
  it("stores the chain seq id of a queued call", () => {
    const db = memoryDb();
    const id = enqueueTask(db, { type: "ping", payload: { ...call, kwargs: { seq_id: "s1" } } }, T);
    const plain = enqueueTask(db, { type: "ping", payload: call }, T);

    expect(getTaskById(db, id)).toMatchObject({ state: "QUEUED", seq_id: "s1", run_after_ms: T, attempts: 0 });
    expect(getTaskById(db, plain)?.seq_id).toBeNull();
    expect(getTaskById(db, "missing")).toBeNull();
  });

  it("claims runnable tasks by priority, then run_after", () => {
    const db = memoryDb();
    const early = enqueueTask(db, { type: "a", payload: call, runAfterMs: T - 10 }, T);
    const urgent = enqueueTask(db, { type: "b", payload: call, priority: 5 }, T);
    enqueueTask(db, { type: "c", payload: call, runAfterMs: T + 60_000 }, T);

    const first = claimNextTask(db, { ...claimOpts, nowMs: T });
    expect(first?.task).toMatchObject({ id: urgent, state: "RUNNING", attempts: 1 });
    expect(first?.lockUntilMs).toBe(T + 30_000);

    expect(claimNextTask(db, { ...claimOpts, nowMs: T })?.task.id).toBe(early);
    expect(claimNextTask(db, { ...claimOpts, nowMs: T })).toBeNull();
  });

  it("completes a claimed task", () => {
    const db = memoryDb();
    const id = enqueueTask(db, { type: "a", payload: call }, T);
    claimNextTask(db, { ...claimOpts, nowMs: T });

    completeTask(db, { taskId: id, nowMs: T + 1, workerId: "w" });

    expect(getTaskById(db, id)?.state).toBe("SUCCEEDED");
    expect(countTasksInState(db, "SUCCEEDED")).toBe(1);
  });

  it("requeues retryable failures with backoff until attempts run out", () => {
    const db = memoryDb();
    const id = enqueueTask(db, { type: "a", payload: call, maxAttempts: 2 }, T);

    claimNextTask(db, { ...claimOpts, nowMs: T });
    expect(failTask(db, { taskId: id, nowMs: T, workerId: "w", error: "down", retryable: true })).toEqual({
      nextRunAfterMs: T + 5_000,
      final: false,
    });
    expect(getTaskById(db, id)).toMatchObject({ state: "QUEUED", run_after_ms: T + 5_000, last_error: "down" });
    expect(claimNextTask(db, { ...claimOpts, nowMs: T + 4_999 })).toBeNull();

    const again = claimNextTask(db, { ...claimOpts, nowMs: T + 5_000 });
    expect(again?.task).toMatchObject({ id, attempts: 2, last_error: null });
    expect(failTask(db, { taskId: id, nowMs: T + 5_000, workerId: "w", error: "down", retryable: true })).toEqual({
      nextRunAfterMs: undefined,
      final: true,
    });
    expect(getTaskById(db, id)?.state).toBe("FAILED_FINAL");
  });

  it("fails non-retryable errors immediately", () => {
    const db = memoryDb();
    const id = enqueueTask(db, { type: "a", payload: call }, T);
    claimNextTask(db, { ...claimOpts, nowMs: T });

    expect(failTask(db, { taskId: id, nowMs: T, workerId: "w", error: "bad", retryable: false }).final).toBe(true);
    expect(getTaskById(db, id)).toMatchObject({ state: "FAILED_FINAL", last_error: "bad" });
  });
});

describe("abandoned tasks", () => {
  it("reclaims a running task once its worker's lock expires", () => {
    const db = memoryDb();
    const id = enqueueTask(db, { type: "a", payload: call }, T);
    claimNextTask(db, { workerId: "dead", lockTtlMs: 30_000, nowMs: T });

    expect(claimNextTask(db, { ...claimOpts, nowMs: T + 29_999 })).toBeNull();

    const reclaimed = claimNextTask(db, { ...claimOpts, nowMs: T + 30_000 });
    expect(reclaimed?.task).toMatchObject({ id, state: "RUNNING", attempts: 2, last_error: null });
  });

  it("fails an abandoned task that has no attempts left", () => {
    const db = memoryDb();
    const id = enqueueTask(db, { type: "a", payload: call, maxAttempts: 1 }, T);
    claimNextTask(db, { workerId: "dead", lockTtlMs: 30_000, nowMs: T });

    expect(claimNextTask(db, { ...claimOpts, nowMs: T + 60_000 })).toBeNull();
    expect(getTaskById(db, id)).toMatchObject({ state: "FAILED_FINAL", last_error: "lock expired" });
  });

  it("keeps a renewed lock", () => {
    const db = memoryDb();
    const id = enqueueTask(db, { type: "a", payload: call }, T);
    claimNextTask(db, { ...claimOpts, nowMs: T });

    expect(renewTaskLock(db, { taskId: id, workerId: "other", lockTtlMs: 30_000, nowMs: T + 20_000 })).toBe(false);
    expect(renewTaskLock(db, { taskId: id, workerId: "w", lockTtlMs: 30_000, nowMs: T + 20_000 })).toBe(true);

    expect(claimNextTask(db, { ...claimOpts, nowMs: T + 49_999 })).toBeNull();
    expect(getTaskById(db, id)?.state).toBe("RUNNING");
  });
});

describe("pruneTasks", () => {
  it("deletes finished rows older than the cutoff", () => {
    const db = memoryDb();
    const done = enqueueTask(db, { type: "a", payload: call }, T);
    claimNextTask(db, { ...claimOpts, nowMs: T });
    completeTask(db, { taskId: done, nowMs: T, workerId: "w" });

    const failed = enqueueTask(db, { type: "b", payload: call }, T);
    claimNextTask(db, { ...claimOpts, nowMs: T });
    failTask(db, { taskId: failed, nowMs: T, workerId: "w", error: "bad", retryable: false });

    const waiting = enqueueTask(db, { type: "c", payload: call, runAfterMs: T + 60_000 }, T);

    expect(pruneTasks(db, T)).toBe(0);
    expect(pruneTasks(db, T + 1)).toBe(2);
    expect(getTaskById(db, done)).toBeNull();
    expect(getTaskById(db, failed)).toBeNull();
    expect(getTaskById(db, waiting)?.state).toBe("QUEUED");
  });
});

describe("SqliteTaskQueue", () => {
  it("enqueues the call after the requested delay", async () => {
    const db = memoryDb();
    const queue = new SqliteTaskQueue(db, () => T);

    const later = await queue.submit("ping", { ...call, kwargs: { seq_id: "s1" } }, 10_000);
    const now = await queue.submit("ping", call, -5);

    expect(getTaskById(db, later)).toMatchObject({ type: "ping", run_after_ms: T + 10_000, seq_id: "s1" });
    expect(getTaskById(db, now)?.run_after_ms).toBe(T);
    expect(JSON.parse(getTaskById(db, now)?.payload_json ?? "null")).toEqual(call);
  });
});
