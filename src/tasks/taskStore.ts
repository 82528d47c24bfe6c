import { randomUUID } from "node:crypto";
import { withImmediateTx, type TasksDb } from "./db.js";
import type { ClaimedTask, EnqueueParams, TaskCall, TaskQueue, TaskRecord, TaskState } from "./types.js";

// Deterministic backoff for infrastructure failures: 5s, 15s, 45s, 135s... capped at 5m
export function computeBackoffMs(attemptsAfterFailure: number): number {
  const base = 5_000;
  const factor = 3;
  const raw = base * Math.pow(factor, Math.max(0, attemptsAfterFailure - 1));
  return Math.min(raw, 5 * 60_000);
}

function seqIdOf(call: TaskCall): string | null {
  const seq = call.kwargs.seq_id;
  return typeof seq === "string" && seq ? seq : null;
}

export function enqueueTask(db: TasksDb, params: EnqueueParams, nowMs: number = Date.now()): string {
  const id = randomUUID();
  const runAfter = params.runAfterMs ?? nowMs;
  const priority = params.priority ?? 0;
  const maxAttempts = params.maxAttempts ?? 5;

  const stmt = db.prepare(`
    INSERT INTO tasks (
      id, type, payload_json, state, priority, attempts, max_attempts,
      run_after_ms, created_at_ms, updated_at_ms, last_error, seq_id
    ) VALUES (
      @id, @type, @payload_json, @state, @priority, @attempts, @max_attempts,
      @run_after_ms, @created_at_ms, @updated_at_ms, @last_error, @seq_id
    )
  `);

  stmt.run({
    id,
    type: params.type,
    payload_json: JSON.stringify(params.payload),
    state: "QUEUED",
    priority,
    attempts: 0,
    max_attempts: maxAttempts,
    run_after_ms: runAfter,
    created_at_ms: nowMs,
    updated_at_ms: nowMs,
    last_error: null,
    seq_id: seqIdOf(params.payload),
  });

  return id;
}

export function getTaskById(db: TasksDb, id: string): TaskRecord | null {
  const row = db.prepare(`SELECT * FROM tasks WHERE id = ?`).get(id) as TaskRecord | undefined;
  return row ?? null;
}

export function countTasksInState(db: TasksDb, state: TaskState): number {
  const row = db.prepare(`SELECT COUNT(*) AS n FROM tasks WHERE state = ?`).get(state) as { n: number };
  return row.n;
}

/**
 * Atomically claim the next runnable task.
 *
 * - BEGIN IMMEDIATE so only one writer claims at a time across processes.
 * - Expired locks are deleted inside the same transaction.
 * - RUNNING tasks left without a lock belong to a worker that died: they go
 *   back to QUEUED, or to FAILED_FINAL once out of attempts.
 * - Only QUEUED tasks without a live lock are considered.
 */
export function claimNextTask(
  db: TasksDb,
  opts: { workerId: string; lockTtlMs: number; nowMs: number }
): ClaimedTask | null {
  return withImmediateTx(db, () => {
    db.prepare(`DELETE FROM task_locks WHERE lock_until_ms <= ?`).run(opts.nowMs);
    reclaimOrphanedTasks(db, opts.nowMs);

    // Highest priority first, then oldest run_after
    const picked = db
      .prepare(
        `
        SELECT t.*
        FROM tasks t
        LEFT JOIN task_locks l ON l.task_id = t.id
        WHERE t.state = 'QUEUED'
          AND t.run_after_ms <= ?
          AND l.task_id IS NULL
        ORDER BY t.priority DESC, t.run_after_ms ASC, t.created_at_ms ASC
        LIMIT 1
      `
      )
      .get(opts.nowMs) as TaskRecord | undefined;

    if (!picked) return null;

    const lockUntil = opts.nowMs + opts.lockTtlMs;

    db.prepare(
      `
      INSERT INTO task_locks (task_id, locked_by, lock_until_ms)
      VALUES (?, ?, ?)
    `
    ).run(picked.id, opts.workerId, lockUntil);

    db.prepare(
      `
      UPDATE tasks
      SET state = 'RUNNING',
          attempts = attempts + 1,
          updated_at_ms = ?,
          last_error = NULL
      WHERE id = ?
    `
    ).run(opts.nowMs, picked.id);

    const updated = db.prepare(`SELECT * FROM tasks WHERE id = ?`).get(picked.id) as TaskRecord;
    return { task: updated, lockUntilMs: lockUntil };
  });
}

const ORPHANED = `state = 'RUNNING' AND id NOT IN (SELECT task_id FROM task_locks)`;

function reclaimOrphanedTasks(db: TasksDb, nowMs: number): void {
  db.prepare(
    `
    UPDATE tasks
    SET state = 'FAILED_FINAL', updated_at_ms = ?, last_error = 'lock expired'
    WHERE ${ORPHANED} AND attempts >= max_attempts
  `
  ).run(nowMs);

  db.prepare(
    `
    UPDATE tasks
    SET state = 'QUEUED', updated_at_ms = ?, last_error = 'lock expired'
    WHERE ${ORPHANED}
  `
  ).run(nowMs);
}

/** Push a held lock forward. False when the worker no longer holds it. */
export function renewTaskLock(
  db: TasksDb,
  opts: { taskId: string; workerId: string; lockTtlMs: number; nowMs: number }
): boolean {
  const res = db
    .prepare(`UPDATE task_locks SET lock_until_ms = ? WHERE task_id = ? AND locked_by = ?`)
    .run(opts.nowMs + opts.lockTtlMs, opts.taskId, opts.workerId);
  return res.changes > 0;
}

export function completeTask(db: TasksDb, opts: { taskId: string; nowMs: number; workerId: string }): void {
  withImmediateTx(db, () => {
    db.prepare(
      `
      UPDATE tasks
      SET state = 'SUCCEEDED',
          updated_at_ms = ?
      WHERE id = ?
    `
    ).run(opts.nowMs, opts.taskId);

    db.prepare(`DELETE FROM task_locks WHERE task_id = ? AND locked_by = ?`).run(opts.taskId, opts.workerId);
  });
}

export function failTask(
  db: TasksDb,
  opts: {
    taskId: string;
    nowMs: number;
    workerId: string;
    error: string;
    retryable: boolean;
  }
): { nextRunAfterMs?: number; final: boolean } {
  return withImmediateTx(db, () => {
    const row = db.prepare(`SELECT * FROM tasks WHERE id = ?`).get(opts.taskId) as TaskRecord | undefined;
    if (!row) {
      // Task vanished: release lock and move on
      db.prepare(`DELETE FROM task_locks WHERE task_id = ? AND locked_by = ?`).run(opts.taskId, opts.workerId);
      return { final: true };
    }

    const attempts = row.attempts; // already incremented when claimed

    let nextRunAfterMs: number | undefined;
    let state: TaskState;

    if (!opts.retryable || attempts >= row.max_attempts) {
      state = "FAILED_FINAL";
    } else {
      // Retryable rows go straight back to QUEUED with a later run_after
      state = "QUEUED";
      nextRunAfterMs = opts.nowMs + computeBackoffMs(attempts);
    }

    db.prepare(
      `
      UPDATE tasks
      SET state = ?,
          run_after_ms = COALESCE(?, run_after_ms),
          updated_at_ms = ?,
          last_error = ?
      WHERE id = ?
    `
    ).run(state, nextRunAfterMs ?? null, opts.nowMs, opts.error, opts.taskId);

    db.prepare(`DELETE FROM task_locks WHERE task_id = ? AND locked_by = ?`).run(opts.taskId, opts.workerId);

    return { nextRunAfterMs, final: state === "FAILED_FINAL" };
  });
}

/**
 * Delete finished rows last touched before `beforeMs`. Polling chains add a
 * row per iteration, so this runs periodically from the consumer.
 */
export function pruneTasks(db: TasksDb, beforeMs: number): number {
  const res = db
    .prepare(`DELETE FROM tasks WHERE state IN ('SUCCEEDED', 'FAILED_FINAL') AND updated_at_ms < ?`)
    .run(beforeMs);
  return res.changes;
}

/** Queue submission over the tasks table. */
export class SqliteTaskQueue implements TaskQueue {
  constructor(
    private readonly db: TasksDb,
    private readonly now: () => number = Date.now
  ) {}

  async submit(taskName: string, call: TaskCall, delayMs = 0): Promise<string> {
    const nowMs = this.now();
    return enqueueTask(this.db, { type: taskName, payload: call, runAfterMs: nowMs + Math.max(0, delayMs) }, nowMs);
  }
}
