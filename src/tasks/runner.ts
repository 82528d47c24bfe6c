import { InvalidTaskPayloadError, UnknownTaskError, errorMessage } from "../errors.js";
import type { TaskEventSink } from "./audit.js";
import type { TasksDb } from "./db.js";
import { claimNextTask, completeTask, failTask, pruneTasks, renewTaskLock } from "./taskStore.js";
import { taskCallSchema, type TaskCall } from "./types.js";
import type { HandlerRegistry } from "./workerRegistry.js";

export interface ConsumerContext {
  db: TasksDb;
  registry: HandlerRegistry;
  workerId: string;
  lockTtlMs: number;
  events: TaskEventSink;
  now?: () => number;
}

export interface ConsumerLoopOptions extends ConsumerContext {
  pollIntervalMs: number;
  maxClaimsPerTick: number;
  concurrency: number;
  /** Finished rows older than this are deleted. */
  retentionMs: number;
  pruneIntervalMs: number;
  signal?: AbortSignal;
}

export function decodeTaskCall(taskType: string, payloadJson: string): TaskCall {
  let raw: unknown;
  try {
    raw = JSON.parse(payloadJson);
  } catch (e) {
    throw new InvalidTaskPayloadError(taskType, errorMessage(e));
  }
  const parsed = taskCallSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidTaskPayloadError(taskType, parsed.error.issues.map((i) => i.message).join("; "));
  }
  return parsed.data;
}

/**
 * Claim and run one task. Returns false when nothing was runnable.
 *
 * A handler that throws fails the row: retryable with queue backoff, except
 * for payloads that can never decode.
 */
export async function processNextTask(ctx: ConsumerContext): Promise<boolean> {
  const now = ctx.now ?? Date.now;
  const { db, workerId, events } = ctx;

  const claimed = claimNextTask(db, { workerId, lockTtlMs: ctx.lockTtlMs, nowMs: now() });
  if (!claimed) return false;

  const { task } = claimed;
  events({
    type: "TASK_CLAIMED",
    taskId: task.id,
    taskType: task.type,
    workerId,
    lockUntilMs: claimed.lockUntilMs,
  });

  const handler = ctx.registry.get(task.type);
  if (!handler) {
    const err = new UnknownTaskError(task.type).message;
    failTask(db, { taskId: task.id, nowMs: now(), workerId, error: err, retryable: false });
    events({ type: "TASK_FAILED", taskId: task.id, taskType: task.type, workerId, retryable: false, error: err });
    console.error(`[task-runner] ${err}`);
    return true;
  }

  // Keep the lock alive while the handler runs so the row is not reclaimed
  const heartbeat = setInterval(() => {
    try {
      if (!renewTaskLock(db, { taskId: task.id, workerId, lockTtlMs: ctx.lockTtlMs, nowMs: now() })) {
        console.warn(`[task-runner] ${task.type} id=${task.id} lost its lock`);
      }
    } catch (e) {
      console.warn(`[task-runner] ${task.type} id=${task.id} lock renewal failed: ${errorMessage(e)}`);
    }
  }, Math.max(1_000, Math.floor(ctx.lockTtlMs / 2)));
  heartbeat.unref();

  try {
    const call = decodeTaskCall(task.type, task.payload_json);
    await handler(call, { nowMs: now(), workerId, taskId: task.id });

    completeTask(db, { taskId: task.id, nowMs: now(), workerId });
    events({ type: "TASK_SUCCEEDED", taskId: task.id, taskType: task.type, workerId });
  } catch (e) {
    const msg = errorMessage(e);
    const retryable = !(e instanceof InvalidTaskPayloadError);
    const res = failTask(db, { taskId: task.id, nowMs: now(), workerId, error: msg, retryable });
    events({
      type: "TASK_FAILED",
      taskId: task.id,
      taskType: task.type,
      workerId,
      retryable,
      nextRunAfterMs: res.nextRunAfterMs,
      error: msg,
    });
    console.error(
      `[task-runner] ${task.type} id=${task.id} failed (${res.final ? "final" : "will retry"}): ${msg}`
    );
  } finally {
    clearInterval(heartbeat);
  }

  return true;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

async function consumerLoop(opts: ConsumerLoopOptions, slot: number): Promise<void> {
  const ctx: ConsumerContext = { ...opts, workerId: `${opts.workerId}#${slot}` };

  while (!opts.signal?.aborted) {
    let claimedAny = false;
    for (let i = 0; i < opts.maxClaimsPerTick; i++) {
      if (!(await processNextTask(ctx))) break;
      claimedAny = true;
    }

    await sleep(claimedAny ? 0 : opts.pollIntervalMs, opts.signal);
  }
}

async function pruneLoop(opts: ConsumerLoopOptions): Promise<void> {
  const now = opts.now ?? Date.now;

  while (!opts.signal?.aborted) {
    const removed = pruneTasks(opts.db, now() - opts.retentionMs);
    if (removed > 0) console.log(`[task-runner] pruned ${removed} finished tasks`);
    await sleep(opts.pruneIntervalMs, opts.signal);
  }
}

/** Run `concurrency` consumers against the queue until the signal aborts. */
export async function runTaskConsumer(opts: ConsumerLoopOptions): Promise<void> {
  console.log(
    `[task-runner] starting workerId=${opts.workerId} poll=${opts.pollIntervalMs}ms ` +
      `lockTtl=${opts.lockTtlMs}ms maxClaims=${opts.maxClaimsPerTick} concurrency=${opts.concurrency} ` +
      `types=${opts.registry.types().join(",")}`
  );

  const loops: Promise<void>[] = [pruneLoop(opts)];
  for (let slot = 0; slot < opts.concurrency; slot++) loops.push(consumerLoop(opts, slot));
  await Promise.all(loops);

  console.log(`[task-runner] stopped workerId=${opts.workerId}`);
}
