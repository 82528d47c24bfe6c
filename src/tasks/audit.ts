import fs from "node:fs";
import path from "node:path";

export type TaskEvent =
  | { type: "TASK_ENQUEUED"; taskId: string; taskType: string; runAfterMs: number; seqId?: string }
  | { type: "TASK_CLAIMED"; taskId: string; taskType: string; workerId: string; lockUntilMs: number }
  | { type: "TASK_SUCCEEDED"; taskId: string; taskType: string; workerId: string }
  | { type: "TASK_FAILED"; taskId: string; taskType: string; workerId: string; retryable: boolean; nextRunAfterMs?: number; error: string }
  | { type: "CHAIN_STARTED"; taskType: string; cacheKey: string; seqId: string }
  | { type: "CHAIN_STOPPED"; taskType: string; cacheKey: string; seqId: string; outcome: string; detail?: string }
  | { type: "CHAIN_FAILURE"; taskType: string; cacheKey: string; seqId: string; failures: number; retryInMs: number | null; error: string }
  | { type: "CHAIN_RESCHEDULED"; taskType: string; cacheKey: string; seqId: string; delayMs: number }
  | { type: "DEPLOY_REPORT"; taskType: string; user: string; machineId: string; ok: boolean; summary: string }
  | { type: "ADMIN_NOTICE"; subject: string; body: string };

export type TaskEventSink = (event: TaskEvent) => void;

/** Append-only JSON-lines audit trail. */
export function createTaskEventLog(filePath: string): TaskEventSink {
  const resolved = path.resolve(process.cwd(), filePath);
  const dir = path.dirname(resolved);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });

  return (event) => {
    const row = {
      ts: Date.now(),
      ...event,
    };
    fs.appendFileSync(resolved, JSON.stringify(row) + "\n", { encoding: "utf8" });
  };
}
