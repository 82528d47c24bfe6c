import { z } from "zod";
import { jsonObjectSchema, jsonValueSchema, type JsonObject, type JsonValue } from "../json.js";

export type TaskState = "QUEUED" | "RUNNING" | "SUCCEEDED" | "FAILED_FINAL";

export interface TaskRecord {
  id: string;
  type: string;
  payload_json: string;
  state: TaskState;
  priority: number;
  attempts: number;
  max_attempts: number;
  run_after_ms: number;
  created_at_ms: number;
  updated_at_ms: number;
  last_error: string | null;
  seq_id: string | null;
}

export interface ClaimedTask {
  task: TaskRecord;
  lockUntilMs: number;
}

export interface TaskWorkerContext {
  nowMs: number;
  workerId: string;
  taskId: string;
}

export type TaskHandler = (payload: TaskCall, ctx: TaskWorkerContext) => Promise<void>;

export interface EnqueueParams {
  type: string;
  payload: TaskCall;
  runAfterMs?: number;
  priority?: number;
  maxAttempts?: number;
}

/**
 * One queued invocation: who it runs for, its positional arguments and its
 * keyword arguments (which may carry the chain's `seq_id`).
 */
export interface TaskCall {
  user: string;
  args: JsonValue[];
  kwargs: JsonObject;
}

export const taskCallSchema = z.object({
  user: z.string().min(1),
  args: z.array(jsonValueSchema).default([]),
  kwargs: jsonObjectSchema.default({}),
});

/** Queue submission seen by everything that schedules work. */
export interface TaskQueue {
  submit(taskName: string, call: TaskCall, delayMs?: number): Promise<string>;
}
