#!/usr/bin/env node
import "dotenv/config";
import { jsonValueSchema, type JsonValue } from "../json.js";
import { createTaskEventLog } from "./audit.js";
import { getEnvString } from "./config.js";
import { closeTasksDb, openTasksDb } from "./db.js";
import { migrateTasksDb } from "./migrations.js";
import { SqliteTaskQueue } from "./taskStore.js";

// Manual trigger: no seq_id, so the runner treats it as a fresh external request.
// Usage: enqueue <task> <user> [arg...]   (object and array args are JSON)

function parseArg(raw: string): JsonValue {
  if (!raw.startsWith("{") && !raw.startsWith("[")) return raw;
  return jsonValueSchema.parse(JSON.parse(raw));
}

async function main() {
  const [taskType, user, ...rest] = process.argv.slice(2);
  if (!taskType || !user) {
    console.error("usage: enqueue <task> <user> [arg...]");
    process.exit(2);
  }

  const db = openTasksDb(getEnvString("TASKS_DB_PATH", ".data/tasks.db"));
  migrateTasksDb(db);

  const queue = new SqliteTaskQueue(db);
  const id = await queue.submit(taskType, { user, args: rest.map(parseArg), kwargs: {} });

  createTaskEventLog(getEnvString("TASK_EVENTS_PATH", ".data/task-events.jsonl"))({
    type: "TASK_ENQUEUED",
    taskId: id,
    taskType,
    runAfterMs: Date.now(),
  });
  closeTasksDb(db);

  console.log(`[enqueue] ${taskType} ${id}`);
}

main().catch((e) => {
  console.error("[enqueue] fatal:", e);
  process.exit(1);
});
