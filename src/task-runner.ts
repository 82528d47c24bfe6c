import "dotenv/config";
import { SqliteCacheStore } from "./cache/sqliteCacheStore.js";
import { buildTaskDefinitions } from "./definitions/index.js";
import { ListenerHub } from "./notify/hub.js";
import { HubNotifier } from "./notify/notifier.js";
import { startServer, stopServer } from "./server.js";
import { HttpBackendGateway } from "./services/httpGateway.js";
import { createTaskEventLog } from "./tasks/audit.js";
import { loadWorkerConfig } from "./tasks/config.js";
import { closeTasksDb, openTasksDb } from "./tasks/db.js";
import { migrateTasksDb } from "./tasks/migrations.js";
import { runTaskConsumer } from "./tasks/runner.js";
import { SqliteTaskQueue } from "./tasks/taskStore.js";
import { buildWorker } from "./worker.js";

async function main() {
  const config = loadWorkerConfig();
  if (!config.tasksEnabled) {
    console.log("[task-runner] TASKS_ENABLED is false; exiting (fail-closed).");
    return;
  }

  const db = openTasksDb(config.dbPath);
  migrateTasksDb(db);

  const events = createTaskEventLog(config.eventsPath);
  const hub = new ListenerHub();
  const gateway = new HttpBackendGateway({ baseUrl: config.gatewayUrl, timeoutMs: config.gatewayTimeoutMs });
  const services = gateway.services();
  const queue = new SqliteTaskQueue(db);

  const worker = buildWorker({
    definitions: buildTaskDefinitions(services),
    services,
    cache: new SqliteCacheStore(db),
    queue,
    presence: hub,
    publisher: hub,
    notifier: new HubNotifier(hub, events),
    events,
    leaseTtlMs: config.leaseTtlMs,
  });

  const running = await startServer(
    { runners: worker.runners, queue, jobTypes: worker.jobTypes },
    hub,
    { port: config.port, bindHost: config.bindHost }
  );

  const controller = new AbortController();
  const stop = (signal: string) => {
    console.log(`[task-runner] ${signal} received, draining`);
    controller.abort();
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));

  await runTaskConsumer({
    db,
    registry: worker.registry,
    workerId: config.workerId,
    lockTtlMs: config.lockTtlMs,
    pollIntervalMs: config.pollIntervalMs,
    maxClaimsPerTick: config.maxClaimsPerTick,
    concurrency: config.concurrency,
    retentionMs: config.retentionMs,
    pruneIntervalMs: config.pruneIntervalMs,
    events,
    signal: controller.signal,
  });

  await stopServer(running);
  closeTasksDb(db);
}

main().catch((e) => {
  console.error("[task-runner] fatal:", e);
  process.exit(1);
});
