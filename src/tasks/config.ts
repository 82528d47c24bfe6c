export const DEFAULT_LOCK_TTL_MS = 30_000; // 30s
export const DEFAULT_POLL_INTERVAL_MS = 1_000; // 1s
export const DEFAULT_MAX_CLAIMS_PER_TICK = 1;
export const DEFAULT_WORKER_CONCURRENCY = 4;
export const DEFAULT_CHAIN_LEASE_TTL_MS = 5 * 60_000;
export const DEFAULT_GATEWAY_TIMEOUT_MS = 60_000;
export const DEFAULT_TASK_RETENTION_MS = 60 * 60_000; // 1h
export const DEFAULT_PRUNE_INTERVAL_MS = 60_000;

type Env = Record<string, string | undefined>;

export function getEnvInt(name: string, fallback: number, env: Env = process.env): number {
  const v = env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

export function getEnvBool(name: string, fallback: boolean, env: Env = process.env): boolean {
  const v = env[name];
  if (v === undefined) return fallback;
  return v === "1" || v.toLowerCase() === "true" || v.toLowerCase() === "yes";
}

export function getEnvString(name: string, fallback: string, env: Env = process.env): string {
  const v = (env[name] || "").trim();
  return v || fallback;
}

export interface WorkerConfig {
  tasksEnabled: boolean;
  dbPath: string;
  eventsPath: string;
  workerId: string;
  lockTtlMs: number;
  pollIntervalMs: number;
  maxClaimsPerTick: number;
  concurrency: number;
  retentionMs: number;
  pruneIntervalMs: number;
  leaseTtlMs: number;
  port: number;
  bindHost: string;
  gatewayUrl: string;
  gatewayTimeoutMs: number;
}

export function loadWorkerConfig(env: Env = process.env): WorkerConfig {
  const config: WorkerConfig = {
    tasksEnabled: getEnvBool("TASKS_ENABLED", false, env),
    dbPath: getEnvString("TASKS_DB_PATH", ".data/tasks.db", env),
    eventsPath: getEnvString("TASK_EVENTS_PATH", ".data/task-events.jsonl", env),
    workerId: getEnvString("TASK_WORKER_ID", `runner-${process.pid}`, env),
    lockTtlMs: getEnvInt("TASK_LOCK_TTL_MS", DEFAULT_LOCK_TTL_MS, env),
    pollIntervalMs: getEnvInt("TASK_POLL_INTERVAL_MS", DEFAULT_POLL_INTERVAL_MS, env),
    maxClaimsPerTick: getEnvInt("TASK_MAX_CLAIMS_PER_TICK", DEFAULT_MAX_CLAIMS_PER_TICK, env),
    concurrency: getEnvInt("TASK_WORKER_CONCURRENCY", DEFAULT_WORKER_CONCURRENCY, env),
    retentionMs: getEnvInt("TASK_RETENTION_MS", DEFAULT_TASK_RETENTION_MS, env),
    pruneIntervalMs: getEnvInt("TASK_PRUNE_INTERVAL_MS", DEFAULT_PRUNE_INTERVAL_MS, env),
    leaseTtlMs: getEnvInt("CHAIN_LEASE_TTL_MS", DEFAULT_CHAIN_LEASE_TTL_MS, env),
    port: getEnvInt("PORT", 3000, env),
    // Keep localhost-only unless explicitly exposed
    bindHost: getEnvString("BIND_HOST", "127.0.0.1", env),
    gatewayUrl: getEnvString("BACKEND_GATEWAY_URL", "http://127.0.0.1:8080", env),
    gatewayTimeoutMs: getEnvInt("BACKEND_GATEWAY_TIMEOUT_MS", DEFAULT_GATEWAY_TIMEOUT_MS, env),
  };

  if (config.lockTtlMs < 1000) throw new Error("TASK_LOCK_TTL_MS must be >= 1000");
  if (config.concurrency < 1) throw new Error("TASK_WORKER_CONCURRENCY must be >= 1");
  if (config.maxClaimsPerTick < 1) throw new Error("TASK_MAX_CLAIMS_PER_TICK must be >= 1");
  if (config.retentionMs < 0) throw new Error("TASK_RETENTION_MS must be >= 0");
  if (config.pruneIntervalMs < 1000) throw new Error("TASK_PRUNE_INTERVAL_MS must be >= 1000");

  return config;
}
