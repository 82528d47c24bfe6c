import crypto from "node:crypto";
import http from "node:http";
import express, { type NextFunction, type Request, type Response } from "express";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import type { WebSocketServer } from "ws";
import { z } from "zod";
import type { ChainRunner } from "./chains/runner.js";
import { errorMessage, InvalidTaskPayloadError } from "./errors.js";
import { jsonObjectSchema, jsonValueSchema } from "./json.js";
import { attachStreamServer, type ListenerHub } from "./notify/hub.js";
import type { TaskQueue } from "./tasks/types.js";

export interface ApiDeps {
  runners: ReadonlyMap<string, ChainRunner>;
  queue: TaskQueue;
  /** Non-chain task types that may be queued directly (deployment workflows). */
  jobTypes: ReadonlySet<string>;
}

export interface ApiResult {
  status: number;
  body: Record<string, unknown>;
}

const taskRequestSchema = z.object({
  user: z.string().min(1).max(256),
  args: z.array(jsonValueSchema).max(32).default([]),
  kwargs: jsonObjectSchema.default({}),
});

function badRequest(detail: string): ApiResult {
  return { status: 400, body: { error: detail } };
}

function parseTaskRequest(body: unknown) {
  return taskRequestSchema.safeParse(body);
}

/** Cached result if there is one; schedules a refresh when it is stale. */
export async function triggerTask(deps: ApiDeps, name: string, body: unknown): Promise<ApiResult> {
  const runner = deps.runners.get(name);
  if (!runner) return { status: 404, body: { error: `Unknown task: ${name}` } };

  const parsed = parseTaskRequest(body);
  if (!parsed.success) return badRequest(parsed.error.issues[0]?.message ?? "Invalid request");

  const { user, args, kwargs } = parsed.data;
  try {
    const out = await runner.smartDelay(user, args, kwargs);
    return { status: out.hit ? 200 : 202, body: out };
  } catch (e) {
    if (e instanceof InvalidTaskPayloadError) return badRequest(e.message);
    throw e;
  }
}

export async function clearTaskCache(deps: ApiDeps, name: string, body: unknown): Promise<ApiResult> {
  const runner = deps.runners.get(name);
  if (!runner) return { status: 404, body: { error: `Unknown task: ${name}` } };

  const parsed = parseTaskRequest(body);
  if (!parsed.success) return badRequest(parsed.error.issues[0]?.message ?? "Invalid request");

  const { user, args, kwargs } = parsed.data;
  const cleared = await runner.clearCache(user, args, kwargs);
  return { status: 200, body: { cleared } };
}

export async function submitJob(deps: ApiDeps, name: string, body: unknown): Promise<ApiResult> {
  if (!deps.jobTypes.has(name)) return { status: 404, body: { error: `Unknown job: ${name}` } };

  const parsed = parseTaskRequest(body);
  if (!parsed.success) return badRequest(parsed.error.issues[0]?.message ?? "Invalid request");

  const id = await deps.queue.submit(name, parsed.data);
  return { status: 202, body: { id } };
}

type RouteHandler = (deps: ApiDeps, name: string, body: unknown) => Promise<ApiResult>;

function route(deps: ApiDeps, fn: RouteHandler) {
  return (req: Request, res: Response) => {
    fn(deps, req.params.name, req.body).then(
      (out) => res.status(out.status).json(out.body),
      (e: unknown) => {
        console.error(`[api] ${req.method} ${req.path} failed: ${errorMessage(e)}`);
        res.status(500).json({ error: "Internal error" });
      }
    );
  };
}

export function createApp(deps: ApiDeps, hub: ListenerHub): express.Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(helmet());

  // Limit JSON body size
  app.use(express.json({ limit: "32kb" }));

  // Request log (request id + status + latency)
  app.use((req: Request, res: Response, next: NextFunction) => {
    const rid = crypto.randomUUID();
    const start = Date.now();
    res.on("finish", () => {
      console.log(
        JSON.stringify({ rid, method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start })
      );
    });
    next();
  });

  app.use(
    rateLimit({
      windowMs: 60_000,
      limit: 120,
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  app.get("/health", (req: Request, res: Response) => {
    const user = typeof req.query.user === "string" ? req.query.user : undefined;
    res.json({ ok: true, tasks: [...deps.runners.keys()].sort(), listeners: user ? hub.listenerCount(user) : undefined });
  });

  app.post("/tasks/:name", route(deps, triggerTask));
  app.delete("/tasks/:name/cache", route(deps, clearTaskCache));
  app.post("/jobs/:name", route(deps, submitJob));

  return app;
}

export interface RunningServer {
  server: http.Server;
  wss: WebSocketServer;
}

/** HTTP API plus the WebSocket result streams on one port. */
export function startServer(
  deps: ApiDeps,
  hub: ListenerHub,
  opts: { port: number; bindHost: string }
): Promise<RunningServer> {
  const server = http.createServer(createApp(deps, hub));
  const wss = attachStreamServer(server, hub);

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(opts.port, opts.bindHost, () => {
      console.log(`[stream] listening on http://${opts.bindHost}:${opts.port} (ws: /stream?user=...)`);
      resolve({ server, wss });
    });
  });
}

/** Terminates stream clients first: `server.close` waits for every upgraded socket. */
export function stopServer({ server, wss }: RunningServer): Promise<void> {
  for (const client of wss.clients) client.terminate();
  wss.close();

  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}
