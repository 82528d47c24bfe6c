import type { ZodType, ZodTypeDef } from "zod";
import { InvalidTaskPayloadError, errorMessage, isTransientError } from "../errors.js";
import type { Notifier } from "../notify/types.js";
import type { BackendServices, ShellTarget } from "../services/types.js";
import type { TaskEventSink } from "../tasks/audit.js";
import type { TaskCall, TaskHandler, TaskQueue } from "../tasks/types.js";
import { postDeployArgsSchema, retryKwargsSchema, type PostDeployArgs } from "./schemas.js";

export const POST_DEPLOY_TASK = "post_deploy_steps";
export const POST_DEPLOY_MAX_RETRIES = 5;
export const TRANSIENT_RETRY_MS = 60_000;
export const NO_ADDRESS_RETRY_MS = 120_000;

export type PostDeployOutcome = "succeeded" | "script_failed" | "retry_scheduled" | "failed";

export interface PostDeployDeps {
  services: Pick<BackendServices, "inventory" | "shell" | "monitoring">;
  queue: TaskQueue;
  notifier: Notifier;
  events: TaskEventSink;
  now?: () => number;
}

export function parseTaskArgs<T>(taskType: string, schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidTaskPayloadError(taskType, parsed.error.issues.map((i) => i.message).join("; "));
  }
  return parsed.data;
}

function isIpv4(ip: string): boolean {
  return !ip.includes(":");
}

/**
 * Runs the deployment script on a freshly created machine.
 *
 * Unlike chain tasks this keeps no cache state: the retry count travels in
 * the queued call, transient errors are retried a fixed number of times
 * with a fixed delay, and the final result always reaches the user.
 */
export class PostDeploySteps {
  private readonly now: () => number;

  constructor(private readonly deps: PostDeployDeps) {
    this.now = deps.now ?? Date.now;
  }

  async run(call: TaskCall): Promise<PostDeployOutcome> {
    const [args] = parseTaskArgs(POST_DEPLOY_TASK, postDeployArgsSchema, call.args);
    const { retries } = parseTaskArgs(POST_DEPLOY_TASK, retryKwargsSchema, call.kwargs);
    const { inventory, shell, monitoring } = this.deps.services;
    const { notifier } = this.deps;

    try {
      const machines = await inventory.listMachines(call.user, args.backendId);
      const machine = machines.find((m) => m.id === args.machineId);
      const ips = machine ? machine.publicIps.filter(isIpv4) : [];
      if (!machine || ips.length === 0) {
        return this.retry(call, args, retries, NO_ADDRESS_RETRY_MS, `machine ${args.machineId} has no public IPv4 address yet`);
      }

      let command = args.command;
      if (args.monitoring) {
        try {
          const enrolment = await monitoring.enable(call.user, args.backendId, machine, ips);
          command = `${enrolment.command};${command}`;
        } catch (e) {
          notifier.notifyUser(call.user, `Enable monitoring failed for machine ${machine.name} (${machine.id})`, errorMessage(e));
          notifier.notifyAdmin(
            `Enable monitoring on creation failed for user ${call.user} machine ${machine.name}: ${errorMessage(e)}`
          );
        }
      }

      const target: ShellTarget = {
        backendId: args.backendId,
        machineId: machine.id,
        host: ips[0],
        keyId: args.keyId,
        username: args.username,
        password: args.password,
        port: args.port,
      };

      const startedMs = this.now();
      const result = await shell.run(call.user, target, command);
      const seconds = ((this.now() - startedMs) / 1000).toFixed(1);

      const report = [
        `Command: ${command}`,
        `Return value: ${result.exitCode}`,
        `Duration: ${seconds} seconds`,
        "Output:",
        result.output,
      ].join("\n");

      const ok = result.exitCode === 0;
      const subject = `Deployment script ${ok ? "succeeded" : "failed"} for machine ${machine.name} (${machine.id})`;
      notifier.notifyUser(call.user, subject, report);
      this.deps.events({
        type: "DEPLOY_REPORT",
        taskType: POST_DEPLOY_TASK,
        user: call.user,
        machineId: machine.id,
        ok,
        summary: `${subject}: exit ${result.exitCode} in ${seconds}s`,
      });
      console.log(`[deploy] ${subject} user=${call.user} exit=${result.exitCode}`);
      return ok ? "succeeded" : "script_failed";
    } catch (e) {
      if (isTransientError(e)) return this.retry(call, args, retries, TRANSIENT_RETRY_MS, errorMessage(e));
      return this.fail(call, args, retries, errorMessage(e));
    }
  }

  handler(): TaskHandler {
    return async (call) => {
      await this.run(call);
    };
  }

  private async retry(
    call: TaskCall,
    args: PostDeployArgs,
    retries: number,
    delayMs: number,
    reason: string
  ): Promise<PostDeployOutcome> {
    if (retries >= POST_DEPLOY_MAX_RETRIES) return this.fail(call, args, retries, reason);

    await this.deps.queue.submit(POST_DEPLOY_TASK, { ...call, kwargs: { ...call.kwargs, retries: retries + 1 } }, delayMs);
    console.log(`[deploy] machine ${args.machineId}: ${reason}; retry ${retries + 1}/${POST_DEPLOY_MAX_RETRIES} in ${delayMs}ms`);
    return "retry_scheduled";
  }

  private fail(call: TaskCall, args: PostDeployArgs, retries: number, reason: string): PostDeployOutcome {
    const { notifier } = this.deps;
    notifier.notifyUser(call.user, `Deployment script failed for machine ${args.machineId} after ${retries} retries`, reason);
    notifier.notifyAdmin(
      `Deployment script failed for machine ${args.machineId} in backend ${args.backendId} by user ${call.user} after ${retries} retries`,
      reason
    );
    this.deps.events({
      type: "DEPLOY_REPORT",
      taskType: POST_DEPLOY_TASK,
      user: call.user,
      machineId: args.machineId,
      ok: false,
      summary: reason,
    });
    return "failed";
  }
}
