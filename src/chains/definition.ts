import type { z } from "zod";
import type { JsonValue } from "../json.js";
import { InvalidTaskPayloadError } from "../errors.js";
import { defaultBackoff, type BackoffDecision, type BackoffPolicy } from "./backoff.js";

export interface TaskSpec<A, P extends JsonValue> {
  name: string;
  /** Age after which a cached result no longer satisfies a new external trigger. */
  resultFreshMs: number;
  /** Age after which a cached result is not served at all. */
  resultExpiresMs: number;
  /** Re-run after every successful publish, every `resultFreshMs`. */
  polling: boolean;
  args: z.ZodType<A, z.ZodTypeDef, unknown>;
  execute(user: string, args: A): Promise<P>;
  backoff?: BackoffPolicy<A>;
}

/**
 * A registered task with its argument type erased, so definitions of
 * different shapes can share one table. Arguments are validated against the
 * task's schema on every call.
 */
export interface TaskDefinition {
  readonly name: string;
  readonly resultFreshMs: number;
  readonly resultExpiresMs: number;
  readonly polling: boolean;
  parseArgs(args: readonly JsonValue[]): void;
  execute(user: string, args: readonly JsonValue[]): Promise<JsonValue>;
  backoff(
    failureOffsetsMs: readonly number[],
    user: string,
    args: readonly JsonValue[],
    error: unknown
  ): Promise<BackoffDecision>;
}

export function defineTask<A, P extends JsonValue>(spec: TaskSpec<A, P>): TaskDefinition {
  if (spec.resultExpiresMs < spec.resultFreshMs) {
    throw new Error(`${spec.name}: resultExpiresMs must be >= resultFreshMs`);
  }

  const parse = (args: readonly JsonValue[]): A => {
    const parsed = spec.args.safeParse(args);
    if (!parsed.success) {
      throw new InvalidTaskPayloadError(spec.name, parsed.error.issues.map((i) => i.message).join("; "));
    }
    return parsed.data;
  };

  const policy: BackoffPolicy<A> = spec.backoff ?? defaultBackoff;

  return {
    name: spec.name,
    resultFreshMs: spec.resultFreshMs,
    resultExpiresMs: spec.resultExpiresMs,
    polling: spec.polling,
    parseArgs(args) {
      parse(args);
    },
    async execute(user, args) {
      return spec.execute(user, parse(args));
    },
    async backoff(failureOffsetsMs, user, args, error) {
      return policy(failureOffsetsMs, user, parse(args), error);
    },
  };
}

export type TaskTable = ReadonlyMap<string, TaskDefinition>;

export function buildTaskTable(definitions: readonly TaskDefinition[]): TaskTable {
  const table = new Map<string, TaskDefinition>();
  for (const def of definitions) {
    if (table.has(def.name)) throw new Error(`Task already defined: ${def.name}`);
    table.set(def.name, def);
  }
  return table;
}
