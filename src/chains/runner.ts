import { randomUUID } from "node:crypto";
import type { CacheStore } from "../cache/cacheStore.js";
import {
  decodeRecord,
  encodeErrorRecord,
  encodeResultRecord,
  errorRecordSchema,
  resultRecordSchema,
  type ErrorRecord,
  type ResultRecord,
} from "../cache/records.js";
import { errorMessage } from "../errors.js";
import type { JsonObject, JsonValue } from "../json.js";
import type { PresenceOracle, ResultPublisher } from "../notify/types.js";
import type { TaskEventSink } from "../tasks/audit.js";
import { DEFAULT_CHAIN_LEASE_TTL_MS } from "../tasks/config.js";
import type { TaskCall, TaskHandler, TaskQueue } from "../tasks/types.js";
import type { TaskDefinition } from "./definition.js";
import {
  SEQ_ID_KWARG,
  buildCacheKey,
  errorKeyFor,
  lockKeyFor,
  newSeqId,
  seqIdFrom,
  withoutSeqId,
} from "./identity.js";

/** How one invocation of a chain ended. */
export type ChainOutcome =
  | "not_listening"
  | "superseded"
  | "fresh_cache"
  | "duplicate"
  | "retry_scheduled"
  | "gave_up"
  | "publish_failed"
  | "completed"
  | "rescheduled";

/** Result of the execution step. Domain errors are already folded into it. */
export type AttemptResult =
  | { kind: "success"; payload: JsonValue }
  | { kind: "retry"; delayMs: number; errorRecord: ErrorRecord }
  | { kind: "give_up"; errorRecord: ErrorRecord };

export type SmartDelayResult =
  | { hit: true; payload: JsonValue; ageMs: number; scheduled: boolean }
  | { hit: false; scheduled: boolean };

export interface ChainRunnerDeps {
  cache: CacheStore;
  queue: TaskQueue;
  presence: PresenceOracle;
  publisher: ResultPublisher;
  events: TaskEventSink;
  now?: () => number;
  newSeqId?: () => string;
  leaseTtlMs?: number;
}

interface ChainContext {
  call: TaskCall;
  cacheKey: string;
  errorKey: string;
  seqId: string;
}

/**
 * Runs one task definition as deduplicated chains.
 *
 * Each invocation runs to completion and, when the chain should continue,
 * resubmits the same call with the chain's `seq_id` after a delay. Only one
 * chain per identity stays current: the cached result carries the `seq_id`
 * of the chain that wrote it, and older chains stop when they see a
 * different one.
 *
 * Cache, queue, presence and publisher errors are not caught here; they
 * fail the queue row and are retried by the queue.
 */
export class ChainRunner {
  private readonly cache: CacheStore;
  private readonly queue: TaskQueue;
  private readonly presence: PresenceOracle;
  private readonly publisher: ResultPublisher;
  private readonly events: TaskEventSink;
  private readonly now: () => number;
  private readonly mintSeqId: () => string;
  private readonly leaseTtlMs: number;
  private readonly tag: string;

  constructor(readonly definition: TaskDefinition, deps: ChainRunnerDeps) {
    this.cache = deps.cache;
    this.queue = deps.queue;
    this.presence = deps.presence;
    this.publisher = deps.publisher;
    this.events = deps.events;
    this.now = deps.now ?? Date.now;
    this.mintSeqId = deps.newSeqId ?? newSeqId;
    this.leaseTtlMs = deps.leaseTtlMs ?? DEFAULT_CHAIN_LEASE_TTL_MS;
    this.tag = `[chain:${definition.name}]`;
  }

  cacheKeyFor(user: string, args: JsonValue[], kwargs: JsonObject = {}): string {
    return buildCacheKey(this.definition.name, [user, ...args], kwargs);
  }

  async run(call: TaskCall): Promise<ChainOutcome> {
    const def = this.definition;
    def.parseArgs(call.args);

    const cacheKey = this.cacheKeyFor(call.user, call.args, call.kwargs);
    const errorKey = errorKeyFor(cacheKey);
    const inboundSeqId = seqIdFrom(call.kwargs);

    const cachedErr = await this.loadError(errorKey);

    // Nobody waiting: stop the chain and forget its failures
    if (!(await this.presence.isListening(call.user))) {
      if (cachedErr) await this.cache.delete(errorKey);
      return this.stop(cacheKey, inboundSeqId, "not_listening");
    }

    const cached = await this.loadResult(cacheKey);
    if (cached) {
      if (inboundSeqId && inboundSeqId !== cached.seqId) {
        return this.stop(cacheKey, inboundSeqId, "superseded", `current seq ${cached.seqId}`);
      }
      if (!inboundSeqId && this.now() - cached.timestamp < def.resultFreshMs) {
        return this.stop(cacheKey, inboundSeqId, "fresh_cache");
      }
    }

    let seqId = inboundSeqId;
    if (!seqId) {
      seqId = this.mintSeqId();
      this.events({ type: "CHAIN_STARTED", taskType: def.name, cacheKey, seqId });
    }

    const lockKey = lockKeyFor(cacheKey);
    const leaseOwner = `${seqId}:${randomUUID()}`;
    if (!(await this.cache.acquireLease(lockKey, leaseOwner, this.leaseTtlMs))) {
      return this.stop(cacheKey, seqId, "duplicate");
    }

    try {
      const ctx: ChainContext = { call, cacheKey, errorKey, seqId };
      const result = await this.attempt(call, seqId, cachedErr);
      return await this.settle(ctx, result, cachedErr);
    } finally {
      await this.cache.releaseLease(lockKey, leaseOwner);
    }
  }

  /**
   * Execute the task once. Failures are appended to the chain's error
   * history and turned into a retry delay or a give-up by the backoff policy.
   */
  async attempt(call: TaskCall, seqId: string, cachedErr: ErrorRecord | undefined): Promise<AttemptResult> {
    const def = this.definition;
    try {
      const payload = await def.execute(call.user, call.args);
      return { kind: "success", payload };
    } catch (err) {
      const previous = cachedErr?.timestamps ?? [];
      const last = previous.length > 0 ? previous[previous.length - 1] : 0;
      const errorRecord: ErrorRecord = {
        seqId: cachedErr?.seqId ?? seqId,
        timestamps: [...previous, Math.max(this.now(), last)],
      };
      const first = errorRecord.timestamps[0];
      const offsets = errorRecord.timestamps.map((t) => t - first);

      let delayMs: number | null;
      try {
        delayMs = await def.backoff(offsets, call.user, call.args, err);
      } catch (policyErr) {
        console.error(`${this.tag} backoff policy failed, giving up: ${errorMessage(policyErr)}`);
        delayMs = null;
      }

      this.events({
        type: "CHAIN_FAILURE",
        taskType: def.name,
        cacheKey: this.cacheKeyFor(call.user, call.args, call.kwargs),
        seqId,
        failures: errorRecord.timestamps.length,
        retryInMs: delayMs,
        error: errorMessage(err),
      });
      console.warn(
        `${this.tag} failure #${errorRecord.timestamps.length} seq=${seqId}: ${errorMessage(err)}; ` +
          (delayMs === null ? "giving up" : `retry in ${delayMs}ms`)
      );

      return delayMs === null ? { kind: "give_up", errorRecord } : { kind: "retry", delayMs, errorRecord };
    }
  }

  /**
   * Serve a cached result when one has not expired, and submit the task when
   * there is none or it is no longer fresh.
   */
  async smartDelay(user: string, args: JsonValue[], kwargs: JsonObject = {}): Promise<SmartDelayResult> {
    const def = this.definition;
    def.parseArgs(args);

    const call: TaskCall = { user, args, kwargs: withoutSeqId(kwargs) };
    const cached = await this.loadResult(this.cacheKeyFor(user, args, kwargs));
    if (!cached) {
      await this.queue.submit(def.name, call);
      return { hit: false, scheduled: true };
    }

    const ageMs = this.now() - cached.timestamp;
    let scheduled = false;
    if (ageMs > def.resultFreshMs) {
      await this.queue.submit(def.name, call);
      scheduled = true;
    }
    if (ageMs < def.resultExpiresMs) {
      return { hit: true, payload: cached.payload, ageMs, scheduled };
    }
    return { hit: false, scheduled };
  }

  async clearCache(user: string, args: JsonValue[], kwargs: JsonObject = {}): Promise<boolean> {
    const cacheKey = this.cacheKeyFor(user, args, kwargs);
    console.log(`${this.tag} clearing cache key=${cacheKey}`);
    return this.cache.delete(cacheKey);
  }

  handler(): TaskHandler {
    return async (call) => {
      await this.run(call);
    };
  }

  private async settle(ctx: ChainContext, result: AttemptResult, cachedErr: ErrorRecord | undefined): Promise<ChainOutcome> {
    const def = this.definition;
    const { call, cacheKey, errorKey, seqId } = ctx;

    switch (result.kind) {
      case "retry":
        await this.cache.set(errorKey, encodeErrorRecord(result.errorRecord));
        await this.resubmit(call, seqId, result.delayMs);
        return "retry_scheduled";

      case "give_up":
        await this.cache.delete(errorKey);
        return this.stop(cacheKey, seqId, "gave_up", `after ${result.errorRecord.timestamps.length} failures`);

      case "success": {
        if (cachedErr) await this.cache.delete(errorKey);

        const record: ResultRecord = { timestamp: this.now(), payload: result.payload, seqId };
        const delivered = await this.publisher.publish(call.user, def.name, result.payload);
        if (!delivered) {
          // Nobody received it, so nobody is listening: do not cache or continue
          return this.stop(cacheKey, seqId, "publish_failed");
        }

        await this.cache.set(cacheKey, encodeResultRecord(record));
        if (!def.polling) return this.stop(cacheKey, seqId, "completed");

        await this.resubmit(call, seqId, def.resultFreshMs);
        this.events({ type: "CHAIN_RESCHEDULED", taskType: def.name, cacheKey, seqId, delayMs: def.resultFreshMs });
        return "rescheduled";
      }
    }
  }

  private async resubmit(call: TaskCall, seqId: string, delayMs: number): Promise<void> {
    const kwargs: JsonObject = { ...call.kwargs, [SEQ_ID_KWARG]: seqId };
    await this.queue.submit(this.definition.name, { user: call.user, args: call.args, kwargs }, delayMs);
  }

  private stop(cacheKey: string, seqId: string, outcome: ChainOutcome, detail?: string): ChainOutcome {
    this.events({ type: "CHAIN_STOPPED", taskType: this.definition.name, cacheKey, seqId, outcome, detail });
    return outcome;
  }

  private async loadResult(cacheKey: string): Promise<ResultRecord | undefined> {
    return decodeRecord(resultRecordSchema, await this.cache.get(cacheKey), (issue) =>
      console.warn(`${this.tag} ignoring malformed result record key=${cacheKey}: ${issue}`)
    );
  }

  private async loadError(errorKey: string): Promise<ErrorRecord | undefined> {
    return decodeRecord(errorRecordSchema, await this.cache.get(errorKey), (issue) =>
      console.warn(`${this.tag} ignoring malformed error record key=${errorKey}: ${issue}`)
    );
  }
}
