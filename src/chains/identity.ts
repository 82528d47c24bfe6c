import { createHash, randomUUID } from "node:crypto";
import { canonicalJson, type JsonObject, type JsonValue } from "../json.js";

export const SEQ_ID_KWARG = "seq_id";

const ERROR_KEY_SUFFIX = "error";
const LOCK_KEY_SUFFIX = "lock";

export function withoutSeqId(kwargs: JsonObject): JsonObject {
  const { [SEQ_ID_KWARG]: _seq, ...rest } = kwargs;
  return rest;
}

export function seqIdFrom(kwargs: JsonObject): string {
  const seq = kwargs[SEQ_ID_KWARG];
  return typeof seq === "string" ? seq : "";
}

/**
 * Stable key for a task identity: sha256 over the canonical JSON of
 * `[taskName, args, kwargs]`, with the chain's `seq_id` left out so every
 * rerun of a chain maps onto the same key.
 */
export function buildCacheKey(taskName: string, args: JsonValue[], kwargs: JsonObject): string {
  const idStr = canonicalJson([taskName, args, withoutSeqId(kwargs)]);
  return createHash("sha256").update(idStr, "utf8").digest("hex");
}

export function errorKeyFor(cacheKey: string): string {
  return cacheKey + ERROR_KEY_SUFFIX;
}

export function lockKeyFor(cacheKey: string): string {
  return cacheKey + LOCK_KEY_SUFFIX;
}

export function newSeqId(): string {
  return randomUUID().replace(/-/g, "");
}
