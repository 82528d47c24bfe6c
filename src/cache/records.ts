import { z } from "zod";
import { jsonValueSchema, type JsonValue } from "../json.js";

/** Last successful result for one task identity, stored under the cache key. */
export interface ResultRecord {
  timestamp: number;
  payload: JsonValue;
  seqId: string;
}

/** Consecutive failures of one chain, stored under `cacheKey + "error"`. */
export interface ErrorRecord {
  seqId: string;
  timestamps: number[];
}

export const resultRecordSchema: z.ZodType<ResultRecord> = z.object({
  timestamp: z.number(),
  payload: jsonValueSchema,
  seqId: z.string(),
});

export const errorRecordSchema: z.ZodType<ErrorRecord> = z.object({
  seqId: z.string(),
  timestamps: z.array(z.number()),
});

export function decodeRecord<T>(
  schema: z.ZodType<T>,
  value: JsonValue | undefined,
  onInvalid: (issue: string) => void
): T | undefined {
  if (value === undefined) return undefined;
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;
  onInvalid(parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; "));
  return undefined;
}

export function encodeResultRecord(record: ResultRecord): JsonValue {
  return { timestamp: record.timestamp, payload: record.payload, seqId: record.seqId };
}

export function encodeErrorRecord(record: ErrorRecord): JsonValue {
  return { seqId: record.seqId, timestamps: [...record.timestamps] };
}
