import type { JsonValue } from "../json.js";

/**
 * Key/value store shared by every worker. No TTLs and no transactions across
 * keys; the chain runner tolerates skew between a result record and its
 * error record.
 */
export interface CacheStore {
  get(key: string): Promise<JsonValue | undefined>;
  set(key: string, value: JsonValue): Promise<void>;
  delete(key: string): Promise<boolean>;

  /**
   * Take a short-lived exclusive lease. Returns false while another owner
   * holds an unexpired lease on the same key; the same owner may re-acquire.
   */
  acquireLease(key: string, owner: string, ttlMs: number): Promise<boolean>;
  releaseLease(key: string, owner: string): Promise<void>;
}
