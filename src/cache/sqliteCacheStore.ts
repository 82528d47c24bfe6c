import { withImmediateTx, type TasksDb } from "../tasks/db.js";
import { jsonValueSchema, type JsonValue } from "../json.js";
import type { CacheStore } from "./cacheStore.js";

export class SqliteCacheStore implements CacheStore {
  constructor(
    private readonly db: TasksDb,
    private readonly now: () => number = Date.now
  ) {}

  async get(key: string): Promise<JsonValue | undefined> {
    const row = this.db.prepare(`SELECT value_json FROM cache_entries WHERE key = ?`).get(key) as
      | { value_json: string }
      | undefined;
    if (!row) return undefined;
    return jsonValueSchema.parse(JSON.parse(row.value_json));
  }

  async set(key: string, value: JsonValue): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO cache_entries (key, value_json, updated_at_ms)
        VALUES (?, ?, ?)
        ON CONFLICT(key) DO UPDATE SET value_json = excluded.value_json, updated_at_ms = excluded.updated_at_ms
      `
      )
      .run(key, JSON.stringify(value), this.now());
  }

  async delete(key: string): Promise<boolean> {
    const res = this.db.prepare(`DELETE FROM cache_entries WHERE key = ?`).run(key);
    return res.changes > 0;
  }

  async acquireLease(key: string, owner: string, ttlMs: number): Promise<boolean> {
    const nowMs = this.now();
    return withImmediateTx(this.db, () => {
      const row = this.db.prepare(`SELECT owner, lease_until_ms FROM cache_leases WHERE key = ?`).get(key) as
        | { owner: string; lease_until_ms: number }
        | undefined;

      if (row && row.owner !== owner && row.lease_until_ms > nowMs) return false;

      this.db
        .prepare(
          `
          INSERT INTO cache_leases (key, owner, lease_until_ms)
          VALUES (?, ?, ?)
          ON CONFLICT(key) DO UPDATE SET owner = excluded.owner, lease_until_ms = excluded.lease_until_ms
        `
        )
        .run(key, owner, nowMs + ttlMs);
      return true;
    });
  }

  async releaseLease(key: string, owner: string): Promise<void> {
    this.db.prepare(`DELETE FROM cache_leases WHERE key = ? AND owner = ?`).run(key, owner);
  }
}
