import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

export type TasksDb = Database.Database;

/**
 * Open the shared queue + cache database.
 *
 * One handle per worker process; it is passed to the queue store and the
 * cache store instead of living in module state. `:memory:` gives a private
 * database (tests).
 */
export function openTasksDb(dbPath: string): TasksDb {
  const inMemory = dbPath === ":memory:";

  if (!inMemory) {
    const dir = path.dirname(path.resolve(process.cwd(), dbPath));
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath);

  // WAL = concurrent readers across worker processes
  if (!inMemory) db.pragma("journal_mode = WAL");

  db.pragma("synchronous = FULL");
  db.pragma("foreign_keys = ON");

  // Avoid immediate "database is locked" errors under contention
  db.pragma("busy_timeout = 5000");
  db.pragma("temp_store = FILE");

  return db;
}

export function closeTasksDb(db: TasksDb): void {
  if (db.open) db.close();
}

/**
 * Run `fn` inside BEGIN IMMEDIATE so only one writer proceeds at a time
 * across processes.
 */
export function withImmediateTx<T>(db: TasksDb, fn: () => T): T {
  db.exec("BEGIN IMMEDIATE");
  try {
    const out = fn();
    db.exec("COMMIT");
    return out;
  } catch (e) {
    if (db.inTransaction) db.exec("ROLLBACK");
    throw e;
  }
}
