import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

const ensureDir = (filePath: string) => {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

const DEFAULT_BUSY_TIMEOUT_MS = 5000;

/**
 * Open a connection to the product store.
 *
 * Readers share one long-lived connection; each creation pipeline opens its own
 * so that its uncommitted provisional row stays invisible to them (WAL).
 */
export const openDatabase = (
  sqlitePath: string,
  options: { busyTimeoutMs?: number } = {},
): Database.Database => {
  const absolutePath = path.resolve(process.cwd(), sqlitePath);
  ensureDir(absolutePath);
  const db = new Database(absolutePath);
  db.pragma("journal_mode = WAL");
  db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS}`);
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");

  return db;
};

/**
 * Connection for one creation run. better-sqlite3 waits for locks
 * synchronously, so the writer does not wait at all: a second concurrent
 * BEGIN IMMEDIATE fails with SQLITE_BUSY instead of stalling the event loop.
 */
export const openWriteConnection = (sqlitePath: string): Database.Database =>
  openDatabase(sqlitePath, { busyTimeoutMs: 0 });
