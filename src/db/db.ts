/**
 * Guildhall — src/db/db.ts
 * WHAT: SQLite connection bootstrap.
 * WHY: Centralizes better-sqlite3 setup and PRAGMAs so consumers can just import `db`.
 * FLOWS:
 *  - Open DB → set PRAGMAs → (optional) statement tracing → closeDatabase() on shutdown
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA: https://sqlite.org/pragma.html
 *
 * NOTE: better-sqlite3 is synchronous; keep statements small and quick.
 * Tests run with DB_PATH=":memory:" so every test file gets a fresh database.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";

const DB_BUSY_TIMEOUT_MS = 5000;
const IN_MEMORY = ":memory:";

const dbPath = env.DB_PATH;
if (dbPath !== IN_MEMORY) {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
}

const dbTraceEnabled = process.env.DB_TRACE === "1";

export const db = new Database(dbPath, {
  fileMustExist: false,
  // DB_TRACE=1 logs every statement at debug level. Noisy; only for chasing a bug.
  verbose: dbTraceEnabled
    ? (message?: unknown) => logger.debug({ evt: "db_call", sql: String(message) }, "db call")
    : undefined,
});
// WAL journaling lets the API server read while the reminder loop writes
db.pragma("journal_mode = WAL");
// Reduce fsync frequency vs FULL
db.pragma("synchronous = NORMAL");
db.pragma("foreign_keys = ON");
// Wait briefly on contention rather than throwing SQLITE_BUSY immediately
db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);
logger.info({ dbPath, dbTraceEnabled }, "SQLite opened");

/**
 * Close the connection. Never throws: shutdown should log, not crash.
 */
export function closeDatabase(): void {
  logger.info("Closing database connection...");
  try {
    db.close();
    logger.info("Database closed successfully");
  } catch (err) {
    logger.error({ err }, "Error closing database");
  }
}
