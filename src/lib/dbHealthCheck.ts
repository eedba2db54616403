/**
 * Guildhall — src/lib/dbHealthCheck.ts
 * WHAT: Verifies database integrity on startup and answers "is the DB reachable?" for /health.
 * WHY: A corrupted file or a wrong DB_PATH should stop the bot before it starts sending reminders.
 * FLOWS:
 *  - requireHealthyDatabase() at boot → checkDatabaseHealth() → exit(1) when unhealthy
 *  - pingDatabase() ← /health, /api/status
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Database } from "better-sqlite3";
import { logger } from "./logger.js";
import { db } from "../db/db.js";

export interface HealthCheckResult {
  healthy: boolean;
  integrity: "ok" | "corrupt" | "error";
  errors: string[];
  tables: Record<string, number | "error">;
}

// Tables every feature needs. Zero rows is fine, a missing table is not.
export const CRITICAL_TABLES = [
  "bot_settings",
  "reminders",
  "support_tickets",
  "faq_entries",
  "invite_tracker",
  "onboarding",
  "audit_logs",
] as const;

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function checkDatabaseHealth(database: Database = db): HealthCheckResult {
  const result: HealthCheckResult = { healthy: false, integrity: "error", errors: [], tables: {} };

  try {
    const rows = database.prepare<[], { integrity_check: string }>("PRAGMA integrity_check").all();
    if (rows.length === 1 && rows[0].integrity_check === "ok") {
      result.integrity = "ok";
    } else {
      result.integrity = "corrupt";
      result.errors.push(`Database corruption detected: ${rows.map((r) => r.integrity_check).join("; ")}`);
    }
  } catch (err) {
    result.errors.push(`Integrity check failed: ${message(err)}`);
  }

  for (const table of CRITICAL_TABLES) {
    try {
      const row = database.prepare<[], { c: number }>(`SELECT COUNT(*) AS c FROM ${table}`).get();
      result.tables[table] = row?.c ?? 0;
    } catch (err) {
      result.tables[table] = "error";
      result.errors.push(`Cannot read table ${table}: ${message(err)}`);
    }
  }

  result.healthy = result.integrity === "ok" && result.errors.length === 0;
  return result;
}

/**
 * Round-trip latency of a trivial query in ms, or null when the query throws.
 */
export function pingDatabase(database: Database = db): number | null {
  const started = performance.now();
  try {
    database.prepare("SELECT 1").get();
    return Math.round((performance.now() - started) * 100) / 100;
  } catch (err) {
    logger.warn({ err }, "[healthcheck] database ping failed");
    return null;
  }
}

export function requireHealthyDatabase(): void {
  const result = checkDatabaseHealth();
  if (result.healthy) {
    logger.info({ integrity: result.integrity, tables: result.tables }, "[healthcheck] database health check passed");
    return;
  }

  logger.fatal(
    { integrity: result.integrity, errors: result.errors, tables: result.tables },
    "[healthcheck] DATABASE HEALTH CHECK FAILED - BOT CANNOT START"
  );
  // Exit code 1 so the process manager doesn't keep restarting into a corrupt file
  process.exit(1);
}
