/**
 * Guildhall — src/features/audit/store.ts
 * WHAT: One row per command invocation, plus the aggregates the HTTP API reads.
 * WHY: The dashboard shows which commands are used and which ones fail.
 * FLOWS:
 *  - recordCommand() ← wrapCommand (success or failure)
 *  - topCommands() → /api/top-commands
 *  - commandTotals() → /api/guilds/:id/metrics
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../../db/db.js";
import { nowUtc } from "../../lib/time.js";

export interface CommandAuditInput {
  guildId: string | null;
  userId: string;
  commandName: string;
  success: boolean;
  errorMessage?: string | null;
}

export interface TopCommand {
  command: string;
  count: number;
}

export function recordCommand(input: CommandAuditInput, nowS: number = nowUtc()): void {
  db.prepare(
    `INSERT INTO audit_logs (guild_id, user_id, command_name, success, error_message, created_at_s)
     VALUES (?, ?, ?, ?, ?, ?)`
  ).run(
    input.guildId,
    input.userId,
    input.commandName,
    input.success ? 1 : 0,
    input.errorMessage ?? null,
    nowS
  );
}

/**
 * Most used commands, all time. `guildId` narrows to one guild.
 */
export function topCommands(limit: number, guildId?: string): TopCommand[] {
  const where = guildId ? "WHERE guild_id = ?" : "";
  const params: Array<string | number> = guildId ? [guildId, limit] : [limit];
  return db
    .prepare<Array<string | number>, TopCommand>(
      `SELECT command_name AS command, COUNT(*) AS count
       FROM audit_logs
       ${where}
       GROUP BY command_name
       ORDER BY count DESC, command_name ASC
       LIMIT ?`
    )
    .all(...params);
}

export function commandTotals(guildId: string): { total: number; failures: number } {
  const row = db
    .prepare<[string], { total: number; failures: number | null }>(
      `SELECT COUNT(*) AS total, SUM(CASE WHEN success = 0 THEN 1 ELSE 0 END) AS failures
       FROM audit_logs WHERE guild_id = ?`
    )
    .get(guildId);
  // SUM over zero rows is NULL
  return { total: row?.total ?? 0, failures: row?.failures ?? 0 };
}
