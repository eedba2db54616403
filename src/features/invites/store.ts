/**
 * Guildhall — src/features/invites/store.ts
 * WHAT: Per-guild invite counters.
 * FLOWS:
 *  - incrementInvites() ← member join attributed to an inviter
 *  - setInvites()/resetInvites() ← /invites set|reset
 *  - inviteLeaderboard()/inviteTotals() → /invites leaderboard, dashboard metrics
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../../db/db.js";
import { nowUtc } from "../../lib/time.js";

export interface InviteCount {
  userId: string;
  count: number;
}

/**
 * RETURNS: the inviter's count after the increment.
 */
export function incrementInvites(guildId: string, userId: string, nowS: number = nowUtc()): number {
  const row = db
    .prepare<[string, string, number], { invite_count: number }>(
      `INSERT INTO invite_tracker (guild_id, user_id, invite_count, updated_at_s)
       VALUES (?, ?, 1, ?)
       ON CONFLICT(guild_id, user_id) DO UPDATE SET
         invite_count = invite_count + 1,
         updated_at_s = excluded.updated_at_s
       RETURNING invite_count`
    )
    .get(guildId, userId, nowS);
  return row?.invite_count ?? 0;
}

export function setInvites(guildId: string, userId: string, count: number, nowS: number = nowUtc()): void {
  db.prepare(
    `INSERT INTO invite_tracker (guild_id, user_id, invite_count, updated_at_s)
     VALUES (?, ?, ?, ?)
     ON CONFLICT(guild_id, user_id) DO UPDATE SET
       invite_count = excluded.invite_count,
       updated_at_s = excluded.updated_at_s`
  ).run(guildId, userId, count, nowS);
}

/**
 * Zero one member's count, or the whole guild's when userId is omitted.
 * RETURNS: number of rows touched.
 */
export function resetInvites(guildId: string, userId?: string, nowS: number = nowUtc()): number {
  if (userId) {
    setInvites(guildId, userId, 0, nowS);
    return 1;
  }
  return db
    .prepare(`UPDATE invite_tracker SET invite_count = 0, updated_at_s = ? WHERE guild_id = ? AND invite_count != 0`)
    .run(nowS, guildId).changes;
}

export function getInviteCount(guildId: string, userId: string): number {
  return (
    db
      .prepare<[string, string], { invite_count: number }>(
        `SELECT invite_count FROM invite_tracker WHERE guild_id = ? AND user_id = ?`
      )
      .get(guildId, userId)?.invite_count ?? 0
  );
}

export function inviteLeaderboard(guildId: string, limit = 10): InviteCount[] {
  return db
    .prepare<[string, number], { user_id: string; invite_count: number }>(
      `SELECT user_id, invite_count FROM invite_tracker
       WHERE guild_id = ? AND invite_count > 0
       ORDER BY invite_count DESC, user_id ASC
       LIMIT ?`
    )
    .all(guildId, limit)
    .map((r) => ({ userId: r.user_id, count: r.invite_count }));
}

export function inviteTotals(guildId: string): { inviters: number; invites: number } {
  const row = db
    .prepare<[string], { inviters: number; invites: number | null }>(
      `SELECT COUNT(*) AS inviters, SUM(invite_count) AS invites
       FROM invite_tracker WHERE guild_id = ? AND invite_count > 0`
    )
    .get(guildId);
  return { inviters: row?.inviters ?? 0, invites: row?.invites ?? 0 };
}
