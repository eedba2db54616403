/**
 * Guildhall — src/features/tickets/store.ts
 * WHAT: support_tickets persistence and the state transitions staff drive.
 * WHY: Transitions are single conditional UPDATEs, so two staff clicking "claim" at
 *      once can't both win: the second UPDATE matches zero rows.
 * FLOWS:
 *  - createTicket() → open
 *  - claimTicket(): open & unclaimed → claimed
 *  - escalateTicket(): anything but closed → escalated
 *  - closeTicket(): anything but closed → closed
 *  - listTicketsSince() → /export tickets
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../../db/db.js";
import { nowUtc } from "../../lib/time.js";

export const TICKET_STATUSES = ["open", "claimed", "escalated", "closed"] as const;
export type TicketStatus = (typeof TICKET_STATUSES)[number];

export interface TicketRow {
  id: number;
  guild_id: string;
  user_id: string;
  username: string;
  description: string;
  status: TicketStatus;
  channel_id: string | null;
  claimed_by: string | null;
  claimed_at_s: number | null;
  escalated_to: string | null;
  created_at_s: number;
  updated_at_s: number;
  closed_at_s: number | null;
}

export interface NewTicket {
  guildId: string;
  userId: string;
  username: string;
  description: string;
  channelId?: string | null;
}

export function createTicket(input: NewTicket, nowS: number = nowUtc()): number {
  const result = db
    .prepare(
      `INSERT INTO support_tickets (guild_id, user_id, username, description, status, channel_id, created_at_s, updated_at_s)
       VALUES (?, ?, ?, ?, 'open', ?, ?, ?)`
    )
    .run(input.guildId, input.userId, input.username, input.description, input.channelId ?? null, nowS, nowS);
  return Number(result.lastInsertRowid);
}

export function getTicket(guildId: string, id: number): TicketRow | undefined {
  return db
    .prepare<[string, number], TicketRow>(`SELECT * FROM support_tickets WHERE guild_id = ? AND id = ?`)
    .get(guildId, id);
}

/**
 * Every ticket of the guild created at or after `sinceS` (all of them when null), newest first.
 */
export function listTicketsSince(guildId: string, sinceS: number | null): TicketRow[] {
  return db
    .prepare<[string, number], TicketRow>(
      `SELECT * FROM support_tickets WHERE guild_id = ? AND created_at_s >= ? ORDER BY id DESC`
    )
    .all(guildId, sinceS ?? 0);
}

/**
 * Everything not closed, oldest first. 25 = one embed's worth of fields.
 */
export function listActiveTickets(guildId: string, limit = 25): TicketRow[] {
  return db
    .prepare<[string, number], TicketRow>(
      `SELECT * FROM support_tickets
       WHERE guild_id = ? AND status IN ('open', 'claimed', 'escalated')
       ORDER BY created_at_s ASC, id ASC
       LIMIT ?`
    )
    .all(guildId, limit);
}

export function claimTicket(guildId: string, id: number, staffId: string, nowS: number = nowUtc()): boolean {
  return (
    db
      .prepare(
        `UPDATE support_tickets
         SET status = 'claimed', claimed_by = ?, claimed_at_s = ?, updated_at_s = ?
         WHERE guild_id = ? AND id = ? AND status = 'open' AND claimed_by IS NULL`
      )
      .run(staffId, nowS, nowS, guildId, id).changes > 0
  );
}

export function escalateTicket(
  guildId: string,
  id: number,
  escalatedTo: string | null,
  nowS: number = nowUtc()
): boolean {
  return (
    db
      .prepare(
        `UPDATE support_tickets
         SET status = 'escalated', escalated_to = ?, updated_at_s = ?
         WHERE guild_id = ? AND id = ? AND status != 'closed'`
      )
      .run(escalatedTo, nowS, guildId, id).changes > 0
  );
}

export function closeTicket(guildId: string, id: number, nowS: number = nowUtc()): boolean {
  return (
    db
      .prepare(
        `UPDATE support_tickets
         SET status = 'closed', closed_at_s = ?, updated_at_s = ?
         WHERE guild_id = ? AND id = ? AND status != 'closed'`
      )
      .run(nowS, nowS, guildId, id).changes > 0
  );
}

export function countTicketsByStatus(guildId: string): Record<TicketStatus, number> {
  const counts: Record<TicketStatus, number> = { open: 0, claimed: 0, escalated: 0, closed: 0 };
  const rows = db
    .prepare<[string], { status: TicketStatus; n: number }>(
      `SELECT status, COUNT(*) AS n FROM support_tickets WHERE guild_id = ? GROUP BY status`
    )
    .all(guildId);
  for (const row of rows) {
    counts[row.status] = row.n;
  }
  return counts;
}
