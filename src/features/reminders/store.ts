/**
 * Guildhall — src/features/reminders/store.ts
 * WHAT: CRUD and scheduler queries for the reminders table.
 * WHY: The loop and the commands share these queries; keeping SQL in one file keeps
 *      the "one-off ⇔ event_time_s IS NOT NULL" rule in one place.
 * FLOWS:
 *  - insertReminder() ← /reminder add, embed watcher
 *  - listDueCandidates(hms) → rows whose time or call_time is this minute
 *  - markSent() / deleteReminderById() ← dispatcher
 *  - purgeStaleOneOffs() ← every tick
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../../db/db.js";
import { nowUtc } from "../../lib/time.js";
import { formatDaysCsv } from "./parsers.js";

export interface ReminderRow {
  id: number;
  guild_id: string;
  name: string;
  channel_id: string;
  /** HH:MM:SS reminder wall time */
  time: string;
  /** HH:MM:SS event start wall time (one-offs) */
  call_time: string | null;
  /** CSV of weekday numbers, Monday = 0 */
  days: string;
  message: string;
  location: string | null;
  created_by: string;
  origin_channel_id: string | null;
  origin_message_id: string | null;
  /** Event instant; non-null means one-off */
  event_time_s: number | null;
  last_sent_s: number | null;
  image_url: string | null;
  offset_minutes: number;
  created_at_s: number;
}

export interface NewReminder {
  guildId: string;
  name: string;
  channelId: string;
  time: string;
  callTime?: string | null;
  days: readonly number[];
  message: string;
  location?: string | null;
  createdBy: string;
  originChannelId?: string | null;
  originMessageId?: string | null;
  eventTimeS?: number | null;
  imageUrl?: string | null;
  offsetMinutes?: number;
}

export function insertReminder(input: NewReminder, nowS: number = nowUtc()): number {
  const result = db
    .prepare(
      `INSERT INTO reminders
         (guild_id, name, channel_id, time, call_time, days, message, location, created_by,
          origin_channel_id, origin_message_id, event_time_s, image_url, offset_minutes, created_at_s)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      input.guildId,
      input.name,
      input.channelId,
      input.time,
      input.callTime ?? null,
      formatDaysCsv(input.days),
      input.message,
      input.location ?? null,
      input.createdBy,
      input.originChannelId ?? null,
      input.originMessageId ?? null,
      input.eventTimeS ?? null,
      input.imageUrl ?? null,
      input.offsetMinutes ?? 60,
      nowS
    );
  return Number(result.lastInsertRowid);
}

export function getReminder(guildId: string, id: number): ReminderRow | undefined {
  return db
    .prepare<[string, number], ReminderRow>(`SELECT * FROM reminders WHERE guild_id = ? AND id = ?`)
    .get(guildId, id);
}

/**
 * Upcoming one-offs first (soonest event first), then recurring ones by time of day.
 */
export function listReminders(guildId: string, limit = 25): ReminderRow[] {
  return db
    .prepare<[string, number], ReminderRow>(
      `SELECT * FROM reminders
       WHERE guild_id = ?
       ORDER BY event_time_s IS NULL, event_time_s, time, id
       LIMIT ?`
    )
    .all(guildId, limit);
}

export function findReminderByOrigin(guildId: string, originMessageId: string): ReminderRow | undefined {
  return db
    .prepare<[string, string], ReminderRow>(
      `SELECT * FROM reminders WHERE guild_id = ? AND origin_message_id = ? LIMIT 1`
    )
    .get(guildId, originMessageId);
}

/**
 * Guild-scoped delete. Returns false when no such reminder exists in this guild.
 */
export function deleteReminder(guildId: string, id: number): boolean {
  return db.prepare(`DELETE FROM reminders WHERE guild_id = ? AND id = ?`).run(guildId, id).changes > 0;
}

export function deleteReminderById(id: number): void {
  db.prepare(`DELETE FROM reminders WHERE id = ?`).run(id);
}

export function listDueCandidates(hms: string): ReminderRow[] {
  return db
    .prepare<[string, string], ReminderRow>(`SELECT * FROM reminders WHERE time = ? OR call_time = ?`)
    .all(hms, hms);
}

export function markSent(id: number, nowS: number): void {
  db.prepare(`UPDATE reminders SET last_sent_s = ? WHERE id = ?`).run(nowS, id);
}

/**
 * Drop one-offs whose event is older than the cutoff. Returns how many went.
 */
export function purgeStaleOneOffs(cutoffS: number): number {
  return db
    .prepare(`DELETE FROM reminders WHERE event_time_s IS NOT NULL AND event_time_s < ?`)
    .run(cutoffS).changes;
}

export function countReminders(guildId: string): { oneOff: number; recurring: number } {
  const row = db
    .prepare<[string], { one_off: number | null; recurring: number | null }>(
      `SELECT
         SUM(CASE WHEN event_time_s IS NOT NULL THEN 1 ELSE 0 END) AS one_off,
         SUM(CASE WHEN event_time_s IS NULL THEN 1 ELSE 0 END) AS recurring
       FROM reminders WHERE guild_id = ?`
    )
    .get(guildId);
  return { oneOff: row?.one_off ?? 0, recurring: row?.recurring ?? 0 };
}
