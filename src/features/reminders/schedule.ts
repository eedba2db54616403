/**
 * Guildhall — src/features/reminders/schedule.ts
 * WHAT: Decides whether a reminder row is due in a given minute. Pure, no I/O.
 * WHY: Kept apart from the dispatcher so the matching rules are testable with plain objects.
 * FLOWS:
 *  - dueReason(row, minute, tz) → "event_start" | "pre_event" | "recurring" | null
 *  - sentThisMinute(row, minute) → idempotency guard across restarts and overlapping ticks
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ZonedMinute } from "../../lib/time.js";
import { zonedDateKey } from "../../lib/time.js";
import { parseDaysCsv } from "./parsers.js";
import type { ReminderRow } from "./store.js";

export type DueReason = "pre_event" | "event_start" | "recurring";

export type ScheduleRow = Pick<ReminderRow, "time" | "call_time" | "days" | "event_time_s" | "offset_minutes">;

/**
 * Why a row fires in this minute, or null.
 *
 * One-offs fire twice: `offset_minutes` before the event (on the date of that instant)
 * and at `call_time` on the event date. Event start is checked first so a zero offset,
 * where both times coincide, still ends with the event-start send.
 */
export function dueReason(row: ScheduleRow, now: ZonedMinute, timeZone: string): DueReason | null {
  if (row.event_time_s !== null) {
    if (row.call_time === now.time && zonedDateKey(row.event_time_s, timeZone) === now.date) {
      return "event_start";
    }
    const reminderS = row.event_time_s - row.offset_minutes * 60;
    if (row.time === now.time && zonedDateKey(reminderS, timeZone) === now.date) {
      return "pre_event";
    }
    return null;
  }

  if (row.time === now.time && parseDaysCsv(row.days).includes(now.weekday)) {
    return "recurring";
  }
  return null;
}

export function sentThisMinute(lastSentS: number | null, now: ZonedMinute): boolean {
  return lastSentS !== null && Math.floor(lastSentS / 60) === Math.floor(now.epochS / 60);
}
