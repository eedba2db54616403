/**
 * Guildhall — src/features/reminders/embedParser.ts
 * WHAT: Turns an event announcement embed into reminder data.
 * WHY: Announcements already say "Date: 15/03/2025 / Time: 19:30 / Location: ..."; staff
 *      shouldn't have to retype that into /reminder add.
 * FLOWS:
 *  - collect "Label: value" lines from the description and the fields
 *  - Time (required) + Date (default today) → event instant in the bot zone
 *  - reminder instant = event − offset
 *  - Days line → recurring, each day moved with the reminder when the offset crosses midnight;
 *    otherwise one-off on the reminder's weekday
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { formatHm, zonedParts, zonedWallToUtc } from "../../lib/time.js";
import { parseDaysString, parseEventDate, parseEventTime, type CalendarDate } from "./parsers.js";

/** The parts of a discord.js Embed we read. */
export interface EmbedLike {
  title?: string | null;
  description?: string | null;
  fields?: ReadonlyArray<{ name: string; value: string }>;
}

export interface EmbedParseOptions {
  nowMs: number;
  timeZone: string;
  offsetMinutes: number;
}

export interface ParsedEmbedReminder {
  title: string;
  description: string;
  /** Event start, epoch ms */
  eventAtMs: number;
  /** When the reminder goes out, epoch ms */
  reminderAtMs: number;
  /** HH:MM wall clock of the event */
  eventTime: string;
  /** HH:MM wall clock of the reminder */
  reminderTime: string;
  /** "-" when the embed has none */
  location: string;
  days: number[];
  recurring: boolean;
}

type Label = "date" | "time" | "location" | "days";

const LABELS = new Map<string, Label>([
  ["date", "date"],
  ["datum", "date"],
  ["time", "time"],
  ["tijd", "time"],
  ["uur", "time"],
  ["location", "location"],
  ["locatie", "location"],
  ["place", "location"],
  ["plaats", "location"],
  ["days", "days"],
  ["dagen", "days"],
]);

/**
 * Every "Label: value" line. Markdown emphasis and leading emoji are dropped
 * ("📅 **Date:** 15/03" → date=15/03). The first occurrence of a label wins.
 */
export function collectLabelledLines(embed: EmbedLike): Partial<Record<Label, string>> {
  const lines: string[] = [];
  if (embed.description) lines.push(...embed.description.split("\n"));
  for (const field of embed.fields ?? []) {
    const valueLines = field.value.split("\n");
    lines.push(`${field.name}: ${valueLines[0] ?? ""}`, ...valueLines.slice(1));
  }

  const found: Partial<Record<Label, string>> = {};
  for (const raw of lines) {
    const line = raw.replace(/[*_`]/g, "").replace(/^[^\p{L}]+/u, "");
    const match = line.match(/^([\p{L} ]+?)\s*:\s*(.+)$/u);
    if (!match) continue;
    const label = LABELS.get(match[1].trim().toLowerCase());
    if (label && found[label] === undefined) {
      found[label] = match[2].trim();
    }
  }
  return found;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
function calendarDayDelta(from: CalendarDate, to: CalendarDate): number {
  return Math.round((Date.UTC(to.year, to.month - 1, to.day) - Date.UTC(from.year, from.month - 1, from.day)) / DAY_MS);
}

/** Weekdays (0 = Monday) moved by `delta` days, sorted and deduplicated. */
export function shiftWeekdays(days: readonly number[], delta: number): number[] {
  const shifted = new Set(days.map((d) => (((d + delta) % 7) + 7) % 7));
  return [...shifted].sort((a, b) => a - b);
}

/**
 * Returns null when the embed has no usable time, or a date line we can't read.
 */
export function parseEmbedForReminder(embed: EmbedLike, opts: EmbedParseOptions): ParsedEmbedReminder | null {
  const lines = collectLabelledLines(embed);
  if (!lines.time) return null;

  const time = parseEventTime(lines.time);
  if (!time) return null;

  let date: CalendarDate | null;
  if (lines.date) {
    date = parseEventDate(lines.date, opts.nowMs, opts.timeZone);
    if (!date) return null;
  } else {
    const today = zonedParts(opts.nowMs, opts.timeZone);
    date = { year: today.year, month: today.month, day: today.day };
  }

  const eventAtMs = zonedWallToUtc({ ...date, hour: time.hour, minute: time.minute }, opts.timeZone);
  const reminderAtMs = eventAtMs - opts.offsetMinutes * 60_000;
  const reminderParts = zonedParts(reminderAtMs, opts.timeZone);

  const explicitDays = parseDaysString(lines.days);
  const recurring = explicitDays.length > 0;
  const dayDelta = calendarDayDelta(date, reminderParts);

  return {
    title: embed.title?.trim() || "Event",
    description: embed.description?.trim() ?? "",
    eventAtMs,
    reminderAtMs,
    eventTime: formatHm(time),
    reminderTime: formatHm(reminderParts),
    location: lines.location || "-",
    // a 00:30 event with a 60 minute lead reminds at 23:30 the evening before
    days: recurring ? shiftWeekdays(explicitDays, dayDelta) : [reminderParts.weekday],
    recurring,
  };
}
