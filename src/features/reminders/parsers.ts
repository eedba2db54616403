/**
 * Guildhall — src/features/reminders/parsers.ts
 * WHAT: Parsing for the strings people type into /reminder and into announcement embeds:
 *       weekday lists, clock times, calendar dates and a few relative dates.
 * WHY: Staff write in Dutch and English, with dots or colons, "ma,wo" or "weekdays".
 *      Everything downstream only wants numbers.
 * FLOWS:
 *  - parseDaysString("ma, wo") → [0, 2]
 *  - parseTimeString("19.30") → { hour: 19, minute: 30 }
 *  - parseEventDate("15th March") / parseRelativeDate("next friday") → calendar date
 *  - extractDateTimeFromText(text) → date + time, or null unless both are present
 *
 * NOTE: Weekdays are Monday-first (0 = Monday). Unparseable input returns []/null, never throws.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { addDays, formatDmy, isValidDate, zonedParts } from "../../lib/time.js";

export interface TimeOfDay {
  hour: number;
  minute: number;
}

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

// Order matters: prefix matching takes the first entry that fits.
const DAY_MAP: ReadonlyArray<readonly [string, number]> = [
  // Dutch
  ["ma", 0], ["maandag", 0],
  ["di", 1], ["dinsdag", 1],
  ["wo", 2], ["woe", 2], ["woensdag", 2],
  ["do", 3], ["donderdag", 3],
  ["vr", 4], ["vrijdag", 4],
  ["za", 5], ["zaterdag", 5],
  ["zo", 6], ["zondag", 6],
  // English
  ["monday", 0], ["mon", 0],
  ["tuesday", 1], ["tue", 1], ["tues", 1],
  ["wednesday", 2], ["wed", 2],
  ["thursday", 3], ["thu", 3], ["thur", 3],
  ["friday", 4], ["fri", 4],
  ["saturday", 5], ["sat", 5],
  ["sunday", 6], ["sun", 6],
];

const DAY_LOOKUP = new Map<string, number>(DAY_MAP);

const DUTCH_DAY_NAMES = ["Maandag", "Dinsdag", "Woensdag", "Donderdag", "Vrijdag", "Zaterdag", "Zondag"];

const ALL_DAYS = [0, 1, 2, 3, 4, 5, 6];

function dayFromWord(word: string): number | undefined {
  const exact = DAY_LOOKUP.get(word);
  if (exact !== undefined) return exact;
  if (/^\d$/.test(word)) {
    const n = Number(word);
    return n <= 6 ? n : undefined;
  }
  // "maan" → maandag, "wednes" → wednesday, "tuesdays" → tuesday
  const prefixed = DAY_MAP.find(([key]) => key.startsWith(word) || word.startsWith(key));
  return prefixed?.[1];
}

/**
 * "ma,di,wo" / "monday tuesday" / "0,1,2" / "daily" / "weekdays" → sorted unique weekday numbers.
 * Unknown parts are skipped.
 */
export function parseDaysString(input: string | null | undefined): number[] {
  if (!input) return [];

  const text = input.toLowerCase().trim().replace(/daily\s*:\s*/g, "").trim();
  if (text.includes("daily") || text.includes("dagelijks")) return [...ALL_DAYS];
  if (text.includes("weekdays")) return [0, 1, 2, 3, 4];
  if (text.includes("weekends")) return [5, 6];

  const found = new Set<number>();
  for (const part of text.split(/,\s*|\s+/)) {
    const word = part.trim();
    if (!word) continue;
    const day = dayFromWord(word);
    if (day !== undefined) found.add(day);
  }
  return [...found].sort((a, b) => a - b);
}

/**
 * Stored form of a day list: "0,2,4".
 */
export function formatDaysCsv(days: readonly number[]): string {
  return [...days].sort((a, b) => a - b).join(",");
}

export function parseDaysCsv(csv: string | null | undefined): number[] {
  if (!csv) return [];
  return csv
    .split(",")
    .map((part) => part.trim())
    .filter((part) => /^[0-6]$/.test(part))
    .map(Number);
}

/**
 * [0, 2] → "Maandag, Woensdag". Monday-first regardless of input order.
 */
export function formatDaysForDisplay(days: readonly number[]): string {
  return ALL_DAYS.filter((d) => days.includes(d))
    .map((d) => DUTCH_DAY_NAMES[d])
    .join(", ");
}

/**
 * "19:30", "9:05", "19.30", "19:30:00" → time of day. Seconds are ignored.
 */
export function parseTimeString(input: string | null | undefined): TimeOfDay | null {
  if (!input) return null;
  const match = input.trim().replace(/\./g, ":").match(/^(\d{1,2}):(\d{2})(?::\d{2})?$/);
  if (!match) return null;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

/**
 * First "HH:MM" / "HH.MM" anywhere in a line; trailing zone labels ("19:30 CET") are ignored.
 */
export function parseEventTime(text: string): TimeOfDay | null {
  for (const match of text.matchAll(/(\d{1,2})[:.](\d{2})/g)) {
    const hour = Number(match[1]);
    const minute = Number(match[2]);
    if (hour <= 23 && minute <= 59) return { hour, minute };
  }
  return null;
}

const MONTHS = new Map<string, number>([
  ["january", 1], ["february", 2], ["march", 3], ["april", 4], ["may", 5], ["june", 6],
  ["july", 7], ["august", 8], ["september", 9], ["october", 10], ["november", 11], ["december", 12],
  ["januari", 1], ["februari", 2], ["maart", 3], ["mei", 5], ["juni", 6],
  ["juli", 7], ["augustus", 8], ["oktober", 10],
]);

const MONTH_ABBREVIATIONS = new Map<string, number>([
  ["jan", 1], ["feb", 2], ["mar", 3], ["maa", 3], ["apr", 4], ["may", 5], ["mei", 5], ["jun", 6],
  ["jul", 7], ["aug", 8], ["sep", 9], ["oct", 10], ["okt", 10], ["nov", 11], ["dec", 12],
]);

function monthFromWord(word: string): number | undefined {
  const lower = word.toLowerCase();
  return MONTHS.get(lower) ?? (lower.length >= 3 ? MONTH_ABBREVIATIONS.get(lower.slice(0, 3)) : undefined);
}

function todayIn(nowMs: number, timeZone: string): CalendarDate & { weekday: number } {
  const p = zonedParts(nowMs, timeZone);
  return { year: p.year, month: p.month, day: p.day, weekday: p.weekday };
}

function relativeDate(text: string, nowMs: number, timeZone: string): CalendarDate | null {
  const lower = text.toLowerCase();
  const today = todayIn(nowMs, timeZone);

  const named = lower.match(/\b(this|next)\s+([a-z]+)/);
  if (named) {
    const target = DAY_LOOKUP.get(named[2]);
    if (target !== undefined) {
      const ahead = (target - today.weekday + 7) % 7;
      // "this friday" on a Friday is today; "next friday" on a Friday is a week out
      const delta = named[1] === "next" && ahead === 0 ? 7 : ahead;
      return addDays(today, delta);
    }
  }

  if (/\b(tomorrow|morgen)\b/.test(lower)) return addDays(today, 1);
  if (/\b(today|vandaag)\b/.test(lower)) return addDays(today, 0);
  return null;
}

/**
 * "today", "tomorrow", "this wednesday", "next friday" (plus vandaag/morgen) → "DD/MM/YYYY".
 */
export function parseRelativeDate(text: string, nowMs: number, timeZone: string): string | null {
  const date = relativeDate(text, nowMs, timeZone);
  return date ? formatDmy(date) : null;
}

/**
 * Calendar date from free text. Tries, in order: 15/03/2025 or 15-03-2025,
 * "15th March [2025]" (English or Dutch month; year defaults to this year), relative dates.
 */
export function parseEventDate(text: string, nowMs: number, timeZone: string): CalendarDate | null {
  const numeric = text.match(/\b(\d{1,2})[/-](\d{1,2})[/-](\d{4})\b/);
  if (numeric) {
    const day = Number(numeric[1]);
    const month = Number(numeric[2]);
    const year = Number(numeric[3]);
    return isValidDate(year, month, day) ? { year, month, day } : null;
  }

  for (const match of text.matchAll(/\b(\d{1,2})(?:st|nd|rd|th|e)?\s+([A-Za-z]+)(?:\s+(\d{4}))?/g)) {
    const month = monthFromWord(match[2]);
    if (month === undefined) continue;
    const day = Number(match[1]);
    const year = match[3] ? Number(match[3]) : todayIn(nowMs, timeZone).year;
    return isValidDate(year, month, day) ? { year, month, day } : null;
  }

  return relativeDate(text, nowMs, timeZone);
}

/**
 * Both a date and a time from one piece of text, or null.
 */
export function extractDateTimeFromText(
  text: string,
  nowMs: number,
  timeZone: string
): { date: CalendarDate; time: TimeOfDay } | null {
  const date = parseEventDate(text, nowMs, timeZone);
  const time = parseEventTime(text);
  return date && time ? { date, time } : null;
}
