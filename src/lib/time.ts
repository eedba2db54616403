/**
 * Guildhall — src/lib/time.ts
 * WHAT: Unix epoch helpers plus wall-clock conversion for the bot's time zone.
 * WHY: Reminders are typed by people in local wall time ("19:30 on Friday") but stored
 *      and compared as instants. Intl gives us zone rules without shipping a tz database.
 * FLOWS:
 *  - nowUtc() → current Unix seconds (INTEGER for SQLite)
 *  - zonedParts(ms, tz) → wall-clock fields in tz
 *  - zonedWallToUtc(wall, tz) → epoch ms for a wall-clock time in tz
 *  - zonedMinute(ms, tz) → the "current minute" the reminder loop matches against
 * DOCS:
 *  - Intl.DateTimeFormat#formatToParts: https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Intl/DateTimeFormat/formatToParts
 *
 * NOTE: weekday numbers are Monday-first (0 = Monday, 6 = Sunday) everywhere in this codebase.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * Current Unix timestamp in seconds. Floor, not round, so "X seconds ago" never goes negative.
 */
export const nowUtc = (): number => Math.floor(Date.now() / 1000);

export const tsToIso = (seconds: number): string => new Date(seconds * 1000).toISOString();

export interface WallClock {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
  hour: number;
  minute: number;
  second?: number;
}

export interface ZonedParts extends Required<WallClock> {
  /** 0 = Monday ... 6 = Sunday */
  weekday: number;
}

/**
 * The minute the reminder loop is currently matching.
 * `time` is always HH:MM:00 because the loop works at minute granularity.
 */
export interface ZonedMinute {
  /** YYYY-MM-DD in the zone */
  date: string;
  /** HH:MM:SS in the zone */
  time: string;
  weekday: number;
  /** Epoch seconds, floored to the minute */
  epochS: number;
}

// Formatter construction is surprisingly expensive; one per zone is plenty.
const partsFormatters = new Map<string, Intl.DateTimeFormat>();

function partsFormatter(timeZone: string): Intl.DateTimeFormat {
  let fmt = partsFormatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-GB", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    partsFormatters.set(timeZone, fmt);
  }
  return fmt;
}

const pad2 = (n: number): string => String(n).padStart(2, "0");

/**
 * Monday-first weekday of a calendar date. Pure calendar math, no zone involved.
 */
export function weekdayOf(year: number, month: number, day: number): number {
  const sundayFirst = new Date(Date.UTC(year, month - 1, day)).getUTCDay();
  return (sundayFirst + 6) % 7;
}

/**
 * Wall-clock fields of an instant as seen in `timeZone`.
 */
export function zonedParts(instantMs: number, timeZone: string): ZonedParts {
  const fields: Record<string, number> = {};
  for (const part of partsFormatter(timeZone).formatToParts(new Date(instantMs))) {
    if (part.type !== "literal") {
      fields[part.type] = Number(part.value);
    }
  }
  const year = fields.year ?? 1970;
  const month = fields.month ?? 1;
  const day = fields.day ?? 1;
  return {
    year,
    month,
    day,
    // Some ICU builds still say "24" at midnight despite h23
    hour: (fields.hour ?? 0) % 24,
    minute: fields.minute ?? 0,
    second: fields.second ?? 0,
    weekday: weekdayOf(year, month, day),
  };
}

/**
 * Offset of `timeZone` from UTC at `instantMs`, in ms (Brussels in winter → +3_600_000).
 */
function zoneOffsetMs(instantMs: number, timeZone: string): number {
  const wholeSecond = Math.floor(instantMs / 1000) * 1000;
  const p = zonedParts(wholeSecond, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return asUtc - wholeSecond;
}

/**
 * Epoch ms of a wall-clock time in `timeZone`.
 *
 * Two-pass offset guess: the first pass uses the offset at the naive UTC reading,
 * the second corrects when a DST switch sits between the two. Wall times inside a
 * spring-forward gap land one hour later (02:30 → 03:30), matching what people expect.
 */
export function zonedWallToUtc(wall: WallClock, timeZone: string): number {
  const naive = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second ?? 0);
  const firstOffset = zoneOffsetMs(naive, timeZone);
  const guess = naive - firstOffset;
  const secondOffset = zoneOffsetMs(guess, timeZone);
  return secondOffset === firstOffset ? guess : naive - secondOffset;
}

export function formatDateKey(p: { year: number; month: number; day: number }): string {
  return `${p.year}-${pad2(p.month)}-${pad2(p.day)}`;
}

export function formatHms(p: { hour: number; minute: number; second?: number }): string {
  return `${pad2(p.hour)}:${pad2(p.minute)}:${pad2(p.second ?? 0)}`;
}

export function formatHm(p: { hour: number; minute: number }): string {
  return `${pad2(p.hour)}:${pad2(p.minute)}`;
}

/** DD/MM/YYYY, the format announcements use */
export function formatDmy(p: { year: number; month: number; day: number }): string {
  return `${pad2(p.day)}/${pad2(p.month)}/${p.year}`;
}

/**
 * YYYY-MM-DD of an epoch-seconds instant in `timeZone`.
 */
export function zonedDateKey(epochS: number, timeZone: string): string {
  return formatDateKey(zonedParts(epochS * 1000, timeZone));
}

export function zonedMinute(instantMs: number, timeZone: string): ZonedMinute {
  const epochS = Math.floor(instantMs / 60_000) * 60;
  const p = zonedParts(epochS * 1000, timeZone);
  return {
    date: formatDateKey(p),
    time: formatHms({ hour: p.hour, minute: p.minute, second: 0 }),
    weekday: p.weekday,
    epochS,
  };
}

/**
 * Calendar date `days` after the given one (negative goes back). Zone-free.
 */
export function addDays(
  date: { year: number; month: number; day: number },
  days: number
): { year: number; month: number; day: number } {
  const d = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() };
}

/**
 * True when year/month/day name a real calendar date (rejects 31/02).
 */
export function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

const longDateFormatters = new Map<string, Intl.DateTimeFormat>();

/**
 * "Tuesday 19 March 2024" in `timeZone`. Assembled from parts because ICU versions
 * disagree on the comma after the weekday.
 */
export function formatLongDate(instantMs: number, timeZone: string): string {
  let fmt = longDateFormatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-GB", {
      timeZone,
      weekday: "long",
      day: "2-digit",
      month: "long",
      year: "numeric",
    });
    longDateFormatters.set(timeZone, fmt);
  }
  const parts = new Map<string, string>();
  for (const part of fmt.formatToParts(new Date(instantMs))) {
    parts.set(part.type, part.value);
  }
  return `${parts.get("weekday") ?? ""} ${parts.get("day") ?? ""} ${parts.get("month") ?? ""} ${parts.get("year") ?? ""}`;
}

/**
 * Human uptime: "3d 4h 12m" / "4h 12m" / "12m".
 */
export function formatUptime(seconds: number): string {
  const d = Math.floor(seconds / 86_400);
  const h = Math.floor((seconds % 86_400) / 3_600);
  const m = Math.floor((seconds % 3_600) / 60);
  if (d > 0) return `${d}d ${h}h ${m}m`;
  if (h > 0) return `${h}h ${m}m`;
  return `${m}m`;
}
