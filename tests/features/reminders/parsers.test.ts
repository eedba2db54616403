/**
 * Guildhall — tests/features/reminders/parsers.test.ts
 * WHAT: Unit tests for day, time and date parsing.
 * WHY: These parse whatever staff type; a regression silently schedules nothing.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import {
  extractDateTimeFromText,
  formatDaysCsv,
  formatDaysForDisplay,
  parseDaysCsv,
  parseDaysString,
  parseEventDate,
  parseEventTime,
  parseRelativeDate,
  parseTimeString,
} from "../../../src/features/reminders/parsers.js";

const TZ = "Europe/Brussels";
// Friday 15 March 2024, 13:00 in Brussels
const FRIDAY_NOON = Date.UTC(2024, 2, 15, 12, 0);

describe("parseDaysString", () => {
  it("parses Dutch abbreviations", () => {
    expect(parseDaysString("ma, wo")).toEqual([0, 2]);
  });

  it("parses English names separated by spaces", () => {
    expect(parseDaysString("Monday Friday")).toEqual([0, 4]);
  });

  it("parses digits", () => {
    expect(parseDaysString("3,0")).toEqual([0, 3]);
  });

  it("expands daily, weekdays and weekends", () => {
    expect(parseDaysString("daily")).toEqual([0, 1, 2, 3, 4, 5, 6]);
    expect(parseDaysString("dagelijks")).toEqual([0, 1, 2, 3, 4, 5, 6]);
    expect(parseDaysString("Weekdays")).toEqual([0, 1, 2, 3, 4]);
    expect(parseDaysString("weekends")).toEqual([5, 6]);
  });

  it("accepts prefixes and plurals", () => {
    expect(parseDaysString("maan")).toEqual([0]);
    expect(parseDaysString("tuesdays")).toEqual([1]);
  });

  it("dedupes and sorts", () => {
    expect(parseDaysString("wo,ma,wo")).toEqual([0, 2]);
  });

  it("skips unknown words and returns [] for nothing usable", () => {
    expect(parseDaysString("xyz, vr")).toEqual([4]);
    expect(parseDaysString("xyz")).toEqual([]);
    expect(parseDaysString("")).toEqual([]);
    expect(parseDaysString(null)).toEqual([]);
  });
});

describe("day list storage", () => {
  it("formats a sorted CSV", () => {
    expect(formatDaysCsv([4, 0, 2])).toBe("0,2,4");
  });

  it("parses a CSV and drops invalid entries", () => {
    expect(parseDaysCsv("0, 2,9,x")).toEqual([0, 2]);
    expect(parseDaysCsv(null)).toEqual([]);
  });

  it("displays Dutch day names Monday-first", () => {
    expect(formatDaysForDisplay([2, 0])).toBe("Maandag, Woensdag");
    expect(formatDaysForDisplay([])).toBe("");
  });
});

describe("parseTimeString", () => {
  it("accepts colons, dots and seconds", () => {
    expect(parseTimeString("19:30")).toEqual({ hour: 19, minute: 30 });
    expect(parseTimeString("9.05")).toEqual({ hour: 9, minute: 5 });
    expect(parseTimeString(" 19:30:00 ")).toEqual({ hour: 19, minute: 30 });
  });

  it("rejects out-of-range and free-form values", () => {
    expect(parseTimeString("24:00")).toBeNull();
    expect(parseTimeString("12:60")).toBeNull();
    expect(parseTimeString("7pm")).toBeNull();
    expect(parseTimeString(undefined)).toBeNull();
  });
});

describe("parseEventTime", () => {
  it("finds a time inside a line", () => {
    expect(parseEventTime("Starts 19.30 CET")).toEqual({ hour: 19, minute: 30 });
  });

  it("skips impossible matches", () => {
    expect(parseEventTime("Code 99:99, doors at 20:15")).toEqual({ hour: 20, minute: 15 });
  });

  it("returns null without a time", () => {
    expect(parseEventTime("all day")).toBeNull();
  });
});

describe("parseEventDate", () => {
  it("parses numeric dates with slashes or dashes", () => {
    expect(parseEventDate("15/03/2025", FRIDAY_NOON, TZ)).toEqual({ year: 2025, month: 3, day: 15 });
    expect(parseEventDate("on 1-4-2025", FRIDAY_NOON, TZ)).toEqual({ year: 2025, month: 4, day: 1 });
  });

  it("rejects impossible numeric dates", () => {
    expect(parseEventDate("31-02-2025", FRIDAY_NOON, TZ)).toBeNull();
  });

  it("parses day + month name with an optional year", () => {
    expect(parseEventDate("15th March 2025", FRIDAY_NOON, TZ)).toEqual({ year: 2025, month: 3, day: 15 });
    expect(parseEventDate("3 mei", FRIDAY_NOON, TZ)).toEqual({ year: 2024, month: 5, day: 3 });
    expect(parseEventDate("22 Sept", FRIDAY_NOON, TZ)).toEqual({ year: 2024, month: 9, day: 22 });
  });

  it("falls back to relative dates", () => {
    expect(parseEventDate("next friday", FRIDAY_NOON, TZ)).toEqual({ year: 2024, month: 3, day: 22 });
    expect(parseEventDate("tomorrow", FRIDAY_NOON, TZ)).toEqual({ year: 2024, month: 3, day: 16 });
  });

  it("returns null when nothing looks like a date", () => {
    expect(parseEventDate("sometime soon", FRIDAY_NOON, TZ)).toBeNull();
  });
});

describe("parseRelativeDate", () => {
  it("treats 'this <day>' as today when it is that day", () => {
    expect(parseRelativeDate("this friday", FRIDAY_NOON, TZ)).toBe("15/03/2024");
  });

  it("treats 'next <day>' as strictly after today", () => {
    expect(parseRelativeDate("next friday", FRIDAY_NOON, TZ)).toBe("22/03/2024");
    expect(parseRelativeDate("next monday", FRIDAY_NOON, TZ)).toBe("18/03/2024");
  });

  it("understands today and tomorrow in both languages", () => {
    expect(parseRelativeDate("vandaag", FRIDAY_NOON, TZ)).toBe("15/03/2024");
    expect(parseRelativeDate("Morgen", FRIDAY_NOON, TZ)).toBe("16/03/2024");
  });

  it("returns null for anything else", () => {
    expect(parseRelativeDate("whenever", FRIDAY_NOON, TZ)).toBeNull();
  });
});

describe("extractDateTimeFromText", () => {
  it("returns date and time when both are present", () => {
    expect(extractDateTimeFromText("Movie night 15/03/2025 at 20:00", FRIDAY_NOON, TZ)).toEqual({
      date: { year: 2025, month: 3, day: 15 },
      time: { hour: 20, minute: 0 },
    });
  });

  it("returns null when either part is missing", () => {
    expect(extractDateTimeFromText("Movie night 15/03/2025", FRIDAY_NOON, TZ)).toBeNull();
    expect(extractDateTimeFromText("Movie night at 20:00", FRIDAY_NOON, TZ)).toBeNull();
  });
});
