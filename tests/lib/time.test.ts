/**
 * Guildhall — tests/lib/time.test.ts
 * WHAT: Unit tests for epoch helpers and wall-clock conversion.
 * WHY: Every reminder fire time goes through zonedWallToUtc/zonedMinute; a one-hour
 *      DST slip would fire reminders at the wrong time twice a year.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import {
  addDays,
  formatDateKey,
  formatDmy,
  formatHm,
  formatHms,
  formatLongDate,
  formatUptime,
  isValidDate,
  nowUtc,
  tsToIso,
  weekdayOf,
  zonedDateKey,
  zonedMinute,
  zonedParts,
  zonedWallToUtc,
} from "../../src/lib/time.js";

const TZ = "Europe/Brussels";

describe("time", () => {
  describe("nowUtc", () => {
    it("floors the current time to whole seconds", () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date("2024-10-20T20:00:00.999Z"));
      expect(nowUtc()).toBe(1729454400);
    });
  });

  describe("tsToIso", () => {
    it("renders epoch seconds as UTC ISO-8601", () => {
      expect(tsToIso(1729454400)).toBe("2024-10-20T20:00:00.000Z");
    });
  });

  describe("weekdayOf", () => {
    it("is Monday-first", () => {
      expect(weekdayOf(2024, 1, 15)).toBe(0); // Monday
      expect(weekdayOf(2024, 3, 15)).toBe(4); // Friday
      expect(weekdayOf(2024, 3, 17)).toBe(6); // Sunday
    });
  });

  describe("zonedParts", () => {
    it("reads wall-clock fields in winter time", () => {
      expect(zonedParts(Date.UTC(2024, 0, 15, 12, 0, 5), TZ)).toEqual({
        year: 2024,
        month: 1,
        day: 15,
        hour: 13,
        minute: 0,
        second: 5,
        weekday: 0,
      });
    });

    it("reads wall-clock fields in summer time", () => {
      const p = zonedParts(Date.UTC(2024, 6, 1, 22, 30), TZ);
      expect(p.day).toBe(2);
      expect(p.hour).toBe(0);
      expect(p.minute).toBe(30);
      expect(p.weekday).toBe(1);
    });

    it("reports midnight as hour 0", () => {
      expect(zonedParts(Date.UTC(2024, 0, 14, 23, 0), TZ).hour).toBe(0);
    });
  });

  describe("zonedWallToUtc", () => {
    it("converts a summer wall time", () => {
      expect(zonedWallToUtc({ year: 2024, month: 7, day: 1, hour: 19, minute: 30 }, TZ)).toBe(
        Date.UTC(2024, 6, 1, 17, 30)
      );
    });

    it("converts a winter wall time", () => {
      expect(zonedWallToUtc({ year: 2024, month: 1, day: 15, hour: 8, minute: 0 }, TZ)).toBe(
        Date.UTC(2024, 0, 15, 7, 0)
      );
    });

    it("moves a time inside the spring-forward gap one hour later", () => {
      // 02:30 does not exist on 31 March 2024; 03:30 CEST is 01:30 UTC
      expect(zonedWallToUtc({ year: 2024, month: 3, day: 31, hour: 2, minute: 30 }, TZ)).toBe(
        Date.UTC(2024, 2, 31, 1, 30)
      );
    });

    it("round-trips through zonedParts", () => {
      const ms = zonedWallToUtc({ year: 2024, month: 10, day: 27, hour: 12, minute: 15 }, TZ);
      const p = zonedParts(ms, TZ);
      expect([p.year, p.month, p.day, p.hour, p.minute]).toEqual([2024, 10, 27, 12, 15]);
    });
  });

  describe("zonedMinute", () => {
    it("floors to the minute and formats date and time", () => {
      expect(zonedMinute(Date.UTC(2024, 0, 15, 12, 0, 42), TZ)).toEqual({
        date: "2024-01-15",
        time: "13:00:00",
        weekday: 0,
        epochS: Date.UTC(2024, 0, 15, 12, 0) / 1000,
      });
    });
  });

  describe("formatting", () => {
    it("pads dates and times", () => {
      expect(formatDateKey({ year: 2024, month: 3, day: 5 })).toBe("2024-03-05");
      expect(formatDmy({ year: 2024, month: 3, day: 5 })).toBe("05/03/2024");
      expect(formatHms({ hour: 9, minute: 5 })).toBe("09:05:00");
      expect(formatHm({ hour: 19, minute: 0 })).toBe("19:00");
    });

    it("gives the zoned date key of an epoch-seconds instant", () => {
      expect(zonedDateKey(Date.UTC(2024, 0, 14, 23, 30) / 1000, TZ)).toBe("2024-01-15");
    });

    it("formats a long date", () => {
      expect(formatLongDate(Date.UTC(2024, 2, 19, 12), TZ)).toBe("Tuesday 19 March 2024");
    });
  });

  describe("calendar math", () => {
    it("adds days across month ends and leap days", () => {
      expect(addDays({ year: 2024, month: 2, day: 28 }, 2)).toEqual({ year: 2024, month: 3, day: 1 });
      expect(addDays({ year: 2024, month: 1, day: 1 }, -1)).toEqual({ year: 2023, month: 12, day: 31 });
    });

    it("validates calendar dates", () => {
      expect(isValidDate(2024, 2, 29)).toBe(true);
      expect(isValidDate(2023, 2, 29)).toBe(false);
      expect(isValidDate(2024, 13, 1)).toBe(false);
      expect(isValidDate(2024, 4, 31)).toBe(false);
    });
  });

  describe("formatUptime", () => {
    it("picks the largest unit that applies", () => {
      expect(formatUptime(3 * 86_400 + 4 * 3_600 + 12 * 60)).toBe("3d 4h 12m");
      expect(formatUptime(4 * 3_600 + 12 * 60 + 30)).toBe("4h 12m");
      expect(formatUptime(59)).toBe("0m");
    });
  });
});
