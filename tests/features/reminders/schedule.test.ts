/**
 * Guildhall — tests/features/reminders/schedule.test.ts
 * WHAT: Unit tests for the due-this-minute rules.
 * WHY: dueReason() decides every send; checking it with plain rows keeps the
 *      dispatcher tests about I/O only.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { dueReason, sentThisMinute, type ScheduleRow } from "../../../src/features/reminders/schedule.js";
import { zonedMinute } from "../../../src/lib/time.js";

const TZ = "Europe/Brussels";
const at = (y: number, mo: number, d: number, h: number, mi: number) =>
  zonedMinute(Date.UTC(y, mo - 1, d, h, mi), TZ);

// Event Friday 22 March 2024 20:00 Brussels (19:00 UTC), reminder an hour earlier
const oneOff: ScheduleRow = {
  time: "19:00:00",
  call_time: "20:00:00",
  days: "4",
  event_time_s: Date.UTC(2024, 2, 22, 19, 0) / 1000,
  offset_minutes: 60,
};

describe("dueReason", () => {
  describe("one-off reminders", () => {
    it("fires the pre-event reminder at the offset time on the event date", () => {
      expect(dueReason(oneOff, at(2024, 3, 22, 18, 0), TZ)).toBe("pre_event");
    });

    it("fires the event-start reminder at call time", () => {
      expect(dueReason(oneOff, at(2024, 3, 22, 19, 0), TZ)).toBe("event_start");
    });

    it("ignores the same wall time on other dates", () => {
      expect(dueReason(oneOff, at(2024, 3, 21, 18, 0), TZ)).toBeNull();
      expect(dueReason(oneOff, at(2024, 3, 29, 19, 0), TZ)).toBeNull();
    });

    it("prefers event start when the offset is zero", () => {
      const zero: ScheduleRow = { ...oneOff, time: "20:00:00", offset_minutes: 0 };
      expect(dueReason(zero, at(2024, 3, 22, 19, 0), TZ)).toBe("event_start");
    });

    it("uses the reminder's own date when the offset crosses midnight", () => {
      // Event 22 March 00:30 Brussels, reminder 21 March 23:30
      const lateNight: ScheduleRow = {
        time: "23:30:00",
        call_time: "00:30:00",
        days: "3",
        event_time_s: Date.UTC(2024, 2, 21, 23, 30) / 1000,
        offset_minutes: 60,
      };
      expect(dueReason(lateNight, at(2024, 3, 21, 22, 30), TZ)).toBe("pre_event");
      expect(dueReason(lateNight, at(2024, 3, 21, 23, 30), TZ)).toBe("event_start");
    });
  });

  describe("recurring reminders", () => {
    const weekly: ScheduleRow = {
      time: "19:30:00",
      call_time: "19:30:00",
      days: "0,4",
      event_time_s: null,
      offset_minutes: 60,
    };

    it("fires on listed weekdays at the stored time", () => {
      expect(dueReason(weekly, at(2024, 3, 15, 18, 30), TZ)).toBe("recurring"); // Friday
      expect(dueReason(weekly, at(2024, 3, 18, 18, 30), TZ)).toBe("recurring"); // Monday
    });

    it("skips other weekdays and other times", () => {
      expect(dueReason(weekly, at(2024, 3, 16, 18, 30), TZ)).toBeNull(); // Saturday
      expect(dueReason(weekly, at(2024, 3, 15, 18, 31), TZ)).toBeNull();
    });
  });
});

describe("sentThisMinute", () => {
  const now = at(2024, 3, 15, 18, 30);

  it("is true when the last send falls in the same minute", () => {
    expect(sentThisMinute(now.epochS + 30, now)).toBe(true);
  });

  it("is false for an earlier minute or no send at all", () => {
    expect(sentThisMinute(now.epochS - 60, now)).toBe(false);
    expect(sentThisMinute(null, now)).toBe(false);
  });
});
