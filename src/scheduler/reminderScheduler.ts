/**
 * Guildhall — src/scheduler/reminderScheduler.ts
 * WHAT: Runs the reminder dispatcher once per wall-clock minute.
 * WHY: Reminders are matched at minute granularity against stored wall-clock times, so a
 *      minute the loop never looks at is a reminder that never goes out.
 * FLOWS:
 *  - start → first tick immediately → re-armed for the next minute boundary after every fire
 *  - each tick dispatches every minute since the last processed one, up to now
 *    (at most MAX_CATCH_UP_MINUTES; last_sent_s keeps replays from double-sending)
 *  - a tick still in flight makes the next one skip; the cursor stays put, so the
 *    following tick picks those minutes up
 *  - each tick → recordSchedulerRun("reminders", ok)
 * DOCS:
 *  - setTimeout: https://nodejs.org/api/timers.html#settimeoutcallback-delay-args
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import { isTruthyFlag } from "../lib/env.js";
import { inSpan } from "../lib/sentry.js";
import { runWithCtx } from "../lib/reqctx.js";
import { recordSchedulerRun } from "../lib/schedulerHealth.js";
import { runReminderTick, type TickResult } from "../features/reminders/dispatcher.js";
import type { ChannelSource } from "../features/logChannel.js";

export const REMINDER_SCHEDULER_NAME = "reminders";
const MINUTE_MS = 60 * 1000;
/** After a longer outage only the most recent minutes are replayed. */
const MAX_CATCH_UP_MINUTES = 10;

let activeTimer: NodeJS.Timeout | null = null;
let inFlight = false;
/** Start (epoch ms) of the last minute fully dispatched, null before the first tick. */
let lastProcessedMinuteMs: number | null = null;

export function msUntilNextMinute(nowMs: number): number {
  return MINUTE_MS - (nowMs % MINUTE_MS);
}

/**
 * Minute starts (epoch ms) a tick at `nowMs` has to dispatch, oldest first.
 * Always includes the current minute, even when it was already processed.
 */
export function minutesToDispatch(lastProcessedMs: number | null, nowMs: number): number[] {
  const current = nowMs - (nowMs % MINUTE_MS);
  if (lastProcessedMs === null || lastProcessedMs >= current) return [current];

  const earliest = Math.max(lastProcessedMs + MINUTE_MS, current - (MAX_CATCH_UP_MINUTES - 1) * MINUTE_MS);
  const minutes: number[] = [];
  for (let m = earliest; m <= current; m += MINUTE_MS) minutes.push(m);
  return minutes;
}

function addInto(total: TickResult, part: TickResult): void {
  total.sent += part.sent;
  total.skipped += part.skipped;
  total.failed += part.failed;
  total.purged += part.purged;
}

/**
 * One guarded tick. Returns null when skipped because the previous tick is still running,
 * or when it failed.
 */
export async function tickReminders(
  source: ChannelSource,
  timeZone: string,
  nowMs: number = Date.now()
): Promise<TickResult | null> {
  if (inFlight) {
    logger.warn({ evt: "reminder_tick_overlap" }, "[reminders] previous tick still running, skipping");
    return null;
  }
  inFlight = true;
  try {
    const minutes = minutesToDispatch(lastProcessedMinuteMs, nowMs);
    if (minutes.length > 1) {
      logger.info({ evt: "reminder_catch_up", minutes: minutes.length }, "[reminders] dispatching missed minutes");
    }

    const result: TickResult = { sent: 0, skipped: 0, failed: 0, purged: 0 };
    await runWithCtx({ cmd: "reminderTick", kind: "task" }, () =>
      inSpan("reminders.tick", async () => {
        for (const minuteMs of minutes) {
          addInto(result, await runReminderTick(source, minuteMs, timeZone));
          lastProcessedMinuteMs = minuteMs;
        }
      })
    );
    recordSchedulerRun(REMINDER_SCHEDULER_NAME, true);
    if (result.sent > 0 || result.failed > 0) {
      logger.info({ evt: "reminder_tick", ...result }, "[reminders] tick complete");
    }
    return result;
  } catch (err) {
    recordSchedulerRun(REMINDER_SCHEDULER_NAME, false, Date.now(), err);
    logger.error({ err, evt: "reminder_tick_failed" }, "[reminders] tick failed");
    return null;
  } finally {
    inFlight = false;
  }
}

function armNextTick(source: ChannelSource, timeZone: string): void {
  activeTimer = setTimeout(() => {
    armNextTick(source, timeZone);
    void tickReminders(source, timeZone);
  }, msUntilNextMinute(Date.now()));
  activeTimer.unref();
}

/**
 * @example
 * // In src/index.ts ClientReady:
 * startReminderScheduler(client, env.BOT_TIMEZONE);
 */
export function startReminderScheduler(source: ChannelSource, timeZone: string): void {
  // Opt-out for tests
  if (isTruthyFlag(process.env.REMINDER_SCHEDULER_DISABLED)) {
    logger.debug("[reminders] scheduler disabled via env flag");
    return;
  }
  if (activeTimer) {
    logger.warn("[reminders] scheduler already running");
    return;
  }

  logger.info({ timeZone }, "[reminders] scheduler starting");

  void tickReminders(source, timeZone);
  armNextTick(source, timeZone);
}

export function stopReminderScheduler(): void {
  if (activeTimer) {
    clearTimeout(activeTimer);
    activeTimer = null;
    logger.info("[reminders] scheduler stopped");
  }
}

/** Tests only. */
export function _resetReminderCursor(): void {
  lastProcessedMinuteMs = null;
}
