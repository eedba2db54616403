/**
 * Guildhall — src/lib/schedulerHealth.ts
 * WHAT: In-memory run ledger for the background loops (today only the reminder tick).
 * WHY: A reminder loop that throws every minute looks the same from Discord as one with
 *      nothing to send. /health and /api/status read this ledger instead.
 * FLOWS:
 *  - tick ends → recordSchedulerRun(name, ok, now, err?) → ledger row replaced
 *  - streak hits ALERT_STREAK → one error log per failing tick until a success
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger, redact } from "./logger.js";

export interface SchedulerHealth {
  name: string;
  /** Epoch ms; null until the first tick finishes */
  lastRunAt: number | null;
  lastSuccessAt: number | null;
  lastErrorAt: number | null;
  /** Redacted message of the most recent failure, kept after later successes */
  lastError: string | null;
  consecutiveFailures: number;
  totalRuns: number;
  totalFailures: number;
}

const ALERT_STREAK = 3;

const ledger = new Map<string, Readonly<SchedulerHealth>>();

function blank(name: string): SchedulerHealth {
  return {
    name,
    lastRunAt: null,
    lastSuccessAt: null,
    lastErrorAt: null,
    lastError: null,
    consecutiveFailures: 0,
    totalRuns: 0,
    totalFailures: 0,
  };
}

function describeFailure(error: unknown): string | null {
  if (error === undefined) return null;
  const message = error instanceof Error ? error.message : String(error);
  return redact(message);
}

/**
 * Record the outcome of one tick.
 *
 * @example
 * try {
 *   await runReminderTick(...);
 *   recordSchedulerRun("reminders", true);
 * } catch (err) {
 *   recordSchedulerRun("reminders", false, Date.now(), err);
 * }
 */
export function recordSchedulerRun(name: string, success: boolean, now = Date.now(), error?: unknown): void {
  const prev = ledger.get(name) ?? blank(name);

  const next: SchedulerHealth = success
    ? { ...prev, lastRunAt: now, lastSuccessAt: now, consecutiveFailures: 0, totalRuns: prev.totalRuns + 1 }
    : {
        ...prev,
        lastRunAt: now,
        lastErrorAt: now,
        lastError: describeFailure(error) ?? prev.lastError,
        consecutiveFailures: prev.consecutiveFailures + 1,
        totalRuns: prev.totalRuns + 1,
        totalFailures: prev.totalFailures + 1,
      };
  ledger.set(name, next);

  if (next.consecutiveFailures >= ALERT_STREAK) {
    logger.error(
      {
        evt: "scheduler_failing",
        scheduler: name,
        streak: next.consecutiveFailures,
        totalFailures: next.totalFailures,
        lastError: next.lastError,
      },
      `[scheduler] ${name} has failed ${next.consecutiveFailures} ticks in a row`
    );
  }
}

export function getSchedulerHealth(): SchedulerHealth[] {
  return Array.from(ledger.values(), (row) => ({ ...row }));
}

export function getSchedulerHealthByName(name: string): SchedulerHealth | undefined {
  const row = ledger.get(name);
  return row && { ...row };
}

/** Tests only. */
export function _clearAllSchedulerHealth(): void {
  ledger.clear();
}
