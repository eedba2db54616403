/**
 * Guildhall — src/lib/rateLimiter.ts
 * WHAT: In-memory per-scope cooldowns for commands people could spam.
 * WHY: Ticket creation posts to the staff log channel; one user hammering it drowns staff.
 * FLOWS:
 *   - checkCooldown(): allowed, or blocked with the time left
 *   - clearCooldown(): drop one scope's cooldown (tests, admin override)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";

// command name → scope (usually userId) → last allowed use (ms)
// GOTCHA: process-local; a restart forgets every cooldown.
const cooldowns = new Map<string, Map<string, number>>();

const CLEANUP_INTERVAL_MS = 10 * 60 * 1000;
const MAX_COOLDOWN_AGE_MS = 2 * 60 * 60 * 1000;

export const COOLDOWNS = {
  /** Ticket creation: 30 seconds per user */
  TICKET_CREATE_MS: 30 * 1000,
} as const;

export type CooldownResult = { allowed: true } | { allowed: false; remainingMs: number };

/**
 * Check and, when allowed, consume a cooldown.
 *
 * The timestamp is recorded on the allowed path itself, so callers can't forget to.
 *
 * @example
 * const cd = checkCooldown("ticket:create", userId, COOLDOWNS.TICKET_CREATE_MS);
 * if (!cd.allowed) return reply(`Wait ${formatCooldown(cd.remainingMs)}.`);
 */
export function checkCooldown(
  commandName: string,
  scopeId: string,
  cooldownMs: number,
  now: number = Date.now()
): CooldownResult {
  const scopeCooldowns = cooldowns.get(commandName) ?? new Map<string, number>();
  const lastUsed = scopeCooldowns.get(scopeId);

  if (lastUsed !== undefined && now - lastUsed < cooldownMs) {
    const remainingMs = cooldownMs - (now - lastUsed);
    logger.debug({ commandName, scopeId, remainingMs }, "[rateLimiter] Command on cooldown");
    return { allowed: false, remainingMs };
  }

  scopeCooldowns.set(scopeId, now);
  cooldowns.set(commandName, scopeCooldowns);
  return { allowed: true };
}

export function clearCooldown(commandName: string, scopeId: string): void {
  cooldowns.get(commandName)?.delete(scopeId);
}

// Math.ceil: "0 seconds remaining" with 900ms left just invites a retry
export function formatCooldown(remainingMs: number): string {
  const seconds = Math.ceil(remainingMs / 1000);
  if (seconds < 60) {
    return `${seconds} second${seconds === 1 ? "" : "s"}`;
  }
  const minutes = Math.ceil(seconds / 60);
  return `${minutes} minute${minutes === 1 ? "" : "s"}`;
}

function cleanupOldCooldowns(): void {
  const now = Date.now();
  let cleaned = 0;

  for (const [commandName, scopeCooldowns] of cooldowns) {
    for (const [scopeId, timestamp] of scopeCooldowns) {
      if (now - timestamp > MAX_COOLDOWN_AGE_MS) {
        scopeCooldowns.delete(scopeId);
        cleaned++;
      }
    }
    if (scopeCooldowns.size === 0) {
      cooldowns.delete(commandName);
    }
  }

  if (cleaned > 0) {
    logger.debug({ cleaned }, "[rateLimiter] Cleaned up old cooldown entries");
  }
}

// unref: this sweep alone must not keep the process (or a test worker) alive
setInterval(cleanupOldCooldowns, CLEANUP_INTERVAL_MS).unref();
