/**
 * Guildhall — src/features/onboarding/store.ts
 * WHAT: Completed onboarding records (one per member per guild) and in-flight sessions.
 * FLOWS:
 *  - saveCompletion() ← the last answer of a session
 *  - getCompletion()/deleteCompletion() ← /onboarding status|reset
 *  - sessions: LRU keyed guild:user, 30 min TTL, refreshed on every step
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { z } from "zod";
import { db } from "../../db/db.js";
import { LRUCache } from "../../lib/lruCache.js";
import { nowUtc } from "../../lib/time.js";
import type { FormattedResponse, OnboardingSession } from "./types.js";

export const SESSION_TTL_MS = 30 * 60 * 1000;

const sessions = new LRUCache<string, OnboardingSession>(5_000, SESSION_TTL_MS);

const sessionKey = (guildId: string, userId: string) => `${guildId}:${userId}`;

export function getSession(guildId: string, userId: string): OnboardingSession | undefined {
  return sessions.get(sessionKey(guildId, userId));
}

/** Also refreshes the TTL; call after every transition. */
export function putSession(session: OnboardingSession): void {
  sessions.set(sessionKey(session.guildId, session.userId), session);
}

export function dropSession(guildId: string, userId: string): boolean {
  return sessions.delete(sessionKey(guildId, userId));
}

const responsesSchema = z.array(z.object({ question: z.string(), answer: z.string() }));

export interface OnboardingRecord {
  guildId: string;
  userId: string;
  responses: FormattedResponse[];
  completedAtS: number;
}

export function saveCompletion(
  guildId: string,
  userId: string,
  responses: readonly FormattedResponse[],
  nowS: number = nowUtc()
): void {
  db.prepare(
    `INSERT INTO onboarding (guild_id, user_id, responses, completed_at_s)
     VALUES (?, ?, ?, ?)
     ON CONFLICT(guild_id, user_id) DO UPDATE SET
       responses = excluded.responses,
       completed_at_s = excluded.completed_at_s`
  ).run(guildId, userId, JSON.stringify(responses), nowS);
}

export function getCompletion(guildId: string, userId: string): OnboardingRecord | undefined {
  const row = db
    .prepare<[string, string], { responses: string; completed_at_s: number }>(
      `SELECT responses, completed_at_s FROM onboarding WHERE guild_id = ? AND user_id = ?`
    )
    .get(guildId, userId);
  if (!row) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(row.responses);
  } catch {
    parsed = [];
  }
  const responses = responsesSchema.safeParse(parsed);
  return {
    guildId,
    userId,
    responses: responses.success ? responses.data : [],
    completedAtS: row.completed_at_s,
  };
}

export function deleteCompletion(guildId: string, userId: string): boolean {
  return db.prepare(`DELETE FROM onboarding WHERE guild_id = ? AND user_id = ?`).run(guildId, userId).changes > 0;
}

export function countCompletions(guildId: string): number {
  return (
    db.prepare<[string], { n: number }>(`SELECT COUNT(*) AS n FROM onboarding WHERE guild_id = ?`).get(guildId)?.n ?? 0
  );
}
