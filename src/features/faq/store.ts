/**
 * Guildhall — src/features/faq/store.ts
 * WHAT: Guild-scoped FAQ entries and the search log.
 * FLOWS:
 *  - listEntries(guildId) newest first → search + paging
 *  - addEntry()/removeEntry() ← /faq add|remove (admins)
 *  - logSearch() ← /faq search
 *
 * NOTE: keywords are stored as a comma-separated string; the store hands out string[].
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../../db/db.js";
import { nowUtc } from "../../lib/time.js";

interface FaqRow {
  id: number;
  guild_id: string;
  title: string;
  summary: string;
  keywords: string;
  created_by: string | null;
  created_at_s: number;
}

export interface FaqEntry {
  id: number;
  guildId: string;
  title: string;
  summary: string;
  keywords: string[];
  createdBy: string | null;
  createdAtS: number;
}

export function splitKeywords(raw: string | null | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((k) => k.trim())
    .filter((k) => k.length > 0);
}

function toEntry(row: FaqRow): FaqEntry {
  return {
    id: row.id,
    guildId: row.guild_id,
    title: row.title,
    summary: row.summary,
    keywords: splitKeywords(row.keywords),
    createdBy: row.created_by,
    createdAtS: row.created_at_s,
  };
}

export function listEntries(guildId: string): FaqEntry[] {
  return db
    .prepare<[string], FaqRow>(`SELECT * FROM faq_entries WHERE guild_id = ? ORDER BY created_at_s DESC, id DESC`)
    .all(guildId)
    .map(toEntry);
}

export function getEntry(guildId: string, id: number): FaqEntry | undefined {
  const row = db
    .prepare<[string, number], FaqRow>(`SELECT * FROM faq_entries WHERE guild_id = ? AND id = ?`)
    .get(guildId, id);
  return row ? toEntry(row) : undefined;
}

export function addEntry(
  input: { guildId: string; title: string; summary: string; keywords: readonly string[]; createdBy: string },
  nowS: number = nowUtc()
): number {
  const result = db
    .prepare(
      `INSERT INTO faq_entries (guild_id, title, summary, keywords, created_by, created_at_s)
       VALUES (?, ?, ?, ?, ?, ?)`
    )
    .run(input.guildId, input.title, input.summary, input.keywords.join(","), input.createdBy, nowS);
  return Number(result.lastInsertRowid);
}

export function removeEntry(guildId: string, id: number): boolean {
  return db.prepare(`DELETE FROM faq_entries WHERE guild_id = ? AND id = ?`).run(guildId, id).changes > 0;
}

export function logSearch(guildId: string, query: string, matchCount: number, nowS: number = nowUtc()): void {
  db.prepare(`INSERT INTO faq_search_logs (guild_id, query, match_count, created_at_s) VALUES (?, ?, ?, ?)`).run(
    guildId,
    query,
    matchCount,
    nowS
  );
}

export function faqCounts(guildId: string): { entries: number; searches: number; unanswered: number } {
  const entries =
    db.prepare<[string], { n: number }>(`SELECT COUNT(*) AS n FROM faq_entries WHERE guild_id = ?`).get(guildId)?.n ?? 0;
  const searchRow = db
    .prepare<[string], { n: number; unanswered: number | null }>(
      `SELECT COUNT(*) AS n, SUM(CASE WHEN match_count = 0 THEN 1 ELSE 0 END) AS unanswered
       FROM faq_search_logs WHERE guild_id = ?`
    )
    .get(guildId);
  return { entries, searches: searchRow?.n ?? 0, unanswered: searchRow?.unanswered ?? 0 };
}
