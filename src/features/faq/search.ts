/**
 * Guildhall — src/features/faq/search.ts
 * WHAT: Token scoring for FAQ search. Pure.
 * WHY: FAQ lists are short (tens of entries); scoring them in memory beats maintaining an FTS index.
 * FLOWS:
 *  - normalizeTokens(text) → lowercase, punctuation → space, tokens of 3+ chars
 *  - scoreEntry(queryTokens, entry) → +2 per direct hit, +1 per synonym-group hit
 *  - rankEntries(query, entries, limit) → best first, ties keep input order
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export interface Searchable {
  title: string;
  summary: string;
  keywords: readonly string[];
}

// base word → words people type instead
export const SYNONYMS: Readonly<Record<string, readonly string[]>> = {
  pwd: ["password"],
  pass: ["password"],
  mail: ["email"],
  "e-mail": ["email"],
  login: ["signin", "sign-in"],
};

export function normalizeTokens(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, " ")
    .split(/\s+/)
    .filter((token) => token.length >= 3);
}

export function scoreEntry(queryTokens: readonly string[], entry: Searchable): number {
  const hay = new Set(normalizeTokens([entry.summary, entry.keywords.join(" "), entry.title].join(" ")));
  let score = 0;

  for (const token of queryTokens) {
    if (hay.has(token)) score += 2;

    // at most one synonym point per query token
    for (const [base, alternatives] of Object.entries(SYNONYMS)) {
      if (token !== base && !alternatives.includes(token)) continue;
      if (hay.has(base) || alternatives.some((alt) => hay.has(alt))) {
        score += 1;
        break;
      }
    }
  }
  return score;
}

/**
 * Entries scoring above zero, best first. Array.prototype.sort is stable, so equal
 * scores keep the order the entries came in (newest first from the store).
 */
export function rankEntries<T extends Searchable>(query: string, entries: readonly T[], limit = 5): T[] {
  const tokens = normalizeTokens(query);
  if (tokens.length === 0) return [];
  return entries
    .map((entry) => ({ entry, score: scoreEntry(tokens, entry) }))
    .filter((scored) => scored.score > 0)
    .sort((a, b) => b.score - a.score)
    .slice(0, limit)
    .map((scored) => scored.entry);
}
