/**
 * Guildhall — src/lib/secureCompare.ts
 * WHAT: Constant-time string comparison for the dashboard API key.
 * WHY: A plain === leaks how many leading characters matched through response timing.
 * DOCS:
 *  - Node.js crypto.timingSafeEqual: https://nodejs.org/api/crypto.html#cryptotimingsafeequala-b
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { timingSafeEqual, createHash } from "node:crypto";

/**
 * Compare a presented secret against the expected one in constant time.
 * Both sides are hashed first because timingSafeEqual throws on unequal lengths,
 * and an early length check would leak the key's length.
 *
 * @security never log either argument
 */
export function secureCompare(presented: string, expected: string): boolean {
  const a = createHash("sha256").update(presented, "utf8").digest();
  const b = createHash("sha256").update(expected, "utf8").digest();
  return timingSafeEqual(a, b);
}
