/**
 * Guildhall — src/lib/owner.ts
 * WHAT: Bot-owner override for permission checks.
 * FLOWS: OWNER_IDS (comma separated) parsed once at module load.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { env, splitList } from "./env.js";

// SECURITY: these ids pass every staff/admin check in every guild. Keep the list short.
const ownerIds = new Set(splitList(env.OWNER_IDS));

export function isOwner(userId: string): boolean {
  return ownerIds.has(userId);
}
