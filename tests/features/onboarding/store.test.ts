/**
 * Guildhall — tests/features/onboarding/store.test.ts
 * WHAT: Tests for completion records and the in-memory session cache.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach } from "vitest";
import { db } from "../../../src/db/db.js";
import { createSession } from "../../../src/features/onboarding/engine.js";
import {
  countCompletions,
  deleteCompletion,
  dropSession,
  getCompletion,
  getSession,
  putSession,
  saveCompletion,
} from "../../../src/features/onboarding/store.js";
import { resetDatabase } from "../../utils/dbFixtures.js";

const GUILD = "guild-1";

describe("onboarding completions", () => {
  beforeEach(() => {
    resetDatabase();
  });

  it("saves, overwrites and reads back a summary", () => {
    saveCompletion(GUILD, "u1", [{ question: "Colour?", answer: "Red" }], 1_700_000_000);
    saveCompletion(GUILD, "u1", [{ question: "Colour?", answer: "Blue" }], 1_700_000_100);

    expect(getCompletion(GUILD, "u1")).toEqual({
      guildId: GUILD,
      userId: "u1",
      responses: [{ question: "Colour?", answer: "Blue" }],
      completedAtS: 1_700_000_100,
    });
    expect(countCompletions(GUILD)).toBe(1);
    expect(getCompletion("guild-2", "u1")).toBeUndefined();
  });

  it("reads a corrupted summary as empty", () => {
    db.prepare(`INSERT INTO onboarding (guild_id, user_id, responses, completed_at_s) VALUES (?, ?, ?, ?)`).run(
      GUILD,
      "u2",
      "{oops",
      5
    );
    expect(getCompletion(GUILD, "u2")?.responses).toEqual([]);
  });

  it("deletes a record once", () => {
    saveCompletion(GUILD, "u1", [], 1);
    expect(deleteCompletion(GUILD, "u1")).toBe(true);
    expect(deleteCompletion(GUILD, "u1")).toBe(false);
  });
});

describe("onboarding sessions", () => {
  it("keys sessions by guild and member", () => {
    const session = createSession({
      guildId: GUILD,
      userId: "u1",
      mode: "rules_only",
      questions: [],
      rules: [],
      nowMs: 0,
    });
    putSession(session);

    expect(getSession(GUILD, "u1")).toBe(session);
    expect(getSession("guild-2", "u1")).toBeUndefined();
    expect(dropSession(GUILD, "u1")).toBe(true);
    expect(getSession(GUILD, "u1")).toBeUndefined();
  });
});
