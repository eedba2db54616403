/**
 * Guildhall — tests/lib/errorCard.test.ts
 * WHAT: Tests for error card hints and layout.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { buildErrorCard, commandLabel, hintFor } from "../../src/lib/errorCard.js";

describe("hintFor", () => {
  it("maps known Discord codes", () => {
    expect(hintFor({ code: 50013 })).toBe("Missing Discord permission in this channel.");
    expect(hintFor({ code: 10062 })).toBe("Interaction expired; the handler didn't answer in time.");
  });

  it("recognizes schema and busy database errors", () => {
    expect(hintFor({ name: "SqliteError", message: "no such table: reminders" })).toBe(
      "Schema mismatch; restart the bot so tables are recreated."
    );
    expect(hintFor({ code: "SQLITE_BUSY" })).toBe("Database is busy. Try again in a moment.");
  });

  it("explains stale components and falls back to a generic hint", () => {
    expect(hintFor({ message: "Unhandled button: faq:old" })).toBe(
      "This component didn't match any handler. It may belong to an older bot version; run the command again."
    );
    expect(hintFor({ message: "boom" })).toBe("Unexpected error. Try again or contact staff.");
  });
});

describe("commandLabel", () => {
  it("labels by interaction kind", () => {
    expect(commandLabel("slash", "faq")).toBe("/faq");
    expect(commandLabel("button", "faq:list")).toBe("button: faq:list");
    expect(commandLabel("modal", "ticket:create")).toBe("modal: ticket:create");
  });
});

describe("buildErrorCard", () => {
  it("lays out the diagnostic fields", () => {
    const card = buildErrorCard(
      {
        traceId: "trace-1",
        cmd: "ticket",
        kind: "slash",
        phase: "db_write",
        err: { name: "SqliteError", code: "SQLITE_BUSY", message: "database is locked" },
        lastSql: "UPDATE   support_tickets\n  SET status = ?",
      },
      new Date(Date.UTC(2024, 2, 15, 12, 0))
    ).toJSON();

    expect(card.fields).toEqual([
      { name: "Command", value: "/ticket", inline: true },
      { name: "Phase", value: "db_write", inline: true },
      { name: "Code", value: "SQLITE_BUSY", inline: true },
      { name: "Message", value: "database is locked" },
      { name: "Last SQL", value: "UPDATE support_tickets SET status = ?" },
      { name: "Trace", value: "trace-1", inline: true },
      { name: "Hint", value: "Database is busy. Try again in a moment." },
    ]);
    expect(card.footer?.text).toBe("2024-03-15T12:00:00.000Z");
  });
});
