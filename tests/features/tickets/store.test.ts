/**
 * Guildhall — tests/features/tickets/store.test.ts
 * WHAT: Tests for ticket persistence and status transitions.
 * WHY: Claims race between staff members; only one conditional UPDATE may win.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach } from "vitest";
import {
  claimTicket,
  closeTicket,
  countTicketsByStatus,
  createTicket,
  escalateTicket,
  getTicket,
  listActiveTickets,
} from "../../../src/features/tickets/store.js";
import { resetDatabase } from "../../utils/dbFixtures.js";

const GUILD = "guild-1";

function open(userId = "member-1", nowS = 1000): number {
  return createTicket({ guildId: GUILD, userId, username: "member", description: "Can't see the rules channel" }, nowS);
}

describe("tickets store", () => {
  beforeEach(() => {
    resetDatabase();
  });

  it("creates open tickets", () => {
    const id = open();
    expect(getTicket(GUILD, id)).toMatchObject({
      id: 1,
      user_id: "member-1",
      status: "open",
      claimed_by: null,
      created_at_s: 1000,
      updated_at_s: 1000,
    });
    expect(getTicket("guild-2", id)).toBeUndefined();
  });

  it("lets exactly one staff member claim", () => {
    const id = open();
    expect(claimTicket(GUILD, id, "staff-1", 2000)).toBe(true);
    expect(claimTicket(GUILD, id, "staff-2", 2001)).toBe(false);
    expect(getTicket(GUILD, id)).toMatchObject({ status: "claimed", claimed_by: "staff-1", claimed_at_s: 2000 });
  });

  it("escalates anything but closed tickets", () => {
    const id = open();
    claimTicket(GUILD, id, "staff-1");
    expect(escalateTicket(GUILD, id, "role-1", 3000)).toBe(true);
    expect(getTicket(GUILD, id)).toMatchObject({ status: "escalated", escalated_to: "role-1", updated_at_s: 3000 });

    closeTicket(GUILD, id);
    expect(escalateTicket(GUILD, id, null)).toBe(false);
  });

  it("closes once", () => {
    const id = open();
    expect(closeTicket(GUILD, id, 4000)).toBe(true);
    expect(closeTicket(GUILD, id, 4001)).toBe(false);
    expect(getTicket(GUILD, id)).toMatchObject({ status: "closed", closed_at_s: 4000 });
  });

  it("lists active tickets oldest first", () => {
    const late = open("member-1", 2000);
    const early = open("member-2", 1000);
    const closed = open("member-3", 500);
    closeTicket(GUILD, closed);

    expect(listActiveTickets(GUILD).map((t) => t.id)).toEqual([early, late]);
  });

  it("counts by status with zeros filled in", () => {
    open();
    const claimed = open();
    claimTicket(GUILD, claimed, "staff-1");

    expect(countTicketsByStatus(GUILD)).toEqual({ open: 1, claimed: 1, escalated: 0, closed: 0 });
  });
});
