/**
 * Guildhall — tests/commands/export.test.ts
 * WHAT: Tests for /export tickets and /export faq.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { AttachmentBuilder, type ChatInputCommandInteraction, type InteractionReplyOptions } from "discord.js";
import { execute, faqCsv, scopeStart, ticketsCsv } from "../../src/commands/export.js";
import { closeTicket, createTicket, getTicket } from "../../src/features/tickets/store.js";
import { addEntry, listEntries } from "../../src/features/faq/store.js";
import { resetDatabase } from "../utils/dbFixtures.js";
import { createTestCommandContext } from "../utils/contextFactory.js";
import { createMockInteraction, repliedContents, type MockOptionsConfig } from "../utils/discordMocks.js";

const GUILD = "guild-123";
const NOW_S = 1729454400; // 2024-10-20T20:00:00Z
const DAY_S = 86_400;

function slash(sub: string, options: Omit<MockOptionsConfig, "getSubcommand"> = {}, isAdmin = true) {
  return createMockInteraction({ isAdmin, options: { getSubcommand: sub, ...options } });
}

function attachedCsv(interaction: ChatInputCommandInteraction) {
  const payload = vi.mocked(interaction.reply).mock.calls[0][0] as InteractionReplyOptions;
  const file = payload.files?.[0];
  if (!(file instanceof AttachmentBuilder) || !Buffer.isBuffer(file.attachment)) {
    throw new Error("reply carried no CSV attachment");
  }
  return { name: file.name, text: file.attachment.toString("utf8") };
}

describe("scopeStart", () => {
  it("counts whole days back from now", () => {
    expect(scopeStart("7d", NOW_S)).toBe(NOW_S - 7 * DAY_S);
    expect(scopeStart("30d", NOW_S)).toBe(NOW_S - 30 * DAY_S);
    expect(scopeStart("all", NOW_S)).toBeNull();
  });
});

describe("CSV rendering", () => {
  beforeEach(() => {
    resetDatabase();
  });

  it("renders tickets with ISO timestamps and empty fields for nulls", () => {
    const id = createTicket({ guildId: GUILD, userId: "u1", username: "ana", description: "Can't join, voice broken" }, NOW_S);
    closeTicket(GUILD, id, NOW_S + 60);
    const row = getTicket(GUILD, id);
    if (!row) throw new Error("ticket missing");

    expect(ticketsCsv([row]).split("\n")).toEqual([
      "id,user_id,username,status,description,channel_id,claimed_by,escalated_to,created_at,updated_at,closed_at",
      `${id},u1,ana,closed,"Can't join, voice broken",,,,2024-10-20T20:00:00.000Z,2024-10-20T20:01:00.000Z,2024-10-20T20:01:00.000Z`,
    ]);
  });

  it("joins FAQ keywords with semicolons", () => {
    addEntry({ guildId: GUILD, title: "Roles", summary: 'Use "/roles"', keywords: ["roles", "ranks"], createdBy: "admin-1" }, NOW_S);
    expect(faqCsv(listEntries(GUILD)).split("\n")).toEqual([
      "id,title,summary,keywords,created_by,created_at",
      '1,Roles,"Use ""/roles""",roles;ranks,admin-1,2024-10-20T20:00:00.000Z',
    ]);
  });
});

describe("/export", () => {
  beforeEach(() => {
    resetDatabase();
    vi.useFakeTimers();
    vi.setSystemTime(new Date(NOW_S * 1000));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("refuses members without Manage Server", async () => {
    const interaction = slash("tickets", {}, false);
    await execute(createTestCommandContext(interaction));
    expect(repliedContents(interaction)).toEqual(["You don't have permission to use this command."]);
  });

  it("exports only this server's tickets from the chosen window, newest first", async () => {
    createTicket({ guildId: GUILD, userId: "u1", username: "old", description: "Old" }, NOW_S - 10 * DAY_S);
    createTicket({ guildId: GUILD, userId: "u2", username: "recent", description: "Recent" }, NOW_S - 3 * DAY_S);
    createTicket({ guildId: "guild-other", userId: "u3", username: "elsewhere", description: "Other" }, NOW_S);
    createTicket({ guildId: GUILD, userId: "u4", username: "today", description: "Today" }, NOW_S);
    const interaction = slash("tickets", { getString: { scope: "7d" } });

    await execute(createTestCommandContext(interaction));

    expect(repliedContents(interaction)).toEqual(["✅ Exported 2 tickets (scope: 7d)."]);
    const csv = attachedCsv(interaction);
    expect(csv.name).toBe("tickets_7d.csv");
    expect(csv.text.split("\n").map((line) => line.split(",")[2])).toEqual(["username", "today", "recent"]);
  });

  it("exports every ticket without a scope", async () => {
    createTicket({ guildId: GUILD, userId: "u1", username: "old", description: "Old" }, NOW_S - 400 * DAY_S);
    const interaction = slash("tickets");

    await execute(createTestCommandContext(interaction));

    expect(repliedContents(interaction)).toEqual(["✅ Exported 1 ticket (scope: all)."]);
    expect(attachedCsv(interaction).name).toBe("tickets_all.csv");
  });

  it("sends the file privately", async () => {
    const interaction = slash("faq");
    await execute(createTestCommandContext(interaction));
    const payload = vi.mocked(interaction.reply).mock.calls[0][0] as InteractionReplyOptions;
    expect(payload.flags).toBeDefined();
  });

  it("exports the FAQ", async () => {
    addEntry({ guildId: GUILD, title: "Rules", summary: "Be kind", keywords: [], createdBy: "admin-1" }, NOW_S - 60);
    addEntry({ guildId: GUILD, title: "Roles", summary: "Pick some", keywords: [], createdBy: "admin-1" }, NOW_S);
    const interaction = slash("faq");

    await execute(createTestCommandContext(interaction));

    expect(repliedContents(interaction)).toEqual(["✅ Exported 2 FAQ entries."]);
    const csv = attachedCsv(interaction);
    expect(csv.name).toBe("faq_entries.csv");
    expect(csv.text.split("\n").slice(1)).toEqual([
      "2,Roles,Pick some,,admin-1,2024-10-20T20:00:00.000Z",
      "1,Rules,Be kind,,admin-1,2024-10-20T19:59:00.000Z",
    ]);
  });
});
