/**
 * Guildhall — tests/commands/reminder.test.ts
 * WHAT: Tests for /reminder add, list and delete.
 * WHY: Manual reminders are the one path where members type dates and times themselves.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, vi } from "vitest";
import type { InteractionReplyOptions } from "discord.js";
import {
  buildManualReminder,
  buildReminderListEmbed,
  describeReminder,
  execute,
  parseMessageLink,
  type ManualReminderInput,
} from "../../src/commands/reminder.js";
import { UserInputError } from "../../src/lib/errors.js";
import { getReminder, insertReminder, listReminders } from "../../src/features/reminders/store.js";
import { settings } from "../../src/features/settings/index.js";
import { resetDatabase } from "../utils/dbFixtures.js";
import { createTestCommandContext } from "../utils/contextFactory.js";
import { createMockChannel, createMockInteraction, embedJson, repliedContents } from "../utils/discordMocks.js";

const TZ = "Europe/Brussels";
// Friday 15 March 2024, 13:00 in Brussels
const NOW = Date.UTC(2024, 2, 15, 12, 0);
const TARGET = "300000000000000001";

function manual(overrides: Partial<ManualReminderInput> = {}): ManualReminderInput {
  return {
    guildId: "guild-1",
    channelId: TARGET,
    createdBy: "user-1",
    name: "Movie night",
    time: "20:00",
    days: null,
    date: null,
    message: null,
    location: null,
    offsetMinutes: 60,
    ...overrides,
  };
}

describe("parseMessageLink", () => {
  it("reads guild, channel and message ids", () => {
    expect(parseMessageLink("https://discord.com/channels/1/22/333")).toEqual({
      guildId: "1",
      channelId: "22",
      messageId: "333",
    });
  });

  it("accepts ptb, canary and discordapp hosts", () => {
    expect(parseMessageLink("https://ptb.discord.com/channels/1/2/3")?.messageId).toBe("3");
    expect(parseMessageLink("https://canary.discordapp.com/channels/1/2/3")?.channelId).toBe("2");
  });

  it("rejects anything else", () => {
    expect(parseMessageLink("https://example.com/channels/1/2/3")).toBeNull();
    expect(parseMessageLink("not a link")).toBeNull();
  });
});

describe("buildManualReminder", () => {
  it("schedules a one-off the offset before the event", () => {
    const row = buildManualReminder(manual({ date: "22/03/2024", location: " Cinema " }), NOW, TZ);
    expect(row).toEqual({
      guildId: "guild-1",
      name: "Movie night",
      channelId: TARGET,
      message: "",
      location: "Cinema",
      createdBy: "user-1",
      offsetMinutes: 60,
      time: "19:00:00",
      callTime: "20:00:00",
      days: [4],
      eventTimeS: Date.UTC(2024, 2, 22, 19, 0) / 1000,
    });
  });

  it("builds a recurring reminder from days", () => {
    const row = buildManualReminder(manual({ days: "ma,wo", time: "19.30" }), NOW, TZ);
    expect(row).toMatchObject({ time: "19:30:00", callTime: "19:30:00", days: [0, 2], eventTimeS: null });
  });

  it("refuses missing names, bad times, bad dates, past events and missing days", () => {
    expect(() => buildManualReminder(manual({ name: "  " }), NOW, TZ)).toThrow("A reminder needs a name.");
    expect(() => buildManualReminder(manual({ time: "25:00" }), NOW, TZ)).toThrow(
      "Invalid time. Use HH:MM, for example 19:30."
    );
    expect(() => buildManualReminder(manual({ date: "someday" }), NOW, TZ)).toThrow(UserInputError);
    expect(() => buildManualReminder(manual({ date: "01/03/2024" }), NOW, TZ)).toThrow(
      "That event is already in the past."
    );
    expect(() => buildManualReminder(manual(), NOW, TZ)).toThrow(
      "No valid days found. Try ma,wo or monday,friday or daily."
    );
  });
});

describe("describeReminder / buildReminderListEmbed", () => {
  beforeEach(() => {
    resetDatabase();
  });

  it("describes one-offs by date and recurring reminders by day", () => {
    insertReminder(buildManualReminder(manual({ date: "22/03/2024" }), NOW, TZ));
    insertReminder(buildManualReminder(manual({ name: "Raid", days: "vr", time: "21:00" }), NOW, TZ));
    const [oneOff, weekly] = listReminders("guild-1");

    expect(describeReminder(oneOff, TZ)).toBe(
      `**#1** Movie night · 22/03/2024 · ⏰ 19:00 (event 20:00) · <#${TARGET}>`
    );
    expect(describeReminder(weekly, TZ)).toBe(`**#2** Raid · Vrijdag · ⏰ 21:00 · <#${TARGET}>`);
  });

  it("says so when there is nothing to list", () => {
    expect(buildReminderListEmbed([], TZ).toJSON().description).toBe("No reminders yet.");
  });
});

describe("/reminder execute", () => {
  beforeEach(() => {
    resetDatabase();
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(NOW);
  });

  it("adds a one-off reminder and confirms it", async () => {
    const interaction = createMockInteraction({
      options: {
        getSubcommand: "add",
        getString: { name: "Movie night", time: "20:00", date: "22/03/2024" },
        getChannel: { channel: { id: TARGET } },
      },
    });

    await execute(createTestCommandContext(interaction));

    expect(interaction.deferReply).toHaveBeenCalled();
    expect(repliedContents(interaction)).toEqual([
      `✅ Reminder added: **#1** Movie night · 22/03/2024 · ⏰ 19:00 (event 20:00) · <#${TARGET}>`,
    ]);
    expect(getReminder("guild-123", 1)).toMatchObject({ channel_id: TARGET, created_by: "user-123" });
  });

  it("falls back to the command channel for recurring reminders", async () => {
    const interaction = createMockInteraction({
      options: { getSubcommand: "add", getString: { name: "Raid", time: "19:30", days: "ma,wo" } },
    });

    await execute(createTestCommandContext(interaction));

    expect(repliedContents(interaction)).toEqual([
      "✅ Reminder added: **#1** Raid · Maandag, Woensdag · ⏰ 19:30 · <#channel-123>",
    ]);
  });

  it("imports a reminder from a linked announcement", async () => {
    const guildId = "400000000000000001";
    const source = createMockChannel("200000000000000001", {
      guildId,
      messages: {
        fetch: vi.fn().mockResolvedValue({
          embeds: [{ title: "Quiz", description: "Date: 22/03/2024\nTime: 20:00", image: { url: "https://example.com/q.png" } }],
        }),
      },
    });
    const interaction = createMockInteraction({
      guildId,
      channels: [source],
      options: {
        getSubcommand: "add",
        getString: { link: `https://discord.com/channels/${guildId}/200000000000000001/500000000000000001` },
      },
    });

    await execute(createTestCommandContext(interaction));

    expect(getReminder(guildId, 1)).toMatchObject({
      name: "Quiz",
      time: "19:00:00",
      call_time: "20:00:00",
      origin_channel_id: "200000000000000001",
      origin_message_id: "500000000000000001",
      image_url: "https://example.com/q.png",
      event_time_s: Date.UTC(2024, 2, 22, 19, 0) / 1000,
    });
  });

  it("refuses links from another server", async () => {
    const interaction = createMockInteraction({
      options: { getSubcommand: "add", getString: { link: "https://discord.com/channels/1/2/3" } },
    });

    await expect(execute(createTestCommandContext(interaction))).rejects.toThrow(
      "That is not a message link from this server."
    );
  });

  it("refuses a link whose channel lives in another server", async () => {
    const guildId = "400000000000000001";
    const elsewhere = createMockChannel("200000000000000002", {
      guildId: "900000000000000009",
      messages: {
        fetch: vi.fn().mockResolvedValue({ embeds: [{ title: "Staff only", description: "Date: 22/03/2024" }] }),
      },
    });
    const interaction = createMockInteraction({
      guildId,
      channels: [elsewhere],
      options: {
        getSubcommand: "add",
        getString: { link: `https://discord.com/channels/${guildId}/200000000000000002/500000000000000001` },
      },
    });

    await expect(execute(createTestCommandContext(interaction))).rejects.toThrow(
      "I can't read the channel that message is in."
    );
    expect(elsewhere.messages.fetch).not.toHaveBeenCalled();
    expect(listReminders(guildId)).toEqual([]);
  });

  it("does nothing while reminders are turned off", async () => {
    settings.set("reminders", "enabled", "false", "guild-123");
    const interaction = createMockInteraction({
      options: { getSubcommand: "add", getString: { name: "Raid", time: "19:30", days: "ma" } },
    });

    await execute(createTestCommandContext(interaction));

    expect(repliedContents(interaction)).toEqual(["⚠️ Reminders are turned off for this server."]);
    expect(listReminders("guild-123")).toEqual([]);
  });

  it("lists this guild's reminders", async () => {
    insertReminder(buildManualReminder(manual({ guildId: "guild-123", days: "za" }), NOW, TZ));
    const interaction = createMockInteraction({ options: { getSubcommand: "list" } });

    await execute(createTestCommandContext(interaction));

    const [payload] = vi.mocked(interaction.reply).mock.calls[0];
    expect(embedJson(payload as InteractionReplyOptions)?.description).toBe(`**#1** Movie night · Zaterdag · ⏰ 20:00 · <#${TARGET}>`);
  });

  describe("delete", () => {
    beforeEach(() => {
      insertReminder(buildManualReminder(manual({ guildId: "guild-123", createdBy: "creator-1", days: "ma" }), NOW, TZ));
    });

    it("reports unknown ids", async () => {
      const interaction = createMockInteraction({ options: { getSubcommand: "delete", getInteger: { id: 9 } } });
      await execute(createTestCommandContext(interaction));
      expect(repliedContents(interaction)).toEqual(["❌ Reminder #9 not found."]);
    });

    it("only lets the creator delete", async () => {
      const interaction = createMockInteraction({ options: { getSubcommand: "delete", getInteger: { id: 1 } } });
      await execute(createTestCommandContext(interaction));
      expect(repliedContents(interaction)).toEqual(["❌ You can only access your own reminders."]);
      expect(getReminder("guild-123", 1)).toBeDefined();
    });

    it("lets the creator delete", async () => {
      const interaction = createMockInteraction({
        userId: "creator-1",
        options: { getSubcommand: "delete", getInteger: { id: 1 } },
      });
      await execute(createTestCommandContext(interaction));
      expect(repliedContents(interaction)).toEqual(["🗑️ Reminder **Movie night** (#1) deleted."]);
      expect(getReminder("guild-123", 1)).toBeUndefined();
    });

    it("lets admins delete anyone's reminder", async () => {
      const interaction = createMockInteraction({
        isAdmin: true,
        options: { getSubcommand: "delete", getInteger: { id: 1 } },
      });
      await execute(createTestCommandContext(interaction));
      expect(getReminder("guild-123", 1)).toBeUndefined();
    });
  });

  it("refuses direct messages", async () => {
    const interaction = createMockInteraction({ guildId: null, options: { getSubcommand: "list" } });
    await expect(execute(createTestCommandContext(interaction))).rejects.toThrow(
      "This command can only be used in a server."
    );
  });
});
