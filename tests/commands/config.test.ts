/**
 * Guildhall — tests/commands/config.test.ts
 * WHAT: Tests for /config view, set, reset, history and autocomplete.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, vi } from "vitest";
import type { AutocompleteInteraction, InteractionReplyOptions } from "discord.js";
import { autocomplete, buildScopeEmbed, execute, formatHistoryLine } from "../../src/commands/config.js";
import { settings } from "../../src/features/settings/index.js";
import type { SettingsHistoryEntry } from "../../src/features/settings/types.js";
import { resetDatabase } from "../utils/dbFixtures.js";
import { createTestCommandContext } from "../utils/contextFactory.js";
import { createMockInteraction, embedJson, repliedContents } from "../utils/discordMocks.js";

const CHANNEL = "300000000000000001";
const NOW = Date.UTC(2024, 2, 15, 12, 0);

function adminInteraction(sub: string, strings: Record<string, string | null> = {}) {
  return createMockInteraction({ isAdmin: true, options: { getSubcommand: sub, getString: strings } });
}

function firstEmbed(interaction: ReturnType<typeof createMockInteraction>) {
  const [payload] = vi.mocked(interaction.reply).mock.calls[0];
  return embedJson(payload as InteractionReplyOptions);
}

describe("buildScopeEmbed", () => {
  beforeEach(() => {
    resetDatabase();
  });

  it("lists keys alphabetically and marks guild overrides", () => {
    settings.set("reminders", "default_channel_id", CHANNEL, "guild-1");

    const embed = buildScopeEmbed("reminders", settings.listScope("reminders", "guild-1")).toJSON();

    expect(embed.title).toBe("⚙️ Settings: reminders");
    expect(embed.description).toBe(
      [
        "**allow_everyone_mentions**: off\n-# Prefix reminders with @everyone",
        `**default_channel_id** ✏️: <#${CHANNEL}>\n-# Channel reminders go to when none is given`,
        "**enabled**: on\n-# Send reminders for this server",
      ].join("\n")
    );
  });

  it("handles an empty scope", () => {
    expect(buildScopeEmbed("nothing", []).toJSON().description).toBe("No settings in this scope.");
  });
});

describe("formatHistoryLine", () => {
  const entry: SettingsHistoryEntry = {
    id: 1,
    guildId: "guild-1",
    scope: "reminders",
    key: "enabled",
    oldValue: null,
    newValue: false,
    valueType: "bool",
    changedBy: "user-1",
    changedAtS: 1_700_000_000,
    changeType: "set",
  };

  it("renders old and new values the way /config shows them", () => {
    expect(formatHistoryLine(entry)).toBe("<t:1700000000:R> **reminders.enabled** not set → off by <@user-1>");
  });

  it("renders resets and system changes", () => {
    expect(formatHistoryLine({ ...entry, changeType: "clear", oldValue: true, newValue: null, changedBy: null })).toBe(
      "<t:1700000000:R> **reminders.enabled** reset (was on) by system"
    );
  });

  it("falls back to raw values for settings that no longer exist", () => {
    expect(formatHistoryLine({ ...entry, scope: "legacy", key: "flag", oldValue: 1, newValue: 2 })).toBe(
      "<t:1700000000:R> **legacy.flag** 1 → 2 by <@user-1>"
    );
  });
});

describe("/config execute", () => {
  beforeEach(() => {
    resetDatabase();
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(NOW);
  });

  it("refuses members without Manage Server", async () => {
    const interaction = createMockInteraction({ options: { getSubcommand: "view", getString: { scope: "system" } } });
    await execute(createTestCommandContext(interaction));
    expect(repliedContents(interaction)).toEqual(["You don't have permission to use this command."]);
  });

  it("shows a scope", async () => {
    const interaction = adminInteraction("view", { scope: "embedwatcher" });
    await execute(createTestCommandContext(interaction));
    expect(firstEmbed(interaction)?.title).toBe("⚙️ Settings: embedwatcher");
  });

  it("rejects unknown scopes and keys", async () => {
    await expect(execute(createTestCommandContext(adminInteraction("view", { scope: "nope" })))).rejects.toThrow(
      "Unknown scope `nope`. Known scopes: embedwatcher, invites, onboarding, reminders, system, ticketbot"
    );
    await expect(
      execute(createTestCommandContext(adminInteraction("reset", { scope: "system", key: "nope" })))
    ).rejects.toThrow("Unknown setting `system.nope`.");
  });

  it("sets a value for this guild", async () => {
    const interaction = adminInteraction("set", { scope: "embedwatcher", key: "reminder_offset_minutes", value: "30" });

    await execute(createTestCommandContext(interaction));

    expect(repliedContents(interaction)).toEqual(["✅ **embedwatcher.reminder_offset_minutes** is now 30."]);
    expect(settings.getNumber("embedwatcher", "reminder_offset_minutes", "guild-123")).toBe(30);
    expect(settings.getNumber("embedwatcher", "reminder_offset_minutes", "guild-9")).toBe(60);
  });

  it("surfaces coercion errors", async () => {
    const interaction = adminInteraction("set", { scope: "embedwatcher", key: "reminder_offset_minutes", value: "soon" });
    await expect(execute(createTestCommandContext(interaction))).rejects.toThrow(
      "embedwatcher.reminder_offset_minutes expects a whole number"
    );
  });

  it("resets an override back to the default", async () => {
    settings.set("reminders", "enabled", false, "guild-123");
    const interaction = adminInteraction("reset", { scope: "reminders", key: "enabled" });

    await execute(createTestCommandContext(interaction));

    expect(repliedContents(interaction)).toEqual(["↩️ **reminders.enabled** reset; it is now on."]);
  });

  it("says when there is nothing to reset", async () => {
    const interaction = adminInteraction("reset", { scope: "reminders", key: "enabled" });
    await execute(createTestCommandContext(interaction));
    expect(repliedContents(interaction)).toEqual(["ℹ️ **reminders.enabled** has no override here (currently on)."]);
  });

  it("shows recent changes", async () => {
    await execute(createTestCommandContext(adminInteraction("set", { scope: "reminders", key: "enabled", value: "off" })));
    const interaction = adminInteraction("history", { scope: "reminders" });

    await execute(createTestCommandContext(interaction));

    const embed = firstEmbed(interaction);
    expect(embed?.title).toBe("🕓 Setting changes: reminders");
    expect(embed?.description).toBe(`<t:${NOW / 1000}:R> **reminders.enabled** not set → off by <@user-123>`);
  });

  it("says when nothing changed yet", async () => {
    const interaction = adminInteraction("history");
    await execute(createTestCommandContext(interaction));
    expect(firstEmbed(interaction)?.description).toBe("No changes yet.");
  });
});

describe("/config autocomplete", () => {
  beforeEach(() => {
    resetDatabase();
  });

  function autocompleteInteraction(focused: { name: string; value: string }, scope: string | null = null) {
    return {
      options: { getFocused: () => focused, getString: () => scope },
      respond: vi.fn().mockResolvedValue(undefined),
    };
  }

  it("suggests scopes", async () => {
    const interaction = autocompleteInteraction({ name: "scope", value: "RE" });
    await autocomplete(interaction as unknown as AutocompleteInteraction);
    expect(interaction.respond).toHaveBeenCalledWith([{ name: "reminders", value: "reminders" }]);
  });

  it("suggests keys of the chosen scope", async () => {
    const interaction = autocompleteInteraction({ name: "key", value: "en" }, "reminders");
    await autocomplete(interaction as unknown as AutocompleteInteraction);
    expect(interaction.respond).toHaveBeenCalledWith([
      { name: "allow_everyone_mentions", value: "allow_everyone_mentions" },
      { name: "enabled", value: "enabled" },
    ]);
  });

  it("suggests nothing for an unknown scope", async () => {
    const interaction = autocompleteInteraction({ name: "key", value: "" }, "nope");
    await autocomplete(interaction as unknown as AutocompleteInteraction);
    expect(interaction.respond).toHaveBeenCalledWith([]);
  });
});
