/**
 * Guildhall — src/commands/config.ts
 * WHAT: /config view | set | reset | history for registered settings.
 * WHY: Every feature reads its channels, roles and toggles from the settings service;
 *      this is the only way admins change them.
 * FLOWS:
 *  - view scope → listScope(scope, guild) → embed (✏️ marks guild overrides)
 *  - set scope key value → coerce → store → reply with the new value
 *  - reset scope key → drop the guild override → back to global/default
 *  - history [scope] → last changes, newest first
 * DOCS:
 *  - Autocomplete: https://discordjs.guide/slash-commands/autocomplete.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  EmbedBuilder,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type AutocompleteInteraction,
  type ChatInputCommandInteraction,
} from "discord.js";
import { UserInputError } from "../lib/errors.js";
import { replyOrEdit, withSql, type CommandContext } from "../lib/cmdWrap.js";
import { requireGuildAdmin, requireGuildId } from "../lib/permissions.js";
import { formatSettingValue, settingLabel, settings, type ScopeEntry } from "../features/settings/index.js";
import type { SettingsHistoryEntry } from "../features/settings/types.js";
import { SAFE_ALLOWED_MENTIONS } from "../lib/constants.js";

export const data = new SlashCommandBuilder()
  .setName("config")
  .setDescription("Server settings")
  .setDMPermission(false)
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .addSubcommand((sc) =>
    sc
      .setName("view")
      .setDescription("Show every setting in a scope")
      .addStringOption((o) => o.setName("scope").setDescription("Scope").setRequired(true).setAutocomplete(true))
  )
  .addSubcommand((sc) =>
    sc
      .setName("set")
      .setDescription("Change a setting for this server")
      .addStringOption((o) => o.setName("scope").setDescription("Scope").setRequired(true).setAutocomplete(true))
      .addStringOption((o) => o.setName("key").setDescription("Setting").setRequired(true).setAutocomplete(true))
      .addStringOption((o) =>
        o.setName("value").setDescription("New value (use none to unset)").setRequired(true).setMaxLength(1000)
      )
  )
  .addSubcommand((sc) =>
    sc
      .setName("reset")
      .setDescription("Remove this server's override")
      .addStringOption((o) => o.setName("scope").setDescription("Scope").setRequired(true).setAutocomplete(true))
      .addStringOption((o) => o.setName("key").setDescription("Setting").setRequired(true).setAutocomplete(true))
  )
  .addSubcommand((sc) =>
    sc
      .setName("history")
      .setDescription("Recent setting changes")
      .addStringOption((o) => o.setName("scope").setDescription("Only this scope").setAutocomplete(true))
  );

function requireScope(scope: string): string {
  if (!settings.scopes().includes(scope)) {
    throw new UserInputError("scope", `Unknown scope \`${scope}\`. Known scopes: ${settings.scopes().join(", ")}`);
  }
  return scope;
}

function requireSetting(scope: string, key: string) {
  requireScope(scope);
  if (!settings.has(scope, key)) {
    throw new UserInputError("key", `Unknown setting \`${scope}.${key}\`.`);
  }
  return settings.definition(scope, key);
}

export function buildScopeEmbed(scope: string, entries: readonly ScopeEntry[]): EmbedBuilder {
  const lines = entries.map(({ definition, value, overridden }) => {
    const marker = overridden ? " ✏️" : "";
    return `**${definition.key}**${marker}: ${formatSettingValue(definition, value)}\n-# ${definition.description}`;
  });
  return new EmbedBuilder()
    .setTitle(`⚙️ Settings: ${scope}`)
    .setDescription(lines.join("\n").slice(0, 4096) || "No settings in this scope.")
    .setFooter({ text: "✏️ = set for this server" })
    .setColor(0x5865f2);
}

export function formatHistoryLine(entry: SettingsHistoryEntry): string {
  const label = `${entry.scope}.${entry.key}`;
  const def = settings.has(entry.scope, entry.key) ? settings.definition(entry.scope, entry.key) : null;
  const render = (v: SettingsHistoryEntry["newValue"]) => (def ? formatSettingValue(def, v) : String(v));
  const by = entry.changedBy ? `<@${entry.changedBy}>` : "system";
  const change =
    entry.changeType === "clear"
      ? `reset (was ${render(entry.oldValue)})`
      : `${render(entry.oldValue)} → ${render(entry.newValue)}`;
  return `<t:${entry.changedAtS}:R> **${label}** ${change} by ${by}`;
}

export async function autocomplete(interaction: AutocompleteInteraction): Promise<void> {
  const focused = interaction.options.getFocused(true);
  const typed = focused.value.toLowerCase();
  let names: string[];
  if (focused.name === "key") {
    const scope = interaction.options.getString("scope") ?? "";
    names = settings.scopes().includes(scope) ? settings.listScope(scope).map((e) => e.definition.key) : [];
  } else {
    names = settings.scopes();
  }
  await interaction.respond(
    names
      .filter((n) => n.includes(typed))
      .slice(0, 25)
      .map((n) => ({ name: n, value: n }))
  );
}

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const guildId = requireGuildId(interaction);
  if (!(await requireGuildAdmin(interaction))) return;
  const sub = interaction.options.getSubcommand();

  switch (sub) {
    case "view": {
      const scope = requireScope(interaction.options.getString("scope", true));
      await replyOrEdit(interaction, { embeds: [buildScopeEmbed(scope, settings.listScope(scope, guildId))] });
      return;
    }

    case "set": {
      const def = requireSetting(interaction.options.getString("scope", true), interaction.options.getString("key", true));
      const raw = interaction.options.getString("value", true);
      const value = withSql(ctx, "INSERT INTO bot_settings ... ON CONFLICT DO UPDATE", () =>
        settings.set(def.scope, def.key, raw, guildId, interaction.user.id)
      );
      await replyOrEdit(interaction, {
        content: `✅ **${settingLabel(def)}** is now ${formatSettingValue(def, value)}.`,
        allowedMentions: SAFE_ALLOWED_MENTIONS,
      });
      return;
    }

    case "reset": {
      const def = requireSetting(interaction.options.getString("scope", true), interaction.options.getString("key", true));
      const cleared = withSql(ctx, "DELETE FROM bot_settings", () =>
        settings.clear(def.scope, def.key, guildId, interaction.user.id)
      );
      const current = formatSettingValue(def, settings.get(def.scope, def.key, guildId));
      await replyOrEdit(interaction, {
        content: cleared
          ? `↩️ **${settingLabel(def)}** reset; it is now ${current}.`
          : `ℹ️ **${settingLabel(def)}** has no override here (currently ${current}).`,
        allowedMentions: SAFE_ALLOWED_MENTIONS,
      });
      return;
    }

    case "history": {
      const scopeOpt = interaction.options.getString("scope");
      const scope = scopeOpt ? requireScope(scopeOpt) : undefined;
      const entries = withSql(ctx, "SELECT * FROM settings_history", () => settings.history(guildId, { scope }));
      const embed = new EmbedBuilder()
        .setTitle(scope ? `🕓 Setting changes: ${scope}` : "🕓 Setting changes")
        .setDescription(entries.length ? entries.map(formatHistoryLine).join("\n").slice(0, 4096) : "No changes yet.")
        .setColor(0x5865f2);
      await replyOrEdit(interaction, { embeds: [embed], allowedMentions: SAFE_ALLOWED_MENTIONS });
      return;
    }

    default:
      await replyOrEdit(interaction, { content: `Unknown subcommand: ${sub}` });
  }
}
