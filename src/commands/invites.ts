/**
 * Guildhall — src/commands/invites.ts
 * WHAT: /invites leaderboard | set | reset
 * FLOWS:
 *  - leaderboard → top 10 inviters for this guild
 *  - set/reset (ManageGuild) → overwrite counts by hand, e.g. after importing history
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import { replyOrEdit, withSql, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { logger } from "../lib/logger.js";
import { requireGuildAdmin, requireGuildId } from "../lib/permissions.js";
import { settings } from "../features/settings/index.js";
import { inviteLeaderboard, resetInvites, setInvites, type InviteCount } from "../features/invites/store.js";
import { SAFE_ALLOWED_MENTIONS } from "../lib/constants.js";

export const data = new SlashCommandBuilder()
  .setName("invites")
  .setDescription("Invite tracking")
  .setDMPermission(false)
  .addSubcommand((sc) => sc.setName("leaderboard").setDescription("Top inviters in this server"))
  .addSubcommand((sc) =>
    sc
      .setName("set")
      .setDescription("Set a member's invite count (admins)")
      .addUserOption((o) => o.setName("user").setDescription("Member").setRequired(true))
      .addIntegerOption((o) => o.setName("count").setDescription("New count").setRequired(true).setMinValue(0))
  )
  .addSubcommand((sc) =>
    sc
      .setName("reset")
      .setDescription("Reset invite counts (admins)")
      .addUserOption((o) => o.setName("user").setDescription("Only this member; everyone when omitted"))
  );

export function buildLeaderboardEmbed(rows: readonly InviteCount[]): EmbedBuilder {
  const embed = new EmbedBuilder().setTitle("🏆 Invite leaderboard").setColor(0xf1c40f);
  if (rows.length === 0) {
    return embed.setDescription("No invite data yet.");
  }
  return embed.setDescription(
    rows.map((r, i) => `**${i + 1}.** <@${r.userId}> · ${r.count} invite${r.count === 1 ? "" : "s"}`).join("\n")
  );
}

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const guildId = requireGuildId(interaction);
  const sub = interaction.options.getSubcommand();

  if (!settings.getBool("invites", "enabled", guildId)) {
    await replyOrEdit(interaction, { content: "⚠️ Invite tracking is turned off for this server." });
    return;
  }

  switch (sub) {
    case "leaderboard": {
      const rows = withSql(ctx, "SELECT * FROM invite_tracker ORDER BY invite_count DESC", () =>
        inviteLeaderboard(guildId, 10)
      );
      await replyOrEdit(
        interaction,
        { embeds: [buildLeaderboardEmbed(rows)], allowedMentions: SAFE_ALLOWED_MENTIONS },
        false
      );
      return;
    }

    case "set": {
      if (!(await requireGuildAdmin(interaction))) return;
      const user = interaction.options.getUser("user", true);
      const count = interaction.options.getInteger("count", true);
      await withStep(ctx, "set", () =>
        withSql(ctx, "INSERT INTO invite_tracker ... ON CONFLICT DO UPDATE", () => setInvites(guildId, user.id, count))
      );
      logger.info({ evt: "invites_set", guildId, userId: user.id, count, by: interaction.user.id }, "[invites] count set");
      await replyOrEdit(interaction, { content: `✅ Invite count for <@${user.id}> set to ${count}.` });
      return;
    }

    case "reset": {
      if (!(await requireGuildAdmin(interaction))) return;
      const user = interaction.options.getUser("user");
      const touched = await withStep(ctx, "reset", () =>
        withSql(ctx, "UPDATE invite_tracker SET invite_count = 0", () => resetInvites(guildId, user?.id))
      );
      logger.info(
        { evt: "invites_reset", guildId, userId: user?.id ?? null, touched, by: interaction.user.id },
        "[invites] counts reset"
      );
      await replyOrEdit(interaction, {
        content: user
          ? `✅ Invite count for <@${user.id}> reset to 0.`
          : `✅ Reset invite counts for ${touched} member${touched === 1 ? "" : "s"}.`,
      });
      return;
    }

    default:
      await replyOrEdit(interaction, { content: `Unknown subcommand: ${sub}` });
  }
}
