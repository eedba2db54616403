/**
 * Guildhall — src/commands/onboarding.ts
 * WHAT: /onboarding start | status | reset
 * FLOWS:
 *  - start → features/onboarding/handlers.startOnboarding (buttons/modals take it from there)
 *  - status [user] → stored summary; other members need ManageGuild
 *  - reset user (ManageGuild) → delete the record and any session so they can start over
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import { replyOrEdit, withSql, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { logger } from "../lib/logger.js";
import { requireGuildAdmin, requireGuildId } from "../lib/permissions.js";
import { startOnboarding } from "../features/onboarding/handlers.js";
import { deleteCompletion, dropSession, getCompletion, getSession } from "../features/onboarding/store.js";
import type { OnboardingRecord } from "../features/onboarding/store.js";

export const data = new SlashCommandBuilder()
  .setName("onboarding")
  .setDescription("Member onboarding")
  .setDMPermission(false)
  .addSubcommand((sc) => sc.setName("start").setDescription("Start (or restart) your onboarding"))
  .addSubcommand((sc) =>
    sc
      .setName("status")
      .setDescription("Show onboarding answers")
      .addUserOption((o) => o.setName("user").setDescription("Member to look up (admins)"))
  )
  .addSubcommand((sc) =>
    sc
      .setName("reset")
      .setDescription("Clear a member's onboarding so they can redo it (admins)")
      .addUserOption((o) => o.setName("user").setDescription("Member").setRequired(true))
  );

export function buildStatusEmbed(userId: string, record: OnboardingRecord): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle("📋 Onboarding status")
    .setDescription(`<@${userId}> completed onboarding <t:${record.completedAtS}:R>.`)
    .setColor(0x57f287);
  if (record.responses.length > 0) {
    embed.addFields(
      record.responses.slice(0, 25).map((r) => ({ name: r.question.slice(0, 256), value: `➜ ${r.answer}`.slice(0, 1024) }))
    );
  }
  return embed;
}

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const guildId = requireGuildId(interaction);
  const sub = interaction.options.getSubcommand();

  switch (sub) {
    case "start":
      await withStep(ctx, "start", () => startOnboarding(ctx));
      return;

    case "status": {
      const target = interaction.options.getUser("user") ?? interaction.user;
      if (target.id !== interaction.user.id && !(await requireGuildAdmin(interaction))) return;

      const record = withSql(ctx, "SELECT * FROM onboarding WHERE guild_id = ? AND user_id = ?", () =>
        getCompletion(guildId, target.id)
      );
      if (record) {
        await replyOrEdit(interaction, { embeds: [buildStatusEmbed(target.id, record)] });
        return;
      }
      const inProgress = getSession(guildId, target.id) !== undefined;
      await replyOrEdit(interaction, {
        content: inProgress
          ? `⏳ <@${target.id}> is still going through onboarding.`
          : `❌ <@${target.id}> has not completed onboarding.`,
      });
      return;
    }

    case "reset": {
      if (!(await requireGuildAdmin(interaction))) return;
      const target = interaction.options.getUser("user", true);
      const removed = withSql(ctx, "DELETE FROM onboarding", () => deleteCompletion(guildId, target.id));
      const hadSession = dropSession(guildId, target.id);
      logger.info(
        { evt: "onboarding_reset", guildId, userId: target.id, removed, hadSession, by: interaction.user.id },
        "[onboarding] reset"
      );
      await replyOrEdit(interaction, {
        content:
          removed || hadSession
            ? `✅ Onboarding for <@${target.id}> was reset.`
            : `ℹ️ <@${target.id}> had no onboarding to reset.`,
      });
      return;
    }

    default:
      await replyOrEdit(interaction, { content: `Unknown subcommand: ${sub}` });
  }
}
