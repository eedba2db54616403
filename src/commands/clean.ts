/**
 * Guildhall — src/commands/clean.ts
 * WHAT: /clean [limit], bulk-deletes the most recent messages of the current channel.
 * FLOWS:
 *  - Manage Messages check → defer (ephemeral) → channel.bulkDelete(limit, filterOld) → count
 * DOCS:
 *  - bulkDelete: https://discord.js.org/#/docs/discord.js/main/class/TextChannel?scrollTo=bulkDelete
 *
 * NOTE: Discord refuses bulk deletes of messages older than 14 days; those are left in place
 * and simply not counted.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { PermissionFlagsBits, SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { logger } from "../lib/logger.js";
import { requireGuildId, requireMemberPermission } from "../lib/permissions.js";

const DEFAULT_LIMIT = 10;
const MAX_LIMIT = 100;

export const data = new SlashCommandBuilder()
  .setName("clean")
  .setDescription(`Delete recent messages in this channel (max ${MAX_LIMIT})`)
  .setDMPermission(false)
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageMessages)
  .addIntegerOption((o) =>
    o
      .setName("limit")
      .setDescription(`How many messages (default ${DEFAULT_LIMIT})`)
      .setMinValue(1)
      .setMaxValue(MAX_LIMIT)
  );

export function clampLimit(requested: number | null): number {
  if (requested === null) return DEFAULT_LIMIT;
  return Math.min(MAX_LIMIT, Math.max(1, Math.trunc(requested)));
}

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const guildId = requireGuildId(interaction);

  if (!(await requireMemberPermission(interaction, PermissionFlagsBits.ManageMessages))) return;

  const channel = interaction.channel;
  if (!channel || channel.isDMBased()) {
    await replyOrEdit(interaction, { content: "❌ This command only works in server text channels." });
    return;
  }

  const limit = clampLimit(interaction.options.getInteger("limit"));
  await ensureDeferred(interaction);
  const deleted = await withStep(ctx, "bulk_delete", () => channel.bulkDelete(limit, true));

  logger.info(
    { evt: "clean", guildId, channelId: channel.id, requested: limit, deleted: deleted.size, by: interaction.user.id },
    "[clean] messages deleted"
  );
  await replyOrEdit(interaction, {
    content: `✅ ${deleted.size} message${deleted.size === 1 ? "" : "s"} deleted.`,
  });
}
