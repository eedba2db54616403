/**
 * Guildhall — src/commands/ticket.ts
 * WHAT: /ticket create | list | claim | escalate | close
 * WHY: Lightweight support queue: members open a ticket, staff pick it up from the log channel.
 * FLOWS:
 *  - create → cooldown → insert → reply with id → log embed
 *  - list/claim/escalate (staff) → conditional UPDATE → log embed
 *  - close (staff or the ticket owner) → log embed
 * DOCS:
 *  - SlashCommandBuilder subcommands: https://discordjs.guide/slash-commands/advanced-creation.html#subcommands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import { replyOrEdit, withSql, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { logger } from "../lib/logger.js";
import { checkCooldown, COOLDOWNS, formatCooldown } from "../lib/rateLimiter.js";
import { isStaff, requireGuildId, requireStaff } from "../lib/permissions.js";
import { validateOwnership } from "../lib/sanitize.js";
import { postToLogChannel } from "../features/logChannel.js";
import { settings } from "../features/settings/index.js";
import {
  claimTicket,
  closeTicket,
  createTicket,
  escalateTicket,
  getTicket,
  listActiveTickets,
  type TicketRow,
} from "../features/tickets/store.js";
import { buildTicketListEmbed, buildTicketLogEmbed, type TicketEvent } from "../features/tickets/embeds.js";

export const data = new SlashCommandBuilder()
  .setName("ticket")
  .setDescription("Support tickets")
  .setDMPermission(false)
  .addSubcommand((sc) =>
    sc
      .setName("create")
      .setDescription("Open a support ticket")
      .addStringOption((o) =>
        o.setName("description").setDescription("What do you need help with?").setRequired(true).setMaxLength(1000)
      )
  )
  .addSubcommand((sc) => sc.setName("list").setDescription("List open tickets (staff)"))
  .addSubcommand((sc) =>
    sc
      .setName("claim")
      .setDescription("Claim a ticket (staff)")
      .addIntegerOption((o) => o.setName("id").setDescription("Ticket number").setRequired(true).setMinValue(1))
  )
  .addSubcommand((sc) =>
    sc
      .setName("escalate")
      .setDescription("Escalate a ticket (staff)")
      .addIntegerOption((o) => o.setName("id").setDescription("Ticket number").setRequired(true).setMinValue(1))
  )
  .addSubcommand((sc) =>
    sc
      .setName("close")
      .setDescription("Close a ticket")
      .addIntegerOption((o) => o.setName("id").setDescription("Ticket number").setRequired(true).setMinValue(1))
  );

async function logTicket(
  interaction: ChatInputCommandInteraction,
  ticket: TicketRow,
  event: TicketEvent,
  ping?: string | null
): Promise<void> {
  await postToLogChannel(interaction.client, ticket.guild_id, {
    content: ping ? `<@&${ping}>` : undefined,
    embeds: [buildTicketLogEmbed(ticket, event, interaction.user.id)],
    allowedMentions: { roles: ping ? [ping] : [] },
  });
}

async function handleCreate(ctx: CommandContext<ChatInputCommandInteraction>, guildId: string): Promise<void> {
  const { interaction } = ctx;
  const cooldown = checkCooldown("ticket:create", interaction.user.id, COOLDOWNS.TICKET_CREATE_MS);
  if (!cooldown.allowed) {
    await replyOrEdit(interaction, {
      content: `⏳ Please wait ${formatCooldown(cooldown.remainingMs)} before opening another ticket.`,
    });
    return;
  }

  const description = interaction.options.getString("description", true).trim();
  const id = withSql(ctx, "INSERT INTO support_tickets", () =>
    createTicket({
      guildId,
      userId: interaction.user.id,
      username: interaction.user.username,
      description,
      channelId: interaction.channelId,
    })
  );

  await replyOrEdit(interaction, { content: `🎫 Ticket **#${id}** created. Staff will get back to you soon.` });
  logger.info({ evt: "ticket_created", guildId, ticketId: id, userId: interaction.user.id }, "[tickets] created");

  const ticket = getTicket(guildId, id);
  if (ticket) await logTicket(interaction, ticket, "created");
}

async function handleTransition(
  ctx: CommandContext<ChatInputCommandInteraction>,
  guildId: string,
  event: "claimed" | "escalated" | "closed"
): Promise<void> {
  const { interaction } = ctx;
  const id = interaction.options.getInteger("id", true);
  const ticket = getTicket(guildId, id);
  if (!ticket) {
    await replyOrEdit(interaction, { content: `❌ Ticket #${id} not found.` });
    return;
  }

  let changed: boolean;
  let ping: string | null = null;
  let refusal: string;

  switch (event) {
    case "claimed":
      changed = withSql(ctx, "UPDATE support_tickets SET status = 'claimed'", () =>
        claimTicket(guildId, id, interaction.user.id)
      );
      refusal = `❌ Ticket #${id} is not open or was already claimed.`;
      break;
    case "escalated":
      ping = settings.getString("ticketbot", "escalation_role_id", guildId);
      changed = withSql(ctx, "UPDATE support_tickets SET status = 'escalated'", () =>
        escalateTicket(guildId, id, ping)
      );
      refusal = `❌ Ticket #${id} is already closed.`;
      break;
    case "closed":
      changed = withSql(ctx, "UPDATE support_tickets SET status = 'closed'", () => closeTicket(guildId, id));
      refusal = `ℹ️ Ticket #${id} is already closed.`;
      break;
  }

  if (!changed) {
    await replyOrEdit(interaction, { content: refusal });
    return;
  }

  await replyOrEdit(interaction, { content: `✅ Ticket #${id} ${event}.` });
  logger.info({ evt: `ticket_${event}`, guildId, ticketId: id, by: interaction.user.id }, "[tickets] status changed");

  const updated = getTicket(guildId, id);
  if (updated) await logTicket(interaction, updated, event, event === "escalated" ? ping : null);
}

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const guildId = requireGuildId(interaction);
  const sub = interaction.options.getSubcommand();

  switch (sub) {
    case "create":
      await withStep(ctx, "create", () => handleCreate(ctx, guildId));
      return;

    case "list": {
      if (!(await requireStaff(interaction))) return;
      const tickets = withSql(ctx, "SELECT * FROM support_tickets", () => listActiveTickets(guildId));
      await replyOrEdit(interaction, { embeds: [buildTicketListEmbed(tickets)] });
      return;
    }

    case "claim":
    case "escalate":
      if (!(await requireStaff(interaction))) return;
      await withStep(ctx, sub, () => handleTransition(ctx, guildId, sub === "claim" ? "claimed" : "escalated"));
      return;

    case "close": {
      const id = interaction.options.getInteger("id", true);
      const ticket = getTicket(guildId, id);
      if (ticket && !isStaff(interaction)) {
        const refusal = validateOwnership(ticket.user_id, interaction.user.id, "tickets");
        if (refusal) {
          await replyOrEdit(interaction, { content: refusal });
          return;
        }
      }
      await withStep(ctx, "close", () => handleTransition(ctx, guildId, "closed"));
      return;
    }

    default:
      await replyOrEdit(interaction, { content: `Unknown subcommand: ${sub}` });
  }
}
