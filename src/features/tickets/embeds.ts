/**
 * Guildhall — src/features/tickets/embeds.ts
 * WHAT: Embeds for the staff log channel and /ticket list.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder } from "discord.js";
import { safeEmbedText } from "../../lib/sanitize.js";
import type { TicketRow, TicketStatus } from "./store.js";

const STATUS_COLORS: Record<TicketStatus, number> = {
  open: 0x57f287,
  claimed: 0x5865f2,
  escalated: 0xfee75c,
  closed: 0x99aab5,
};

export type TicketEvent = "created" | "claimed" | "escalated" | "closed";

const EVENT_TITLES: Record<TicketEvent, string> = {
  created: "🎫 New ticket",
  claimed: "🙋 Ticket claimed",
  escalated: "🚨 Ticket escalated",
  closed: "🔒 Ticket closed",
};

/**
 * Log-channel card. The description is user-typed, so it goes through safeEmbedText:
 * no pings, no links, no markdown tricks in the staff channel.
 */
export function buildTicketLogEmbed(ticket: TicketRow, event: TicketEvent, actorId: string): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle(`${EVENT_TITLES[event]} #${ticket.id}`)
    .setColor(STATUS_COLORS[ticket.status])
    .setDescription(safeEmbedText(ticket.description, 1024) || "-")
    .addFields(
      { name: "Opened by", value: `<@${ticket.user_id}>`, inline: true },
      { name: "Status", value: ticket.status, inline: true }
    );

  if (event !== "created") {
    embed.addFields({ name: "By", value: `<@${actorId}>`, inline: true });
  }
  if (ticket.escalated_to) {
    embed.addFields({ name: "Escalated to", value: `<@&${ticket.escalated_to}>`, inline: true });
  }
  return embed.setTimestamp(ticket.updated_at_s * 1000);
}

export function buildTicketListEmbed(tickets: readonly TicketRow[]): EmbedBuilder {
  const embed = new EmbedBuilder().setTitle("Active tickets").setColor(0x5865f2);
  if (tickets.length === 0) {
    return embed.setDescription("No open tickets. 🎉");
  }
  embed.addFields(
    tickets.map((t) => ({
      name: `#${t.id} · ${t.status}`,
      value: [
        `<@${t.user_id}> · <t:${t.created_at_s}:R>`,
        safeEmbedText(t.description, 200) || "-",
        t.claimed_by ? `Claimed by <@${t.claimed_by}>` : null,
      ]
        .filter((line): line is string => line !== null)
        .join("\n"),
    }))
  );
  return embed;
}
