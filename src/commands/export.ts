/**
 * Guildhall — src/commands/export.ts
 * WHAT: /export tickets | faq, a guild's data as a CSV attachment (admins).
 * FLOWS:
 *  - tickets [scope] → support_tickets created within 7d / 30d / ever → tickets_<scope>.csv
 *  - faq → every FAQ entry → faq_entries.csv
 * DOCS:
 *  - AttachmentBuilder: https://discord.js.org/#/docs/discord.js/main/class/AttachmentBuilder
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  AttachmentBuilder,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
} from "discord.js";
import { replyOrEdit, withSql, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { toCsv } from "../lib/csv.js";
import { logger } from "../lib/logger.js";
import { requireGuildAdmin, requireGuildId } from "../lib/permissions.js";
import { nowUtc, tsToIso } from "../lib/time.js";
import { listTicketsSince, type TicketRow } from "../features/tickets/store.js";
import { listEntries, type FaqEntry } from "../features/faq/store.js";

const TICKET_SCOPES = { "7d": 7, "30d": 30, all: null } as const;
export type TicketScope = keyof typeof TICKET_SCOPES;

function isTicketScope(value: string): value is TicketScope {
  return Object.hasOwn(TICKET_SCOPES, value);
}

export const data = new SlashCommandBuilder()
  .setName("export")
  .setDescription("Download server data as CSV (admins)")
  .setDMPermission(false)
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .addSubcommand((sc) =>
    sc
      .setName("tickets")
      .setDescription("Support tickets")
      .addStringOption((o) =>
        o
          .setName("scope")
          .setDescription("Created within (default: all)")
          .addChoices(
            { name: "Last 7 days", value: "7d" },
            { name: "Last 30 days", value: "30d" },
            { name: "All", value: "all" }
          )
      )
  )
  .addSubcommand((sc) => sc.setName("faq").setDescription("FAQ entries"));

const isoOrNull = (seconds: number | null): string | null => (seconds === null ? null : tsToIso(seconds));

/** Null for "all". */
export function scopeStart(scope: TicketScope, nowS: number): number | null {
  const days = TICKET_SCOPES[scope];
  return days === null ? null : nowS - days * 86_400;
}

export function ticketsCsv(rows: readonly TicketRow[]): string {
  return toCsv(
    [
      "id",
      "user_id",
      "username",
      "status",
      "description",
      "channel_id",
      "claimed_by",
      "escalated_to",
      "created_at",
      "updated_at",
      "closed_at",
    ],
    rows.map((t) => ({
      id: t.id,
      user_id: t.user_id,
      username: t.username,
      status: t.status,
      description: t.description,
      channel_id: t.channel_id,
      claimed_by: t.claimed_by,
      escalated_to: t.escalated_to,
      created_at: tsToIso(t.created_at_s),
      updated_at: tsToIso(t.updated_at_s),
      closed_at: isoOrNull(t.closed_at_s),
    }))
  );
}

export function faqCsv(entries: readonly FaqEntry[]): string {
  return toCsv(
    ["id", "title", "summary", "keywords", "created_by", "created_at"],
    entries.map((e) => ({
      id: e.id,
      title: e.title,
      summary: e.summary,
      keywords: e.keywords.join(";"),
      created_by: e.createdBy,
      created_at: tsToIso(e.createdAtS),
    }))
  );
}

const csvFile = (csv: string, name: string): AttachmentBuilder =>
  new AttachmentBuilder(Buffer.from(csv, "utf8"), { name });

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const guildId = requireGuildId(interaction);
  if (!(await requireGuildAdmin(interaction))) return;

  const sub = interaction.options.getSubcommand();
  switch (sub) {
    case "tickets": {
      const raw = interaction.options.getString("scope") ?? "all";
      const scope: TicketScope = isTicketScope(raw) ? raw : "all";
      const rows = withSql(ctx, "SELECT * FROM support_tickets WHERE guild_id = ? AND created_at_s >= ?", () =>
        listTicketsSince(guildId, scopeStart(scope, nowUtc()))
      );
      const file = await withStep(ctx, "render", () => csvFile(ticketsCsv(rows), `tickets_${scope}.csv`));
      logger.info({ evt: "export_tickets", guildId, scope, rows: rows.length, by: interaction.user.id }, "[export] tickets");
      await replyOrEdit(interaction, {
        content: `✅ Exported ${rows.length} ticket${rows.length === 1 ? "" : "s"} (scope: ${scope}).`,
        files: [file],
      });
      return;
    }

    case "faq": {
      const entries = withSql(ctx, "SELECT * FROM faq_entries WHERE guild_id = ?", () => listEntries(guildId));
      const file = await withStep(ctx, "render", () => csvFile(faqCsv(entries), "faq_entries.csv"));
      logger.info({ evt: "export_faq", guildId, rows: entries.length, by: interaction.user.id }, "[export] faq");
      await replyOrEdit(interaction, {
        content: `✅ Exported ${entries.length} FAQ entr${entries.length === 1 ? "y" : "ies"}.`,
        files: [file],
      });
      return;
    }

    default:
      await replyOrEdit(interaction, { content: `Unknown subcommand: ${sub}` });
  }
}
