/**
 * Guildhall — src/commands/faq.ts
 * WHAT: /faq search | list | view | add | remove, plus the list pager buttons.
 * WHY: Members answer their own questions before opening a ticket.
 * FLOWS:
 *  - search → rank in memory → log the query (with match count) → results embed
 *  - list → page embed + Prev/Next buttons (faq:list:<page>:<public>)
 *  - add/remove → ManageGuild only
 * DOCS:
 *  - Buttons: https://discordjs.guide/message-components/buttons.html
 *  - Updating a component message: https://discord.js.org/#/docs/discord.js/main/class/ButtonInteraction?scrollTo=update
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder, type ButtonInteraction, type ChatInputCommandInteraction } from "discord.js";
import { replyOrEdit, withSql, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { logger } from "../lib/logger.js";
import { requireGuildAdmin, requireGuildId } from "../lib/permissions.js";
import { UserInputError } from "../lib/errors.js";
import { rankEntries } from "../features/faq/search.js";
import { addEntry, getEntry, listEntries, logSearch, removeEntry, splitKeywords } from "../features/faq/store.js";
import {
  buildFaqEntryEmbed,
  buildFaqPageEmbed,
  buildFaqPager,
  buildFaqResultsEmbed,
  FAQ_LIST_RE,
  totalPages,
} from "../features/faq/embeds.js";

export const data = new SlashCommandBuilder()
  .setName("faq")
  .setDescription("Frequently asked questions")
  .setDMPermission(false)
  .addSubcommand((sc) =>
    sc
      .setName("search")
      .setDescription("Search the FAQ")
      .addStringOption((o) => o.setName("query").setDescription("What are you looking for?").setRequired(true))
      .addBooleanOption((o) => o.setName("public").setDescription("Show the answer to everyone"))
  )
  .addSubcommand((sc) =>
    sc
      .setName("list")
      .setDescription("Browse the latest entries")
      .addIntegerOption((o) => o.setName("page").setDescription("Page number").setMinValue(1))
      .addBooleanOption((o) => o.setName("public").setDescription("Show the list to everyone"))
  )
  .addSubcommand((sc) =>
    sc
      .setName("view")
      .setDescription("Show one entry")
      .addIntegerOption((o) => o.setName("id").setDescription("Entry id").setRequired(true).setMinValue(1))
      .addBooleanOption((o) => o.setName("public").setDescription("Show the answer to everyone"))
  )
  .addSubcommand((sc) =>
    sc
      .setName("add")
      .setDescription("Add an entry (admins)")
      .addStringOption((o) => o.setName("title").setDescription("Question").setRequired(true).setMaxLength(100))
      .addStringOption((o) => o.setName("summary").setDescription("Answer").setRequired(true).setMaxLength(1000))
      .addStringOption((o) =>
        o.setName("keywords").setDescription("Comma separated, e.g. password, login").setMaxLength(200)
      )
  )
  .addSubcommand((sc) =>
    sc
      .setName("remove")
      .setDescription("Remove an entry (admins)")
      .addIntegerOption((o) => o.setName("id").setDescription("Entry id").setRequired(true).setMinValue(1))
  );

async function handleSearch(ctx: CommandContext<ChatInputCommandInteraction>, guildId: string): Promise<void> {
  const { interaction } = ctx;
  const query = interaction.options.getString("query", true).trim();
  const isPublic = interaction.options.getBoolean("public") ?? false;

  const entries = withSql(ctx, "SELECT * FROM faq_entries", () => listEntries(guildId));
  const results = rankEntries(query, entries, 5);
  withSql(ctx, "INSERT INTO faq_search_logs", () => logSearch(guildId, query, results.length));
  logger.debug({ evt: "faq_search", guildId, matches: results.length }, "[faq] search");

  if (results.length === 0) {
    await replyOrEdit(interaction, { content: "No results." });
    return;
  }
  await replyOrEdit(interaction, { embeds: [buildFaqResultsEmbed(results)] }, !isPublic);
}

async function handleList(ctx: CommandContext<ChatInputCommandInteraction>, guildId: string): Promise<void> {
  const { interaction } = ctx;
  const isPublic = interaction.options.getBoolean("public") ?? false;
  const entries = withSql(ctx, "SELECT * FROM faq_entries", () => listEntries(guildId));
  if (entries.length === 0) {
    await replyOrEdit(interaction, { content: "No FAQ entries yet." });
    return;
  }

  const page = Math.min((interaction.options.getInteger("page") ?? 1) - 1, totalPages(entries.length) - 1);
  await replyOrEdit(
    interaction,
    {
      embeds: [buildFaqPageEmbed(entries, page)],
      components: [buildFaqPager(page, entries.length, isPublic)],
    },
    !isPublic
  );
}

async function handleView(ctx: CommandContext<ChatInputCommandInteraction>, guildId: string): Promise<void> {
  const { interaction } = ctx;
  const id = interaction.options.getInteger("id", true);
  const entry = withSql(ctx, "SELECT * FROM faq_entries WHERE id = ?", () => getEntry(guildId, id));
  if (!entry) {
    await replyOrEdit(interaction, { content: `❌ FAQ entry #${id} not found.` });
    return;
  }
  const isPublic = interaction.options.getBoolean("public") ?? false;
  await replyOrEdit(interaction, { embeds: [buildFaqEntryEmbed(entry)] }, !isPublic);
}

async function handleAdd(ctx: CommandContext<ChatInputCommandInteraction>, guildId: string): Promise<void> {
  const { interaction } = ctx;
  const title = interaction.options.getString("title", true).trim();
  const summary = interaction.options.getString("summary", true).trim();
  if (!title || !summary) {
    throw new UserInputError("title", "Title and summary are required.");
  }
  const keywords = splitKeywords(interaction.options.getString("keywords"));

  const id = withSql(ctx, "INSERT INTO faq_entries", () =>
    addEntry({ guildId, title, summary, keywords, createdBy: interaction.user.id })
  );
  logger.info({ evt: "faq_added", guildId, entryId: id, by: interaction.user.id }, "[faq] entry added");
  await replyOrEdit(interaction, { content: `✅ Added FAQ **#${id}**: ${title}` });
}

async function handleRemove(ctx: CommandContext<ChatInputCommandInteraction>, guildId: string): Promise<void> {
  const { interaction } = ctx;
  const id = interaction.options.getInteger("id", true);
  const removed = withSql(ctx, "DELETE FROM faq_entries", () => removeEntry(guildId, id));
  if (!removed) {
    await replyOrEdit(interaction, { content: `❌ FAQ entry #${id} not found.` });
    return;
  }
  logger.info({ evt: "faq_removed", guildId, entryId: id, by: interaction.user.id }, "[faq] entry removed");
  await replyOrEdit(interaction, { content: `🗑️ Removed FAQ #${id}.` });
}

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const guildId = requireGuildId(interaction);
  const sub = interaction.options.getSubcommand();

  switch (sub) {
    case "search":
      await withStep(ctx, "search", () => handleSearch(ctx, guildId));
      return;
    case "list":
      await withStep(ctx, "list", () => handleList(ctx, guildId));
      return;
    case "view":
      await withStep(ctx, "view", () => handleView(ctx, guildId));
      return;
    case "add":
      if (!(await requireGuildAdmin(interaction))) return;
      await withStep(ctx, "add", () => handleAdd(ctx, guildId));
      return;
    case "remove":
      if (!(await requireGuildAdmin(interaction))) return;
      await withStep(ctx, "remove", () => handleRemove(ctx, guildId));
      return;
    default:
      await replyOrEdit(interaction, { content: `Unknown subcommand: ${sub}` });
  }
}

/**
 * Prev/Next on a list message: re-render the requested page in place.
 */
export async function handleFaqListButton(ctx: CommandContext<ButtonInteraction>): Promise<void> {
  const { interaction } = ctx;
  const match = FAQ_LIST_RE.exec(interaction.customId);
  if (!match) return;
  const guildId = requireGuildId(interaction);

  const entries = withSql(ctx, "SELECT * FROM faq_entries", () => listEntries(guildId));
  const page = Math.min(Number(match[1]), totalPages(entries.length) - 1);
  await withStep(ctx, "update", () =>
    interaction.update({
      embeds: [buildFaqPageEmbed(entries, page)],
      components: [buildFaqPager(page, entries.length, match[2] === "1")],
    })
  );
}
