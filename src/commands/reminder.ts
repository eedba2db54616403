/**
 * Guildhall — src/commands/reminder.ts
 * WHAT: /reminder add | list | delete
 * WHY: Manual reminders next to the ones the embed watcher creates on its own.
 * FLOWS:
 *  - add (link) → fetch message → parseEmbedForReminder → insert
 *  - add (date) → one-off: event = date+time, reminder = offset earlier
 *  - add → recurring on the parsed days
 *  - list → embed of this guild's reminders
 *  - delete → creator or ManageGuild only
 * DOCS:
 *  - Message links: https://discord.com/developers/docs/reference#message-formatting
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { ChannelType, EmbedBuilder, SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import { BOT_TIMEZONE } from "../lib/env.js";
import { UserInputError } from "../lib/errors.js";
import { ensureDeferred, replyOrEdit, withSql, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { logger } from "../lib/logger.js";
import { isGuildAdmin, requireGuildId } from "../lib/permissions.js";
import { validateOwnership } from "../lib/sanitize.js";
import { formatDmy, formatHms, zonedParts, zonedWallToUtc } from "../lib/time.js";
import { fetchSendableChannel, postToLogChannel } from "../features/logChannel.js";
import { settings } from "../features/settings/index.js";
import { parseEmbedForReminder } from "../features/reminders/embedParser.js";
import { offsetMinutesFor, reminderFromEmbed } from "../features/reminders/embedWatcher.js";
import {
  formatDaysForDisplay,
  parseDaysCsv,
  parseDaysString,
  parseEventDate,
  parseTimeString,
} from "../features/reminders/parsers.js";
import {
  deleteReminder,
  getReminder,
  insertReminder,
  listReminders,
  type NewReminder,
  type ReminderRow,
} from "../features/reminders/store.js";
import { SAFE_ALLOWED_MENTIONS } from "../lib/constants.js";

export const data = new SlashCommandBuilder()
  .setName("reminder")
  .setDescription("Event reminders")
  .setDMPermission(false)
  .addSubcommand((sc) =>
    sc
      .setName("add")
      .setDescription("Add a reminder")
      .addStringOption((o) => o.setName("name").setDescription("Reminder name").setMaxLength(100))
      .addStringOption((o) => o.setName("time").setDescription("Event time, HH:MM"))
      .addStringOption((o) => o.setName("days").setDescription("Days for a weekly reminder, e.g. ma,wo or monday friday"))
      .addStringOption((o) => o.setName("message").setDescription("Message text").setMaxLength(1500))
      .addChannelOption((o) =>
        o
          .setName("channel")
          .setDescription("Channel to post in")
          .addChannelTypes(ChannelType.GuildText, ChannelType.GuildAnnouncement)
      )
      .addStringOption((o) => o.setName("date").setDescription("Event date (DD/MM/YYYY, 15 March, next friday)"))
      .addStringOption((o) => o.setName("location").setDescription("Location").setMaxLength(200))
      .addStringOption((o) => o.setName("link").setDescription("Link to an announcement message with an embed"))
  )
  .addSubcommand((sc) => sc.setName("list").setDescription("List reminders in this server"))
  .addSubcommand((sc) =>
    sc
      .setName("delete")
      .setDescription("Delete a reminder")
      .addIntegerOption((o) => o.setName("id").setDescription("Reminder id").setRequired(true).setMinValue(1))
  );

const MESSAGE_LINK_RE = /^https:\/\/(?:(?:ptb|canary)\.)?discord(?:app)?\.com\/channels\/(\d+)\/(\d+)\/(\d+)/;

export function parseMessageLink(link: string): { guildId: string; channelId: string; messageId: string } | null {
  const match = MESSAGE_LINK_RE.exec(link.trim());
  if (!match) return null;
  return { guildId: match[1], channelId: match[2], messageId: match[3] };
}

export interface ManualReminderInput {
  guildId: string;
  channelId: string;
  createdBy: string;
  name: string | null;
  time: string | null;
  days: string | null;
  date: string | null;
  message: string | null;
  location: string | null;
  offsetMinutes: number;
}

/**
 * Row for /reminder add without a link. Throws UserInputError on anything unusable.
 */
export function buildManualReminder(input: ManualReminderInput, nowMs: number, timeZone: string): NewReminder {
  const name = input.name?.trim();
  if (!name) throw new UserInputError("name", "A reminder needs a name.");
  const time = parseTimeString(input.time);
  if (!time) throw new UserInputError("time", "Invalid time. Use HH:MM, for example 19:30.");

  const base = {
    guildId: input.guildId,
    name,
    channelId: input.channelId,
    message: input.message?.trim() ?? "",
    location: input.location?.trim() || null,
    createdBy: input.createdBy,
    offsetMinutes: input.offsetMinutes,
  };

  if (input.date) {
    const date = parseEventDate(input.date, nowMs, timeZone);
    if (!date) throw new UserInputError("date", "Invalid date. Use DD/MM/YYYY, \"15 March\" or \"next friday\".");
    const eventAtMs = zonedWallToUtc({ ...date, hour: time.hour, minute: time.minute }, timeZone);
    if (eventAtMs <= nowMs) throw new UserInputError("date", "That event is already in the past.");
    const reminderParts = zonedParts(eventAtMs - input.offsetMinutes * 60_000, timeZone);
    return {
      ...base,
      time: formatHms({ hour: reminderParts.hour, minute: reminderParts.minute }),
      callTime: formatHms(time),
      days: [reminderParts.weekday],
      eventTimeS: Math.floor(eventAtMs / 1000),
    };
  }

  const days = parseDaysString(input.days);
  if (days.length === 0) {
    throw new UserInputError("days", "No valid days found. Try ma,wo or monday,friday or daily.");
  }
  return { ...base, time: formatHms(time), callTime: formatHms(time), days, eventTimeS: null };
}

export function describeReminder(row: ReminderRow, timeZone: string): string {
  const hm = row.time.slice(0, 5);
  const when =
    row.event_time_s !== null
      ? `${formatDmy(zonedParts(row.event_time_s * 1000, timeZone))} · ⏰ ${hm} (event ${row.call_time?.slice(0, 5) ?? hm})`
      : `${formatDaysForDisplay(parseDaysCsv(row.days))} · ⏰ ${hm}`;
  return `**#${row.id}** ${row.name} · ${when} · <#${row.channel_id}>`;
}

export function buildReminderListEmbed(rows: readonly ReminderRow[], timeZone: string): EmbedBuilder {
  const embed = new EmbedBuilder().setTitle("⏰ Reminders").setColor(0xf1c40f);
  if (rows.length === 0) return embed.setDescription("No reminders yet.");
  return embed.setDescription(rows.map((r) => describeReminder(r, timeZone)).join("\n").slice(0, 4096));
}

async function reminderFromLink(
  ctx: CommandContext<ChatInputCommandInteraction>,
  guildId: string,
  channelId: string,
  link: string,
  offsetMinutes: number
): Promise<NewReminder> {
  const { interaction } = ctx;
  const parsedLink = parseMessageLink(link);
  if (!parsedLink || parsedLink.guildId !== guildId) {
    throw new UserInputError("link", "That is not a message link from this server.");
  }

  const source = await fetchSendableChannel(interaction.client, parsedLink.channelId, guildId);
  if (!source) throw new UserInputError("link", "I can't read the channel that message is in.");
  const message = await withStep(ctx, "fetch_message", () =>
    source.messages.fetch(parsedLink.messageId).catch((err: unknown) => {
      logger.warn({ err, guildId, messageId: parsedLink.messageId }, "[reminder] linked message fetch failed");
      return null;
    })
  );
  if (!message) throw new UserInputError("link", "I couldn't find that message.");

  const embed = message.embeds[0];
  if (!embed) throw new UserInputError("link", "That message has no embed.");

  const nowMs = Date.now();
  const parsed = parseEmbedForReminder(embed, { nowMs, timeZone: BOT_TIMEZONE, offsetMinutes });
  if (!parsed) throw new UserInputError("link", "No date or time found in that embed.");
  if (!parsed.recurring && parsed.eventAtMs < nowMs) {
    throw new UserInputError("link", "That event is already over.");
  }

  const row = reminderFromEmbed(parsed, {
    guildId,
    channelId,
    createdBy: interaction.user.id,
    originChannelId: parsedLink.channelId,
    originMessageId: parsedLink.messageId,
    offsetMinutes,
    imageUrl: embed.image?.url ?? null,
    name: interaction.options.getString("name"),
    message: interaction.options.getString("message"),
  });
  const location = interaction.options.getString("location")?.trim();
  return location ? { ...row, location } : row;
}

async function handleAdd(ctx: CommandContext<ChatInputCommandInteraction>, guildId: string): Promise<void> {
  const { interaction } = ctx;
  if (!settings.getBool("reminders", "enabled", guildId)) {
    await replyOrEdit(interaction, { content: "⚠️ Reminders are turned off for this server." });
    return;
  }
  await ensureDeferred(interaction);

  const channelId =
    interaction.options.getChannel("channel")?.id ??
    settings.getString("reminders", "default_channel_id", guildId) ??
    interaction.channelId;
  const offsetMinutes = offsetMinutesFor(guildId);
  const link = interaction.options.getString("link");

  const input: NewReminder = link
    ? await withStep(ctx, "from_link", () => reminderFromLink(ctx, guildId, channelId, link, offsetMinutes))
    : buildManualReminder(
        {
          guildId,
          channelId,
          createdBy: interaction.user.id,
          name: interaction.options.getString("name"),
          time: interaction.options.getString("time"),
          days: interaction.options.getString("days"),
          date: interaction.options.getString("date"),
          message: interaction.options.getString("message"),
          location: interaction.options.getString("location"),
          offsetMinutes,
        },
        Date.now(),
        BOT_TIMEZONE
      );

  const id = withSql(ctx, "INSERT INTO reminders", () => insertReminder(input));
  const row = getReminder(guildId, id);
  logger.info(
    { evt: "reminder_created", guildId, reminderId: id, oneOff: input.eventTimeS != null, by: interaction.user.id },
    "[reminder] created"
  );

  const summary = row ? describeReminder(row, BOT_TIMEZONE) : `**#${id}** ${input.name}`;
  await withStep(ctx, "log", () =>
    postToLogChannel(interaction.client, guildId, {
      content: `📌 Reminder added by <@${interaction.user.id}>: ${summary}`,
      allowedMentions: SAFE_ALLOWED_MENTIONS,
    })
  );
  await replyOrEdit(interaction, { content: `✅ Reminder added: ${summary}` });
}

async function handleDelete(ctx: CommandContext<ChatInputCommandInteraction>, guildId: string): Promise<void> {
  const { interaction } = ctx;
  const id = interaction.options.getInteger("id", true);
  const row = withSql(ctx, "SELECT * FROM reminders WHERE guild_id = ? AND id = ?", () => getReminder(guildId, id));
  if (!row) {
    await replyOrEdit(interaction, { content: `❌ Reminder #${id} not found.` });
    return;
  }

  const denied = isGuildAdmin(interaction) ? null : validateOwnership(row.created_by, interaction.user.id, "reminders");
  if (denied) {
    await replyOrEdit(interaction, { content: denied });
    return;
  }

  withSql(ctx, "DELETE FROM reminders WHERE guild_id = ? AND id = ?", () => deleteReminder(guildId, id));
  logger.info({ evt: "reminder_deleted", guildId, reminderId: id, by: interaction.user.id }, "[reminder] deleted");
  await replyOrEdit(interaction, { content: `🗑️ Reminder **${row.name}** (#${id}) deleted.` });
}

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const guildId = requireGuildId(interaction);
  const sub = interaction.options.getSubcommand();

  switch (sub) {
    case "add":
      await handleAdd(ctx, guildId);
      return;
    case "list": {
      const rows = withSql(ctx, "SELECT * FROM reminders WHERE guild_id = ?", () => listReminders(guildId));
      await replyOrEdit(interaction, { embeds: [buildReminderListEmbed(rows, BOT_TIMEZONE)] });
      return;
    }
    case "delete":
      await handleDelete(ctx, guildId);
      return;
    default:
      await replyOrEdit(interaction, { content: `Unknown subcommand: ${sub}` });
  }
}
