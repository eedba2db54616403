/**
 * Guildhall — src/features/reminders/dispatcher.ts
 * WHAT: One pass of the reminder loop: find rows due this minute and send them.
 * WHY: Separated from the interval so tests can drive a tick with a fixed clock and fake channels.
 * FLOWS:
 *  - runReminderTick(source, nowMs, tz)
 *    → purge stale one-offs
 *    → candidates where time/call_time = this minute
 *    → dueReason() → sentThisMinute() guard → reminders.enabled → send → markSent
 *    → event-start sends delete the one-off
 *    → short confirmation in the guild log channel
 *  - failures are per row: logged, posted to the log channel, loop continues
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder, type MessageCreateOptions } from "discord.js";
import { logger } from "../../lib/logger.js";
import { classifyError } from "../../lib/errors.js";
import { formatLongDate, zonedMinute } from "../../lib/time.js";
import { fetchSendableChannel, postToLogChannel, type ChannelSource } from "../logChannel.js";
import { settings } from "../settings/index.js";
import { dueReason, sentThisMinute, type DueReason } from "./schedule.js";
import {
  deleteReminderById,
  listDueCandidates,
  markSent,
  purgeStaleOneOffs,
  type ReminderRow,
} from "./store.js";
import { SAFE_ALLOWED_MENTIONS } from "../../lib/constants.js";

const STALE_ONE_OFF_S = 24 * 60 * 60;

export interface TickResult {
  sent: number;
  skipped: number;
  failed: number;
  purged: number;
}

const hm = (hms: string): string => hms.slice(0, 5);

export function messageLink(guildId: string, channelId: string, messageId: string): string {
  return `https://discord.com/channels/${guildId}/${channelId}/${messageId}`;
}

/**
 * The message a reminder posts. Plain title/description/fields; @everyone only when the
 * guild turned it on, and allowedMentions is always explicit so message text can't ping.
 */
export function buildReminderMessage(
  row: ReminderRow,
  reason: DueReason,
  timeZone: string,
  allowEveryone: boolean
): MessageCreateOptions {
  const embed = new EmbedBuilder()
    .setColor(0x5865f2)
    .setTitle(`⏰ Reminder: ${row.name}`)
    .setDescription(row.message.trim() || "-");

  if (row.event_time_s !== null) {
    embed.addFields(
      { name: "📅 Date", value: formatLongDate(row.event_time_s * 1000, timeZone), inline: true },
      { name: "🕒 Time", value: hm(row.call_time ?? row.time), inline: true }
    );
  } else {
    embed.addFields({ name: "🕒 Time", value: hm(row.time), inline: true });
  }

  if (row.location && row.location !== "-") {
    embed.addFields({ name: "📍 Location", value: row.location, inline: true });
  }

  if (row.origin_channel_id && row.origin_message_id) {
    embed.addFields({
      name: "🔗 Original message",
      value: `[Jump to announcement](${messageLink(row.guild_id, row.origin_channel_id, row.origin_message_id)})`,
    });
  }

  if (row.image_url) {
    embed.setImage(row.image_url);
  }

  if (reason === "event_start") {
    embed.setFooter({ text: "Starting now" });
  }

  return allowEveryone
    ? { content: "@everyone", embeds: [embed], allowedMentions: { parse: ["everyone"] } }
    : { embeds: [embed], allowedMentions: SAFE_ALLOWED_MENTIONS };
}

export function reminderLogLine(row: ReminderRow, removed: boolean): string {
  const label = `**${row.name}** (#${row.id})`;
  return removed
    ? `🗑️ One-off reminder ${label} sent to <#${row.channel_id}> and removed.`
    : `📨 Reminder ${label} sent to <#${row.channel_id}>.`;
}

async function sendOne(
  source: ChannelSource,
  row: ReminderRow,
  reason: DueReason,
  nowS: number,
  timeZone: string
): Promise<"sent" | "skipped"> {
  const channel = await fetchSendableChannel(source, row.channel_id, row.guild_id);
  if (!channel) {
    logger.warn(
      { evt: "reminder_channel_missing", reminderId: row.id, guildId: row.guild_id, channelId: row.channel_id },
      "[reminders] target channel unavailable, skipping"
    );
    return "skipped";
  }

  const allowEveryone = settings.getBool("reminders", "allow_everyone_mentions", row.guild_id);
  await channel.send(buildReminderMessage(row, reason, timeZone, allowEveryone));
  markSent(row.id, nowS);

  const removed = reason === "event_start";
  if (removed) {
    deleteReminderById(row.id);
  }

  await postToLogChannel(source, row.guild_id, reminderLogLine(row, removed));

  logger.info(
    { evt: "reminder_sent", reminderId: row.id, guildId: row.guild_id, reason },
    "[reminders] sent"
  );
  return "sent";
}

export async function runReminderTick(source: ChannelSource, nowMs: number, timeZone: string): Promise<TickResult> {
  const minute = zonedMinute(nowMs, timeZone);
  const nowS = Math.floor(nowMs / 1000);
  const result: TickResult = { sent: 0, skipped: 0, failed: 0, purged: 0 };

  result.purged = purgeStaleOneOffs(nowS - STALE_ONE_OFF_S);
  if (result.purged > 0) {
    logger.info({ evt: "reminder_purge", purged: result.purged }, "[reminders] purged past one-off reminders");
  }

  for (const row of listDueCandidates(minute.time)) {
    const reason = dueReason(row, minute, timeZone);
    if (!reason) continue;

    if (sentThisMinute(row.last_sent_s, minute)) {
      logger.debug({ reminderId: row.id }, "[reminders] already sent this minute");
      result.skipped++;
      continue;
    }

    if (!settings.getBool("reminders", "enabled", row.guild_id)) {
      result.skipped++;
      continue;
    }

    try {
      const outcome = await sendOne(source, row, reason, nowS, timeZone);
      result[outcome]++;
    } catch (err) {
      result.failed++;
      const classified = classifyError(err);
      logger.error(
        { evt: "reminder_send_failed", err, reminderId: row.id, guildId: row.guild_id, errorKind: classified.kind },
        "[reminders] send failed"
      );
      await postToLogChannel(
        source,
        row.guild_id,
        `⚠️ Reminder **${row.name}** (#${row.id}) could not be sent to <#${row.channel_id}>: ${classified.message}`
      );
    }
  }

  return result;
}
