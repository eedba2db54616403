/**
 * Guildhall — src/features/reminders/embedWatcher.ts
 * WHAT: Creates reminders from announcement embeds posted in the configured channel.
 * WHY: Event announcements are the source of truth for dates; reminders follow automatically.
 * FLOWS:
 *  - messageCreate → handleAnnouncementMessage()
 *    → channel == embedwatcher.announcements_channel_id?
 *    → not already imported (origin_message_id)
 *    → parseEmbedForReminder() → insertReminder() → confirmation in the log channel
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import { formatDmy, zonedParts } from "../../lib/time.js";
import { postToLogChannel, type ChannelSource } from "../logChannel.js";
import { settings } from "../settings/index.js";
import { parseEmbedForReminder, type EmbedLike, type ParsedEmbedReminder } from "./embedParser.js";
import { formatDaysForDisplay } from "./parsers.js";
import { findReminderByOrigin, insertReminder, type NewReminder } from "./store.js";

export type AnnouncementEmbed = EmbedLike & { image?: { url: string } | null };

/** The parts of a discord.js Message the watcher reads. */
export interface AnnouncementMessage {
  id: string;
  guildId: string | null;
  channelId: string;
  author: { id: string };
  embeds: readonly AnnouncementEmbed[];
  client: ChannelSource & { user: { id: string } | null };
}

export interface EmbedReminderTarget {
  guildId: string;
  channelId: string;
  createdBy: string;
  originChannelId: string;
  originMessageId: string;
  offsetMinutes: number;
  imageUrl?: string | null;
  /** Overrides the embed title */
  name?: string | null;
  /** Overrides the embed description */
  message?: string | null;
}

export function offsetMinutesFor(guildId: string): number {
  return settings.getNumber("embedwatcher", "reminder_offset_minutes", guildId) ?? 60;
}

/**
 * Row for a parsed embed. One-offs carry the event instant; recurring ones only wall times.
 */
export function reminderFromEmbed(parsed: ParsedEmbedReminder, target: EmbedReminderTarget): NewReminder {
  return {
    guildId: target.guildId,
    name: target.name?.trim() || parsed.title,
    channelId: target.channelId,
    time: `${parsed.reminderTime}:00`,
    callTime: `${parsed.eventTime}:00`,
    days: parsed.days,
    message: target.message?.trim() || parsed.description,
    location: parsed.location,
    createdBy: target.createdBy,
    originChannelId: target.originChannelId,
    originMessageId: target.originMessageId,
    eventTimeS: parsed.recurring ? null : Math.floor(parsed.eventAtMs / 1000),
    imageUrl: target.imageUrl ?? null,
    offsetMinutes: target.offsetMinutes,
  };
}

export function describeParsed(parsed: ParsedEmbedReminder, timeZone: string): string {
  if (parsed.recurring) {
    return `every ${formatDaysForDisplay(parsed.days)} at ${parsed.reminderTime} (event ${parsed.eventTime})`;
  }
  const eventDate = formatDmy(zonedParts(parsed.eventAtMs, timeZone));
  return `on ${eventDate} at ${parsed.reminderTime} (event ${parsed.eventTime})`;
}

/**
 * Returns the new reminder id, or null when the message was not for us or not parseable.
 */
export async function handleAnnouncementMessage(
  message: AnnouncementMessage,
  timeZone: string,
  nowMs: number = Date.now()
): Promise<number | null> {
  const guildId = message.guildId;
  if (!guildId || message.embeds.length === 0) return null;
  if (message.client.user && message.author.id === message.client.user.id) return null;

  const watchedChannel = settings.getString("embedwatcher", "announcements_channel_id", guildId);
  if (!watchedChannel || watchedChannel !== message.channelId) return null;

  if (findReminderByOrigin(guildId, message.id)) {
    logger.debug({ guildId, messageId: message.id }, "[embedwatcher] announcement already imported");
    return null;
  }

  const embed = message.embeds[0];
  const offsetMinutes = offsetMinutesFor(guildId);
  const parsed = parseEmbedForReminder(embed, { nowMs, timeZone, offsetMinutes });
  if (!parsed) {
    logger.info({ guildId, messageId: message.id }, "[embedwatcher] no date/time found in announcement");
    return null;
  }

  if (!parsed.recurring && parsed.eventAtMs < nowMs) {
    logger.info({ guildId, messageId: message.id }, "[embedwatcher] announced event is already over");
    return null;
  }

  const targetChannel = settings.getString("reminders", "default_channel_id", guildId) ?? message.channelId;
  const id = insertReminder(
    reminderFromEmbed(parsed, {
      guildId,
      channelId: targetChannel,
      createdBy: message.author.id,
      originChannelId: message.channelId,
      originMessageId: message.id,
      offsetMinutes,
      imageUrl: embed.image?.url ?? null,
    })
  );

  logger.info(
    { evt: "embed_reminder_created", guildId, reminderId: id, messageId: message.id, recurring: parsed.recurring },
    "[embedwatcher] reminder created from announcement"
  );

  await postToLogChannel(
    message.client,
    guildId,
    `📌 Reminder #${id} **${parsed.title}** created from an announcement: ${describeParsed(parsed, timeZone)} in <#${targetChannel}>.`
  );
  return id;
}
