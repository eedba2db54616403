/**
 * Guildhall — src/features/logChannel.ts
 * WHAT: Channel resolution for bot output plus the guild log channel poster.
 * WHY: Reminder failures, ticket events, onboarding summaries and embed-watcher confirmations
 *      all land in system.log_channel_id; the lookup and error handling live here once.
 * FLOWS:
 *  - fetchSendableChannel(source, id, guildId) → text-based channel of that guild, or null
 *  - postToLogChannel(source, guildId, payload) → true when delivered
 * DOCS:
 *  - ChannelManager#fetch: https://discord.js.org/#/docs/discord.js/main/class/ChannelManager?scrollTo=fetch
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Channel, GuildTextBasedChannel, MessageCreateOptions } from "discord.js";
import { logger } from "../lib/logger.js";
import { errorCode } from "../lib/errors.js";
import { settings } from "./settings/index.js";

/** Anything with a channel manager: the Client, or a Guild. */
export interface ChannelSource {
  channels: { fetch(id: string): Promise<Channel | null> };
}

/**
 * Resolve a channel we can post to. Missing, deleted, DM or voice-only channels → null,
 * and so is a channel of any guild other than `guildId`: the Client can see every guild
 * the bot is in, and stored ids or pasted links may name any of them.
 */
export async function fetchSendableChannel(
  source: ChannelSource,
  channelId: string,
  guildId: string
): Promise<GuildTextBasedChannel | null> {
  let channel: Channel | null;
  try {
    channel = await source.channels.fetch(channelId);
  } catch (err) {
    // 10003 Unknown Channel is the common case: someone deleted it
    logger.warn({ err, channelId, code: errorCode(err) }, "[channels] failed to fetch channel");
    return null;
  }

  if (!channel || !channel.isTextBased() || channel.isDMBased()) {
    logger.warn({ channelId, type: channel?.type }, "[channels] channel is not a guild text channel");
    return null;
  }
  if (channel.guildId !== guildId) {
    logger.warn(
      { evt: "channel_guild_mismatch", channelId, guildId, channelGuildId: channel.guildId },
      "[channels] channel belongs to another guild"
    );
    return null;
  }
  return channel;
}

/**
 * Post to the guild's configured log channel. Never throws: a log post failing is
 * itself only worth a warning.
 */
export async function postToLogChannel(
  source: ChannelSource,
  guildId: string,
  payload: MessageCreateOptions | string
): Promise<boolean> {
  const channelId = settings.getString("system", "log_channel_id", guildId);
  if (!channelId) {
    logger.debug({ guildId }, "[channels] no log channel configured");
    return false;
  }

  const channel = await fetchSendableChannel(source, channelId, guildId);
  if (!channel) return false;

  try {
    await channel.send(payload);
    return true;
  } catch (err) {
    logger.warn({ err, guildId, channelId }, "[channels] failed to post to log channel");
    return false;
  }
}
