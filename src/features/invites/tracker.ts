/**
 * Guildhall — src/features/invites/tracker.ts
 * WHAT: Works out which invite a new member used and announces the join.
 * WHY: Discord doesn't tell us. We keep a snapshot of every invite's use count and diff it
 *      against a fresh fetch when someone joins.
 * FLOWS:
 *  - loadGuildInvites() ← ready / guildCreate
 *  - rememberInvite() ← inviteCreate
 *  - handleMemberJoin() ← guildMemberAdd: fetch → diff → increment → announce
 * DOCS:
 *  - GuildInviteManager#fetch: https://discord.js.org/#/docs/discord.js/main/class/GuildInviteManager?scrollTo=fetch
 *  - Invite events need the GuildInvites intent: https://discord.com/developers/docs/topics/gateway#list-of-intents
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { LRUCache } from "../../lib/lruCache.js";
import { logger } from "../../lib/logger.js";
import { errorCode } from "../../lib/errors.js";
import { fetchSendableChannel, type ChannelSource } from "../logChannel.js";
import { settings } from "../settings/index.js";
import { DEFAULT_NO_INVITER_TEMPLATE, DEFAULT_WITH_INVITER_TEMPLATE } from "../settings/definitions.js";
import { incrementInvites } from "./store.js";

/** The slice of a discord.js Invite we keep. */
export interface InviteLike {
  code: string;
  uses: number | null;
  maxUses: number | null;
  inviterId: string | null;
  inviter: { displayName: string } | null;
}

export interface InviteSnapshot {
  code: string;
  uses: number;
  maxUses: number;
  inviterId: string | null;
  inviterName: string | null;
}

export type GuildInvites = Map<string, InviteSnapshot>;

export interface InviteGuild {
  id: string;
  invites: { fetch(): Promise<ReadonlyMap<string, InviteLike>> };
}

export interface JoiningMember {
  id: string;
  displayName: string;
  guild: InviteGuild;
  client: ChannelSource;
}

export interface JoinResult {
  inviterId: string | null;
  count: number | null;
  announced: boolean;
}

// a week without any invite activity and we re-fetch on the next event anyway
const snapshots = new LRUCache<string, GuildInvites>(1_000, 7 * 24 * 60 * 60 * 1000);

export function toSnapshot(invite: InviteLike): InviteSnapshot {
  return {
    code: invite.code,
    uses: invite.uses ?? 0,
    maxUses: invite.maxUses ?? 0,
    inviterId: invite.inviterId,
    inviterName: invite.inviter?.displayName ?? null,
  };
}

export function snapshotOf(invites: ReadonlyMap<string, InviteLike>): GuildInvites {
  const map: GuildInvites = new Map();
  for (const invite of invites.values()) {
    map.set(invite.code, toSnapshot(invite));
  }
  return map;
}

/**
 * The invite whose use count went up. When none did, an invite that vanished while it
 * had exactly one use left was consumed by this join (Discord deletes it at max uses).
 */
export function findUsedInvite(before: GuildInvites, after: GuildInvites): InviteSnapshot | null {
  for (const [code, current] of after) {
    const previous = before.get(code);
    if (previous && current.uses > previous.uses) return current;
  }
  for (const [code, previous] of before) {
    if (after.has(code)) continue;
    if (previous.maxUses > 0 && previous.uses === previous.maxUses - 1) return previous;
  }
  return null;
}

/**
 * Fills {name} placeholders. `{{` and `}}` are literal braces. A placeholder we don't know
 * means the template is misconfigured, so it is returned untouched instead of half-rendered.
 */
export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string {
  const unknown: string[] = [];
  const rendered = template.replace(/\{\{|\}\}|\{([^{}]*)\}/g, (match, name: string | undefined) => {
    if (match === "{{") return "{";
    if (match === "}}") return "}";
    const key = name ?? "";
    if (!Object.prototype.hasOwnProperty.call(values, key)) {
      unknown.push(key);
      return match;
    }
    return values[key] ?? "";
  });

  if (unknown.length > 0) {
    logger.warn({ placeholders: unknown }, "[invites] unknown placeholder in template");
    return template;
  }
  return rendered;
}

export async function loadGuildInvites(guild: InviteGuild): Promise<number> {
  try {
    const invites = snapshotOf(await guild.invites.fetch());
    snapshots.set(guild.id, invites);
    return invites.size;
  } catch (err) {
    // 50013 Missing Permissions: the bot needs Manage Server to list invites
    logger.warn({ err, guildId: guild.id, code: errorCode(err) }, "[invites] could not load invites");
    return 0;
  }
}

export function rememberInvite(guildId: string, invite: InviteLike): void {
  const current = snapshots.get(guildId) ?? new Map<string, InviteSnapshot>();
  current.set(invite.code, toSnapshot(invite));
  snapshots.set(guildId, current);
}

export function forgetGuildInvites(guildId: string): void {
  snapshots.delete(guildId);
}

function templateFor(guildId: string, withInviter: boolean): string {
  const key = withInviter ? "with_inviter_template" : "no_inviter_template";
  const value = settings.getString("invites", key, guildId);
  if (value && value.trim()) return value;
  return withInviter ? DEFAULT_WITH_INVITER_TEMPLATE : DEFAULT_NO_INVITER_TEMPLATE;
}

export async function handleMemberJoin(member: JoiningMember): Promise<JoinResult> {
  const guildId = member.guild.id;
  const result: JoinResult = { inviterId: null, count: null, announced: false };
  if (!settings.getBool("invites", "enabled", guildId)) return result;

  const before = snapshots.get(guildId) ?? new Map<string, InviteSnapshot>();
  let after: GuildInvites;
  try {
    after = snapshotOf(await member.guild.invites.fetch());
  } catch (err) {
    logger.warn({ err, guildId, code: errorCode(err) }, "[invites] could not fetch invites on join");
    return result;
  }
  snapshots.set(guildId, after);

  const used = findUsedInvite(before, after);
  if (used?.inviterId) {
    result.inviterId = used.inviterId;
    result.count = incrementInvites(guildId, used.inviterId);
    logger.info(
      { evt: "invite_attributed", guildId, memberId: member.id, inviterId: used.inviterId, code: used.code },
      "[invites] join attributed"
    );
  }

  const channelId = settings.getString("invites", "announcement_channel_id", guildId);
  if (!channelId) {
    logger.debug({ guildId }, "[invites] no announcement channel configured");
    return result;
  }
  const channel = await fetchSendableChannel(member.client, channelId, guildId);
  if (!channel) return result;

  const withInviter = result.inviterId !== null;
  const content = renderTemplate(templateFor(guildId, withInviter), {
    member: `<@${member.id}>`,
    member_name: member.displayName,
    inviter: result.inviterId ? `<@${result.inviterId}>` : "",
    inviter_name: used?.inviterName ?? "",
    count: String(result.count ?? 0),
  });

  try {
    await channel.send({
      content,
      allowedMentions: { users: result.inviterId ? [member.id, result.inviterId] : [member.id] },
    });
    result.announced = true;
  } catch (err) {
    logger.warn({ err, guildId, channelId }, "[invites] failed to announce join");
  }
  return result;
}
