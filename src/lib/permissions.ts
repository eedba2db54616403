/**
 * Guildhall — src/lib/permissions.ts
 * WHAT: Who counts as an admin or as ticket staff in a guild.
 * WHY: Every mutating command (FAQ add, /config, ticket claim) asks the same question;
 *      the answer has to be identical everywhere.
 * FLOWS:
 *  - isGuildAdmin(): bot owner → guild owner → ManageGuild
 *  - isStaff(): isGuildAdmin() → ticketbot.staff_role_id
 *  - requireGuildAdmin()/requireStaff(): same, plus an ephemeral refusal
 *  - requireMemberPermission(): isGuildAdmin() → one Discord permission (e.g. ManageMessages)
 * DOCS:
 *  - Discord permissions: https://discord.com/developers/docs/topics/permissions
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { PermissionFlagsBits, type APIInteractionGuildMember, type GuildMember } from "discord.js";
import { isOwner } from "./owner.js";
import { replyOrEdit, type InstrumentedInteraction } from "./cmdWrap.js";
import { UserInputError } from "./errors.js";
import { settings } from "../features/settings/index.js";

const DENIED = "You don't have permission to use this command.";

/**
 * Guild id of the interaction; DMs are refused with a plain reply via wrapCommand.
 */
export function requireGuildId(interaction: InstrumentedInteraction): string {
  if (!interaction.guildId) {
    throw new UserInputError("guild", "This command can only be used in a server.");
  }
  return interaction.guildId;
}

/**
 * Discord hands us a cached GuildMember or the raw API member (roles as string[]).
 */
export function memberHasRole(
  member: GuildMember | APIInteractionGuildMember | null | undefined,
  roleId: string
): boolean {
  if (!member) return false;
  if (Array.isArray(member.roles)) return member.roles.includes(roleId);
  return member.roles.cache.has(roleId);
}

export function isGuildAdmin(interaction: InstrumentedInteraction): boolean {
  if (!interaction.guildId) return false;
  if (isOwner(interaction.user.id)) return true;
  if (interaction.guild?.ownerId === interaction.user.id) return true;
  return interaction.memberPermissions?.has(PermissionFlagsBits.ManageGuild) ?? false;
}

export function isStaff(interaction: InstrumentedInteraction): boolean {
  if (isGuildAdmin(interaction)) return true;
  if (!interaction.guildId) return false;
  const staffRoleId = settings.getString("ticketbot", "staff_role_id", interaction.guildId);
  return staffRoleId !== null && memberHasRole(interaction.member, staffRoleId);
}

/**
 * RETURNS: true if allowed; false if denied and the refusal was sent.
 */
export async function requireGuildAdmin(interaction: InstrumentedInteraction): Promise<boolean> {
  if (isGuildAdmin(interaction)) return true;
  await replyOrEdit(interaction, { content: DENIED });
  return false;
}

export async function requireStaff(interaction: InstrumentedInteraction): Promise<boolean> {
  if (isStaff(interaction)) return true;
  await replyOrEdit(interaction, { content: DENIED });
  return false;
}

/**
 * Admins, or members holding `flag` (a PermissionFlagsBits value) in this guild.
 */
export async function requireMemberPermission(interaction: InstrumentedInteraction, flag: bigint): Promise<boolean> {
  if (isGuildAdmin(interaction) || (interaction.memberPermissions?.has(flag) ?? false)) return true;
  await replyOrEdit(interaction, { content: DENIED });
  return false;
}
