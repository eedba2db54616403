/**
 * Guildhall — src/commands/sync.ts
 * WHAT: Slash-command registration through REST bulk overwrite.
 * WHY: PUT replaces the whole set in one call, so removed commands disappear too.
 * FLOWS:
 *  - GUILD_ID set → syncCommandsToGuild(GUILD_ID): instant, for development
 *  - otherwise → syncCommandsGlobally(): can take up to an hour to show up
 * DOCS:
 *  - Bulk overwrite: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-global-application-commands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { REST, Routes } from "discord.js";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { getAllSlashCommands } from "./registry.js";

function rest(): REST {
  return new REST({ version: "10" }).setToken(env.DISCORD_TOKEN);
}

export async function syncCommandsToGuild(guildId: string): Promise<boolean> {
  const body = getAllSlashCommands();
  try {
    await rest().put(Routes.applicationGuildCommands(env.CLIENT_ID, guildId), { body });
    logger.info({ guildId, count: body.length }, "[cmdsync] synced commands to guild");
    return true;
  } catch (err) {
    logger.warn({ err, guildId }, "[cmdsync] failed to sync guild commands");
    return false;
  }
}

export async function syncCommandsGlobally(): Promise<boolean> {
  const body = getAllSlashCommands();
  try {
    await rest().put(Routes.applicationCommands(env.CLIENT_ID), { body });
    logger.info({ count: body.length }, "[cmdsync] synced global commands");
    return true;
  } catch (err) {
    logger.warn({ err }, "[cmdsync] failed to sync global commands");
    return false;
  }
}

/**
 * Startup registration: the dev guild when GUILD_ID is set, global otherwise.
 */
export async function registerCommands(): Promise<boolean> {
  return env.GUILD_ID ? syncCommandsToGuild(env.GUILD_ID) : syncCommandsGlobally();
}
