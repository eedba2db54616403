/**
 * Guildhall — src/commands/registry.ts
 * WHAT: Every slash command module, in one list.
 * WHY: The interaction router and the REST sync both read from here, so a command
 *      can't be registered with Discord and then go unhandled (or the other way round).
 * DOCS:
 *  - Slash command deployment: https://discordjs.guide/interactions/deploying-commands.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type {
  AutocompleteInteraction,
  ChatInputCommandInteraction,
  RESTPostAPIChatInputApplicationCommandsJSONBody,
} from "discord.js";
import type { CommandContext } from "../lib/cmdWrap.js";
import * as clean from "./clean.js";
import * as config from "./config.js";
import * as exportCommand from "./export.js";
import * as faq from "./faq.js";
import * as health from "./health.js";
import * as invites from "./invites.js";
import * as onboarding from "./onboarding.js";
import * as reminder from "./reminder.js";
import * as ticket from "./ticket.js";

export interface CommandModule {
  data: { name: string; toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody };
  execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void>;
  autocomplete?(interaction: AutocompleteInteraction): Promise<void>;
}

export const COMMAND_MODULES: readonly CommandModule[] = [
  clean,
  config,
  exportCommand,
  faq,
  health,
  invites,
  onboarding,
  reminder,
  ticket,
];

/**
 * JSON payloads for bulk registration.
 */
export function getAllSlashCommands(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return COMMAND_MODULES.map((mod) => mod.data.toJSON());
}
