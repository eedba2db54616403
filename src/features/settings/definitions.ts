/**
 * Guildhall — src/features/settings/definitions.ts
 * WHAT: Every setting the bot knows about, with defaults and bounds.
 * WHY: /config only accepts keys registered here.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { SettingDefinition } from "./types.js";

export const ONBOARDING_MODES = ["disabled", "rules_only", "rules_with_questions", "questions_only"] as const;
export type OnboardingMode = (typeof ONBOARDING_MODES)[number];

export const DEFAULT_WITH_INVITER_TEMPLATE = "{member} joined! {inviter} now has {count} invites.";
export const DEFAULT_NO_INVITER_TEMPLATE = "{member} joined, but no inviter data found.";

const channel = (scope: string, key: string, description: string): SettingDefinition => ({
  scope,
  key,
  description,
  valueType: "channel",
  default: null,
  allowNull: true,
});

const role = (scope: string, key: string, description: string): SettingDefinition => ({
  scope,
  key,
  description,
  valueType: "role",
  default: null,
  allowNull: true,
});

export const SETTING_DEFINITIONS: readonly SettingDefinition[] = [
  // system
  channel("system", "log_channel_id", "Channel for bot logs, failures and confirmations"),
  channel("system", "rules_channel_id", "Channel that holds the server rules"),
  channel("system", "onboarding_channel_id", "Channel where new members start onboarding"),

  // onboarding
  {
    scope: "onboarding",
    key: "enabled",
    description: "Allow members to run onboarding",
    valueType: "bool",
    default: true,
  },
  {
    scope: "onboarding",
    key: "mode",
    description: "Which steps onboarding shows",
    valueType: "str",
    default: "rules_with_questions",
    choices: ONBOARDING_MODES,
  },
  role("onboarding", "completion_role_id", "Role granted after onboarding completes"),

  // embed watcher
  channel("embedwatcher", "announcements_channel_id", "Channel whose embeds become reminders"),
  {
    scope: "embedwatcher",
    key: "reminder_offset_minutes",
    description: "Minutes before an announced event to send its reminder",
    valueType: "int",
    default: 60,
    min: 0,
    max: 4320,
  },

  // tickets
  channel("ticketbot", "category_id", "Category for ticket channels"),
  role("ticketbot", "staff_role_id", "Role allowed to handle tickets"),
  role("ticketbot", "escalation_role_id", "Role pinged when a ticket is escalated"),

  // invites
  {
    scope: "invites",
    key: "enabled",
    description: "Track which invite each new member used",
    valueType: "bool",
    default: true,
  },
  channel("invites", "announcement_channel_id", "Channel for join announcements"),
  {
    scope: "invites",
    key: "with_inviter_template",
    description: "Join message when the inviter is known",
    valueType: "str",
    default: DEFAULT_WITH_INVITER_TEMPLATE,
  },
  {
    scope: "invites",
    key: "no_inviter_template",
    description: "Join message when the inviter is unknown",
    valueType: "str",
    default: DEFAULT_NO_INVITER_TEMPLATE,
  },

  // reminders
  {
    scope: "reminders",
    key: "enabled",
    description: "Send reminders for this server",
    valueType: "bool",
    default: true,
  },
  channel("reminders", "default_channel_id", "Channel reminders go to when none is given"),
  {
    scope: "reminders",
    key: "allow_everyone_mentions",
    description: "Prefix reminders with @everyone",
    valueType: "bool",
    default: false,
  },
];
