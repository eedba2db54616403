/**
 * Guildhall — src/features/settings/coerce.ts
 * WHAT: Turns raw input (slash-command strings, JSON from the DB) into a typed setting value.
 * WHY: /config set hands us strings like "yes", "<#123>", "45"; every consumer downstream
 *      wants a boolean, a channel id, or a number inside its allowed range.
 * FLOWS: null check → per-type parse → choices → min/max
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { UserInputError } from "../../lib/errors.js";
import type { SettingDefinition, SettingValue } from "./types.js";

const TRUE_WORDS = new Set(["true", "1", "yes", "on"]);
const FALSE_WORDS = new Set(["false", "0", "no", "off"]);

// Discord snowflakes are 17-20 digits today; allow a little slack either side.
const SNOWFLAKE_RE = /^\d{15,21}$/;
const CHANNEL_MENTION_RE = /^<#(\d{15,21})>$/;
const ROLE_MENTION_RE = /^<@&(\d{15,21})>$/;

export function settingLabel(def: Pick<SettingDefinition, "scope" | "key">): string {
  return `${def.scope}.${def.key}`;
}

function coerceBool(def: SettingDefinition, raw: unknown): boolean {
  if (typeof raw === "boolean") return raw;
  const word = String(raw).trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  throw new UserInputError(settingLabel(def), "Boolean setting expects true/false");
}

function coerceInt(def: SettingDefinition, raw: unknown): number {
  if (typeof raw === "number" && Number.isInteger(raw)) return raw;
  const text = String(raw).trim();
  if (/^[-+]?\d+$/.test(text)) return Number(text);
  throw new UserInputError(settingLabel(def), `${settingLabel(def)} expects a whole number`);
}

function coerceFloat(def: SettingDefinition, raw: unknown): number {
  if (typeof raw === "number" && Number.isFinite(raw)) return raw;
  const text = String(raw).trim();
  const parsed = Number(text);
  if (text !== "" && Number.isFinite(parsed)) return parsed;
  throw new UserInputError(settingLabel(def), `${settingLabel(def)} expects a number`);
}

function coerceSnowflake(def: SettingDefinition, raw: unknown, mentionRe: RegExp, noun: string): string {
  const text = String(raw).trim();
  const mention = text.match(mentionRe);
  if (mention) return mention[1];
  if (SNOWFLAKE_RE.test(text)) return text;
  throw new UserInputError(settingLabel(def), `${settingLabel(def)} expects a ${noun} id or mention`);
}

function isNullish(raw: unknown): boolean {
  if (raw === null || raw === undefined) return true;
  // "none"/"null" typed into /config set means "unset this"
  return typeof raw === "string" && /^(none|null)$/i.test(raw.trim());
}

/**
 * Coerce `raw` for `def`. Throws UserInputError with a message fit to show the user.
 */
export function coerceSettingValue(def: SettingDefinition, raw: unknown): SettingValue {
  if (isNullish(raw)) {
    if (def.allowNull) return null;
    throw new UserInputError(settingLabel(def), `${settingLabel(def)} cannot be null`);
  }

  let value: boolean | number | string;
  switch (def.valueType) {
    case "bool":
      value = coerceBool(def, raw);
      break;
    case "int":
      value = coerceInt(def, raw);
      break;
    case "float":
      value = coerceFloat(def, raw);
      break;
    case "channel":
      value = coerceSnowflake(def, raw, CHANNEL_MENTION_RE, "channel");
      break;
    case "role":
      value = coerceSnowflake(def, raw, ROLE_MENTION_RE, "role");
      break;
    case "str":
      value = String(raw);
      break;
  }

  if (def.choices && !def.choices.includes(String(value))) {
    throw new UserInputError(
      settingLabel(def),
      `${settingLabel(def)} must be one of: ${def.choices.join(", ")}`
    );
  }

  if (typeof value === "number") {
    if (def.min !== undefined && value < def.min) {
      throw new UserInputError(settingLabel(def), `${settingLabel(def)} cannot be smaller than ${def.min}`);
    }
    if (def.max !== undefined && value > def.max) {
      throw new UserInputError(settingLabel(def), `${settingLabel(def)} cannot be larger than ${def.max}`);
    }
  }

  return value;
}

/**
 * Render a value for humans (/config view, history lines).
 */
export function formatSettingValue(def: SettingDefinition, value: SettingValue): string {
  if (value === null) return "not set";
  if (def.valueType === "channel") return `<#${String(value)}>`;
  if (def.valueType === "role") return `<@&${String(value)}>`;
  if (typeof value === "boolean") return value ? "on" : "off";
  return String(value);
}
