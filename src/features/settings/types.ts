/**
 * Guildhall — src/features/settings/types.ts
 * WHAT: Shared types for the settings service.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export type SettingValueType = "bool" | "int" | "float" | "str" | "channel" | "role";

export type SettingValue = boolean | number | string | null;

/** Overrides stored under this guild id apply to every guild without its own override. */
export const GLOBAL_GUILD_ID = "0";

export interface SettingDefinition {
  scope: string;
  key: string;
  description: string;
  valueType: SettingValueType;
  default: SettingValue;
  allowNull?: boolean;
  min?: number;
  max?: number;
  choices?: readonly string[];
}

export interface SettingChange {
  guildId: string;
  scope: string;
  key: string;
  value: SettingValue;
  previous: SettingValue;
  changeType: "set" | "clear";
  changedBy: string | null;
}

export type SettingsListener = (change: SettingChange) => void;

export interface ScopeEntry {
  definition: SettingDefinition;
  value: SettingValue;
  overridden: boolean;
}

export interface SettingsHistoryEntry {
  id: number;
  guildId: string;
  scope: string;
  key: string;
  oldValue: SettingValue;
  newValue: SettingValue;
  valueType: SettingValueType;
  changedBy: string | null;
  changedAtS: number;
  changeType: "set" | "clear";
}
