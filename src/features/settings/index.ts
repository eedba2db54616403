/**
 * Guildhall — src/features/settings/index.ts
 * WHAT: The process-wide SettingsService, backed by SQLite, with every definition registered.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { SETTING_DEFINITIONS } from "./definitions.js";
import { SettingsService } from "./service.js";
import { sqliteSettingsStore } from "./store.js";

export const settings = new SettingsService(sqliteSettingsStore);
for (const def of SETTING_DEFINITIONS) {
  settings.register(def);
}

export { SettingsService } from "./service.js";
export { coerceSettingValue, formatSettingValue, settingLabel } from "./coerce.js";
export { GLOBAL_GUILD_ID } from "./types.js";
export type { SettingDefinition, SettingValue, SettingChange, ScopeEntry } from "./types.js";
