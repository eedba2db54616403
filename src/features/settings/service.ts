/**
 * Guildhall — src/features/settings/service.ts
 * WHAT: Typed, registered, per-guild settings with a global layer and change history.
 * WHY: Every feature reads its knobs (channels, toggles, offsets) through one place so
 *      /config can list, validate and audit them.
 * FLOWS:
 *  - register(def) at import time (definitions.ts)
 *  - load() once at startup → in-memory override cache
 *  - get(scope, key, guildId) → guild override → global override → fallback → default
 *  - set()/clear() → coerce → store (transaction) → cache → listeners
 *
 * NOTE: reads never touch SQLite after load(); the cache is the source of truth for the process.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import { nowUtc } from "../../lib/time.js";
import { coerceSettingValue, settingLabel } from "./coerce.js";
import type { HistoryQuery, SettingsStore } from "./store.js";
import {
  GLOBAL_GUILD_ID,
  type ScopeEntry,
  type SettingDefinition,
  type SettingsHistoryEntry,
  type SettingsListener,
  type SettingValue,
} from "./types.js";

const defKey = (scope: string, key: string): string => `${scope}.${key}`;

function encode(value: SettingValue): string | null {
  return value === null ? null : JSON.stringify(value);
}

export class SettingsService {
  private readonly definitions = new Map<string, SettingDefinition>();
  // guildId → "scope.key" → value
  private readonly overrides = new Map<string, Map<string, SettingValue>>();
  private readonly listeners = new Set<SettingsListener>();
  private loaded = false;

  constructor(private readonly store: SettingsStore) {}

  register(def: SettingDefinition): void {
    const id = defKey(def.scope, def.key);
    if (this.definitions.has(id)) {
      throw new Error(`Setting ${id} is already registered`);
    }
    this.definitions.set(id, def);
  }

  /**
   * Read every override row into the cache. Rows for unknown settings or with values
   * that no longer coerce (a definition changed type) are skipped with a warning.
   */
  load(): number {
    this.overrides.clear();
    let count = 0;
    for (const row of this.store.loadAll()) {
      const def = this.definitions.get(defKey(row.scope, row.key));
      if (!def) {
        logger.debug({ scope: row.scope, key: row.key }, "[settings] skipping unregistered override");
        continue;
      }
      try {
        const parsed: unknown = row.valueJson === null ? null : JSON.parse(row.valueJson);
        this.cacheSet(row.guildId, def, coerceSettingValue(def, parsed));
        count++;
      } catch (err) {
        logger.warn(
          { err, guildId: row.guildId, setting: settingLabel(def) },
          "[settings] dropping unreadable override"
        );
      }
    }
    this.loaded = true;
    logger.info({ evt: "settings_loaded", count }, "[settings] overrides loaded");
    return count;
  }

  definition(scope: string, key: string): SettingDefinition {
    const def = this.definitions.get(defKey(scope, key));
    if (!def) {
      throw new Error(`Unknown setting ${defKey(scope, key)}`);
    }
    return def;
  }

  has(scope: string, key: string): boolean {
    return this.definitions.has(defKey(scope, key));
  }

  get(scope: string, key: string, guildId: string = GLOBAL_GUILD_ID, fallback?: SettingValue): SettingValue {
    const def = this.definition(scope, key);
    this.ensureLoaded();
    const id = defKey(scope, key);

    const guildMap = this.overrides.get(guildId);
    if (guildMap?.has(id)) return guildMap.get(id) ?? null;

    if (guildId !== GLOBAL_GUILD_ID) {
      const globalMap = this.overrides.get(GLOBAL_GUILD_ID);
      if (globalMap?.has(id)) return globalMap.get(id) ?? null;
    }

    return fallback !== undefined ? fallback : def.default;
  }

  getBool(scope: string, key: string, guildId?: string): boolean {
    const value = this.get(scope, key, guildId);
    return typeof value === "boolean" ? value : false;
  }

  getNumber(scope: string, key: string, guildId?: string): number | null {
    const value = this.get(scope, key, guildId);
    return typeof value === "number" ? value : null;
  }

  getString(scope: string, key: string, guildId?: string): string | null {
    const value = this.get(scope, key, guildId);
    return typeof value === "string" ? value : null;
  }

  isOverridden(scope: string, key: string, guildId: string = GLOBAL_GUILD_ID): boolean {
    this.definition(scope, key);
    this.ensureLoaded();
    return this.overrides.get(guildId)?.has(defKey(scope, key)) ?? false;
  }

  scopes(): string[] {
    const seen = new Set<string>();
    for (const def of this.definitions.values()) seen.add(def.scope);
    return [...seen].sort();
  }

  listScope(scope: string, guildId: string = GLOBAL_GUILD_ID): ScopeEntry[] {
    return [...this.definitions.values()]
      .filter((def) => def.scope === scope)
      .sort((a, b) => a.key.localeCompare(b.key))
      .map((definition) => ({
        definition,
        value: this.get(scope, definition.key, guildId),
        overridden: this.isOverridden(scope, definition.key, guildId),
      }));
  }

  /**
   * Coerce and persist an override. Throws UserInputError when the value does not fit.
   */
  set(
    scope: string,
    key: string,
    raw: unknown,
    guildId: string = GLOBAL_GUILD_ID,
    updatedBy: string | null = null
  ): SettingValue {
    const def = this.definition(scope, key);
    const value = coerceSettingValue(def, raw);
    const previous = this.get(scope, key, guildId);

    this.store.writeOverride({
      guildId,
      scope,
      key,
      oldValueJson: this.isOverridden(scope, key, guildId) ? encode(previous) : null,
      newValueJson: encode(value),
      valueType: def.valueType,
      changedBy: updatedBy,
      nowS: nowUtc(),
    });
    this.cacheSet(guildId, def, value);

    logger.info(
      { evt: "setting_set", guildId, setting: settingLabel(def), updatedBy },
      "[settings] override set"
    );
    this.notify({ guildId, scope, key, value, previous, changeType: "set", changedBy: updatedBy });
    return value;
  }

  /**
   * Drop an override. Returns false (and writes nothing) when there was none.
   */
  clear(scope: string, key: string, guildId: string = GLOBAL_GUILD_ID, updatedBy: string | null = null): boolean {
    const def = this.definition(scope, key);
    if (!this.isOverridden(scope, key, guildId)) return false;

    const previous = this.get(scope, key, guildId);
    this.store.removeOverride({
      guildId,
      scope,
      key,
      oldValueJson: encode(previous),
      newValueJson: null,
      valueType: def.valueType,
      changedBy: updatedBy,
      nowS: nowUtc(),
    });
    this.overrides.get(guildId)?.delete(defKey(scope, key));

    logger.info(
      { evt: "setting_clear", guildId, setting: settingLabel(def), updatedBy },
      "[settings] override cleared"
    );
    this.notify({
      guildId,
      scope,
      key,
      value: this.get(scope, key, guildId),
      previous,
      changeType: "clear",
      changedBy: updatedBy,
    });
    return true;
  }

  history(guildId: string, query: Partial<HistoryQuery> = {}): SettingsHistoryEntry[] {
    const rows = this.store.history(guildId, { scope: query.scope, key: query.key, limit: query.limit ?? 20 });
    return rows.map((row) => ({
      id: row.id,
      guildId: row.guild_id,
      scope: row.scope,
      key: row.key,
      oldValue: decodeHistoryValue(row.old_value),
      newValue: decodeHistoryValue(row.new_value),
      valueType: row.value_type,
      changedBy: row.changed_by,
      changedAtS: row.changed_at_s,
      changeType: row.change_type,
    }));
  }

  /**
   * Subscribe to set/clear. Returns the unsubscribe function.
   */
  addListener(listener: SettingsListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private ensureLoaded(): void {
    if (!this.loaded) this.load();
  }

  private cacheSet(guildId: string, def: SettingDefinition, value: SettingValue): void {
    let guildMap = this.overrides.get(guildId);
    if (!guildMap) {
      guildMap = new Map();
      this.overrides.set(guildId, guildMap);
    }
    guildMap.set(defKey(def.scope, def.key), value);
  }

  private notify(change: Parameters<SettingsListener>[0]): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (err) {
        logger.error(
          { err, setting: defKey(change.scope, change.key), guildId: change.guildId },
          "[settings] listener failed"
        );
      }
    }
  }
}

function decodeHistoryValue(text: string | null): SettingValue {
  if (text === null) return null;
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed === "boolean" || typeof parsed === "number" || typeof parsed === "string") {
    return parsed;
  }
  return null;
}
