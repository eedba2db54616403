/**
 * Guildhall — src/features/settings/store.ts
 * WHAT: SQLite persistence for setting overrides and their change history.
 * WHY: Kept behind a small interface so SettingsService stays testable and owns the cache.
 * FLOWS:
 *  - loadAll() → every override row (read once at startup)
 *  - writeOverride() → upsert bot_settings + append settings_history in one transaction
 *  - removeOverride() → delete from bot_settings + append settings_history
 *  - history() → newest-first audit trail
 * DOCS:
 *  - better-sqlite3 transactions: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md#transactionfunction---function
 *  - SQLite UPSERT: https://sqlite.org/lang_upsert.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../../db/db.js";
import type { SettingValueType } from "./types.js";

export interface StoredOverride {
  guildId: string;
  scope: string;
  key: string;
  /** JSON-encoded value (null stays SQL NULL) */
  valueJson: string | null;
}

export interface OverrideWrite {
  guildId: string;
  scope: string;
  key: string;
  oldValueJson: string | null;
  newValueJson: string | null;
  valueType: SettingValueType;
  changedBy: string | null;
  nowS: number;
}

export interface HistoryRow {
  id: number;
  guild_id: string;
  scope: string;
  key: string;
  old_value: string | null;
  new_value: string | null;
  value_type: SettingValueType;
  changed_by: string | null;
  changed_at_s: number;
  change_type: "set" | "clear";
}

export interface HistoryQuery {
  scope?: string;
  key?: string;
  limit: number;
}

export interface SettingsStore {
  loadAll(): StoredOverride[];
  writeOverride(write: OverrideWrite): void;
  removeOverride(write: OverrideWrite): void;
  history(guildId: string, query: HistoryQuery): HistoryRow[];
}

function appendHistory(write: OverrideWrite, changeType: "set" | "clear"): void {
  db.prepare(
    `INSERT INTO settings_history
       (guild_id, scope, key, old_value, new_value, value_type, changed_by, changed_at_s, change_type)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
  ).run(
    write.guildId,
    write.scope,
    write.key,
    write.oldValueJson,
    write.newValueJson,
    write.valueType,
    write.changedBy,
    write.nowS,
    changeType
  );
}

const writeTx = db.transaction((write: OverrideWrite) => {
  db.prepare(
    `INSERT INTO bot_settings (guild_id, scope, key, value, value_type, updated_by, updated_at_s)
     VALUES (?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(guild_id, scope, key) DO UPDATE SET
       value = excluded.value,
       value_type = excluded.value_type,
       updated_by = excluded.updated_by,
       updated_at_s = excluded.updated_at_s`
  ).run(write.guildId, write.scope, write.key, write.newValueJson, write.valueType, write.changedBy, write.nowS);
  appendHistory(write, "set");
});

const removeTx = db.transaction((write: OverrideWrite) => {
  db.prepare(`DELETE FROM bot_settings WHERE guild_id = ? AND scope = ? AND key = ?`).run(
    write.guildId,
    write.scope,
    write.key
  );
  appendHistory(write, "clear");
});

export const sqliteSettingsStore: SettingsStore = {
  loadAll() {
    return db
      .prepare<[], { guild_id: string; scope: string; key: string; value: string | null }>(
        `SELECT guild_id, scope, key, value FROM bot_settings`
      )
      .all()
      .map((row) => ({ guildId: row.guild_id, scope: row.scope, key: row.key, valueJson: row.value }));
  },

  writeOverride(write) {
    writeTx(write);
  },

  removeOverride(write) {
    removeTx(write);
  },

  history(guildId, query) {
    const clauses = ["guild_id = ?"];
    const params: Array<string | number> = [guildId];
    if (query.scope) {
      clauses.push("scope = ?");
      params.push(query.scope);
    }
    if (query.key) {
      clauses.push("key = ?");
      params.push(query.key);
    }
    params.push(query.limit);
    // id DESC breaks ties for changes made within the same second
    return db
      .prepare<Array<string | number>, HistoryRow>(
        `SELECT * FROM settings_history
         WHERE ${clauses.join(" AND ")}
         ORDER BY changed_at_s DESC, id DESC
         LIMIT ?`
      )
      .all(...params);
  },
};
