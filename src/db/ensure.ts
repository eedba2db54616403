/**
 * Guildhall — src/db/ensure.ts
 * WHAT: On-start schema self-heal for every feature table.
 * WHY: We run on existing databases without migration tooling; CREATE IF NOT EXISTS
 *      plus additive ALTERs keep older files working.
 * FLOWS:
 *  - ensureAllSchemas() → one ensure*() per feature → addColumnIfMissing() for later columns
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA table_info: https://sqlite.org/pragma.html#pragma_table_info
 *  - SQLite ALTER TABLE: https://sqlite.org/lang_altertable.html
 *
 * NOTE: Small, synchronous queries only. No awaits; better-sqlite3 is sync.
 * All timestamps are Unix seconds (INTEGER), suffixed _s.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { db } from "./db.js";
import { logger } from "../lib/logger.js";

/**
 * Probe schema and add a column if absent. Table names are compile-time
 * constants here, never user input.
 */
export function addColumnIfMissing(table: string, column: string, definition: string): boolean {
  const cols = db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
  if (cols.some((c) => c.name === column)) {
    return false;
  }
  db.prepare(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`).run();
  logger.info({ table, column }, "[ensure] added missing column");
  return true;
}

export function ensureSettingsSchema(): void {
  // guild_id "0" holds bot-wide overrides
  db.exec(`
    CREATE TABLE IF NOT EXISTS bot_settings (
      guild_id TEXT NOT NULL,
      scope TEXT NOT NULL,
      key TEXT NOT NULL,
      value TEXT,
      value_type TEXT NOT NULL,
      updated_by TEXT,
      updated_at_s INTEGER NOT NULL,
      PRIMARY KEY (guild_id, scope, key)
    );

    CREATE TABLE IF NOT EXISTS settings_history (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      guild_id TEXT NOT NULL,
      scope TEXT NOT NULL,
      key TEXT NOT NULL,
      old_value TEXT,
      new_value TEXT,
      value_type TEXT NOT NULL,
      changed_by TEXT,
      changed_at_s INTEGER NOT NULL,
      change_type TEXT NOT NULL CHECK (change_type IN ('set', 'clear'))
    );

    CREATE INDEX IF NOT EXISTS idx_settings_history_guild
      ON settings_history(guild_id, changed_at_s DESC);
  `);
}

export function ensureRemindersSchema(): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS reminders (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      guild_id TEXT NOT NULL,
      name TEXT NOT NULL,
      channel_id TEXT NOT NULL,
      time TEXT NOT NULL,
      call_time TEXT,
      days TEXT NOT NULL DEFAULT '',
      message TEXT NOT NULL DEFAULT '',
      location TEXT,
      created_by TEXT NOT NULL,
      origin_channel_id TEXT,
      origin_message_id TEXT,
      event_time_s INTEGER,
      last_sent_s INTEGER,
      created_at_s INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_reminders_time ON reminders(time);
    CREATE INDEX IF NOT EXISTS idx_reminders_call_time ON reminders(call_time);
    CREATE INDEX IF NOT EXISTS idx_reminders_guild ON reminders(guild_id);
  `);

  // Columns added after the first release
  addColumnIfMissing("reminders", "image_url", "TEXT");
  addColumnIfMissing("reminders", "offset_minutes", "INTEGER NOT NULL DEFAULT 60");
}

export function ensureTicketsSchema(): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS support_tickets (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      guild_id TEXT NOT NULL,
      user_id TEXT NOT NULL,
      username TEXT NOT NULL,
      description TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'open'
        CHECK (status IN ('open', 'claimed', 'escalated', 'closed')),
      channel_id TEXT,
      claimed_by TEXT,
      claimed_at_s INTEGER,
      escalated_to TEXT,
      created_at_s INTEGER NOT NULL,
      updated_at_s INTEGER NOT NULL,
      closed_at_s INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_support_tickets_guild_status
      ON support_tickets(guild_id, status, created_at_s);
  `);
}

export function ensureFaqSchema(): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS faq_entries (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      guild_id TEXT NOT NULL,
      title TEXT NOT NULL,
      summary TEXT NOT NULL,
      keywords TEXT NOT NULL DEFAULT '',
      created_by TEXT,
      created_at_s INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS faq_search_logs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      guild_id TEXT NOT NULL,
      query TEXT NOT NULL,
      match_count INTEGER NOT NULL,
      created_at_s INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_faq_entries_guild ON faq_entries(guild_id, created_at_s DESC);
  `);
}

export function ensureInvitesSchema(): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS invite_tracker (
      guild_id TEXT NOT NULL,
      user_id TEXT NOT NULL,
      invite_count INTEGER NOT NULL DEFAULT 0,
      updated_at_s INTEGER NOT NULL,
      PRIMARY KEY (guild_id, user_id)
    );
  `);
}

export function ensureOnboardingSchema(): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS onboarding (
      guild_id TEXT NOT NULL,
      user_id TEXT NOT NULL,
      responses TEXT NOT NULL,
      completed_at_s INTEGER NOT NULL,
      PRIMARY KEY (guild_id, user_id)
    );

    CREATE TABLE IF NOT EXISTS guild_onboarding_questions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      guild_id TEXT NOT NULL,
      step_order INTEGER NOT NULL,
      question TEXT NOT NULL,
      question_type TEXT NOT NULL CHECK (question_type IN ('choice', 'multi', 'text', 'email')),
      options TEXT NOT NULL DEFAULT '[]',
      followup TEXT NOT NULL DEFAULT '{}',
      required INTEGER NOT NULL DEFAULT 1,
      enabled INTEGER NOT NULL DEFAULT 1,
      UNIQUE (guild_id, step_order)
    );

    CREATE TABLE IF NOT EXISTS guild_rules (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      guild_id TEXT NOT NULL,
      rule_order INTEGER NOT NULL,
      title TEXT NOT NULL,
      description TEXT NOT NULL,
      UNIQUE (guild_id, rule_order)
    );
  `);
}

export function ensureAuditSchema(): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS audit_logs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      guild_id TEXT,
      user_id TEXT NOT NULL,
      command_name TEXT NOT NULL,
      success INTEGER NOT NULL,
      error_message TEXT,
      created_at_s INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_audit_logs_guild_created ON audit_logs(guild_id, created_at_s);
    CREATE INDEX IF NOT EXISTS idx_audit_logs_command ON audit_logs(command_name);
  `);
}

/**
 * Run every ensure in dependency-free order. Called once at startup and by tests.
 */
export function ensureAllSchemas(): void {
  ensureSettingsSchema();
  ensureRemindersSchema();
  ensureTicketsSchema();
  ensureFaqSchema();
  ensureInvitesSchema();
  ensureOnboardingSchema();
  ensureAuditSchema();
  logger.info("[ensure] schema ready");
}
