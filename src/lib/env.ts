/**
 * Guildhall — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail-fast on missing secrets; keep process.env access centralized.
 * FLOWS: load .env → parse/validate → export typed env object
 * DOCS:
 *  - Node ESM: https://nodejs.org/api/esm.html
 *  - zod: https://zod.dev
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// Load .env from the working directory.
// override: true outside tests so .env wins over a stale shell environment;
// override: false in tests so values set in tests/setup.ts survive.
// GOTCHA: run the bot from the project root or this looks for .env in the wrong place.
const isTest = process.env.NODE_ENV === "test";
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

/**
 * Raw environment extraction. Every variable gets trimmed to handle
 * stray whitespace in .env files. Everything is extracted first, then
 * validated in one pass via zod.
 */
const raw = {
  DISCORD_TOKEN: process.env.DISCORD_TOKEN?.trim(),
  CLIENT_ID: process.env.CLIENT_ID?.trim(),
  GUILD_ID: process.env.GUILD_ID?.trim() || undefined,
  NODE_ENV: process.env.NODE_ENV?.trim(),
  DB_PATH: process.env.DB_PATH?.trim() || undefined,
  SENTRY_DSN: process.env.SENTRY_DSN?.trim() || undefined,
  SENTRY_ENVIRONMENT: process.env.SENTRY_ENVIRONMENT?.trim() || undefined,
  SENTRY_TRACES_SAMPLE_RATE: process.env.SENTRY_TRACES_SAMPLE_RATE?.trim() || undefined,
  LOG_LEVEL: process.env.LOG_LEVEL?.trim() || undefined,
  OWNER_IDS: process.env.OWNER_IDS?.trim() || undefined,
  BOT_TIMEZONE: process.env.BOT_TIMEZONE?.trim() || undefined,

  // Dashboard API (optional)
  API_ENABLED: process.env.API_ENABLED?.trim() || undefined,
  API_HOST: process.env.API_HOST?.trim() || undefined,
  API_PORT: process.env.API_PORT?.trim() || undefined,
  API_KEY: process.env.API_KEY?.trim() || undefined,
  API_CORS_ORIGINS: process.env.API_CORS_ORIGINS?.trim() || undefined,
};

/**
 * Intl throws a RangeError for unknown zones.
 */
function isValidTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-GB", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

// Flags in .env files: "1", "yes", "ON"...
const truthyPattern = /^(1|true|yes|on)$/i;

/**
 * Required vs optional variables.
 */
const schema = z.object({
  // Core Discord credentials - bot won't start without these
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  CLIENT_ID: z.string().min(1, "Missing CLIENT_ID"),
  GUILD_ID: z.string().optional(), // Only needed for guild-scoped command registration
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DB_PATH: z.string().default("data/data.db"),

  // Sentry error tracking - disabled if DSN not provided
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),

  LOG_LEVEL: z.string().optional(),

  // Owner override (optional, comma-separated user IDs)
  OWNER_IDS: z.string().optional(),

  // Every wall-clock time the bot shows or matches (reminders, embed dates) lives here.
  BOT_TIMEZONE: z
    .string()
    .default("Europe/Brussels")
    .refine(isValidTimeZone, { message: "BOT_TIMEZONE is not a known IANA time zone" }),

  API_ENABLED: z
    .string()
    .optional()
    .transform((val) => truthyPattern.test(val ?? "")),
  API_HOST: z.string().default("127.0.0.1"),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  API_KEY: z.string().optional(),
  API_CORS_ORIGINS: z.string().optional(),
});

/**
 * Validate everything at once and print every issue before exiting.
 */
const parsed = schema.safeParse(raw);
if (!parsed.success) {
  const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
  console.error(`Environment validation failed:\n${issues}`);
  process.exit(1);
}
export const env = parsed.data;

/**
 * Parse a comma-separated env list into trimmed, non-empty entries.
 */
export function splitList(value: string | undefined): string[] {
  return value
    ? value
        .split(",")
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
    : [];
}

export function isTruthyFlag(value: string | undefined): boolean {
  return truthyPattern.test(value ?? "");
}

// Bot-wide time zone, re-exported because almost every reminder helper needs it.
export const BOT_TIMEZONE = env.BOT_TIMEZONE;
