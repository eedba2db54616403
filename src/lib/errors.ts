/**
 * Guildhall — src/lib/errors.ts
 * WHAT: UserInputError, plus classification of anything caught into a `kind`-tagged union.
 * WHY: cmdWrap, eventWrap and the reminder dispatcher each decide reply text, retry and
 *      Sentry reporting from the same classification.
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - isRecoverable(err) → boolean (worth retrying on the next tick)
 *  - shouldReportToSentry(err) → boolean (filter noise)
 * USAGE:
 *  import { classifyError, isRecoverable } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "discord_api" && classified.code === 10062) { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Thrown error classes =====

/**
 * Thrown for bad user input (a setting value that doesn't coerce, a malformed
 * time string). wrapCommand turns it into a plain ephemeral reply instead of an
 * error card, and it never goes to Sentry.
 */
export class UserInputError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "UserInputError";
    this.field = field;
  }
}

// ===== Error Type Definitions =====

export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/**
 * Database errors (SQLite).
 * - SQLITE_BUSY/SQLITE_LOCKED: transient, can retry
 * - SQLITE_CONSTRAINT_*: logic error, don't retry
 */
export interface DbError extends AppError {
  kind: "db_error";
  code: string;
  sql?: string;
  table?: string;
}

/**
 * Discord API errors. Discord uses numeric codes, not HTTP status:
 * - 10003: Unknown Channel (reminder target deleted)
 * - 10062: Unknown Interaction (3s window expired)
 * - 40060: Already acknowledged
 * - 50001: Missing Access
 * - 50013: Missing Permissions
 *
 * See: https://discord.com/developers/docs/topics/opcodes-and-status-codes
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

export interface ValidationError extends AppError {
  kind: "validation";
  field: string;
}

export interface PermissionError extends AppError {
  kind: "permission";
  needed: string[];
}

/** Network errors: the request never reached Discord or the connection dropped. */
export interface NetworkError extends AppError {
  kind: "network";
  code: string; // ECONNRESET, ETIMEDOUT, ENOTFOUND, ECONNREFUSED
  host?: string;
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | DbError
  | DiscordApiError
  | ValidationError
  | PermissionError
  | NetworkError
  | UnknownError;

// ===== Error Classification =====

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

function stringProp(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

function numberProp(obj: Record<string, unknown>, key: string): number | undefined {
  const value = obj[key];
  return typeof value === "number" ? value : undefined;
}

// name/message live on the prototype chain for Error subclasses, so spread alone misses them.
function asRecord(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const record: Record<string, unknown> = { ...err };
    record.name = err.name;
    record.message = err.message;
    return record;
  }
  if (err && typeof err === "object") {
    return { ...err };
  }
  return { message: String(err) };
}

/**
 * The `code` property of a thrown value, when it has one (Discord: number, Node/SQLite: string).
 */
export function errorCode(err: unknown): string | number | undefined {
  if (!err || typeof err !== "object") return undefined;
  const code = asRecord(err).code;
  return typeof code === "string" || typeof code === "number" ? code : undefined;
}

/**
 * Classify any caught error into the union.
 *
 * Ordered from most specific to least: our own input errors, SQLite errors,
 * Discord errors, network errors, permission codes, then unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (err === null || err === undefined) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const cause = err instanceof Error ? err : undefined;

  if (err instanceof UserInputError) {
    return { kind: "validation", field: err.field, message: err.message, cause };
  }

  const error = asRecord(err);
  const message = stringProp(error, "message") ?? String(err);
  const name = stringProp(error, "name");
  const code = error.code;

  if (name === "SqliteError" || (typeof code === "string" && code.startsWith("SQLITE_"))) {
    const sql = stringProp(error, "sql");
    return {
      kind: "db_error",
      code: typeof code === "string" ? code : "UNKNOWN",
      message,
      sql,
      table: extractTableFromSql(sql),
      cause,
    };
  }

  // Discord permission codes come through as DiscordAPIError too, so check them first.
  if (code === 50013) {
    return { kind: "permission", needed: ["Unknown"], message, cause };
  }
  if (code === 50001) {
    return { kind: "permission", needed: ["ViewChannel"], message, cause };
  }

  if (typeof code === "number" && (name === "DiscordAPIError" || name?.includes("Discord"))) {
    return {
      kind: "discord_api",
      code,
      httpStatus: numberProp(error, "status") ?? numberProp(error, "httpStatus"),
      method: stringProp(error, "method"),
      path: stringProp(error, "url") ?? stringProp(error, "path"),
      message,
      cause,
    };
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    return {
      kind: "network",
      code,
      host: stringProp(error, "hostname") ?? stringProp(error, "host"),
      message,
      cause,
    };
  }

  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

/**
 * Transient failures only: dropped connections, a locked database, Discord 5xx.
 */
export function isRecoverable(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "network":
      return true;

    case "db_error":
      return err.code === "SQLITE_BUSY" || err.code === "SQLITE_LOCKED";

    case "discord_api": {
      const status = err.httpStatus ?? 0;
      return status >= 500 && status < 600;
    }

    default:
      return false;
  }
}

/**
 * Expired interactions, deleted messages or channels, and anything the member caused stay out of Sentry.
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api": {
      const ignoredCodes = [
        10062, // Unknown interaction (expired)
        40060, // Already acknowledged
        10008, // Unknown message
        10003, // Unknown channel
      ];
      return !ignoredCodes.includes(err.code);
    }

    case "network":
    case "validation":
    case "permission":
      return false;

    default:
      return true;
  }
}

// ===== Error Context Helpers =====

/** Flat pino fields for a classified error. */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "db_error":
      return { ...base, sqlCode: err.code, sql: err.sql?.slice(0, 100), table: err.table };

    case "discord_api":
      return {
        ...base,
        discordCode: err.code,
        httpStatus: err.httpStatus,
        method: err.method,
        path: err.path,
      };

    case "network":
      return { ...base, networkCode: err.code, host: err.host };

    case "permission":
      return { ...base, neededPerms: err.needed };

    case "validation":
      return { ...base, field: err.field };

    default:
      return base;
  }
}

/**
 * User-facing text for an error. Validation messages are written for users
 * already, so they pass through untouched.
 */
export function userFriendlyMessage(err: ClassifiedError): string {
  switch (err.kind) {
    case "db_error":
      if (err.code === "SQLITE_BUSY") {
        return "Database is temporarily busy. Please try again.";
      }
      if (err.code.startsWith("SQLITE_CONSTRAINT")) {
        return "This operation conflicts with existing data.";
      }
      return "A database error occurred.";

    case "discord_api":
      if (err.code === 10062) {
        return "This interaction has expired. Please try the command again.";
      }
      if (err.code === 10003) {
        return "That channel no longer exists.";
      }
      return "Discord API error occurred.";

    case "network":
      return "Network error. Please try again in a moment.";

    case "permission":
      return `Missing permissions: ${err.needed.join(", ")}`;

    case "validation":
      return err.message;

    default:
      return "An unexpected error occurred.";
  }
}

// ===== Internal Helpers =====

/**
 * Best-effort table name from a SQL string, for error context only.
 */
function extractTableFromSql(sql: string | undefined): string | undefined {
  if (!sql) return undefined;
  const match = sql.match(/(?:FROM|INTO|UPDATE|JOIN)\s+(\w+)/i);
  return match?.[1];
}
