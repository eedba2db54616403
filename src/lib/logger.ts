/**
 * Guildhall — src/lib/logger.ts
 * WHAT: The one pino instance every module logs through, plus redact() for text that came from users or Discord.
 * WHY: Error-level logs carrying an `err` are also forwarded to Sentry, so call sites never talk to Sentry directly.
 * FLOWS:
 *  - LOG_LEVEL / LOG_PRETTY / LOG_FILE → transport choice → pino()
 *  - logger.error({ err }, msg) → logMethod hook → sentry.captureException (lazy import)
 * DOCS:
 *  - pino: https://getpino.io
 *  - pino-pretty: https://github.com/pinojs/pino-pretty
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino, { type LoggerOptions } from "pino";

const MAX_REDACTED_LENGTH = 300;

// Applied in order. The DSN rule keeps scheme, host and public key.
const REDACTIONS: ReadonlyArray<readonly [RegExp, string]> = [
  [/[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g, "[redacted_token]"],
  [/(https?:\/\/)([^:@]+):[^@]+@/gi, "$1$2:[redacted]@"],
  [/@(everyone|here)/gi, "@redacted"],
];

/**
 * Flatten, scrub and cap a string before it goes into a log line.
 * Ticket topics, onboarding answers and Discord API error bodies all pass through here.
 */
export function redact(value: string): string {
  if (!value) return "";
  const scrubbed = REDACTIONS.reduce(
    (text, [pattern, replacement]) => text.replace(pattern, replacement),
    value.replace(/\s+/g, " ").trim()
  );
  return scrubbed.length > MAX_REDACTED_LENGTH ? `${scrubbed.slice(0, MAX_REDACTED_LENGTH)}...` : scrubbed;
}

const ERR_FIELDS = ["name", "code", "message", "stack"] as const;

// DiscordAPIError and SqliteError carry request bodies and circular refs; keep four fields.
function serializeErr(e: unknown): Record<string, unknown> {
  if (!e || typeof e !== "object") return { message: e };
  return Object.fromEntries(ERR_FIELDS.map((field) => [field, Reflect.get(e, field)]));
}

function pickTransport(): LoggerOptions["transport"] {
  const underVitest = Boolean(process.env.VITEST_WORKER_ID);
  if (underVitest || (process.env.LOG_PRETTY === "true" && process.stdout.isTTY)) {
    return {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss.l", ignore: "pid,hostname" },
    };
  }
  if (process.env.LOG_FILE) {
    return { target: "pino/file", options: { destination: process.env.LOG_FILE, mkdir: true } };
  }
  return undefined;
}

function errorFromArgs(first: unknown): Error | undefined {
  if (first instanceof Error) return first;
  if (first && typeof first === "object" && "err" in first && first.err instanceof Error) return first.err;
  return undefined;
}

let sentryLoadFailed = false;

function forwardToSentry(err: Error, message: string | undefined, level: string): void {
  // sentry.ts imports this module, so load it on first use.
  import("./sentry.js")
    .then(({ captureException, isSentryEnabled }) => {
      if (isSentryEnabled()) captureException(err, { message, level });
    })
    .catch((loadErr: unknown) => {
      if (sentryLoadFailed) return;
      sentryLoadFailed = true;
      console.warn("[logger] sentry module unavailable:", serializeErr(loadErr).message);
    });
}

const transport = pickTransport();

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: undefined,
  serializers: { err: serializeErr },
  ...(transport ? { transport } : {}),
  hooks: {
    logMethod(args, method, level) {
      if (level >= pino.levels.values.error) {
        const err = errorFromArgs(args[0]);
        if (err) {
          forwardToSentry(err, typeof args[1] === "string" ? args[1] : undefined, pino.levels.labels[level] ?? "error");
        }
      }
      return method.apply(this, args);
    },
  },
});
