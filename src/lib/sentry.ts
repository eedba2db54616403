/**
 * Guildhall — src/lib/sentry.ts
 * WHAT: Optional Sentry wiring. Without a usable SENTRY_DSN every export here is a no-op.
 * WHY: Command and event wrappers call these helpers unconditionally; whether anything is sent is decided once, at boot.
 * FLOWS:
 *  - index.ts → initializeSentry() → Sentry.init → enabled
 *  - 403 from ingest → disabled for the rest of the process
 *  - shutdown → flushSentry(timeout)
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { env } from "./env.js";
import { logger, redact } from "./logger.js";

let enabled = false;

/**
 * Shape check only: scheme, public key and a project path. Whether the key still works
 * is only known after the first send.
 */
export function isUsableDsn(dsn: string | undefined): dsn is string {
  if (!dsn || !URL.canParse(dsn)) return false;
  const { protocol, username, pathname } = new URL(dsn);
  return (protocol === "https:" || protocol === "http:") && username !== "" && pathname.length > 1;
}

function releaseTag(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(join(process.cwd(), "package.json"), "utf8"));
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return `guildhall-bot@${pkg.version}`;
    }
  } catch (err) {
    logger.debug({ err }, "[sentry] package.json unreadable, release left unset");
  }
  return "guildhall-bot@unknown";
}

export function initializeSentry(): void {
  if (process.env.VITEST_WORKER_ID) return;

  if (!isUsableDsn(env.SENTRY_DSN)) {
    logger.info("[sentry] no usable SENTRY_DSN, error tracking off");
    return;
  }

  const environment = env.SENTRY_ENVIRONMENT ?? env.NODE_ENV;

  try {
    Sentry.init({
      dsn: env.SENTRY_DSN,
      environment,
      release: releaseTag(),
      tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,
      integrations: [
        Sentry.httpIntegration(),
        Sentry.onUncaughtExceptionIntegration({
          onFatalError: async (err: Error) => {
            logger.fatal({ err }, "[sentry] uncaught exception");
            process.exit(1);
          },
        }),
        Sentry.onUnhandledRejectionIntegration({ mode: "warn" }),
      ],
      beforeSend(event) {
        if (event.message) event.message = redact(event.message);
        for (const exception of event.exception?.values ?? []) {
          if (exception.value) exception.value = redact(exception.value);
        }
        return event;
      },
      // Network blips and Discord API refusals are already logged with guild context.
      ignoreErrors: ["DiscordAPIError", "AbortError", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND"],
    });
  } catch (err) {
    logger.error({ err }, "[sentry] init failed");
    return;
  }

  enabled = true;
  logger.info({ environment }, "[sentry] error tracking on");

  const client = Sentry.getClient();
  client?.on("afterSendEvent", (_event, response) => {
    if (response?.statusCode !== 403) return;
    logger.warn({ statusCode: 403 }, "[sentry] DSN rejected, turning error tracking off");
    enabled = false;
    client.close(0).then(undefined, (err: unknown) => logger.debug({ err }, "[sentry] close after 403 failed"));
  });
}

export function isSentryEnabled(): boolean {
  return enabled;
}

/** Event id, or null when tracking is off. */
export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!enabled) return null;
  return Sentry.captureException(error, context ? { contexts: { guildhall: context } } : undefined);
}

export function addBreadcrumb(crumb: Sentry.Breadcrumb): void {
  if (enabled) Sentry.addBreadcrumb(crumb);
}

export function setUser(user: { id: string; username?: string }): void {
  if (enabled) Sentry.setUser(user);
}

export function setTag(key: string, value: string): void {
  if (enabled) Sentry.setTag(key, value);
}

export function setContext(name: string, context: Record<string, unknown>): void {
  if (enabled) Sentry.setContext(name, context);
}

export async function flushSentry(timeoutMs = 2000): Promise<boolean> {
  if (!enabled) return true;
  try {
    return await Sentry.close(timeoutMs);
  } catch (err) {
    logger.warn({ err }, "[sentry] flush failed");
    return false;
  }
}

/**
 * Run fn inside a performance span when tracking is on, plainly otherwise.
 *
 * @example
 * await inSpan("reminders.tick", () => runReminderTick(client, Date.now(), tz));
 */
export async function inSpan<T>(name: string, fn: () => Promise<T> | T): Promise<T> {
  return enabled ? await Sentry.startSpan({ name }, fn) : await fn();
}
