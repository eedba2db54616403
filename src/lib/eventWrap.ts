/**
 * Guildhall — src/lib/eventWrap.ts
 * WHAT: Safe wrapper for discord.js gateway event handlers.
 * WHY: A rejected promise inside client.on() can take the process down; events must never throw.
 * FLOWS:
 *  - wrapEvent(name, handler) → runs inside a fresh request context → race against a timeout
 *  - failures → classifyError → log (+ Sentry when reportable)
 * USAGE:
 *  client.on(Events.GuildMemberAdd, wrapEvent("guildMemberAdd", async (member) => { ... }));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";
import { runWithCtx } from "./reqctx.js";

type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

// Member joins fetch invites over REST; 10s leaves plenty of room.
const DEFAULT_EVENT_TIMEOUT_MS = 10_000;

/**
 * Wrap an event handler so it logs instead of throwing.
 *
 * @example
 * client.on(Events.InviteCreate, wrapEvent("inviteCreate", (invite) => cacheInvite(invite)));
 */
export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>,
  timeoutMs: number = DEFAULT_EVENT_TIMEOUT_MS
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`Event handler timeout after ${timeoutMs}ms`)), timeoutMs);
      timer.unref();
    });

    try {
      await runWithCtx({ cmd: eventName, kind: "task" }, () => Promise.race([Promise.resolve(handler(...args)), timeout]));
    } catch (err) {
      const classified = classifyError(err);
      const contextIds = extractEventContext(args);

      logger.error(
        { evt: "event_error", event: eventName, ...errorContext(classified, contextIds), err },
        `[${eventName}] event handler failed: ${classified.message}`
      );

      if (shouldReportToSentry(classified)) {
        captureException(err instanceof Error ? err : new Error(String(err)), {
          event: eventName,
          errorKind: classified.kind,
          ...contextIds,
        });
      }
      // never re-throw
    } finally {
      clearTimeout(timer);
    }
  };
}

function idOf(value: unknown): string | undefined {
  if (value && typeof value === "object" && "id" in value && typeof value.id === "string") {
    return value.id;
  }
  return undefined;
}

/**
 * guild/user/channel ids from whatever discord.js handed the event (GuildMember,
 * Invite, Message...). Unknown shapes just contribute nothing.
 */
export function extractEventContext(args: unknown[]): Record<string, string> {
  const context: Record<string, string> = {};

  for (const arg of args) {
    if (!arg || typeof arg !== "object") continue;

    if ("guildId" in arg && typeof arg.guildId === "string") {
      context.guildId = arg.guildId;
    }
    const guildId = "guild" in arg ? idOf(arg.guild) : undefined;
    if (guildId) context.guildId = guildId;

    const userId = "user" in arg ? idOf(arg.user) : undefined;
    if (userId) context.userId = userId;

    if ("channelId" in arg && typeof arg.channelId === "string") {
      context.channelId = arg.channelId;
    }

    const entityId = idOf(arg);
    if (entityId && !context.entityId) context.entityId = entityId;
  }

  return context;
}
