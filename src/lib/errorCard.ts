/**
 * Guildhall — src/lib/errorCard.ts
 * WHAT: Formats and posts an "error card" to the invoking interaction with helpful diagnostics.
 * WHY: Interactions should never crash silently; surface context to users and breadcrumbs to logs.
 * FLOWS: hintFor() → build embed → replyOrEdit()
 * DOCS:
 *  - Interaction replies (flags): https://discord.js.org/#/docs/discord.js/main/typedef/InteractionReplyOptions
 *  - Discord error codes: https://discord.com/developers/docs/topics/opcodes-and-status-codes#json
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder } from "discord.js";
import { logger, redact } from "./logger.js";
import { replyOrEdit, type InstrumentedInteraction } from "./cmdWrap.js";
import type { InteractionKind } from "./reqctx.js";

const HINTS: ReadonlyMap<number, string> = new Map([
  [10003, "Channel not found. It may have been deleted or the bot lacks visibility."],
  [10008, "Message not found. It may have been deleted or is in an inaccessible channel."],
  [10062, "Interaction expired; the handler didn't answer in time."],
  [40060, "Already acknowledged; avoid double reply."],
  [50001, "Bot lacks access to this resource. Check channel visibility and role permissions."],
  [50013, "Missing Discord permission in this channel."],
  [50035, "Invalid request format. This is likely a bot bug; report it to staff with the trace ID."],
]);

/**
 * Translates raw errors into a one-line hint. Users shouldn't need to google "10062".
 */
export function hintFor(err: { name?: string; message?: string; code?: string | number }): string {
  const message = err.message ?? "";

  if (err.name === "SqliteError" && /no such table/i.test(message)) {
    return "Schema mismatch; restart the bot so tables are recreated.";
  }
  if (err.code === "SQLITE_BUSY") {
    return "Database is busy. Try again in a moment.";
  }

  if (typeof err.code === "number") {
    const hint = HINTS.get(err.code);
    if (hint) return hint;
  }

  if (/Unhandled (modal|button|select)/i.test(message)) {
    return "This component didn't match any handler. It may belong to an older bot version; run the command again.";
  }

  return "Unexpected error. Try again or contact staff.";
}

// 140 is enough to see the query shape
function truncateSql(sql: string | null | undefined): string {
  if (!sql) return "n/a";
  const cleaned = sql.replace(/\s+/g, " ").trim();
  return cleaned.length <= 140 ? cleaned : `${cleaned.slice(0, 140)}...`;
}

function truncateMessage(message: string | undefined): string {
  if (!message) return "No message provided";
  const safe = redact(message);
  return safe.length <= 200 ? safe : `${safe.slice(0, 200)}...`;
}

export type ErrorCardDetails = {
  traceId: string;
  cmd: string;
  kind: InteractionKind;
  phase: string;
  err: {
    name?: string;
    code?: string | number;
    message?: string;
    stack?: string;
  };
  lastSql?: string | null;
};

export function commandLabel(kind: InteractionKind, cmd: string): string {
  switch (kind) {
    case "button":
      return `button: ${cmd}`;
    case "select":
      return `select: ${cmd}`;
    case "modal":
      return `modal: ${cmd}`;
    default:
      return `/${cmd}`;
  }
}

export function buildErrorCard(details: ErrorCardDetails, now: Date = new Date()): EmbedBuilder {
  const codeDisplay = details.err.code !== undefined ? String(details.err.code) : (details.err.name ?? "unknown");

  return new EmbedBuilder()
    .setTitle("Command Error")
    .setColor(0xed4245)
    .addFields(
      { name: "Command", value: commandLabel(details.kind, details.cmd), inline: true },
      { name: "Phase", value: details.phase || "unknown", inline: true },
      { name: "Code", value: codeDisplay, inline: true },
      { name: "Message", value: truncateMessage(details.err.message) },
      { name: "Last SQL", value: truncateSql(details.lastSql) },
      { name: "Trace", value: details.traceId, inline: true },
      { name: "Hint", value: hintFor(details.err) }
    )
    .setFooter({ text: now.toISOString() });
}

/**
 * postErrorCard
 * WHAT: Sends the error embed. Ephemeral: trace ids are safe, but failures are nobody else's business.
 * RETURNS: never rejects; delivery failures are logged.
 */
export async function postErrorCard(interaction: InstrumentedInteraction, details: ErrorCardDetails): Promise<void> {
  try {
    await replyOrEdit(interaction, { embeds: [buildErrorCard(details)] });
  } catch (err) {
    // The user got no feedback at all
    logger.error({ err, traceId: details.traceId, evt: "error_card_fail" }, "failed to deliver error card");
  }
}
