/**
 * Guildhall — src/lib/cmdWrap.ts
 * WHAT: Small helpers to standardize interaction lifecycle: tracing, step logging, audit rows, error cards, safe defers/replies.
 * WHY: Discord has a strict 3-second SLA for first responses; wrapping commands ensures consistency and fewer 10062s.
 * FLOWS:
 *  - wrapCommand(): enter → step(...) → try/catch → audit row → postErrorCard (or plain reply for bad input)
 *  - ensureDeferred(): deferReply if not already replied/deferred (ephemeral by default)
 *  - replyOrEdit(): choose reply/editReply/followUp based on state; ephemeral by default
 * DOCS:
 *  - discord.js v14 (interactions): https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Interaction replies (options/flags): https://discord.js.org/#/docs/discord.js/main/typedef/InteractionReplyOptions
 *  - Interaction response rules (3-second window): https://discord.com/developers/docs/interactions/receiving-and-responding
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  MessageFlags,
  DiscordAPIError,
  type InteractionReplyOptions,
  type ChatInputCommandInteraction,
  type ModalSubmitInteraction,
  type ButtonInteraction,
  type StringSelectMenuInteraction,
  type Interaction,
} from "discord.js";
import { logger, redact } from "./logger.js";
import { addBreadcrumb, captureException, setContext, setTag } from "./sentry.js";
import { ctx as reqCtx, newTraceId, type InteractionKind } from "./reqctx.js";
import {
  classifyError,
  errorCode,
  errorContext,
  shouldReportToSentry,
  userFriendlyMessage,
} from "./errors.js";
import { recordCommand } from "../features/audit/store.js";

/**
 * A "phase" is just a label for where we are in command execution.
 * "it crashed in phase 'db_write'" beats "it crashed somewhere in handleClaim".
 */
type Phase = string;

/**
 * Union of interaction types we support wrapping.
 * Autocomplete is missing on purpose: it can't show embeds or error cards.
 */
export type InstrumentedInteraction =
  | ChatInputCommandInteraction
  | ModalSubmitInteraction
  | ButtonInteraction
  | StringSelectMenuInteraction;

/**
 * Context object passed to wrapped command handlers.
 * Call step() to mark progress, setLastSql() before DB calls.
 */
export type CommandContext<I extends InstrumentedInteraction = ChatInputCommandInteraction> = {
  interaction: I;
  /** Mark the current execution phase (e.g., "validate", "db_write", "reply") */
  step: (phase: Phase) => void;
  currentPhase: () => Phase;
  /** Track the last SQL query for error diagnostics */
  setLastSql: (sql: string | null) => void;
  readonly traceId: string;
};

export type SqlTrackingCtx = { setLastSql: (sql: string | null) => void };

type CommandExecutor<I extends InstrumentedInteraction> = (ctx: CommandContext<I>) => Promise<void>;

// Discord gives us 3000ms; 2500 leaves room for latency.
const WATCHDOG_MS = 2500;

function inferKind(interaction: InstrumentedInteraction): InteractionKind {
  if (interaction.isChatInputCommand()) return "slash";
  if (interaction.isModalSubmit()) return "modal";
  if (interaction.isStringSelectMenu()) return "select";
  return "button";
}

/**
 * REST metadata from a DiscordAPIError for logging. Body is redacted and truncated;
 * we want a hint, not the payload. Returns null for non-Discord errors so callers can spread.
 */
function discordRestMeta(err: unknown) {
  if (!(err instanceof DiscordAPIError)) return null;
  let bodySnippet: string | undefined;
  try {
    const body = err.requestBody;
    if (body.json !== undefined) {
      bodySnippet = redact(JSON.stringify(body.json));
    } else if (body.files?.length) {
      bodySnippet = `[files:${body.files.length}]`;
    }
  } catch {
    bodySnippet = "[unserializable]";
  }
  if (bodySnippet && bodySnippet.length > 120) {
    bodySnippet = `${bodySnippet.slice(0, 120)}...`;
  }
  return {
    status: err.status,
    code: err.code,
    method: err.method,
    url: err.url,
    bodySnippet,
  };
}

/**
 * armWatchdog
 * WHAT: Sets a timer to auto-defer modal submissions nearing the 3s deadline.
 * WHY: Modal handlers write to the DB and post to log channels; this covers us against 10062.
 * RETURNS: A cleanup function that clears the timer.
 * PITFALLS:
 *  - Only defers modals; slash/button defers are handled by the handlers themselves.
 */
export function armWatchdog(interaction: Interaction): () => void {
  const timer = setTimeout(() => {
    if (!interaction.isModalSubmit()) return;
    if (interaction.deferred || interaction.replied) return;
    const meta = reqCtx();
    interaction
      .deferReply({ flags: MessageFlags.Ephemeral })
      .then(() => {
        logger.warn(
          { evt: "watchdog_autodefer", kind: "modal", id: interaction.customId, traceId: meta.traceId },
          "auto-deferred to avoid 10062"
        );
      })
      .catch((err: unknown) => {
        logger.warn(
          { evt: "watchdog_autodefer_fail", code: errorCode(err), traceId: meta.traceId, err },
          "auto-defer failed"
        );
      });
  }, WATCHDOG_MS);
  // A pending watchdog must not hold the process open during shutdown
  timer.unref();
  return () => clearTimeout(timer);
}

function audit(
  interaction: InstrumentedInteraction,
  commandName: string,
  success: boolean,
  errorMessage: string | null
): void {
  try {
    recordCommand({
      guildId: interaction.guildId,
      userId: interaction.user.id,
      commandName,
      success,
      errorMessage,
    });
  } catch (err) {
    // An audit failure must never turn a working command into a failed one
    logger.warn({ err, evt: "audit_write_fail", cmd: commandName }, "[audit] failed to record command");
  }
}

/**
 * wrapCommand
 * WHAT: Decorates a handler with tracing, step logging, an audit row and error-card handling.
 * WHY: Centralizes brittle interaction handling so individual commands stay focused.
 * RETURNS: An interaction handler that never rejects.
 * PITFALLS:
 *  - Throw UserInputError for bad input: the user gets its message, not an error card.
 *  - Set ctx.setLastSql before DB calls so failures show the statement.
 */
export function wrapCommand<I extends InstrumentedInteraction>(name: string, fn: CommandExecutor<I>) {
  return async (interaction: I): Promise<void> => {
    const store = reqCtx();
    const traceId = store.traceId ?? newTraceId();
    const cmdName = store.cmd ?? name;
    const kind = store.kind ?? inferKind(interaction);
    const startedAt = Date.now();
    let phase: Phase = "enter";
    let lastSql: string | null = null;

    const commandCtx: CommandContext<I> = {
      interaction,
      step: (newPhase: Phase) => {
        phase = newPhase;
        logger.debug({ evt: "cmd_step", traceId, cmd: cmdName, phase });
        addBreadcrumb({ category: "cmd", message: cmdName, data: { phase, traceId }, level: "info" });
        setTag("phase", phase);
      },
      currentPhase: () => phase,
      setLastSql: (sql: string | null) => {
        lastSql = sql;
      },
      traceId,
    };

    logger.info(
      {
        evt: "cmd_start",
        traceId,
        cmd: cmdName,
        kind,
        userId: interaction.user.id,
        guildId: interaction.guildId ?? "dm",
      },
      "command start"
    );

    setTag("cmd", cmdName);
    setTag("traceId", traceId);
    setTag("phase", phase);
    setContext("discord", {
      userId: interaction.user.id,
      guildId: interaction.guildId ?? "dm",
      channelId: interaction.channelId ?? null,
    });

    try {
      await fn(commandCtx);
      logger.info({ evt: "cmd_ok", traceId, cmd: cmdName, ms: Date.now() - startedAt }, "command ok");
      audit(interaction, cmdName, true, null);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      const classified = classifyError(error);
      audit(interaction, cmdName, false, redact(classified.message));

      if (classified.kind === "validation") {
        logger.info(
          { evt: "cmd_rejected", traceId, cmd: cmdName, field: classified.field },
          `command rejected input: ${classified.message}`
        );
        try {
          await replyOrEdit(interaction, { content: `❌ ${userFriendlyMessage(classified)}` });
        } catch (replyErr) {
          logger.warn({ err: replyErr, traceId, evt: "cmd_rejected_reply_fail" }, "failed to reply to rejected input");
        }
        return;
      }

      const errPayload = {
        name: err.name,
        code: errorCode(error),
        message: err.message,
        stack: err.stack,
      };
      logger.error(
        {
          evt: "cmd_error",
          traceId,
          cmd: cmdName,
          kind,
          phase,
          lastSql,
          customId: "customId" in interaction ? interaction.customId : undefined,
          ...errorContext(classified),
          err: errPayload,
        },
        `command error: ${classified.message}`
      );
      setTag("phase", phase);
      setTag("errorKind", classified.kind);

      if (shouldReportToSentry(classified)) {
        captureException(err, {
          cmd: cmdName,
          phase,
          traceId,
          lastSql,
          errorKind: classified.kind,
        });
      }

      try {
        // dynamic import: errorCard imports replyOrEdit from here
        const { postErrorCard } = await import("./errorCard.js");
        await postErrorCard(interaction, { traceId, cmd: cmdName, kind, phase, err: errPayload, lastSql });
      } catch (cardErr) {
        logger.error({ err: cardErr, traceId, evt: "cmd_error_card_fail" }, "Failed to post error card");
      }
    }
  };
}

/**
 * Mark a phase and run some work under it. Errors propagate to wrapCommand.
 */
export async function withStep<T, I extends InstrumentedInteraction>(
  ctx: CommandContext<I>,
  phase: Phase,
  fn: () => Promise<T> | T
): Promise<T> {
  ctx.step(phase);
  return await fn();
}

/**
 * Wrap a synchronous database operation with SQL tracking.
 * On failure the SQL stays set so the error card can show it.
 */
export function withSql<T>(ctx: SqlTrackingCtx, sql: string, run: () => T): T {
  ctx.setLastSql(sql);
  const result = run();
  ctx.setLastSql(null);
  return result;
}

/**
 * ensureDeferred
 * WHAT: First-time acknowledgement with deferReply if we haven't replied yet.
 * THROWS: Re-throws non-10062 errors; 10062 (expired) is logged and swallowed.
 */
export async function ensureDeferred(interaction: InstrumentedInteraction, ephemeral = true): Promise<void> {
  if (interaction.deferred || interaction.replied) {
    return;
  }
  try {
    await interaction.deferReply(ephemeral ? { flags: MessageFlags.Ephemeral } : {});
    logger.debug({ evt: "cmd_deferred", traceId: reqCtx().traceId }, "[cmd] deferred reply");
  } catch (err) {
    const code = errorCode(err);
    const logPayload = { evt: "cmd_defer_fail", traceId: reqCtx().traceId, code, ...(discordRestMeta(err) ?? {}), err };
    if (code === 10062) {
      logger.warn(logPayload, "defer failed (interaction expired)");
      return;
    }
    logger.warn(logPayload, "defer failed");
    throw err;
  }
}

/**
 * replyOrEdit
 * WHAT: Sends a response with the right API based on interaction state.
 * WHY: Avoids double-acknowledge (40060). Replies default to ephemeral; pass ephemeral=false
 *      for output everyone should see.
 * THROWS: Re-throws anything but 10062/40060 after logging.
 */
export async function replyOrEdit(
  interaction: InstrumentedInteraction,
  payload: InteractionReplyOptions,
  ephemeral = true
): Promise<void> {
  const withFlags: InteractionReplyOptions = ephemeral ? { ...payload, flags: MessageFlags.Ephemeral } : payload;
  try {
    if (interaction.deferred) {
      // editReply can't change ephemerality; the defer decided it
      const { flags: _flags, ...editPayload } = withFlags;
      await interaction.editReply(editPayload);
      return;
    }
    if (interaction.replied) {
      await interaction.followUp(withFlags);
      return;
    }
    await interaction.reply(withFlags);
  } catch (err) {
    const code = errorCode(err);
    const logPayload = { evt: "cmd_reply_fail", traceId: reqCtx().traceId, code, ...(discordRestMeta(err) ?? {}), err };
    if (code === 10062) {
      logger.warn(logPayload, "reply/edit skipped; interaction expired");
      return;
    }
    if (code === 40060) {
      logger.warn(logPayload, "reply/edit skipped; already acknowledged");
      return;
    }
    logger.error(logPayload, "reply/edit failed");
    throw err;
  }
}
