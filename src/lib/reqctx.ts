/**
 * Guildhall — src/lib/reqctx.ts
 * WHAT: Per-interaction trace context carried through awaits with AsyncLocalStorage.
 * WHY: Store helpers deep inside ticket or onboarding flows log with the same traceId the
 *      member sees on an error card, without every function taking it as a parameter.
 * FLOWS:
 *  - cmdWrap / eventWrap / reminder tick → runWithCtx({ cmd, kind, ... }, fn)
 *  - anything awaited inside fn → ctx().traceId
 * DOCS:
 *  - AsyncLocalStorage: https://nodejs.org/api/async_context.html#class-asynclocalstorage
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";

export type InteractionKind = "slash" | "button" | "select" | "modal" | "task";

export type ReqContext = {
  traceId: string;
  cmd?: string;
  kind?: InteractionKind;
  userId?: string;
  guildId?: string | null;
  channelId?: string | null;
};

const TRACE_ID_LENGTH = 11;
const ALPHABET = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";

const als = new AsyncLocalStorage<ReqContext>();

/** Short base62 id members can quote back from an error card. */
export function newTraceId(): string {
  return Array.from(randomBytes(TRACE_ID_LENGTH), (byte) => ALPHABET[byte % ALPHABET.length]).join("");
}

/**
 * Run fn with `meta` layered over the surrounding context, if any.
 * Fields left out of `meta` are inherited; a fresh traceId is minted only at the outermost layer.
 *
 * NOTE: discord.js emits events outside any context. eventWrap opens one per event.
 */
export function runWithCtx<T>(meta: Partial<ReqContext>, fn: () => T): T {
  const outer = als.getStore();
  const merged: ReqContext = {
    ...outer,
    ...definedOnly(meta),
    traceId: meta.traceId ?? outer?.traceId ?? newTraceId(),
    guildId: meta.guildId ?? outer?.guildId ?? null,
    channelId: meta.channelId ?? outer?.channelId ?? null,
  };
  return als.run(merged, fn);
}

function definedOnly(meta: Partial<ReqContext>): Partial<ReqContext> {
  const out: Partial<ReqContext> = {};
  if (meta.cmd !== undefined) out.cmd = meta.cmd;
  if (meta.kind !== undefined) out.kind = meta.kind;
  if (meta.userId !== undefined) out.userId = meta.userId;
  return out;
}

/** Current context, or `{}` outside one. */
export function ctx(): Partial<ReqContext> {
  return als.getStore() ?? {};
}
