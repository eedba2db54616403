/**
 * Guildhall — src/lib/sanitize.ts
 * WHAT: Input sanitizers for text that ends up in embeds or logs.
 * WHY: Ticket descriptions, onboarding answers and FAQ text are user-typed; echoed raw into
 *      a staff channel they can ping @everyone, inject links or break embed formatting.
 * FLOWS:
 *  - safeEmbedText(): urlFilter → stripMentions → escapeMarkdown → truncate
 *  - safeLogMessage(): strip control chars → single line → truncate
 * DOCS:
 *  - Discord markdown: https://support.discord.com/hc/en-us/articles/210298617
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// Backslash must come first or we'd double-escape our own escapes.
const MARKDOWN_CHARS = ["\\", "`", "*", "_", "~", "|", ">", "[", "]"];

export function escapeMarkdown(text: string): string {
  if (!text) return "";
  let out = text;
  for (const ch of MARKDOWN_CHARS) {
    out = out.split(ch).join(`\\${ch}`);
  }
  return out;
}

/**
 * Removes user/role/channel mentions and @everyone/@here, then collapses whitespace.
 */
export function stripMentions(text: string): string {
  if (!text) return "";
  return text
    .replace(/<@!?\d+>/g, "")
    .replace(/<@&\d+>/g, "")
    .replace(/<#\d+>/g, "")
    .replace(/@everyone/gi, "")
    .replace(/@here/gi, "")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * allowHttp=true keeps http(s) links and only strips script-capable schemes;
 * allowHttp=false removes every link, including protocol-relative and bare www. ones.
 */
export function urlFilter(text: string, allowHttp = false): string {
  if (!text) return "";
  let out = text;
  if (allowHttp) {
    out = out
      .replace(/javascript:\S*/gi, "")
      .replace(/data:\S*/gi, "")
      .replace(/vbscript:\S*/gi, "")
      .replace(/file:\S*/gi, "");
  } else {
    out = out
      .replace(/https?:\/\/\S+/gi, "")
      .replace(/\/\/\S+/g, "")
      .replace(/\bwww\.\S+/gi, "");
  }
  return out.replace(/\s+/g, " ").trim();
}

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength - 3)}...` : text;
}

/**
 * Text safe to drop into an embed title/description/field.
 * 4096 is Discord's embed description limit; pass 1024 for field values.
 */
export function safeEmbedText(text: string, maxLength = 4096): string {
  if (!text) return "";
  return truncate(escapeMarkdown(stripMentions(urlFilter(text, false))), maxLength);
}

/**
 * Single-line, control-char-free text for log fields.
 */
export function safeLogMessage(text: string, maxLength = 200): string {
  if (!text) return "";
  const cleaned = text
    .replace(/[\x00-\x08\x0b\x0c\x0e-\x1f\x7f-\x9f]/g, "")
    .replace(/[\r\n]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
  return truncate(cleaned, maxLength);
}

/**
 * Ownership guard for user-owned rows (reminders, tickets).
 * Returns the refusal message, or null when the actor owns the row.
 */
export function validateOwnership(ownerId: string, actorId: string, resourceType: string): string | null {
  return ownerId === actorId ? null : `❌ You can only access your own ${resourceType}.`;
}
