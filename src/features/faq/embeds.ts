/**
 * Guildhall — src/features/faq/embeds.ts
 * WHAT: FAQ list pages, search results and single-entry embeds, plus the list pager buttons.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ActionRowBuilder, ButtonBuilder, ButtonStyle, EmbedBuilder } from "discord.js";
import type { FaqEntry } from "./store.js";

export const FAQ_PAGE_SIZE = 10;

// faq:list:<page>:<public 0|1>   page is zero-based
export const FAQ_LIST_RE = /^faq:list:(\d+):([01])$/;

export function preview(text: string, max: number): string {
  const trimmed = text.trim() || "-";
  return trimmed.length > max ? `${trimmed.slice(0, max)}…` : trimmed;
}

export function totalPages(count: number, pageSize = FAQ_PAGE_SIZE): number {
  return Math.max(1, Math.ceil(count / pageSize));
}

/**
 * One page of the newest-first list. `page` is zero-based and clamped into range.
 */
export function buildFaqPageEmbed(entries: readonly FaqEntry[], page: number): EmbedBuilder {
  const pages = totalPages(entries.length);
  const current = Math.min(Math.max(page, 0), pages - 1);
  const embed = new EmbedBuilder().setTitle("📚 FAQ: latest").setColor(0x5865f2);

  const slice = entries.slice(current * FAQ_PAGE_SIZE, (current + 1) * FAQ_PAGE_SIZE);
  if (slice.length === 0) {
    return embed.setDescription("No FAQ entries yet.");
  }
  embed.addFields(slice.map((e) => ({ name: `[${e.id}] ${e.title}`, value: preview(e.summary, 140) })));
  return embed.setFooter({ text: `Page ${current + 1} / ${pages}` });
}

export function buildFaqPager(page: number, count: number, isPublic: boolean): ActionRowBuilder<ButtonBuilder> {
  const pages = totalPages(count);
  const flag = isPublic ? "1" : "0";
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder()
      .setCustomId(`faq:list:${Math.max(page - 1, 0)}:${flag}`)
      .setLabel("⬅ Prev")
      .setStyle(ButtonStyle.Secondary)
      .setDisabled(page <= 0),
    new ButtonBuilder()
      .setCustomId(`faq:list:${Math.min(page + 1, pages - 1)}:${flag}`)
      .setLabel("➡ Next")
      .setStyle(ButtonStyle.Primary)
      .setDisabled(page >= pages - 1)
  );
}

export function buildFaqResultsEmbed(results: readonly FaqEntry[]): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle("🔎 FAQ: top results")
    .setColor(0xe67e22)
    .addFields(results.map((e) => ({ name: `[${e.id}] ${e.title}`, value: preview(e.summary, 160) })));
}

export function buildFaqEntryEmbed(entry: FaqEntry): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle(`📖 ${entry.title}`)
    .setDescription(entry.summary || "-")
    .setColor(0x57f287);
  if (entry.keywords.length > 0) {
    embed.addFields({ name: "Keywords", value: entry.keywords.join(", ") });
  }
  return embed;
}
