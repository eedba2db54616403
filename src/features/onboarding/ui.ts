/**
 * Guildhall — src/features/onboarding/ui.ts
 * WHAT: Turns engine prompts into embeds, buttons, select menus and modals.
 * WHY: The customId carries the step so a click on an old message can't answer the current question.
 * FLOWS:
 *  - renderPrompt(prompt) → { embeds, components } for reply/update
 *  - buildAnswerModal() ← "Answer" button on text, email and follow-up prompts
 *  - parseOnboardingId() ← interaction router
 *  - buildStartMessage() → the public welcome post with the start button (rules channel)
 * DOCS:
 *  - Select menus: https://discordjs.guide/message-components/select-menus.html
 *  - Modals: https://discordjs.guide/interactions/modals.html
 *
 * customIds:
 *  onb:start            start a session (public, persistent button)
 *  onb:rules            accept the rules
 *  onb:choice:<step>:<value>  (button) / onb:choice:<step> (select, many options)
 *  onb:multi:<step>     multi select
 *  onb:skip:<step>      optional questions only
 *  onb:input:<step>     opens onb:modal:<step>
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  EmbedBuilder,
  ModalBuilder,
  StringSelectMenuBuilder,
  TextInputBuilder,
  TextInputStyle,
} from "discord.js";
import type { FormattedResponse, GuildRule, OnboardingQuestion, Prompt } from "./types.js";

export const ANSWER_INPUT_ID = "answer";

// 5 rows × 5 buttons, minus a row for Skip
const MAX_OPTION_BUTTONS = 20;

export const START_ONBOARDING_ID = "onb:start";

export type OnboardingAction =
  | { action: "start" }
  | { action: "rules" }
  | { action: "choice"; step: number; value: string | null }
  | { action: "multi"; step: number }
  | { action: "skip"; step: number }
  | { action: "input"; step: number }
  | { action: "modal"; step: number };

export const ONBOARDING_ID_RE = /^onb:(start|rules|choice|multi|skip|input|modal)(?::(\d+))?(?::(.+))?$/;

export function parseOnboardingId(customId: string): OnboardingAction | null {
  const match = ONBOARDING_ID_RE.exec(customId);
  if (!match) return null;
  const [, action, stepRaw, value] = match;
  if (action === "start" || action === "rules") return { action };
  if (stepRaw === undefined) return null;
  const step = Number(stepRaw);
  switch (action) {
    case "choice":
      return { action, step, value: value ?? null };
    case "multi":
    case "skip":
    case "input":
    case "modal":
      return { action, step };
    default:
      return null;
  }
}

export type PromptView = {
  embeds: EmbedBuilder[];
  components: Array<ActionRowBuilder<ButtonBuilder> | ActionRowBuilder<StringSelectMenuBuilder>>;
};

/**
 * Welcome post left in the rules channel. The button is not tied to a step, so it keeps
 * working across restarts.
 */
export function buildStartMessage(guildName: string): PromptView {
  const embed = new EmbedBuilder()
    .setTitle(`Welcome to ${guildName}`)
    .setDescription("Read the rules, answer a few questions and you're in. Press the button below to begin.")
    .setColor(0x57f287);
  const button = new ButtonBuilder()
    .setCustomId(START_ONBOARDING_ID)
    .setLabel("🚀 Start Onboarding")
    .setStyle(ButtonStyle.Success);
  return { embeds: [embed], components: [new ActionRowBuilder<ButtonBuilder>().addComponents(button)] };
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

function answerButton(step: number): ButtonBuilder {
  return new ButtonBuilder().setCustomId(`onb:input:${step}`).setLabel("✏️ Answer").setStyle(ButtonStyle.Primary);
}

function skipButton(step: number): ButtonBuilder {
  return new ButtonBuilder().setCustomId(`onb:skip:${step}`).setLabel("Skip").setStyle(ButtonStyle.Secondary);
}

function rulesView(rules: readonly GuildRule[], rulesChannelId: string | null): PromptView {
  const embed = new EmbedBuilder().setTitle("📜 Server rules").setColor(0x5865f2);
  if (rules.length > 0) {
    embed.addFields(
      rules.slice(0, 25).map((r, i) => ({ name: `${i + 1}. ${r.title}`, value: r.description.slice(0, 1024) || "-" }))
    );
  } else {
    embed.setDescription(
      rulesChannelId ? `Please read the rules in <#${rulesChannelId}>.` : "Please read and follow the server rules."
    );
  }
  const accept = new ButtonBuilder().setCustomId("onb:rules").setLabel("✅ I accept the rules").setStyle(ButtonStyle.Success);
  return { embeds: [embed], components: [new ActionRowBuilder<ButtonBuilder>().addComponents(accept)] };
}

function questionView(step: number, total: number, question: OnboardingQuestion): PromptView {
  const embed = new EmbedBuilder()
    .setTitle("📝 Onboarding")
    .setDescription(question.question)
    .setColor(0x3498db)
    .setFooter({ text: `Question ${step + 1} / ${total}${question.required ? "" : " · optional"}` });
  const components: PromptView["components"] = [];

  if (question.type === "choice" && question.options.length <= MAX_OPTION_BUTTONS) {
    const buttons = question.options.map((o) =>
      new ButtonBuilder().setCustomId(`onb:choice:${step}:${o.value}`).setLabel(o.label).setStyle(ButtonStyle.Primary)
    );
    for (const row of chunk(buttons, 5)) {
      components.push(new ActionRowBuilder<ButtonBuilder>().addComponents(row));
    }
  } else if (question.type === "choice" || question.type === "multi") {
    const multi = question.type === "multi";
    const select = new StringSelectMenuBuilder()
      .setCustomId(multi ? `onb:multi:${step}` : `onb:choice:${step}`)
      .setPlaceholder(multi ? "Pick one or more options…" : "Pick an option…")
      .setMinValues(multi && !question.required ? 0 : 1)
      .setMaxValues(multi ? question.options.length : 1)
      .addOptions(question.options.map((o) => ({ label: o.label, value: o.value })));
    components.push(new ActionRowBuilder<StringSelectMenuBuilder>().addComponents(select));
  } else {
    components.push(new ActionRowBuilder<ButtonBuilder>().addComponents(answerButton(step)));
  }

  if (!question.required) {
    components.push(new ActionRowBuilder<ButtonBuilder>().addComponents(skipButton(step)));
  }
  return { embeds: [embed], components };
}

export function renderPrompt(prompt: Prompt, rulesChannelId: string | null = null): PromptView {
  switch (prompt.kind) {
    case "rules":
      return rulesView(prompt.rules, rulesChannelId);
    case "question":
      return questionView(prompt.step, prompt.total, prompt.question);
    case "followup": {
      const embed = new EmbedBuilder().setTitle("📝 One more thing").setDescription(prompt.question).setColor(0x3498db);
      return {
        embeds: [embed],
        components: [new ActionRowBuilder<ButtonBuilder>().addComponents(answerButton(prompt.step))],
      };
    }
    case "complete":
      return {
        embeds: [new EmbedBuilder().setTitle("🎉 Onboarding complete").setColor(0x57f287)],
        components: [],
      };
  }
}

export function buildAnswerModal(step: number, question: string, inputType: "text" | "email", required: boolean) {
  const input = new TextInputBuilder()
    .setCustomId(ANSWER_INPUT_ID)
    // modal labels are capped at 45 characters
    .setLabel(question.length > 45 ? `${question.slice(0, 44)}…` : question)
    .setStyle(inputType === "email" ? TextInputStyle.Short : TextInputStyle.Paragraph)
    .setPlaceholder(inputType === "email" ? "name@example.com" : "Type your answer here...")
    .setRequired(required)
    .setMaxLength(inputType === "email" ? 254 : 1000);

  return new ModalBuilder()
    .setCustomId(`onb:modal:${step}`)
    .setTitle("Onboarding")
    .addComponents(new ActionRowBuilder<TextInputBuilder>().addComponents(input));
}

function responseFields(responses: readonly FormattedResponse[]) {
  return responses.slice(0, 25).map((r) => ({
    name: r.question.slice(0, 256),
    value: `➜ ${r.answer}`.slice(0, 1024),
  }));
}

export function buildSummaryEmbed(displayName: string, responses: readonly FormattedResponse[]): EmbedBuilder {
  const embed = new EmbedBuilder().setTitle("📜 Onboarding summary").setColor(0x3498db);
  if (responses.length === 0) {
    return embed.setDescription(`Thanks, ${displayName}! You're all set.`);
  }
  return embed
    .setDescription(`Here is a summary of your answers, ${displayName}:`)
    .addFields(responseFields(responses));
}

export function buildLogEmbed(
  userId: string,
  username: string,
  responses: readonly FormattedResponse[],
  completedAtS: number
): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle("📝 Onboarding completed")
    .setDescription(`**User:** <@${userId}> (${username}, ${userId})`)
    .setColor(0x57f287)
    .addFields(responseFields(responses))
    .setTimestamp(completedAtS * 1000);
}
