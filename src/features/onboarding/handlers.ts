/**
 * Guildhall — src/features/onboarding/handlers.ts
 * WHAT: Interaction glue between Discord and the onboarding engine.
 * WHY: /onboarding start, the buttons, the select menus and the modal all do the same three things:
 *      load the session, apply one transition, render whatever comes next.
 * FLOWS:
 *  - startOnboarding(): settings gate → createSession → ephemeral prompt (/onboarding start or onb:start)
 *  - ensureStartMessage(): on ready, leave one start button in the rules channel
 *  - handleOnboardingComponent(): onb:* buttons and selects → transition → update the message
 *  - handleOnboardingModal(): onb:modal:<step> → text/email/follow-up answer → update or reply
 *  - finishOnboarding(): save → log channel summary → completion role → summary to the member
 * DOCS:
 *  - ButtonInteraction#update: https://discord.js.org/#/docs/discord.js/main/class/ButtonInteraction?scrollTo=update
 *  - ModalSubmitInteraction#isFromMessage: https://discord.js.org/#/docs/discord.js/main/class/ModalSubmitInteraction?scrollTo=isFromMessage
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type {
  ButtonInteraction,
  ModalSubmitInteraction,
  StringSelectMenuInteraction,
} from "discord.js";
import { replyOrEdit, withSql, withStep, type CommandContext, type InstrumentedInteraction } from "../../lib/cmdWrap.js";
import { logger } from "../../lib/logger.js";
import { errorCode } from "../../lib/errors.js";
import { requireGuildId } from "../../lib/permissions.js";
import { nowUtc } from "../../lib/time.js";
import { fetchSendableChannel, postToLogChannel, type ChannelSource } from "../logChannel.js";
import { settings } from "../settings/index.js";
import { ONBOARDING_MODES, type OnboardingMode } from "../settings/definitions.js";
import {
  acceptRules,
  answerChoice,
  answerFollowup,
  answerMulti,
  answerText,
  createSession,
  currentPrompt,
  formatResponses,
  skipQuestion,
} from "./engine.js";
import { getQuestions, getRules } from "./questions.js";
import { dropSession, getSession, putSession, saveCompletion } from "./store.js";
import type { OnboardingSession, StepResult } from "./types.js";
import {
  ANSWER_INPUT_ID,
  buildAnswerModal,
  buildLogEmbed,
  buildStartMessage,
  buildSummaryEmbed,
  parseOnboardingId,
  renderPrompt,
  START_ONBOARDING_ID,
  type PromptView,
} from "./ui.js";
import { SAFE_ALLOWED_MENTIONS } from "../../lib/constants.js";

type Respond = (view: PromptView) => Promise<void>;

const EXPIRED = "⌛ Your onboarding session expired. Run `/onboarding start` to begin again.";

function isOnboardingMode(value: string | null): value is OnboardingMode {
  return value !== null && (ONBOARDING_MODES as readonly string[]).includes(value);
}

/**
 * Effective mode for a guild; `onboarding.enabled = false` wins over any mode.
 */
export function onboardingModeFor(guildId: string): OnboardingMode {
  if (!settings.getBool("onboarding", "enabled", guildId)) return "disabled";
  const mode = settings.getString("onboarding", "mode", guildId);
  return isOnboardingMode(mode) ? mode : "disabled";
}

function rulesChannel(guildId: string): string | null {
  return settings.getString("system", "rules_channel_id", guildId);
}

async function assignCompletionRole(interaction: InstrumentedInteraction, guildId: string): Promise<boolean | null> {
  const roleId = settings.getString("onboarding", "completion_role_id", guildId);
  if (!roleId || !interaction.guild) return null;
  try {
    const member = await interaction.guild.members.fetch(interaction.user.id);
    await member.roles.add(roleId, "Onboarding completed");
    return true;
  } catch (err) {
    // 50013 when the role sits above the bot's highest role
    logger.warn(
      { err, guildId, userId: interaction.user.id, roleId, code: errorCode(err) },
      "[onboarding] failed to assign completion role"
    );
    return false;
  }
}

export async function finishOnboarding(
  ctx: CommandContext<InstrumentedInteraction>,
  session: OnboardingSession,
  respond: Respond
): Promise<void> {
  const { interaction } = ctx;
  const responses = formatResponses(session);
  const completedAtS = nowUtc();

  withSql(ctx, "INSERT INTO onboarding ... ON CONFLICT DO UPDATE", () =>
    saveCompletion(session.guildId, session.userId, responses, completedAtS)
  );
  dropSession(session.guildId, session.userId);

  const roleAssigned = await withStep(ctx, "assign_role", () => assignCompletionRole(interaction, session.guildId));

  await withStep(ctx, "log", () =>
    postToLogChannel(interaction.client, session.guildId, {
      embeds: [buildLogEmbed(session.userId, interaction.user.username, responses, completedAtS)],
      content: roleAssigned === false ? "⚠️ The completion role could not be assigned." : undefined,
      allowedMentions: SAFE_ALLOWED_MENTIONS,
    })
  );

  logger.info(
    {
      evt: "onboarding_completed",
      guildId: session.guildId,
      userId: session.userId,
      answers: responses.length,
      ms: Date.now() - session.startedAtMs,
    },
    "[onboarding] completed"
  );

  const displayName = interaction.member && "displayName" in interaction.member
    ? interaction.member.displayName
    : interaction.user.username;
  await respond({ embeds: [buildSummaryEmbed(displayName, responses)], components: [] });
}

async function applyResult(
  ctx: CommandContext<InstrumentedInteraction>,
  session: OnboardingSession,
  result: StepResult,
  respond: Respond
): Promise<void> {
  if (!result.ok) {
    await replyOrEdit(ctx.interaction, { content: `❌ ${result.error}` });
    return;
  }
  putSession(session);
  if (result.prompt.kind === "complete") {
    await finishOnboarding(ctx, session, respond);
    return;
  }
  await respond(renderPrompt(result.prompt, rulesChannel(session.guildId)));
}

export async function startOnboarding(ctx: CommandContext<InstrumentedInteraction>): Promise<void> {
  const { interaction } = ctx;
  const guildId = requireGuildId(interaction);
  const mode = onboardingModeFor(guildId);
  if (mode === "disabled") {
    await replyOrEdit(interaction, { content: "⚠️ Onboarding is not available in this server." });
    return;
  }

  const session = withSql(ctx, "SELECT * FROM guild_onboarding_questions", () =>
    createSession({
      guildId,
      userId: interaction.user.id,
      mode,
      questions: getQuestions(guildId),
      rules: getRules(guildId),
      nowMs: Date.now(),
    })
  );
  putSession(session);
  logger.info({ evt: "onboarding_started", guildId, userId: interaction.user.id, mode }, "[onboarding] started");

  const respond: Respond = (view) => replyOrEdit(interaction, view);
  await applyResult(ctx, session, { ok: true, prompt: currentPrompt(session) }, respond);
}

export async function handleOnboardingComponent(
  ctx: CommandContext<ButtonInteraction | StringSelectMenuInteraction>
): Promise<void> {
  const { interaction } = ctx;
  const parsed = parseOnboardingId(interaction.customId);
  if (!parsed || parsed.action === "modal") return;
  // The start button sits on a public message; the session goes to a fresh ephemeral reply.
  if (parsed.action === "start") {
    await startOnboarding(ctx);
    return;
  }

  const guildId = requireGuildId(interaction);
  const session = getSession(guildId, interaction.user.id);
  if (!session) {
    await replyOrEdit(interaction, { content: EXPIRED });
    return;
  }

  const respond: Respond = async (view) => {
    await interaction.update(view);
  };
  const selected = interaction.isStringSelectMenu() ? interaction.values : [];

  switch (parsed.action) {
    case "rules":
      await applyResult(ctx, session, acceptRules(session), respond);
      return;
    case "choice":
      await applyResult(ctx, session, answerChoice(session, parsed.step, parsed.value ?? selected[0] ?? ""), respond);
      return;
    case "multi":
      await applyResult(ctx, session, answerMulti(session, parsed.step, selected), respond);
      return;
    case "skip":
      await applyResult(ctx, session, skipQuestion(session, parsed.step), respond);
      return;
    case "input": {
      const prompt = currentPrompt(session);
      if (prompt.kind === "followup" && prompt.step === parsed.step) {
        await interaction.showModal(buildAnswerModal(prompt.step, prompt.question, prompt.inputType, true));
        return;
      }
      if (
        prompt.kind === "question" &&
        prompt.step === parsed.step &&
        (prompt.question.type === "text" || prompt.question.type === "email")
      ) {
        const { question } = prompt;
        await interaction.showModal(
          buildAnswerModal(prompt.step, question.question, question.type === "email" ? "email" : "text", question.required)
        );
        return;
      }
      await replyOrEdit(interaction, { content: "❌ This question is no longer active." });
      return;
    }
  }
}

export async function handleOnboardingModal(ctx: CommandContext<ModalSubmitInteraction>): Promise<void> {
  const { interaction } = ctx;
  const parsed = parseOnboardingId(interaction.customId);
  if (!parsed || parsed.action !== "modal") return;

  const guildId = requireGuildId(interaction);
  const session = getSession(guildId, interaction.user.id);
  if (!session) {
    await replyOrEdit(interaction, { content: EXPIRED });
    return;
  }

  const text = interaction.fields.getTextInputValue(ANSWER_INPUT_ID);
  const result =
    currentPrompt(session).kind === "followup"
      ? answerFollowup(session, parsed.step, text)
      : answerText(session, parsed.step, text);

  const respond: Respond = async (view) => {
    if (interaction.isFromMessage()) {
      await interaction.update(view);
    } else {
      await replyOrEdit(interaction, view);
    }
  };
  await applyResult(ctx, session, result, respond);
}

export type StartMessageOutcome = "posted" | "present" | "no_channel" | "disabled";

/**
 * Post the welcome message with the start button in the rules channel unless one of the
 * channel's last 100 messages already carries it.
 */
export async function ensureStartMessage(
  source: ChannelSource,
  guildId: string,
  guildName: string
): Promise<StartMessageOutcome> {
  if (onboardingModeFor(guildId) === "disabled") return "disabled";
  const channelId = rulesChannel(guildId);
  if (!channelId) return "no_channel";
  const channel = await fetchSendableChannel(source, channelId, guildId);
  if (!channel) return "no_channel";

  const recent = await channel.messages.fetch({ limit: 100 });
  if (recent.some((message) => message.resolveComponent(START_ONBOARDING_ID) !== null)) return "present";

  await channel.send({ ...buildStartMessage(guildName), allowedMentions: SAFE_ALLOWED_MENTIONS });
  logger.info({ evt: "onboarding_start_posted", guildId, channelId }, "[onboarding] start button posted");
  return "posted";
}
