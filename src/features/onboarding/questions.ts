/**
 * Guildhall — src/features/onboarding/questions.ts
 * WHAT: Reads and writes onboarding questions and rules for a guild.
 * WHY: Decouples question storage from the session engine and the Discord UI.
 * FLOWS:
 *  - getQuestions(): enabled rows ordered by step_order, or DEFAULT_QUESTIONS when the guild has none
 *  - upsertQuestion(): INSERT ... ON CONFLICT(guild_id, step_order)
 *  - getRules()/replaceRules(): guild_rules in rule_order
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - zod safeParse: https://zod.dev/?id=safeparse
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { db } from "../../db/db.js";
import { logger } from "../../lib/logger.js";
import { withSql, type SqlTrackingCtx } from "../../lib/cmdWrap.js";
import {
  followupsSchema,
  optionsSchema,
  QUESTION_TYPES,
  type GuildRule,
  type OnboardingQuestion,
  type QuestionType,
} from "./types.js";

type QuestionRow = {
  step_order: number;
  question: string;
  question_type: string;
  options: string;
  followup: string;
  required: number;
};

const yesNo = [
  { label: "✅ Yes", value: "yes" },
  { label: "❌ No", value: "no" },
];

// Used until a guild stores its own questions.
export const DEFAULT_QUESTIONS: ReadonlyArray<OnboardingQuestion> = [
  {
    stepOrder: 0,
    question: "📣 How did you hear about us?",
    type: "choice",
    options: [
      { label: "Invited by a friend", value: "friend" },
      { label: "Social media", value: "social" },
      { label: "Event or presentation", value: "event" },
    ],
    followup: {
      friend: { question: "Who invited you?", type: "text" },
      social: { question: "Which platform?", type: "text" },
      event: { question: "Name of the event?", type: "text" },
    },
    required: true,
  },
  {
    stepOrder: 1,
    question: "💼 Which topics are you most interested in?",
    type: "multi",
    options: [
      { label: "📈 Investing", value: "investing" },
      { label: "💻 Tech", value: "tech" },
      { label: "🎨 Creative work", value: "creative" },
      { label: "🤝 Networking", value: "networking" },
    ],
    followup: {},
    required: true,
  },
  {
    stepOrder: 2,
    question: "📞 Would you like an introduction call?",
    type: "choice",
    options: yesNo,
    followup: { yes: { question: "Please enter your email address", type: "email" } },
    required: true,
  },
];

function isQuestionType(value: string): value is QuestionType {
  return (QUESTION_TYPES as readonly string[]).includes(value);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Row → question. Rows with an unknown type, unreadable JSON, or a choice question
 * without options are skipped with a warning rather than breaking the whole flow.
 */
export function toQuestion(guildId: string, row: QuestionRow): OnboardingQuestion | null {
  const options = optionsSchema.safeParse(parseJson(row.options));
  const followup = followupsSchema.safeParse(parseJson(row.followup));
  const type = row.question_type;

  if (!isQuestionType(type) || !options.success || !followup.success) {
    logger.warn({ guildId, step: row.step_order }, "[onboarding] skipping malformed question row");
    return null;
  }
  if ((type === "choice" || type === "multi") && options.data.length === 0) {
    logger.warn({ guildId, step: row.step_order }, "[onboarding] skipping choice question without options");
    return null;
  }
  return {
    stepOrder: row.step_order,
    question: row.question,
    type,
    options: options.data,
    followup: followup.data,
    required: row.required === 1,
  };
}

export function getQuestionCount(guildId: string): number {
  const row = db
    .prepare<[string], { n: number }>(`SELECT COUNT(*) AS n FROM guild_onboarding_questions WHERE guild_id = ?`)
    .get(guildId);
  return row?.n ?? 0;
}

export function getQuestions(guildId: string): OnboardingQuestion[] {
  if (getQuestionCount(guildId) === 0) return [...DEFAULT_QUESTIONS];

  return db
    .prepare<[string], QuestionRow>(
      `SELECT step_order, question, question_type, options, followup, required
       FROM guild_onboarding_questions
       WHERE guild_id = ? AND enabled = 1
       ORDER BY step_order ASC`
    )
    .all(guildId)
    .map((row) => toQuestion(guildId, row))
    .filter((q): q is OnboardingQuestion => q !== null);
}

export function upsertQuestion(
  guildId: string,
  question: OnboardingQuestion,
  enabled = true,
  ctx?: SqlTrackingCtx
): void {
  const prompt = question.question.trim();
  if (prompt.length === 0) {
    throw new Error("Question text cannot be empty");
  }
  // select placeholders and embed descriptions both cut off around here
  if (prompt.length > 150) {
    throw new Error("Question text must be 150 characters or less");
  }

  const sql = `
    INSERT INTO guild_onboarding_questions
      (guild_id, step_order, question, question_type, options, followup, required, enabled)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(guild_id, step_order) DO UPDATE SET
      question = excluded.question,
      question_type = excluded.question_type,
      options = excluded.options,
      followup = excluded.followup,
      required = excluded.required,
      enabled = excluded.enabled
  `;
  const run = () =>
    db
      .prepare(sql)
      .run(
        guildId,
        question.stepOrder,
        prompt,
        question.type,
        JSON.stringify(question.options),
        JSON.stringify(question.followup),
        question.required ? 1 : 0,
        enabled ? 1 : 0
      );

  if (ctx) {
    withSql(ctx, sql, run);
  } else {
    run();
  }
}

export function getRules(guildId: string): GuildRule[] {
  return db
    .prepare<[string], { rule_order: number; title: string; description: string }>(
      `SELECT rule_order, title, description FROM guild_rules WHERE guild_id = ? ORDER BY rule_order ASC`
    )
    .all(guildId)
    .map((r) => ({ order: r.rule_order, title: r.title, description: r.description }));
}

/**
 * Swap the whole rule list in one transaction so readers never see half of it.
 */
export function replaceRules(guildId: string, rules: readonly GuildRule[]): number {
  const tx = db.transaction((items: readonly GuildRule[]) => {
    db.prepare(`DELETE FROM guild_rules WHERE guild_id = ?`).run(guildId);
    const insert = db.prepare(`INSERT INTO guild_rules (guild_id, rule_order, title, description) VALUES (?, ?, ?, ?)`);
    for (const rule of items) {
      insert.run(guildId, rule.order, rule.title, rule.description);
    }
    return items.length;
  });
  return tx(rules);
}
