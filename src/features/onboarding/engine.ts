/**
 * Guildhall — src/features/onboarding/engine.ts
 * WHAT: The onboarding state machine. No Discord types in here.
 * WHY: Every button, select and modal funnels into a handful of transitions; keeping them pure
 *      lets the tests walk whole flows without mocking interactions.
 * FLOWS:
 *  - createSession() → currentPrompt(): rules (when the mode has them) → question 0 → ... → complete
 *  - answerChoice(): may park the session on a follow-up before moving on
 *  - formatResponses(): the summary written to the DB and the log channel
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { OnboardingMode } from "../settings/definitions.js";
import type {
  Answer,
  FormattedResponse,
  GuildRule,
  OnboardingQuestion,
  OnboardingSession,
  Prompt,
  StepResult,
} from "./types.js";

export const EMAIL_RE = /^[\w.-]+@[\w.-]+\.\w{2,}$/;
export const NO_RESPONSE = "No response";

export function isValidEmail(text: string): boolean {
  return EMAIL_RE.test(text.trim());
}

export function modeHasRules(mode: OnboardingMode): boolean {
  return mode === "rules_only" || mode === "rules_with_questions";
}

export function modeHasQuestions(mode: OnboardingMode): boolean {
  return mode === "rules_with_questions" || mode === "questions_only";
}

export function createSession(input: {
  guildId: string;
  userId: string;
  mode: OnboardingMode;
  questions: readonly OnboardingQuestion[];
  rules: readonly GuildRule[];
  nowMs: number;
}): OnboardingSession {
  if (input.mode === "disabled") {
    throw new Error("onboarding is disabled");
  }
  return {
    guildId: input.guildId,
    userId: input.userId,
    mode: input.mode,
    questions: modeHasQuestions(input.mode) ? [...input.questions] : [],
    rules: [...input.rules],
    rulesAccepted: !modeHasRules(input.mode),
    step: 0,
    answers: new Map(),
    pending: null,
    startedAtMs: input.nowMs,
  };
}

export function currentPrompt(session: OnboardingSession): Prompt {
  if (!session.rulesAccepted) {
    return { kind: "rules", rules: session.rules };
  }
  if (session.pending) {
    return {
      kind: "followup",
      step: session.pending.step,
      question: session.pending.spec.question,
      inputType: session.pending.spec.type,
    };
  }
  const question = session.questions[session.step];
  if (!question) {
    return { kind: "complete" };
  }
  return { kind: "question", step: session.step, total: session.questions.length, question };
}

export function isComplete(session: OnboardingSession): boolean {
  return currentPrompt(session).kind === "complete";
}

function advance(session: OnboardingSession, answer: Answer): StepResult {
  session.answers.set(session.step, answer);
  session.pending = null;
  session.step += 1;
  return { ok: true, prompt: currentPrompt(session) };
}

function activeQuestion(session: OnboardingSession, step: number): OnboardingQuestion | string {
  if (!session.rulesAccepted) return "Please accept the rules first.";
  if (session.pending) return "Please answer the follow-up question first.";
  if (step !== session.step) return "This question is no longer active.";
  const question = session.questions[step];
  if (!question) return "Onboarding is already complete.";
  return question;
}

export function acceptRules(session: OnboardingSession): StepResult {
  if (session.rulesAccepted) {
    return { ok: false, error: "The rules were already accepted." };
  }
  session.rulesAccepted = true;
  return { ok: true, prompt: currentPrompt(session) };
}

export function answerChoice(session: OnboardingSession, step: number, value: string): StepResult {
  const question = activeQuestion(session, step);
  if (typeof question === "string") return { ok: false, error: question };
  if (question.type !== "choice") return { ok: false, error: "This question expects a different kind of answer." };
  if (!question.options.some((o) => o.value === value)) {
    return { ok: false, error: "That option is not available." };
  }

  // option values come from guild admins; "constructor" must not find Object.prototype
  if (Object.hasOwn(question.followup, value)) {
    session.pending = { step, value, spec: question.followup[value] };
    return { ok: true, prompt: currentPrompt(session) };
  }
  return advance(session, { kind: "choice", value });
}

export function answerMulti(session: OnboardingSession, step: number, values: readonly string[]): StepResult {
  const question = activeQuestion(session, step);
  if (typeof question === "string") return { ok: false, error: question };
  if (question.type !== "multi") return { ok: false, error: "This question expects a different kind of answer." };

  const unique = [...new Set(values)];
  if (unique.some((v) => !question.options.some((o) => o.value === v))) {
    return { ok: false, error: "That option is not available." };
  }
  if (question.required && unique.length === 0) {
    return { ok: false, error: "Please pick at least one option." };
  }
  return advance(session, { kind: "multi", values: unique });
}

export function answerText(session: OnboardingSession, step: number, raw: string): StepResult {
  const question = activeQuestion(session, step);
  if (typeof question === "string") return { ok: false, error: question };
  if (question.type !== "text" && question.type !== "email") {
    return { ok: false, error: "This question expects a different kind of answer." };
  }

  const text = raw.trim();
  if (text.length === 0) {
    if (question.required) return { ok: false, error: "This question needs an answer." };
    return advance(session, { kind: "skipped" });
  }
  if (question.type === "email" && !isValidEmail(text)) {
    return { ok: false, error: "Invalid email format. Please try again." };
  }
  return advance(session, { kind: "text", text });
}

export function answerFollowup(session: OnboardingSession, step: number, raw: string): StepResult {
  const pending = session.pending;
  if (!pending || pending.step !== step) {
    return { ok: false, error: "This question is no longer active." };
  }
  const text = raw.trim();
  if (text.length === 0) {
    return { ok: false, error: "This question needs an answer." };
  }
  if (pending.spec.type === "email" && !isValidEmail(text)) {
    return { ok: false, error: "Invalid email format. Please try again." };
  }
  return advance(session, { kind: "choice", value: pending.value, followup: { question: pending.spec.question, text } });
}

/**
 * Optional questions only; required ones must be answered.
 */
export function skipQuestion(session: OnboardingSession, step: number): StepResult {
  const question = activeQuestion(session, step);
  if (typeof question === "string") return { ok: false, error: question };
  if (question.required) return { ok: false, error: "This question needs an answer." };
  return advance(session, { kind: "skipped" });
}

function labelFor(question: OnboardingQuestion, value: string): string {
  return question.options.find((o) => o.value === value)?.label ?? value;
}

export function formatAnswer(question: OnboardingQuestion, answer: Answer | undefined): string {
  if (!answer) return NO_RESPONSE;
  switch (answer.kind) {
    case "choice": {
      const label = labelFor(question, answer.value);
      return answer.followup ? `${label} — ${answer.followup.question}: ${answer.followup.text}` : label;
    }
    case "multi":
      return answer.values.length > 0 ? answer.values.map((v) => labelFor(question, v)).join(", ") : NO_RESPONSE;
    case "text":
      return answer.text || NO_RESPONSE;
    case "skipped":
      return NO_RESPONSE;
  }
}

export function formatResponses(session: OnboardingSession): FormattedResponse[] {
  return session.questions.map((question, index) => ({
    question: question.question,
    answer: formatAnswer(question, session.answers.get(index)),
  }));
}
