/**
 * Guildhall — src/features/onboarding/types.ts
 * WHAT: Question, answer and session shapes for the onboarding flow.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import type { OnboardingMode } from "../settings/definitions.js";

export const QUESTION_TYPES = ["choice", "multi", "text", "email"] as const;
export type QuestionType = (typeof QUESTION_TYPES)[number];

export const optionSchema = z.object({
  label: z.string().min(1).max(80),
  value: z.string().min(1).max(50),
});
export type QuestionOption = z.infer<typeof optionSchema>;

export const followupSchema = z.object({
  question: z.string().min(1).max(45),
  type: z.enum(["text", "email"]).default("text"),
});
export type FollowupSpec = z.infer<typeof followupSchema>;

export const optionsSchema = z.array(optionSchema).max(25);
export const followupsSchema = z.record(z.string(), followupSchema);

export interface OnboardingQuestion {
  stepOrder: number;
  question: string;
  type: QuestionType;
  options: QuestionOption[];
  /** keyed by option value */
  followup: Record<string, FollowupSpec>;
  required: boolean;
}

export interface GuildRule {
  order: number;
  title: string;
  description: string;
}

export type Answer =
  | { kind: "choice"; value: string; followup?: { question: string; text: string } }
  | { kind: "multi"; values: string[] }
  | { kind: "text"; text: string }
  | { kind: "skipped" };

export interface PendingFollowup {
  step: number;
  value: string;
  spec: FollowupSpec;
}

export interface OnboardingSession {
  guildId: string;
  userId: string;
  mode: Exclude<OnboardingMode, "disabled">;
  questions: OnboardingQuestion[];
  rules: GuildRule[];
  rulesAccepted: boolean;
  /** index into questions of the question being asked */
  step: number;
  answers: Map<number, Answer>;
  pending: PendingFollowup | null;
  startedAtMs: number;
}

export type Prompt =
  | { kind: "rules"; rules: GuildRule[] }
  | { kind: "question"; step: number; total: number; question: OnboardingQuestion }
  | { kind: "followup"; step: number; question: string; inputType: "text" | "email" }
  | { kind: "complete" };

export type StepResult = { ok: true; prompt: Prompt } | { ok: false; error: string };

/** One row of the stored summary, in question order. */
export interface FormattedResponse {
  question: string;
  answer: string;
}
