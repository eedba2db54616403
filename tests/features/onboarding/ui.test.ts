/**
 * Guildhall — tests/features/onboarding/ui.test.ts
 * WHAT: Tests for onboarding customIds, prompt views, the answer modal and summaries.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { DEFAULT_QUESTIONS } from "../../../src/features/onboarding/questions.js";
import type { OnboardingQuestion } from "../../../src/features/onboarding/types.js";
import {
  buildAnswerModal,
  buildLogEmbed,
  buildSummaryEmbed,
  buildStartMessage,
  parseOnboardingId,
  renderPrompt,
} from "../../../src/features/onboarding/ui.js";

describe("parseOnboardingId", () => {
  it("reads every action", () => {
    expect(parseOnboardingId("onb:start")).toEqual({ action: "start" });
    expect(parseOnboardingId("onb:rules")).toEqual({ action: "rules" });
    expect(parseOnboardingId("onb:choice:2:friend")).toEqual({ action: "choice", step: 2, value: "friend" });
    expect(parseOnboardingId("onb:choice:2")).toEqual({ action: "choice", step: 2, value: null });
    expect(parseOnboardingId("onb:multi:1")).toEqual({ action: "multi", step: 1 });
    expect(parseOnboardingId("onb:modal:3")).toEqual({ action: "modal", step: 3 });
  });

  it("keeps colons inside option values", () => {
    expect(parseOnboardingId("onb:choice:0:a:b")).toEqual({ action: "choice", step: 0, value: "a:b" });
  });

  it("rejects foreign ids and missing steps", () => {
    expect(parseOnboardingId("faq:list:1:1")).toBeNull();
    expect(parseOnboardingId("onb:skip")).toBeNull();
  });
});

describe("buildStartMessage", () => {
  it("welcomes by guild name with one persistent start button", () => {
    const view = buildStartMessage("Test Guild");
    expect(view.embeds[0].toJSON().title).toBe("Welcome to Test Guild");
    expect(view.components[0].toJSON()).toMatchObject({
      components: [{ custom_id: "onb:start", label: "🚀 Start Onboarding", style: 3 }],
    });
  });
});

describe("renderPrompt", () => {
  it("points at the rules channel when no rules are stored", () => {
    const view = renderPrompt({ kind: "rules", rules: [] }, "300000000000000001");
    expect(view.embeds[0].toJSON().description).toBe("Please read the rules in <#300000000000000001>.");
    expect(view.components[0].toJSON()).toMatchObject({ components: [{ custom_id: "onb:rules" }] });
  });

  it("lists stored rules as fields", () => {
    const view = renderPrompt({ kind: "rules", rules: [{ order: 4, title: "Be kind", description: "No harassment." }] });
    expect(view.embeds[0].toJSON().fields).toEqual([{ name: "1. Be kind", value: "No harassment." }]);
  });

  it("renders choice questions as buttons", () => {
    const view = renderPrompt({ kind: "question", step: 0, total: 3, question: DEFAULT_QUESTIONS[0] });
    expect(view.embeds[0].toJSON().footer?.text).toBe("Question 1 / 3");
    expect(view.components).toHaveLength(1);
    expect(view.components[0].toJSON()).toMatchObject({
      components: [
        { custom_id: "onb:choice:0:friend", label: "Invited by a friend" },
        { custom_id: "onb:choice:0:social", label: "Social media" },
        { custom_id: "onb:choice:0:event", label: "Event or presentation" },
      ],
    });
  });

  it("renders multi questions as a select menu", () => {
    const view = renderPrompt({ kind: "question", step: 1, total: 3, question: DEFAULT_QUESTIONS[1] });
    expect(view.components[0].toJSON()).toMatchObject({
      components: [{ custom_id: "onb:multi:1", min_values: 1, max_values: 4 }],
    });
  });

  it("falls back to a select menu for long choice lists", () => {
    const many: OnboardingQuestion = {
      ...DEFAULT_QUESTIONS[0],
      options: Array.from({ length: 21 }, (_, i) => ({ label: `Option ${i}`, value: `o${i}` })),
    };
    const view = renderPrompt({ kind: "question", step: 0, total: 1, question: many });
    expect(view.components[0].toJSON()).toMatchObject({
      components: [{ custom_id: "onb:choice:0", max_values: 1 }],
    });
  });

  it("adds an answer button and a skip row to optional text questions", () => {
    const question: OnboardingQuestion = {
      stepOrder: 0,
      question: "Anything else?",
      type: "text",
      options: [],
      followup: {},
      required: false,
    };
    const view = renderPrompt({ kind: "question", step: 0, total: 1, question });
    expect(view.embeds[0].toJSON().footer?.text).toBe("Question 1 / 1 · optional");
    expect(view.components.map((row) => row.toJSON())).toMatchObject([
      { components: [{ custom_id: "onb:input:0" }] },
      { components: [{ custom_id: "onb:skip:0" }] },
    ]);
  });

  it("renders follow-ups and completion", () => {
    const followup = renderPrompt({ kind: "followup", step: 2, question: "Which shade?", inputType: "text" });
    expect(followup.embeds[0].toJSON()).toMatchObject({ title: "📝 One more thing", description: "Which shade?" });
    expect(followup.components[0].toJSON()).toMatchObject({ components: [{ custom_id: "onb:input:2" }] });

    const done = renderPrompt({ kind: "complete" });
    expect(done.embeds[0].toJSON().title).toBe("🎉 Onboarding complete");
    expect(done.components).toEqual([]);
  });
});

describe("buildAnswerModal", () => {
  it("caps the label and sizes email inputs", () => {
    const modal = buildAnswerModal(2, "x".repeat(50), "email", true);
    expect(modal.toJSON()).toMatchObject({
      custom_id: "onb:modal:2",
      title: "Onboarding",
      components: [
        {
          components: [
            { custom_id: "answer", label: `${"x".repeat(44)}…`, required: true, max_length: 254, placeholder: "name@example.com" },
          ],
        },
      ],
    });
  });
});

describe("summaries", () => {
  it("thanks members without answers", () => {
    expect(buildSummaryEmbed("Sam", []).toJSON().description).toBe("Thanks, Sam! You're all set.");
  });

  it("lists answers for the member and the log channel", () => {
    const responses = [{ question: "Colour?", answer: "Blue" }];
    expect(buildSummaryEmbed("Sam", responses).toJSON().fields).toEqual([{ name: "Colour?", value: "➜ Blue" }]);

    const log = buildLogEmbed("u1", "sam", responses, 1_700_000_000).toJSON();
    expect(log.description).toBe("**User:** <@u1> (sam, u1)");
    expect(log.timestamp).toBe("2023-11-14T22:13:20.000Z");
  });
});
