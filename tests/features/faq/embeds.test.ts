/**
 * Guildhall — tests/features/faq/embeds.test.ts
 * WHAT: Tests for FAQ paging and embeds.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import {
  buildFaqEntryEmbed,
  buildFaqPageEmbed,
  buildFaqPager,
  FAQ_LIST_RE,
  preview,
  totalPages,
} from "../../../src/features/faq/embeds.js";
import type { FaqEntry } from "../../../src/features/faq/store.js";

function entry(id: number, overrides: Partial<FaqEntry> = {}): FaqEntry {
  return {
    id,
    guildId: "guild-1",
    title: `Question ${id}`,
    summary: `Answer ${id}`,
    keywords: [],
    createdBy: "admin-1",
    createdAtS: 1000,
    ...overrides,
  };
}

const many = Array.from({ length: 12 }, (_, i) => entry(i + 1));

describe("preview / totalPages", () => {
  it("trims and cuts with an ellipsis", () => {
    expect(preview("  short  ", 10)).toBe("short");
    expect(preview("abcdefghijkl", 5)).toBe("abcde…");
    expect(preview("   ", 5)).toBe("-");
  });

  it("always has at least one page", () => {
    expect(totalPages(0)).toBe(1);
    expect(totalPages(10)).toBe(1);
    expect(totalPages(11)).toBe(2);
  });
});

describe("buildFaqPageEmbed", () => {
  it("shows ten entries per page with a footer", () => {
    const first = buildFaqPageEmbed(many, 0).toJSON();
    expect(first.fields).toHaveLength(10);
    expect(first.fields?.[0]).toEqual({ name: "[1] Question 1", value: "Answer 1" });
    expect(first.footer?.text).toBe("Page 1 / 2");

    const second = buildFaqPageEmbed(many, 1).toJSON();
    expect(second.fields?.map((f) => f.name)).toEqual(["[11] Question 11", "[12] Question 12"]);
  });

  it("clamps the page into range", () => {
    expect(buildFaqPageEmbed(many, 9).toJSON().footer?.text).toBe("Page 2 / 2");
    expect(buildFaqPageEmbed(many, -1).toJSON().footer?.text).toBe("Page 1 / 2");
  });

  it("handles an empty FAQ", () => {
    expect(buildFaqPageEmbed([], 0).toJSON().description).toBe("No FAQ entries yet.");
  });
});

describe("buildFaqPager", () => {
  function buttons(page: number, count: number, isPublic: boolean) {
    return buildFaqPager(page, count, isPublic)
      .toJSON()
      .components.map((c) => ({ id: "custom_id" in c ? c.custom_id : null, disabled: c.disabled }));
  }

  it("disables Prev on the first page and Next on the last", () => {
    expect(buttons(0, 12, false)).toEqual([
      { id: "faq:list:0:0", disabled: true },
      { id: "faq:list:1:0", disabled: false },
    ]);
    expect(buttons(1, 12, true)).toEqual([
      { id: "faq:list:0:1", disabled: false },
      { id: "faq:list:1:1", disabled: true },
    ]);
  });

  it("produces ids the button router understands", () => {
    expect(FAQ_LIST_RE.exec("faq:list:3:1")?.slice(1)).toEqual(["3", "1"]);
    expect(FAQ_LIST_RE.test("faq:list:x:1")).toBe(false);
  });
});

describe("buildFaqEntryEmbed", () => {
  it("lists keywords when there are any", () => {
    expect(buildFaqEntryEmbed(entry(1, { keywords: ["rules", "conduct"] })).toJSON().fields).toEqual([
      { name: "Keywords", value: "rules, conduct" },
    ]);
    expect(buildFaqEntryEmbed(entry(2)).toJSON().fields).toBeUndefined();
  });
});
