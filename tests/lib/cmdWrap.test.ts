/**
 * Guildhall — tests/lib/cmdWrap.test.ts
 * WHAT: Tests for the command wrapper and the reply helpers.
 * WHY: Every command goes through these; a wrong reply API means 40060s in production.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, vi } from "vitest";
import { MessageFlags, type InteractionReplyOptions } from "discord.js";
import { db } from "../../src/db/db.js";
import { ensureDeferred, replyOrEdit, withSql, withStep, wrapCommand } from "../../src/lib/cmdWrap.js";
import { UserInputError } from "../../src/lib/errors.js";
import { resetDatabase } from "../utils/dbFixtures.js";
import { createTestCommandContext } from "../utils/contextFactory.js";
import { createDiscordAPIError, createMockInteraction, embedJson, repliedContents } from "../utils/discordMocks.js";

type AuditRow = { command_name: string; success: number; error_message: string | null; guild_id: string | null };

function auditRows(): AuditRow[] {
  return db
    .prepare<[], AuditRow>("SELECT command_name, success, error_message, guild_id FROM audit_logs ORDER BY id")
    .all();
}

describe("replyOrEdit", () => {
  it("replies ephemerally on a fresh interaction", async () => {
    const interaction = createMockInteraction();
    await replyOrEdit(interaction, { content: "hi" });
    expect(interaction.reply).toHaveBeenCalledWith({ content: "hi", flags: MessageFlags.Ephemeral });
  });

  it("replies publicly when asked", async () => {
    const interaction = createMockInteraction();
    await replyOrEdit(interaction, { content: "hi" }, false);
    expect(interaction.reply).toHaveBeenCalledWith({ content: "hi" });
  });

  it("edits the deferred reply without flags", async () => {
    const interaction = createMockInteraction();
    await interaction.deferReply();
    await replyOrEdit(interaction, { content: "done" });
    expect(interaction.editReply).toHaveBeenCalledWith({ content: "done" });
    expect(interaction.reply).not.toHaveBeenCalled();
  });

  it("follows up after a reply", async () => {
    const interaction = createMockInteraction();
    await interaction.reply({ content: "first" });
    await replyOrEdit(interaction, { content: "second" });
    expect(interaction.followUp).toHaveBeenCalledWith({ content: "second", flags: MessageFlags.Ephemeral });
  });

  it("swallows expired and already-acknowledged interactions", async () => {
    const expired = createMockInteraction();
    vi.mocked(expired.reply).mockRejectedValueOnce(createDiscordAPIError(10062, "Unknown interaction", 404));
    await expect(replyOrEdit(expired, { content: "x" })).resolves.toBeUndefined();

    const acked = createMockInteraction();
    vi.mocked(acked.reply).mockRejectedValueOnce(createDiscordAPIError(40060, "Interaction has already been acknowledged."));
    await expect(replyOrEdit(acked, { content: "x" })).resolves.toBeUndefined();
  });

  it("rethrows anything else", async () => {
    const interaction = createMockInteraction();
    vi.mocked(interaction.reply).mockRejectedValueOnce(createDiscordAPIError(50013, "Missing Permissions", 403));
    await expect(replyOrEdit(interaction, { content: "x" })).rejects.toThrow("Missing Permissions");
  });
});

describe("ensureDeferred", () => {
  it("defers once, ephemerally", async () => {
    const interaction = createMockInteraction();
    await ensureDeferred(interaction);
    await ensureDeferred(interaction);
    expect(interaction.deferReply).toHaveBeenCalledTimes(1);
    expect(interaction.deferReply).toHaveBeenCalledWith({ flags: MessageFlags.Ephemeral });
  });

  it("skips interactions that were already answered", async () => {
    const interaction = createMockInteraction();
    await interaction.reply({ content: "hi" });
    await ensureDeferred(interaction);
    expect(interaction.deferReply).not.toHaveBeenCalled();
  });

  it("swallows 10062 and rethrows other failures", async () => {
    const expired = createMockInteraction();
    vi.mocked(expired.deferReply).mockRejectedValueOnce(createDiscordAPIError(10062, "Unknown interaction", 404));
    await expect(ensureDeferred(expired)).resolves.toBeUndefined();

    const broken = createMockInteraction();
    vi.mocked(broken.deferReply).mockRejectedValueOnce(new Error("socket hang up"));
    await expect(ensureDeferred(broken)).rejects.toThrow("socket hang up");
  });
});

describe("withSql / withStep", () => {
  it("clears the SQL after success and keeps it after a failure", () => {
    const ctx = createTestCommandContext(createMockInteraction());
    expect(withSql(ctx, "SELECT 1", () => 1)).toBe(1);
    expect(ctx.sql).toEqual(["SELECT 1", null]);

    expect(() =>
      withSql(ctx, "DELETE FROM nowhere", () => {
        throw new Error("boom");
      })
    ).toThrow("boom");
    expect(ctx.sql).toEqual(["SELECT 1", null, "DELETE FROM nowhere"]);
  });

  it("marks the phase before running", async () => {
    const ctx = createTestCommandContext(createMockInteraction());
    const result = await withStep(ctx, "db_write", () => ctx.currentPhase());
    expect(result).toBe("db_write");
  });
});

describe("wrapCommand", () => {
  beforeEach(() => {
    resetDatabase();
  });

  it("runs the handler and audits success", async () => {
    const handler = vi.fn().mockResolvedValue(undefined);
    const interaction = createMockInteraction();

    await wrapCommand("faq", handler)(interaction);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0]).toMatchObject({ interaction });
    expect(auditRows()).toEqual([{ command_name: "faq", success: 1, error_message: null, guild_id: "guild-123" }]);
  });

  it("answers bad input with the plain message", async () => {
    const interaction = createMockInteraction();

    await wrapCommand("reminder", async () => {
      throw new UserInputError("time", "Invalid time. Use HH:MM, for example 19:30.");
    })(interaction);

    expect(repliedContents(interaction)).toEqual(["❌ Invalid time. Use HH:MM, for example 19:30."]);
    expect(auditRows()).toEqual([
      {
        command_name: "reminder",
        success: 0,
        error_message: "Invalid time. Use HH:MM, for example 19:30.",
        guild_id: "guild-123",
      },
    ]);
  });

  it("posts an error card with the failing phase and SQL", async () => {
    const interaction = createMockInteraction();

    await wrapCommand("ticket", async (ctx) => {
      ctx.step("db_write");
      withSql(ctx, "UPDATE support_tickets SET status = ?", () => {
        throw new Error("disk I/O error");
      });
    })(interaction);

    const [payload] = vi.mocked(interaction.reply).mock.calls[0];
    const card = embedJson(payload as InteractionReplyOptions);
    expect(card?.title).toBe("Command Error");
    const field = (name: string) => card?.fields?.find((f) => f.name === name)?.value;
    expect(field("Command")).toBe("/ticket");
    expect(field("Phase")).toBe("db_write");
    expect(field("Code")).toBe("Error");
    expect(field("Message")).toBe("disk I/O error");
    expect(field("Last SQL")).toBe("UPDATE support_tickets SET status = ?");
    expect(auditRows()[0]).toMatchObject({ success: 0, error_message: "disk I/O error" });
  });

  it("never rejects even when the error reply fails", async () => {
    const interaction = createMockInteraction();
    vi.mocked(interaction.reply).mockRejectedValue(new Error("gateway gone"));

    await expect(
      wrapCommand("health", async () => {
        throw new Error("boom");
      })(interaction)
    ).resolves.toBeUndefined();
  });
});
