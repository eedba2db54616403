/**
 * Guildhall — tests/commands/clean.test.ts
 * WHAT: Tests for /clean.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import { clampLimit, execute } from "../../src/commands/clean.js";
import { createTestCommandContext } from "../utils/contextFactory.js";
import { createMockInteraction, repliedContents } from "../utils/discordMocks.js";

function channelDeleting(count: number) {
  return {
    id: "channel-123",
    isDMBased: () => false,
    bulkDelete: vi.fn().mockResolvedValue({ size: count }),
  };
}

describe("clampLimit", () => {
  it("defaults to 10 and stays within 1..100", () => {
    expect(clampLimit(null)).toBe(10);
    expect(clampLimit(250)).toBe(100);
    expect(clampLimit(0)).toBe(1);
    expect(clampLimit(25)).toBe(25);
  });
});

describe("/clean", () => {
  it("bulk-deletes the requested number of messages and reports the count", async () => {
    const channel = channelDeleting(7);
    const interaction = createMockInteraction({ isAdmin: true, channel, options: { getInteger: { limit: 20 } } });
    const ctx = createTestCommandContext(interaction);

    await execute(ctx);

    expect(channel.bulkDelete).toHaveBeenCalledWith(20, true);
    expect(interaction.deferReply).toHaveBeenCalledTimes(1);
    expect(repliedContents(interaction)).toEqual(["✅ 7 messages deleted."]);
    expect(ctx.phases).toContain("bulk_delete");
  });

  it("uses the default limit and says 'message' for one", async () => {
    const channel = channelDeleting(1);
    const interaction = createMockInteraction({ isAdmin: true, channel });

    await execute(createTestCommandContext(interaction));

    expect(channel.bulkDelete).toHaveBeenCalledWith(10, true);
    expect(repliedContents(interaction)).toEqual(["✅ 1 message deleted."]);
  });

  it("refuses members without Manage Messages", async () => {
    const channel = channelDeleting(3);
    const interaction = createMockInteraction({ channel });

    await execute(createTestCommandContext(interaction));

    expect(channel.bulkDelete).not.toHaveBeenCalled();
    expect(repliedContents(interaction)).toEqual(["You don't have permission to use this command."]);
  });

  it("refuses when there is no server channel to clean", async () => {
    const interaction = createMockInteraction({ isAdmin: true, channel: null });

    await execute(createTestCommandContext(interaction));

    expect(repliedContents(interaction)).toEqual(["❌ This command only works in server text channels."]);
  });
});
