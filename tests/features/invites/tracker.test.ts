/**
 * Guildhall — tests/features/invites/tracker.test.ts
 * WHAT: Tests for invite attribution and join announcements.
 * WHY: Attribution is a diff of use counts; one-use invites disappear instead of counting up.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  findUsedInvite,
  forgetGuildInvites,
  handleMemberJoin,
  loadGuildInvites,
  rememberInvite,
  renderTemplate,
  snapshotOf,
  type InviteLike,
  type InviteSnapshot,
  type JoiningMember,
} from "../../../src/features/invites/tracker.js";
import { getInviteCount } from "../../../src/features/invites/store.js";
import { settings } from "../../../src/features/settings/index.js";
import { resetDatabase } from "../../utils/dbFixtures.js";
import { createChannelSource, createMockChannel, type MockTextChannel } from "../../utils/discordMocks.js";

const GUILD = "guild-1";
const ANNOUNCE = "700000000000000001";

function invite(code: string, uses: number, inviterId: string | null = "inviter-1", maxUses = 0): InviteLike {
  return { code, uses, maxUses, inviterId, inviter: inviterId ? { displayName: "Inviter" } : null };
}

function snap(code: string, uses: number, maxUses = 0, inviterId: string | null = "inviter-1"): InviteSnapshot {
  return { code, uses, maxUses, inviterId, inviterName: inviterId ? "Inviter" : null };
}

function inviteMap(...invites: InviteLike[]): Map<string, InviteLike> {
  return new Map(invites.map((i) => [i.code, i]));
}

function member(fetchResult: Map<string, InviteLike> | Error, channels: MockTextChannel[] = []): JoiningMember {
  const fetch = fetchResult instanceof Error ? vi.fn().mockRejectedValue(fetchResult) : vi.fn().mockResolvedValue(fetchResult);
  return {
    id: "newbie-1",
    displayName: "Newbie",
    guild: { id: GUILD, invites: { fetch } },
    client: createChannelSource(channels),
  };
}

describe("findUsedInvite", () => {
  it("finds the invite whose uses went up", () => {
    const before = new Map([["a", snap("a", 1)], ["b", snap("b", 4)]]);
    const after = new Map([["a", snap("a", 1)], ["b", snap("b", 5)]]);
    expect(findUsedInvite(before, after)?.code).toBe("b");
  });

  it("treats a vanished invite on its last use as the used one", () => {
    const before = new Map([["once", snap("once", 0, 1)], ["old", snap("old", 2, 10)]]);
    const after = new Map([["old", snap("old", 2, 10)]]);
    expect(findUsedInvite(before, after)?.code).toBe("once");
  });

  it("returns null when nothing changed", () => {
    const same = new Map([["a", snap("a", 1)]]);
    expect(findUsedInvite(same, new Map(same))).toBeNull();
    expect(findUsedInvite(new Map(), same)).toBeNull();
  });
});

describe("renderTemplate", () => {
  it("fills placeholders and keeps doubled braces literal", () => {
    expect(renderTemplate("{member} joined via {inviter} {{vip}}", { member: "A", inviter: "B" })).toBe(
      "A joined via B {vip}"
    );
  });

  it("returns the template untouched when a placeholder is unknown", () => {
    expect(renderTemplate("{member} and {nope}", { member: "A" })).toBe("{member} and {nope}");
  });
});

describe("snapshots", () => {
  beforeEach(() => {
    forgetGuildInvites(GUILD);
  });

  it("loads a guild's invites", async () => {
    const count = await loadGuildInvites({ id: GUILD, invites: { fetch: async () => inviteMap(invite("a", 1), invite("b", 2)) } });
    expect(count).toBe(2);
  });

  it("reports zero when invites cannot be listed", async () => {
    const count = await loadGuildInvites({
      id: GUILD,
      invites: { fetch: () => Promise.reject(new Error("Missing Permissions")) },
    });
    expect(count).toBe(0);
  });

  it("normalizes null uses", () => {
    expect(snapshotOf(inviteMap({ code: "x", uses: null, maxUses: null, inviterId: null, inviter: null }))).toEqual(
      new Map([["x", { code: "x", uses: 0, maxUses: 0, inviterId: null, inviterName: null }]])
    );
  });
});

describe("handleMemberJoin", () => {
  let channel: MockTextChannel;

  beforeEach(() => {
    resetDatabase();
    forgetGuildInvites(GUILD);
    channel = createMockChannel(ANNOUNCE);
  });

  it("attributes the join and announces it", async () => {
    settings.set("invites", "announcement_channel_id", ANNOUNCE, GUILD);
    rememberInvite(GUILD, invite("abc", 2));

    const result = await handleMemberJoin(member(inviteMap(invite("abc", 3)), [channel]));

    expect(result).toEqual({ inviterId: "inviter-1", count: 1, announced: true });
    expect(getInviteCount(GUILD, "inviter-1")).toBe(1);
    expect(channel.send).toHaveBeenCalledWith({
      content: "<@newbie-1> joined! <@inviter-1> now has 1 invites.",
      allowedMentions: { users: ["newbie-1", "inviter-1"] },
    });
  });

  it("uses the no-inviter template when attribution fails", async () => {
    settings.set("invites", "announcement_channel_id", ANNOUNCE, GUILD);
    settings.set("invites", "no_inviter_template", "Welcome {member_name}!", GUILD);

    const result = await handleMemberJoin(member(inviteMap(invite("abc", 3)), [channel]));

    expect(result).toEqual({ inviterId: null, count: null, announced: true });
    expect(channel.send).toHaveBeenCalledWith({ content: "Welcome Newbie!", allowedMentions: { users: ["newbie-1"] } });
  });

  it("counts without announcing when no channel is set", async () => {
    rememberInvite(GUILD, invite("abc", 0));
    const result = await handleMemberJoin(member(inviteMap(invite("abc", 1))));
    expect(result).toEqual({ inviterId: "inviter-1", count: 1, announced: false });
  });

  it("does nothing while invite tracking is off", async () => {
    settings.set("invites", "enabled", "off", GUILD);
    const joining = member(inviteMap(invite("abc", 1)));

    expect(await handleMemberJoin(joining)).toEqual({ inviterId: null, count: null, announced: false });
    expect(joining.guild.invites.fetch).not.toHaveBeenCalled();
  });

  it("gives up quietly when invites cannot be fetched", async () => {
    settings.set("invites", "announcement_channel_id", ANNOUNCE, GUILD);
    const result = await handleMemberJoin(member(new Error("Missing Permissions"), [channel]));
    expect(result.announced).toBe(false);
    expect(channel.send).not.toHaveBeenCalled();
  });
});
