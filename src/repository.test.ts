import { describe, it } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { GiveawayRepository } from "./repository";
import type { NewGiveaway } from "./types";

const CHANNEL_ID = -1001;
const NOW = new Date("2026-03-01T00:00:00.000Z");

function mkGiveaway(overrides: Partial<NewGiveaway> = {}): NewGiveaway {
  return {
    title: "Spring giveaway",
    description: "Three prizes",
    channelId: CHANNEL_ID,
    endsAt: "2026-03-10T18:00:00.000Z",
    winnerPlaces: 2,
    createdBy: 7,
    ...overrides,
  };
}

function daysBefore(days: number): string {
  return new Date(NOW.getTime() - days * 24 * 60 * 60 * 1000).toISOString();
}

describe("GiveawayRepository", () => {
  it("creates the database file and its directory", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "giveaway-repo-test-"));
    const storagePath = path.join(dir, "nested", "giveaways.db");
    const repo = new GiveawayRepository(storagePath);
    repo.createGiveaway(mkGiveaway(), NOW);
    repo.close();

    const reopened = new GiveawayRepository(storagePath);
    assert.strictEqual(reopened.getGiveaway(1)?.title, "Spring giveaway");
    reopened.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("stores channels", () => {
    const repo = new GiveawayRepository(":memory:");
    assert.strictEqual(repo.addChannel({ channelId: CHANNEL_ID, title: "News", username: "news_channel", addedBy: 7 }), true);
    repo.addChannel({ channelId: -1002, title: "Other" });

    const channel = repo.getChannel(CHANNEL_ID);
    assert.strictEqual(channel?.title, "News");
    assert.strictEqual(channel?.username, "news_channel");
    assert.strictEqual(channel?.addedBy, 7);
    assert.strictEqual(repo.getChannel(-1002)?.addedBy, undefined);
    assert.deepStrictEqual(
      repo
        .listChannels()
        .map((entry) => entry.channelId)
        .sort((a, b) => a - b),
      [-1002, CHANNEL_ID],
    );

    assert.strictEqual(repo.removeChannel(-1002), true);
    assert.strictEqual(repo.removeChannel(-1002), false);
    assert.strictEqual(repo.getChannel(-1002), undefined);
    repo.close();
  });

  it("creates and reads giveaways", () => {
    const repo = new GiveawayRepository(":memory:");
    const created = repo.createGiveaway(mkGiveaway({ winnerMessage: "You won place {{place}}" }), NOW);

    assert.deepStrictEqual(created, {
      id: 1,
      title: "Spring giveaway",
      description: "Three prizes",
      winnerMessage: "You won place {{place}}",
      channelId: CHANNEL_ID,
      startsAt: NOW.toISOString(),
      endsAt: "2026-03-10T18:00:00.000Z",
      winnerPlaces: 2,
      status: "active",
      createdBy: 7,
      createdAt: NOW.toISOString(),
    });

    repo.setGiveawayMessageId(1, 555);
    assert.strictEqual(repo.getGiveaway(1)?.messageId, 555);
    assert.strictEqual(repo.getGiveaway(99), undefined);
    repo.close();
  });

  it("lists active giveaways by end time", () => {
    const repo = new GiveawayRepository(":memory:");
    repo.createGiveaway(mkGiveaway({ title: "late", endsAt: "2026-04-01T00:00:00.000Z" }), NOW);
    repo.createGiveaway(mkGiveaway({ title: "early", endsAt: "2026-03-05T00:00:00.000Z" }), NOW);
    repo.createGiveaway(mkGiveaway({ title: "cancelled" }), NOW);
    repo.cancelGiveaway(3);

    assert.deepStrictEqual(
      repo.getActiveGiveaways().map((giveaway) => giveaway.title),
      ["early", "late"],
    );
    assert.deepStrictEqual(
      repo.listGiveaways("cancelled").map((giveaway) => giveaway.title),
      ["cancelled"],
    );
    repo.close();
  });

  it("adds each participant once", () => {
    const repo = new GiveawayRepository(":memory:");
    repo.createGiveaway(mkGiveaway(), NOW);

    assert.strictEqual(repo.addParticipant(1, { userId: 11, username: "alice", firstName: "Alice" }, NOW), true);
    assert.strictEqual(repo.addParticipant(1, { userId: 11, username: "alice" }, NOW), false);
    assert.strictEqual(repo.addParticipant(1, { userId: 12 }, NOW), true);

    assert.strictEqual(repo.getParticipantsCount(1), 2);
    assert.deepStrictEqual(repo.getParticipants(1), [
      { userId: 11, username: "alice", firstName: "Alice", giveawayId: 1, joinedAt: NOW.toISOString() },
      { userId: 12, giveawayId: 1, joinedAt: NOW.toISOString() },
    ]);
    assert.strictEqual(repo.getParticipantsCount(99), 0);
    repo.close();
  });

  it("finishes an active giveaway once with its winners", () => {
    const repo = new GiveawayRepository(":memory:");
    repo.createGiveaway(mkGiveaway(), NOW);
    const winners = [
      { userId: 12, place: 1, username: "bob" },
      { userId: 11, place: 2 },
    ];

    assert.strictEqual(repo.finishGiveaway(1, winners, "test-seed", NOW), true);
    const finished = repo.getGiveaway(1);
    assert.strictEqual(finished?.status, "finished");
    assert.strictEqual(finished?.drawSeed, "test-seed");
    assert.strictEqual(finished?.finishedAt, NOW.toISOString());
    assert.deepStrictEqual(repo.getWinners(1), [
      { userId: 12, username: "bob", giveawayId: 1, place: 1, wonAt: NOW.toISOString() },
      { userId: 11, giveawayId: 1, place: 2, wonAt: NOW.toISOString() },
    ]);

    assert.strictEqual(repo.finishGiveaway(1, [{ userId: 13, place: 1 }], "other-seed", NOW), false);
    assert.strictEqual(repo.getWinners(1).length, 2);
    assert.strictEqual(repo.getGiveaway(1)?.drawSeed, "test-seed");
    repo.close();
  });

  it("does not finish a cancelled giveaway", () => {
    const repo = new GiveawayRepository(":memory:");
    repo.createGiveaway(mkGiveaway(), NOW);
    assert.strictEqual(repo.cancelGiveaway(1), true);
    assert.strictEqual(repo.cancelGiveaway(1), false);

    assert.strictEqual(repo.finishGiveaway(1, [{ userId: 11, place: 1 }]), false);
    assert.strictEqual(repo.getGiveaway(1)?.status, "cancelled");
    assert.deepStrictEqual(repo.getWinners(1), []);
    repo.close();
  });

  it("rolls back the finish when a winner row is rejected", () => {
    const repo = new GiveawayRepository(":memory:");
    repo.createGiveaway(mkGiveaway(), NOW);

    assert.throws(() =>
      repo.finishGiveaway(1, [
        { userId: 11, place: 1 },
        { userId: 12, place: 1 },
      ]),
    );
    assert.strictEqual(repo.getGiveaway(1)?.status, "active");
    assert.deepStrictEqual(repo.getWinners(1), []);
    repo.close();
  });

  it("edits only the given fields of active giveaways", () => {
    const repo = new GiveawayRepository(":memory:");
    repo.createGiveaway(mkGiveaway({ winnerMessage: "Place {{place}}" }), NOW);

    const retitled = repo.updateGiveaway(1, { title: "Summer giveaway" }, NOW);
    assert.strictEqual(retitled?.title, "Summer giveaway");
    assert.strictEqual(retitled?.description, "Three prizes");
    assert.strictEqual(retitled?.winnerMessage, "Place {{place}}");
    assert.strictEqual(retitled?.endsAt, "2026-03-10T18:00:00.000Z");

    const moved = repo.updateGiveaway(1, { endsAt: "2026-03-20T00:00:00.000Z", winnerMessage: "You won" }, NOW);
    assert.strictEqual(moved?.endsAt, "2026-03-20T00:00:00.000Z");
    assert.strictEqual(moved?.winnerMessage, "You won");
    assert.strictEqual(moved?.title, "Summer giveaway");

    repo.finishGiveaway(1, [], undefined, NOW);
    assert.strictEqual(repo.updateGiveaway(1, { endsAt: "2026-04-01T00:00:00.000Z" }, NOW), undefined);
    assert.strictEqual(repo.getGiveaway(1)?.endsAt, "2026-03-20T00:00:00.000Z");
    assert.strictEqual(repo.updateGiveaway(99, { title: "Nope" }, NOW), undefined);
    repo.close();
  });

  it("counts active giveaways per channel", () => {
    const repo = new GiveawayRepository(":memory:");
    repo.createGiveaway(mkGiveaway(), NOW);
    repo.createGiveaway(mkGiveaway(), NOW);
    repo.createGiveaway(mkGiveaway({ channelId: -1002 }), NOW);
    repo.cancelGiveaway(2);

    assert.strictEqual(repo.countActiveGiveaways(CHANNEL_ID), 1);
    assert.strictEqual(repo.countActiveGiveaways(-1002), 1);
    assert.strictEqual(repo.countActiveGiveaways(-1003), 0);
    repo.close();
  });

  it("stores runtime admins once and removes them", () => {
    const repo = new GiveawayRepository(":memory:");

    assert.strictEqual(repo.addAdmin({ userId: 21, username: "carol" }, 2, NOW), true);
    assert.strictEqual(repo.addAdmin({ userId: 21 }, 2, NOW), false);
    assert.strictEqual(repo.addAdmin({ userId: 22 }, undefined, NOW), true);
    assert.strictEqual(repo.isAdmin(21), true);
    assert.deepStrictEqual(repo.listAdmins(), [
      { userId: 21, username: "carol", addedAt: NOW.toISOString(), addedBy: 2 },
      { userId: 22, addedAt: NOW.toISOString() },
    ]);

    assert.strictEqual(repo.removeAdmin(21), true);
    assert.strictEqual(repo.removeAdmin(21), false);
    assert.strictEqual(repo.isAdmin(21), false);
    repo.close();
  });

  it("deletes a giveaway with its participants and winners", () => {
    const repo = new GiveawayRepository(":memory:");
    repo.createGiveaway(mkGiveaway(), NOW);
    repo.addParticipant(1, { userId: 11 }, NOW);
    repo.finishGiveaway(1, [{ userId: 11, place: 1 }], undefined, NOW);

    assert.strictEqual(repo.deleteGiveaway(1), true);
    assert.strictEqual(repo.getGiveaway(1), undefined);
    assert.deepStrictEqual(repo.getParticipants(1), []);
    assert.deepStrictEqual(repo.getWinners(1), []);
    assert.strictEqual(repo.deleteGiveaway(1), false);
    repo.close();
  });

  it("purges finished giveaways past the retention window", () => {
    const repo = new GiveawayRepository(":memory:");
    repo.createGiveaway(mkGiveaway({ title: "old", endsAt: daysBefore(20) }), NOW);
    repo.createGiveaway(mkGiveaway({ title: "recent", endsAt: daysBefore(5) }), NOW);
    repo.createGiveaway(mkGiveaway({ title: "stale active", endsAt: daysBefore(30) }), NOW);
    repo.addParticipant(1, { userId: 11 }, NOW);
    repo.finishGiveaway(1, [{ userId: 11, place: 1 }], undefined, NOW);
    repo.finishGiveaway(2, [], undefined, NOW);

    assert.strictEqual(repo.deleteFinishedOlderThan(15, NOW), 1);
    assert.deepStrictEqual(
      repo.listGiveaways().map((giveaway) => giveaway.title),
      ["stale active", "recent"],
    );
    assert.deepStrictEqual(repo.getParticipants(1), []);
    assert.deepStrictEqual(repo.getWinners(1), []);
    assert.strictEqual(repo.deleteFinishedOlderThan(15, NOW), 0);
    repo.close();
  });

  it("upserts channel subscribers and re-activates returning ones", () => {
    const repo = new GiveawayRepository(":memory:");

    assert.deepStrictEqual(repo.upsertChannelSubscribers(CHANNEL_ID, [{ userId: 1 }, { userId: 2 }], NOW), {
      added: 2,
      updated: 0,
    });
    assert.deepStrictEqual(
      repo.upsertChannelSubscribers(CHANNEL_ID, [{ userId: 1 }, { userId: 2 }, { userId: 3 }], NOW),
      { added: 1, updated: 0 },
    );

    assert.strictEqual(repo.markSubscriberLeft(CHANNEL_ID, 2, NOW), true);
    assert.strictEqual(repo.markSubscriberLeft(CHANNEL_ID, 2, NOW), false);
    assert.deepStrictEqual(repo.listSubscriberIds(CHANNEL_ID), [1, 3]);
    assert.strictEqual(repo.countChannelSubscribers(CHANNEL_ID), 2);
    assert.strictEqual(repo.getChannelSubscribers(CHANNEL_ID)[1]?.leftAt, NOW.toISOString());

    assert.deepStrictEqual(repo.upsertChannelSubscribers(CHANNEL_ID, [{ userId: 2, username: "back" }], NOW), {
      added: 0,
      updated: 1,
    });
    assert.deepStrictEqual(repo.listSubscriberIds(CHANNEL_ID), [1, 2, 3]);
    assert.strictEqual(repo.getChannelSubscribers(CHANNEL_ID)[1]?.username, "back");
    repo.close();
  });

  it("selects recently active subscribers", () => {
    const repo = new GiveawayRepository(":memory:");
    repo.upsertChannelSubscribers(CHANNEL_ID, [{ userId: 1 }, { userId: 2 }, { userId: 3 }], NOW);
    repo.touchSubscriberActivity(CHANNEL_ID, { userId: 1 }, new Date(daysBefore(10)));
    repo.touchSubscriberActivity(CHANNEL_ID, { userId: 2 }, new Date(daysBefore(40)));
    repo.touchSubscriberActivity(CHANNEL_ID, { userId: 4, username: "newcomer" }, new Date(daysBefore(1)));

    assert.deepStrictEqual(repo.listSubscriberIds(CHANNEL_ID, { activeWithinDays: 30, now: NOW }), [1, 4]);
    assert.deepStrictEqual(repo.listSubscriberIds(CHANNEL_ID), [1, 2, 3, 4]);
    repo.close();
  });

  it("tracks mailing progress", () => {
    const repo = new GiveawayRepository(":memory:");
    const mailing = repo.createMailing({
      channelId: CHANNEL_ID,
      adminId: 7,
      audience: "all",
      messageText: "Hello",
      totalUsers: 3,
    });
    assert.strictEqual(mailing.status, "sending");
    assert.strictEqual(mailing.sentCount, 0);

    repo.updateMailingProgress(mailing.id, { sentCount: 1, failedCount: 0, blockedCount: 1 });
    assert.strictEqual(repo.getMailing(mailing.id)?.blockedCount, 1);

    repo.completeMailing(mailing.id, "cancelled", { sentCount: 1, failedCount: 1, blockedCount: 1 });
    const done = repo.getMailing(mailing.id);
    assert.strictEqual(done?.status, "cancelled");
    assert.strictEqual(done?.failedCount, 1);
    assert.ok(done?.finishedAt);
    repo.close();
  });

  it("cancels mailings a previous process left sending", () => {
    const repo = new GiveawayRepository(":memory:");
    const input = { channelId: CHANNEL_ID, adminId: 7, audience: "all" as const, messageText: "Hello", totalUsers: 2 };
    const finished = repo.createMailing(input);
    repo.completeMailing(finished.id, "done", { sentCount: 2, failedCount: 0, blockedCount: 0 });
    const stale = repo.createMailing(input);

    assert.deepStrictEqual(repo.cancelInterruptedMailings(NOW), [stale.id]);
    assert.strictEqual(repo.getMailing(stale.id)?.status, "cancelled");
    assert.strictEqual(repo.getMailing(stale.id)?.finishedAt, NOW.toISOString());
    assert.strictEqual(repo.getMailing(finished.id)?.status, "done");
    assert.deepStrictEqual(repo.cancelInterruptedMailings(NOW), []);
    repo.close();
  });
});
