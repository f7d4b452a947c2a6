import { describe, it } from "node:test";
import assert from "node:assert";

import {
  buildAdminSummary,
  buildGiveawayPost,
  buildHelpMessage,
  buildMailingReport,
  buildParticipateKeyboard,
  buildReminderPost,
  buildWinnerNotification,
  buildWinnersAnnouncement,
  escapeHtml,
  formatDateTime,
  formatUserName,
} from "./bot-ui";
import { createDeliveryStats } from "./delivery";
import { REMINDER_TIERS } from "./reminders";
import type { Giveaway } from "./types";

function mkGiveaway(overrides: Partial<Giveaway> = {}): Giveaway {
  return {
    id: 4,
    title: "Spring",
    description: "Three prizes",
    channelId: -1001,
    startsAt: "2026-04-01T00:00:00.000Z",
    endsAt: "2026-12-31T20:00:00.000Z",
    winnerPlaces: 3,
    status: "active",
    createdBy: 2,
    createdAt: "2026-04-01T00:00:00.000Z",
    ...overrides,
  };
}

describe("formatting", () => {
  it("escapes html special characters", () => {
    assert.strictEqual(escapeHtml("<b>Tom & Jerry</b>"), "&lt;b&gt;Tom &amp; Jerry&lt;/b&gt;");
  });

  it("prefers username, then full name, then first name", () => {
    assert.strictEqual(formatUserName({ userId: 1, username: "alice", fullName: "Alice Smith" }, "ru"), "@alice");
    assert.strictEqual(formatUserName({ userId: 1, fullName: "Alice Smith", firstName: "Alice" }, "ru"), "Alice Smith");
    assert.strictEqual(formatUserName({ userId: 1, firstName: "Alice" }, "ru"), "Alice");
    assert.strictEqual(formatUserName({ userId: 1 }, "ru"), "Пользователь");
    assert.strictEqual(formatUserName({ userId: 1 }, "en"), "User");
  });

  it("formats dates in the configured time zone", () => {
    assert.strictEqual(formatDateTime("2026-12-31T20:00:00.000Z", "UTC"), "31.12.2026 20:00");
    assert.strictEqual(formatDateTime("2026-12-31T20:00:00.000Z", "Europe/Moscow"), "31.12.2026 23:00");
  });
});

describe("channel posts", () => {
  it("builds the participate button with the current count", () => {
    assert.deepStrictEqual(buildParticipateKeyboard(5, 3, "en"), [
      [{ text: "🎁 Participate (3)", callbackData: "join:5" }],
    ]);
  });

  it("builds the giveaway post", () => {
    assert.strictEqual(
      buildGiveawayPost(mkGiveaway(), "en", "UTC"),
      "🎁 <b>Spring</b>\n\nThree prizes\n\n🏆 Prize places: 3\n⏳ Results: 31.12.2026 20:00\n\nPress the button below to participate.",
    );
  });

  it("escapes markup in the title and description", () => {
    const giveaway = mkGiveaway({ title: "Win <3", description: "Tom & Jerry <b>merch</b>" });
    assert.strictEqual(
      buildGiveawayPost(giveaway, "en", "UTC"),
      "🎁 <b>Win &lt;3</b>\n\nTom &amp; Jerry &lt;b&gt;merch&lt;/b&gt;\n\n🏆 Prize places: 3\n⏳ Results: 31.12.2026 20:00\n\nPress the button below to participate.",
    );
    const tomorrow = REMINDER_TIERS.find((tier) => tier.id === "1d");
    assert.ok(tomorrow);
    assert.strictEqual(
      buildReminderPost({ giveaway, tier: tomorrow, participants: 8, locale: "en", timeZone: "UTC" }),
      "⏰ <b>Reminder!</b>\n\n🎁 <b>Win &lt;3</b>\n\nTom &amp; Jerry &lt;b&gt;merch&lt;/b&gt;\n\n🏆 Prize places: 3\n👥 Participants: 8\n⏳ Results tomorrow: 31.12.2026 20:00",
    );
  });

  it("lists several winners with medals", () => {
    const text = buildWinnersAnnouncement(
      [
        { userId: 1, place: 1, username: "a<b" },
        { userId: 2, place: 2, firstName: "Bob" },
        { userId: 3, place: 4 },
      ],
      "ru",
    );
    assert.strictEqual(
      text,
      [
        "🎊 <b>РОЗЫГРЫШ ЗАВЕРШЕН!</b>",
        "",
        "🥇 <b>1 место:</b> @a&lt;b",
        "🥈 <b>2 место:</b> Bob",
        "🏅 <b>4 место:</b> Пользователь",
        "",
        "🎉 Поздравляем!",
      ].join("\n"),
    );
  });
});

describe("winner notification", () => {
  it("uses the default text without a template", () => {
    assert.strictEqual(
      buildWinnerNotification(mkGiveaway(), { userId: 1, place: 2 }, "ru"),
      "🎉 Поздравляем! Вы заняли 2 место в розыгрыше «Spring».",
    );
    assert.strictEqual(
      buildWinnerNotification(mkGiveaway({ winnerMessage: "   " }), { userId: 1, place: 1 }, "en"),
      "🎉 Congratulations! You took place 1 in the giveaway \"Spring\".",
    );
  });

  it("fills the giveaway template", () => {
    assert.strictEqual(
      buildWinnerNotification(
        mkGiveaway({ winnerMessage: "{{name}}, place {{place}} in {{title}} is yours. {{prize}}" }),
        { userId: 1, place: 1, username: "alice" },
        "en",
      ),
      "@alice, place 1 in Spring is yours. {{prize}}",
    );
  });
});

describe("admin reports", () => {
  it("lists each winner with the delivery outcome", () => {
    const text = buildAdminSummary({
      giveaway: mkGiveaway(),
      participants: 10,
      eligible: 7,
      winners: [
        { userId: 1, place: 1, username: "alice" },
        { userId: 2, place: 2 },
        { userId: 3, place: 3 },
      ],
      results: [
        { userId: 1, outcome: "success", attempts: 1 },
        { userId: 2, outcome: "rate_limited", attempts: 4 },
      ],
      locale: "en",
    });
    assert.strictEqual(
      text,
      [
        "📋 Results of giveaway #4 \"Spring\"",
        "Participants: 10, passed the subscription check: 7",
        "",
        "1. @alice (id 1): ✅ notified",
        "2. User (id 2): ⏳ rate limited",
        "3. User (id 3): ❔ not attempted",
        "",
        "Contact the winners who could not be notified manually.",
      ].join("\n"),
    );
  });

  it("summarizes a mailing", () => {
    const stats = {
      ...createDeliveryStats(1000),
      totalSent: 10,
      successful: 8,
      failed: 2,
      blocked: 1,
      otherErrors: 1,
      finishedAt: 6400,
    };
    assert.strictEqual(
      buildMailingReport(4, stats, false, "en"),
      "📨 Mailing #4 finished\nSent: 10, successful: 8, blocked: 1, rate limited: 0, errors: 1\nDuration: 5 sec.",
    );
  });
});

describe("buildHelpMessage", () => {
  it("shows admin commands to admins only", () => {
    assert.strictEqual(buildHelpMessage("ru", false), "Бот розыгрышей.\n\nКоманды:\n/help\n/whoami");
    const adminHelp = buildHelpMessage("en", true).split("\n");
    assert.strictEqual(adminHelp[6], "Admin commands:");
    assert.ok(adminHelp.includes("/finish id"));
    assert.ok(adminHelp.includes("/edit id title|description|message | text"));
    assert.ok(adminHelp.includes("/removechannel chat_id"));
    assert.ok(adminHelp.includes("/addadmin user_id"));
    assert.ok(adminHelp.includes("/mailing chat_id all|active_30d | text"));
  });
});
