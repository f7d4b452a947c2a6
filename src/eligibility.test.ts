import { describe, it } from "node:test";
import assert from "node:assert";

import { EligibilityChecker } from "./eligibility";
import { FakeChatMessenger, MemoryLogger } from "./test-support";

const CHANNEL_ID = -1001;

describe("EligibilityChecker", () => {
  it("accepts members, administrators and the creator", async () => {
    const chat = new FakeChatMessenger();
    chat.setMember(CHANNEL_ID, 1, "member");
    chat.setMember(CHANNEL_ID, 2, "administrator");
    chat.setMember(CHANNEL_ID, 3, "creator");
    const checker = new EligibilityChecker(chat, new MemoryLogger());

    assert.strictEqual(await checker.isEligible(1, CHANNEL_ID), true);
    assert.strictEqual(await checker.isEligible(2, CHANNEL_ID), true);
    assert.strictEqual(await checker.isEligible(3, CHANNEL_ID), true);
  });

  it("rejects users who left, were kicked or are restricted", async () => {
    const chat = new FakeChatMessenger();
    chat.setMember(CHANNEL_ID, 1, "left");
    chat.setMember(CHANNEL_ID, 2, "kicked");
    chat.setMember(CHANNEL_ID, 3, "restricted");
    const checker = new EligibilityChecker(chat, new MemoryLogger());

    assert.strictEqual(await checker.isEligible(1, CHANNEL_ID), false);
    assert.strictEqual(await checker.isEligible(2, CHANNEL_ID), false);
    assert.strictEqual(await checker.isEligible(3, CHANNEL_ID), false);
  });

  it("fails closed when the lookup throws", async () => {
    const chat = new FakeChatMessenger();
    chat.setMember(CHANNEL_ID, 1, new Error("400: user not found"));
    const logger = new MemoryLogger();
    const checker = new EligibilityChecker(chat, logger);

    assert.strictEqual(await checker.isEligible(1, CHANNEL_ID), false);
    const [entry] = logger.entries;
    assert.strictEqual(logger.entries.length, 1);
    assert.strictEqual(entry?.level, "warn");
    assert.strictEqual(entry?.event, "eligibility_lookup_failed");
    assert.strictEqual(entry?.payload?.userId, 1);
    assert.strictEqual(entry?.payload?.channelId, CHANNEL_ID);
    assert.strictEqual(entry?.payload?.message, "400: user not found");
  });

  it("filters a pool in order, skipping failed lookups", async () => {
    const chat = new FakeChatMessenger();
    chat.setMember(CHANNEL_ID, 1, "member");
    chat.setMember(CHANNEL_ID, 2, new Error("network down"));
    chat.setMember(CHANNEL_ID, 3, "left");
    chat.setMember(CHANNEL_ID, 4, "administrator");
    const checker = new EligibilityChecker(chat, new MemoryLogger());

    const eligible = await checker.filterEligible(
      [{ userId: 1 }, { userId: 2 }, { userId: 3 }, { userId: 4 }, { userId: 5 }],
      CHANNEL_ID,
    );
    assert.deepStrictEqual(eligible, [{ userId: 1 }, { userId: 4 }]);
  });
});
