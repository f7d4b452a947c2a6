import { describe, it } from "node:test";
import assert from "node:assert";

import { Telegram, TelegramError } from "telegraf";

import { classifyTelegramError, TelegrafMessenger, toInlineMarkup } from "./telegraf-messenger";

describe("classifyTelegramError", () => {
  it("treats 403 as blocked", () => {
    const error = new TelegramError({ error_code: 403, description: "Forbidden: bot was blocked by the user" });
    assert.deepStrictEqual(classifyTelegramError(error), {
      kind: "blocked",
      reason: "Forbidden: bot was blocked by the user",
    });
  });

  it("reads retry_after from 429 responses", () => {
    const error = new TelegramError({
      error_code: 429,
      description: "Too Many Requests: retry after 12",
      parameters: { retry_after: 12 },
    });
    assert.deepStrictEqual(classifyTelegramError(error), { kind: "rate_limited", retryAfterSeconds: 12 });
  });

  it("reports other api errors with their code", () => {
    const error = new TelegramError({ error_code: 400, description: "Bad Request: chat not found" });
    assert.deepStrictEqual(classifyTelegramError(error), {
      kind: "failed",
      reason: "400: Bad Request: chat not found",
    });
  });

  it("reports transport errors by message", () => {
    assert.deepStrictEqual(classifyTelegramError(new Error("ETIMEDOUT")), { kind: "failed", reason: "ETIMEDOUT" });
  });
});

describe("toInlineMarkup", () => {
  it("turns keyboard rows into callback buttons", () => {
    const markup = toInlineMarkup([
      [{ text: "🎁 Участвовать (3)", callbackData: "join:5" }],
      [{ text: "Rules", callbackData: "rules" }],
    ]);
    assert.strictEqual(markup.inline_keyboard.length, 2);
    const button = markup.inline_keyboard[0]?.[0];
    assert.strictEqual(button?.text, "🎁 Участвовать (3)");
    assert.strictEqual(button && "callback_data" in button ? button.callback_data : undefined, "join:5");
  });
});

describe("TelegrafMessenger.editMessage", () => {
  it("edits the text and keyboard of a posted message", async () => {
    const telegram = new Telegram("test-token");
    const calls: Array<Record<string, unknown>> = [];
    telegram.editMessageText = async (chatId, messageId, inlineMessageId, text, extra) => {
      calls.push({
        chatId,
        messageId,
        inlineMessageId,
        text,
        parseMode: extra?.parse_mode,
        rows: extra?.reply_markup?.inline_keyboard.length,
      });
      return true;
    };

    await new TelegrafMessenger(telegram).editMessage(-1001, 55, "<b>Updated</b>", {
      html: true,
      keyboard: [[{ text: "🎁 Участвовать (2)", callbackData: "join:5" }]],
    });

    assert.deepStrictEqual(calls, [
      { chatId: -1001, messageId: 55, inlineMessageId: undefined, text: "<b>Updated</b>", parseMode: "HTML", rows: 1 },
    ]);
  });

  it("sends plain text without markup options", async () => {
    const telegram = new Telegram("test-token");
    const extras: unknown[] = [];
    telegram.editMessageText = async (_chatId, _messageId, _inlineMessageId, _text, extra) => {
      extras.push(extra);
      return true;
    };

    await new TelegrafMessenger(telegram).editMessage(-1001, 55, "Plain");

    assert.deepStrictEqual(extras, [{}]);
  });
});
