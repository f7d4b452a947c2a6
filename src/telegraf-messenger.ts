import { Markup, TelegramError, type Telegram } from "telegraf";
import type { InlineKeyboardMarkup } from "telegraf/types";

import { normalizeError } from "./logger";
import type {
  ChatMemberStatus,
  ChatMessenger,
  DirectMessenger,
  DirectSendOutcome,
  InlineKeyboard,
  SendMessageOptions,
  SentMessage,
} from "./messaging";

export type SendFailure = Exclude<DirectSendOutcome, { kind: "sent" }>;

/** Bot API errors: 403 is permanent for the recipient, 429 carries `retry_after`. */
export function classifyTelegramError(error: unknown): SendFailure {
  if (error instanceof TelegramError) {
    if (error.code === 403) {
      return { kind: "blocked", reason: error.description };
    }
    if (error.code === 429) {
      return { kind: "rate_limited", retryAfterSeconds: error.response.parameters?.retry_after ?? 0 };
    }
    return { kind: "failed", reason: `${error.code}: ${error.description}` };
  }
  return { kind: "failed", reason: normalizeError(error).message };
}

export function toInlineMarkup(keyboard: InlineKeyboard): InlineKeyboardMarkup {
  return Markup.inlineKeyboard(
    keyboard.map((row) => row.map((button) => Markup.button.callback(button.text, button.callbackData))),
  ).reply_markup;
}

export class TelegrafMessenger implements ChatMessenger, DirectMessenger {
  constructor(private readonly telegram: Telegram) {}

  async sendMessage(chatId: number, text: string, options: SendMessageOptions = {}): Promise<SentMessage> {
    const message = await this.telegram.sendMessage(chatId, text, {
      ...(options.html ? { parse_mode: "HTML" as const } : {}),
      ...(options.replyToMessageId !== undefined
        ? { reply_parameters: { message_id: options.replyToMessageId, allow_sending_without_reply: true } }
        : {}),
      ...(options.keyboard ? { reply_markup: toInlineMarkup(options.keyboard) } : {}),
    });
    return { messageId: message.message_id };
  }

  async editMessage(chatId: number, messageId: number, text: string, options: SendMessageOptions = {}): Promise<void> {
    await this.telegram.editMessageText(chatId, messageId, undefined, text, {
      ...(options.html ? { parse_mode: "HTML" as const } : {}),
      ...(options.keyboard ? { reply_markup: toInlineMarkup(options.keyboard) } : {}),
    });
  }

  async getChatMemberStatus(chatId: number, userId: number): Promise<ChatMemberStatus> {
    const member = await this.telegram.getChatMember(chatId, userId);
    return member.status;
  }

  async sendDirect(userId: number, text: string): Promise<DirectSendOutcome> {
    try {
      await this.telegram.sendMessage(userId, text);
      return { kind: "sent" };
    } catch (error) {
      return classifyTelegramError(error);
    }
  }
}
