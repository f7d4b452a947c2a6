export type ChatMemberStatus = "creator" | "administrator" | "member" | "restricted" | "left" | "kicked";

export type InlineButton = {
  text: string;
  callbackData: string;
};

export type InlineKeyboard = InlineButton[][];

export type SendMessageOptions = {
  html?: boolean;
  replyToMessageId?: number;
  keyboard?: InlineKeyboard;
};

export type SentMessage = {
  messageId: number;
};

/** Bot-side messaging: channel posts, admin reports, membership lookups. */
export interface ChatMessenger {
  sendMessage(chatId: number, text: string, options?: SendMessageOptions): Promise<SentMessage>;
  editMessage(chatId: number, messageId: number, text: string, options?: SendMessageOptions): Promise<void>;
  getChatMemberStatus(chatId: number, userId: number): Promise<ChatMemberStatus>;
}

export type DirectSendOutcome =
  | { kind: "sent" }
  | { kind: "blocked"; reason: string }
  | { kind: "rate_limited"; retryAfterSeconds: number }
  | { kind: "failed"; reason: string };

/**
 * Direct message to a single user. Implementations classify transport errors
 * into a `DirectSendOutcome` and only throw on programming errors.
 */
export interface DirectMessenger {
  sendDirect(userId: number, text: string): Promise<DirectSendOutcome>;
}
