import { Api, TelegramClient, errors } from "telegram";
import { StringSession } from "telegram/sessions";

import type { UserAccountConfig } from "./config";
import type { Logger } from "./logger";
import { normalizeError } from "./logger";
import type { DirectMessenger, DirectSendOutcome } from "./messaging";
import type { ChannelMember, ChannelMemberSource } from "./subscribers";
import type { SendFailure } from "./telegraf-messenger";

const BLOCKED_RPC_ERRORS: ReadonlySet<string> = new Set([
  "USER_IS_BLOCKED",
  "INPUT_USER_DEACTIVATED",
  "USER_PRIVACY_RESTRICTED",
  "YOU_BLOCKED_USER",
  "PEER_ID_INVALID",
]);

export function classifyRpcErrorMessage(errorMessage: string): SendFailure {
  if (BLOCKED_RPC_ERRORS.has(errorMessage) || errorMessage.startsWith("USER_DEACTIVATED")) {
    return { kind: "blocked", reason: errorMessage };
  }
  if (errorMessage === "PEER_FLOOD") {
    return { kind: "rate_limited", retryAfterSeconds: 0 };
  }
  const floodWait = /^FLOOD_WAIT_(\d+)$/.exec(errorMessage);
  if (floodWait?.[1]) {
    return { kind: "rate_limited", retryAfterSeconds: Number(floodWait[1]) };
  }
  return { kind: "failed", reason: errorMessage };
}

export function classifyUserClientError(error: unknown): SendFailure {
  if (error instanceof errors.FloodWaitError) {
    return { kind: "rate_limited", retryAfterSeconds: error.seconds };
  }
  if (error instanceof errors.RPCError) {
    return classifyRpcErrorMessage(error.errorMessage);
  }
  return { kind: "failed", reason: normalizeError(error).message };
}

export type RawAccountUser = {
  id: { toString(): string };
  bot?: boolean | undefined;
  deleted?: boolean | undefined;
  username?: string | undefined;
  firstName?: string | undefined;
  lastName?: string | undefined;
};

export function toChannelMember(user: RawAccountUser): ChannelMember {
  const fullName = [user.firstName, user.lastName].filter(Boolean).join(" ");
  return {
    userId: Number(user.id.toString()),
    isBot: Boolean(user.bot),
    isDeleted: Boolean(user.deleted),
    ...(user.username ? { username: user.username } : {}),
    ...(user.firstName ? { firstName: user.firstName } : {}),
    ...(fullName ? { fullName } : {}),
  };
}

/** MTProto user account: reads channel member lists and sends direct messages. */
export class UserAccountClient implements DirectMessenger, ChannelMemberSource {
  private readonly client: TelegramClient;
  private connected = false;

  constructor(
    config: UserAccountConfig,
    private readonly logger: Logger,
  ) {
    this.client = new TelegramClient(new StringSession(config.session), config.apiId, config.apiHash, {
      connectionRetries: 5,
      floodSleepThreshold: 120,
    });
  }

  async connect(): Promise<void> {
    if (this.connected) {
      return;
    }
    await this.client.connect();
    if (!(await this.client.checkAuthorization())) {
      throw new Error("User account session is not authorized; regenerate USER_SESSION.");
    }
    this.connected = true;
    this.logger.info("user_client_connected");
  }

  async disconnect(): Promise<void> {
    if (!this.connected) {
      return;
    }
    this.connected = false;
    await this.client.destroy();
    this.logger.info("user_client_disconnected");
  }

  async sendDirect(userId: number, text: string): Promise<DirectSendOutcome> {
    try {
      await this.connect();
      await this.client.sendMessage(userId, { message: text });
      return { kind: "sent" };
    } catch (error) {
      return classifyUserClientError(error);
    }
  }

  async *listMembers(channelId: number): AsyncGenerator<ChannelMember> {
    await this.connect();
    for await (const participant of this.client.iterParticipants(channelId)) {
      if (participant instanceof Api.User) {
        yield toChannelMember(participant);
      }
    }
  }
}
