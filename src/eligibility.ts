import type { Logger } from "./logger";
import { normalizeError } from "./logger";
import type { ChatMemberStatus, ChatMessenger } from "./messaging";

const ELIGIBLE_STATUSES: ReadonlySet<ChatMemberStatus> = new Set(["creator", "administrator", "member"]);

export type ChatMemberLookup = Pick<ChatMessenger, "getChatMemberStatus">;

export class EligibilityChecker {
  constructor(
    private readonly members: ChatMemberLookup,
    private readonly logger: Logger,
  ) {}

  /** Live membership check; any lookup failure counts as not eligible. */
  async isEligible(userId: number, channelId: number): Promise<boolean> {
    try {
      const status = await this.members.getChatMemberStatus(channelId, userId);
      return ELIGIBLE_STATUSES.has(status);
    } catch (error) {
      this.logger.warn("eligibility_lookup_failed", { userId, channelId, ...normalizeError(error) });
      return false;
    }
  }

  async filterEligible<T extends { userId: number }>(candidates: readonly T[], channelId: number): Promise<T[]> {
    const eligible: T[] = [];
    for (const candidate of candidates) {
      if (await this.isEligible(candidate.userId, channelId)) {
        eligible.push(candidate);
      }
    }
    return eligible;
  }
}
