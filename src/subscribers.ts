import type { Logger } from "./logger";
import type { GiveawayRepository, UpsertResult } from "./repository";
import type { UserProfile } from "./types";

export type ChannelMember = UserProfile & {
  isBot: boolean;
  isDeleted: boolean;
};

export interface ChannelMemberSource {
  listMembers(channelId: number): AsyncIterable<ChannelMember>;
}

export type SubscriberStore = Pick<GiveawayRepository, "upsertChannelSubscribers">;

export type ParseReport = UpsertResult & {
  fetched: number;
  skipped: number;
};

function toProfile(member: ChannelMember): UserProfile {
  return {
    userId: member.userId,
    ...(member.username ? { username: member.username } : {}),
    ...(member.firstName ? { firstName: member.firstName } : {}),
    ...(member.fullName ? { fullName: member.fullName } : {}),
  };
}

export class SubscriberParser {
  constructor(
    private readonly source: ChannelMemberSource,
    private readonly store: SubscriberStore,
    private readonly logger: Logger,
    private readonly batchSize = 200,
  ) {}

  /** Pulls the member list and upserts it; bots and deleted accounts are skipped. */
  async parseChannel(channelId: number): Promise<ParseReport> {
    const report: ParseReport = { fetched: 0, skipped: 0, added: 0, updated: 0 };
    let batch: UserProfile[] = [];

    const flush = (): void => {
      if (batch.length === 0) {
        return;
      }
      const result = this.store.upsertChannelSubscribers(channelId, batch);
      report.added += result.added;
      report.updated += result.updated;
      batch = [];
    };

    this.logger.info("subscriber_parse_started", { channelId });
    for await (const member of this.source.listMembers(channelId)) {
      report.fetched += 1;
      if (member.isBot || member.isDeleted) {
        report.skipped += 1;
        continue;
      }
      batch.push(toProfile(member));
      if (batch.length >= this.batchSize) {
        flush();
      }
    }
    flush();

    this.logger.info("subscriber_parse_finished", { channelId, ...report });
    return report;
  }
}
