export type GiveawayStatus = "active" | "finished" | "cancelled";

export interface Channel {
  channelId: number;
  title: string;
  username?: string;
  addedBy?: number;
  createdAt: string;
}

export interface Giveaway {
  id: number;
  title: string;
  description: string;
  winnerMessage?: string;
  channelId: number;
  messageId?: number;
  startsAt: string;
  endsAt: string;
  winnerPlaces: number;
  status: GiveawayStatus;
  createdBy: number;
  createdAt: string;
  finishedAt?: string;
  drawSeed?: string;
}

export type NewGiveaway = Pick<
  Giveaway,
  "title" | "description" | "channelId" | "endsAt" | "winnerPlaces" | "createdBy"
> & { winnerMessage?: string };

/** Fields an admin may change while the giveaway is active. */
export type GiveawayChanges = Partial<Pick<Giveaway, "title" | "description" | "winnerMessage" | "endsAt">>;

export interface UserProfile {
  userId: number;
  username?: string;
  firstName?: string;
  fullName?: string;
}

export interface Participant extends UserProfile {
  giveawayId: number;
  joinedAt: string;
}

export interface Winner extends UserProfile {
  giveawayId: number;
  place: number;
  wonAt: string;
}

export type WinnerDraft = UserProfile & { place: number };

export interface BotAdmin extends UserProfile {
  addedBy?: number;
  addedAt: string;
}

export interface ChannelSubscriber extends UserProfile {
  channelId: number;
  addedAt: string;
  leftAt?: string;
  lastActivityAt?: string;
}

export type MailingAudience = "all" | "active_30d";
export type MailingStatus = "pending" | "sending" | "done" | "cancelled";

export interface Mailing {
  id: number;
  channelId: number;
  adminId: number;
  audience: MailingAudience;
  messageText: string;
  totalUsers: number;
  sentCount: number;
  failedCount: number;
  blockedCount: number;
  status: MailingStatus;
  createdAt: string;
  finishedAt?: string;
}
