import fs from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";

import type {
  BotAdmin,
  Channel,
  ChannelSubscriber,
  Giveaway,
  GiveawayChanges,
  GiveawayStatus,
  Mailing,
  MailingAudience,
  MailingStatus,
  NewGiveaway,
  Participant,
  UserProfile,
  Winner,
  WinnerDraft,
} from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS admins (
    user_id INTEGER PRIMARY KEY,
    username TEXT,
    first_name TEXT,
    full_name TEXT,
    added_by INTEGER,
    added_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS channels (
    channel_id INTEGER PRIMARY KEY,
    title TEXT NOT NULL,
    username TEXT,
    added_by INTEGER,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS giveaways (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    description TEXT NOT NULL,
    winner_message TEXT,
    channel_id INTEGER NOT NULL,
    message_id INTEGER,
    starts_at TEXT NOT NULL,
    ends_at TEXT NOT NULL,
    winner_places INTEGER NOT NULL CHECK (winner_places >= 1),
    status TEXT NOT NULL DEFAULT 'active',
    created_by INTEGER NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    finished_at TEXT,
    draw_seed TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_giveaways_status ON giveaways (status);

  CREATE TABLE IF NOT EXISTS participants (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    giveaway_id INTEGER NOT NULL,
    user_id INTEGER NOT NULL,
    username TEXT,
    first_name TEXT,
    full_name TEXT,
    joined_at TEXT NOT NULL,
    UNIQUE (giveaway_id, user_id)
  );

  CREATE TABLE IF NOT EXISTS winners (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    giveaway_id INTEGER NOT NULL,
    user_id INTEGER NOT NULL,
    username TEXT,
    first_name TEXT,
    full_name TEXT,
    place INTEGER NOT NULL,
    won_at TEXT NOT NULL,
    UNIQUE (giveaway_id, place)
  );

  CREATE TABLE IF NOT EXISTS channel_subscribers (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    channel_id INTEGER NOT NULL,
    user_id INTEGER NOT NULL,
    username TEXT,
    first_name TEXT,
    full_name TEXT,
    added_at TEXT NOT NULL,
    left_at TEXT,
    last_activity_at TEXT,
    UNIQUE (channel_id, user_id)
  );

  CREATE TABLE IF NOT EXISTS mailings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    channel_id INTEGER NOT NULL,
    admin_id INTEGER NOT NULL,
    audience TEXT NOT NULL,
    message_text TEXT NOT NULL,
    total_users INTEGER NOT NULL,
    sent_count INTEGER NOT NULL DEFAULT 0,
    failed_count INTEGER NOT NULL DEFAULT 0,
    blocked_count INTEGER NOT NULL DEFAULT 0,
    status TEXT NOT NULL DEFAULT 'pending',
    created_at TEXT NOT NULL,
    finished_at TEXT
  );
`;

type ChannelRow = {
  channel_id: number;
  title: string;
  username: string | null;
  added_by: number | null;
  created_at: string;
};

type GiveawayRow = {
  id: number;
  title: string;
  description: string;
  winner_message: string | null;
  channel_id: number;
  message_id: number | null;
  starts_at: string;
  ends_at: string;
  winner_places: number;
  status: GiveawayStatus;
  created_by: number;
  created_at: string;
  finished_at: string | null;
  draw_seed: string | null;
};

type ProfileRow = {
  user_id: number;
  username: string | null;
  first_name: string | null;
  full_name: string | null;
};

type AdminRow = ProfileRow & { added_by: number | null; added_at: string };
type ParticipantRow = ProfileRow & { giveaway_id: number; joined_at: string };
type WinnerRow = ProfileRow & { giveaway_id: number; place: number; won_at: string };
type SubscriberRow = ProfileRow & {
  channel_id: number;
  added_at: string;
  left_at: string | null;
  last_activity_at: string | null;
};

type MailingRow = {
  id: number;
  channel_id: number;
  admin_id: number;
  audience: MailingAudience;
  message_text: string;
  total_users: number;
  sent_count: number;
  failed_count: number;
  blocked_count: number;
  status: MailingStatus;
  created_at: string;
  finished_at: string | null;
};

function toProfile(row: ProfileRow): UserProfile {
  return {
    userId: row.user_id,
    ...(row.username ? { username: row.username } : {}),
    ...(row.first_name ? { firstName: row.first_name } : {}),
    ...(row.full_name ? { fullName: row.full_name } : {}),
  };
}

function toChannel(row: ChannelRow): Channel {
  return {
    channelId: row.channel_id,
    title: row.title,
    createdAt: row.created_at,
    ...(row.username ? { username: row.username } : {}),
    ...(row.added_by !== null ? { addedBy: row.added_by } : {}),
  };
}

function toGiveaway(row: GiveawayRow): Giveaway {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    channelId: row.channel_id,
    startsAt: row.starts_at,
    endsAt: row.ends_at,
    winnerPlaces: row.winner_places,
    status: row.status,
    createdBy: row.created_by,
    createdAt: row.created_at,
    ...(row.winner_message ? { winnerMessage: row.winner_message } : {}),
    ...(row.message_id !== null ? { messageId: row.message_id } : {}),
    ...(row.finished_at ? { finishedAt: row.finished_at } : {}),
    ...(row.draw_seed ? { drawSeed: row.draw_seed } : {}),
  };
}

function toMailing(row: MailingRow): Mailing {
  return {
    id: row.id,
    channelId: row.channel_id,
    adminId: row.admin_id,
    audience: row.audience,
    messageText: row.message_text,
    totalUsers: row.total_users,
    sentCount: row.sent_count,
    failedCount: row.failed_count,
    blockedCount: row.blocked_count,
    status: row.status,
    createdAt: row.created_at,
    ...(row.finished_at ? { finishedAt: row.finished_at } : {}),
  };
}

export type UpsertResult = { added: number; updated: number };

export type MailingProgress = {
  sentCount: number;
  failedCount: number;
  blockedCount: number;
};

export class GiveawayRepository {
  private readonly db: Database.Database;

  /** `":memory:"` keeps everything in process. */
  constructor(storagePath: string) {
    if (storagePath !== ":memory:") {
      fs.mkdirSync(path.dirname(storagePath), { recursive: true });
    }
    this.db = new Database(storagePath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA);
  }

  close(): void {
    this.db.close();
  }

  // Admins added at runtime; the ones from the environment never land here.

  addAdmin(admin: UserProfile, addedBy?: number, now: Date = new Date()): boolean {
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO admins (user_id, username, first_name, full_name, added_by, added_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(
        admin.userId,
        admin.username ?? null,
        admin.firstName ?? null,
        admin.fullName ?? null,
        addedBy ?? null,
        now.toISOString(),
      );
    return result.changes > 0;
  }

  removeAdmin(userId: number): boolean {
    return this.db.prepare("DELETE FROM admins WHERE user_id = ?").run(userId).changes > 0;
  }

  isAdmin(userId: number): boolean {
    return this.db.prepare("SELECT 1 FROM admins WHERE user_id = ?").get(userId) !== undefined;
  }

  listAdmins(): BotAdmin[] {
    return this.db
      .prepare<unknown[], AdminRow>("SELECT * FROM admins ORDER BY added_at ASC, user_id ASC")
      .all()
      .map((row) => ({
        ...toProfile(row),
        addedAt: row.added_at,
        ...(row.added_by !== null ? { addedBy: row.added_by } : {}),
      }));
  }

  // Channels

  addChannel(channel: { channelId: number; title: string; username?: string; addedBy?: number }): boolean {
    const result = this.db
      .prepare(
        `INSERT INTO channels (channel_id, title, username, added_by, created_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT (channel_id) DO UPDATE SET title = excluded.title, username = excluded.username`,
      )
      .run(channel.channelId, channel.title, channel.username ?? null, channel.addedBy ?? null, new Date().toISOString());
    return result.changes > 0;
  }

  getChannel(channelId: number): Channel | undefined {
    const row = this.db.prepare<unknown[], ChannelRow>("SELECT * FROM channels WHERE channel_id = ?").get(channelId);
    return row ? toChannel(row) : undefined;
  }

  listChannels(): Channel[] {
    return this.db
      .prepare<unknown[], ChannelRow>("SELECT * FROM channels ORDER BY created_at ASC")
      .all()
      .map(toChannel);
  }

  removeChannel(channelId: number): boolean {
    return this.db.prepare("DELETE FROM channels WHERE channel_id = ?").run(channelId).changes > 0;
  }

  // Giveaways

  createGiveaway(input: NewGiveaway, now: Date = new Date()): Giveaway {
    const nowIso = now.toISOString();
    const result = this.db
      .prepare(
        `INSERT INTO giveaways
           (title, description, winner_message, channel_id, starts_at, ends_at, winner_places,
            status, created_by, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, 'active', ?, ?, ?)`,
      )
      .run(
        input.title,
        input.description,
        input.winnerMessage ?? null,
        input.channelId,
        nowIso,
        input.endsAt,
        input.winnerPlaces,
        input.createdBy,
        nowIso,
        nowIso,
      );
    const created = this.getGiveaway(Number(result.lastInsertRowid));
    if (!created) {
      throw new Error("Giveaway insert did not persist.");
    }
    return created;
  }

  getGiveaway(giveawayId: number): Giveaway | undefined {
    const row = this.db.prepare<unknown[], GiveawayRow>("SELECT * FROM giveaways WHERE id = ?").get(giveawayId);
    return row ? toGiveaway(row) : undefined;
  }

  listGiveaways(status?: GiveawayStatus): Giveaway[] {
    const rows = status
      ? this.db
          .prepare<unknown[], GiveawayRow>("SELECT * FROM giveaways WHERE status = ? ORDER BY ends_at ASC")
          .all(status)
      : this.db.prepare<unknown[], GiveawayRow>("SELECT * FROM giveaways ORDER BY ends_at ASC").all();
    return rows.map(toGiveaway);
  }

  getActiveGiveaways(): Giveaway[] {
    return this.listGiveaways("active");
  }

  setGiveawayMessageId(giveawayId: number, messageId: number): void {
    this.db
      .prepare("UPDATE giveaways SET message_id = ?, updated_at = ? WHERE id = ?")
      .run(messageId, new Date().toISOString(), giveawayId);
  }

  /** Applies the given fields to an active giveaway; undefined when nothing was updated. */
  updateGiveaway(giveawayId: number, changes: GiveawayChanges, now: Date = new Date()): Giveaway | undefined {
    const result = this.db
      .prepare(
        `UPDATE giveaways SET
           title = COALESCE(?, title),
           description = COALESCE(?, description),
           winner_message = COALESCE(?, winner_message),
           ends_at = COALESCE(?, ends_at),
           updated_at = ?
         WHERE id = ? AND status = 'active'`,
      )
      .run(
        changes.title ?? null,
        changes.description ?? null,
        changes.winnerMessage ?? null,
        changes.endsAt ?? null,
        now.toISOString(),
        giveawayId,
      );
    return result.changes > 0 ? this.getGiveaway(giveawayId) : undefined;
  }

  countActiveGiveaways(channelId: number): number {
    const row = this.db
      .prepare<unknown[], { total: number }>(
        "SELECT COUNT(*) AS total FROM giveaways WHERE channel_id = ? AND status = 'active'",
      )
      .get(channelId);
    return row?.total ?? 0;
  }

  cancelGiveaway(giveawayId: number): boolean {
    const result = this.db
      .prepare("UPDATE giveaways SET status = 'cancelled', updated_at = ? WHERE id = ? AND status = 'active'")
      .run(new Date().toISOString(), giveawayId);
    return result.changes > 0;
  }

  deleteGiveaway(giveawayId: number): boolean {
    return this.db.transaction((id: number) => {
      this.db.prepare("DELETE FROM winners WHERE giveaway_id = ?").run(id);
      this.db.prepare("DELETE FROM participants WHERE giveaway_id = ?").run(id);
      return this.db.prepare("DELETE FROM giveaways WHERE id = ?").run(id).changes > 0;
    })(giveawayId);
  }

  /**
   * Marks the giveaway finished and stores its winners in one transaction.
   * Returns false, writing nothing, when the giveaway is no longer active.
   */
  finishGiveaway(giveawayId: number, winners: readonly WinnerDraft[], drawSeed?: string, now: Date = new Date()): boolean {
    const nowIso = now.toISOString();
    return this.db.transaction(() => {
      const updated = this.db
        .prepare(
          `UPDATE giveaways SET status = 'finished', finished_at = ?, updated_at = ?, draw_seed = ?
           WHERE id = ? AND status = 'active'`,
        )
        .run(nowIso, nowIso, drawSeed ?? null, giveawayId);
      if (updated.changes === 0) {
        return false;
      }
      const insert = this.db.prepare(
        `INSERT INTO winners (giveaway_id, user_id, username, first_name, full_name, place, won_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      );
      for (const winner of winners) {
        insert.run(
          giveawayId,
          winner.userId,
          winner.username ?? null,
          winner.firstName ?? null,
          winner.fullName ?? null,
          winner.place,
          nowIso,
        );
      }
      return true;
    })();
  }

  getWinners(giveawayId: number): Winner[] {
    return this.db
      .prepare<unknown[], WinnerRow>("SELECT * FROM winners WHERE giveaway_id = ? ORDER BY place ASC")
      .all(giveawayId)
      .map((row) => ({ ...toProfile(row), giveawayId: row.giveaway_id, place: row.place, wonAt: row.won_at }));
  }

  /** Purges finished giveaways that ended more than `days` ago, with their participants and winners. */
  deleteFinishedOlderThan(days: number, now: Date = new Date()): number {
    const cutoff = new Date(now.getTime() - days * DAY_MS).toISOString();
    return this.db.transaction(() => {
      const ids = this.db
        .prepare<unknown[], { id: number }>("SELECT id FROM giveaways WHERE status = 'finished' AND ends_at < ?")
        .all(cutoff)
        .map((row) => row.id);
      for (const id of ids) {
        this.db.prepare("DELETE FROM winners WHERE giveaway_id = ?").run(id);
        this.db.prepare("DELETE FROM participants WHERE giveaway_id = ?").run(id);
        this.db.prepare("DELETE FROM giveaways WHERE id = ?").run(id);
      }
      return ids.length;
    })();
  }

  // Participants

  addParticipant(giveawayId: number, user: UserProfile, now: Date = new Date()): boolean {
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO participants (giveaway_id, user_id, username, first_name, full_name, joined_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(giveawayId, user.userId, user.username ?? null, user.firstName ?? null, user.fullName ?? null, now.toISOString());
    return result.changes > 0;
  }

  getParticipants(giveawayId: number): Participant[] {
    return this.db
      .prepare<unknown[], ParticipantRow>("SELECT * FROM participants WHERE giveaway_id = ? ORDER BY id ASC")
      .all(giveawayId)
      .map((row) => ({ ...toProfile(row), giveawayId: row.giveaway_id, joinedAt: row.joined_at }));
  }

  getParticipantsCount(giveawayId: number): number {
    const row = this.db
      .prepare<unknown[], { total: number }>("SELECT COUNT(*) AS total FROM participants WHERE giveaway_id = ?")
      .get(giveawayId);
    return row?.total ?? 0;
  }

  // Channel subscribers

  /** New rows count as added; rows that had left and came back count as updated. */
  upsertChannelSubscribers(channelId: number, members: readonly UserProfile[], now: Date = new Date()): UpsertResult {
    const nowIso = now.toISOString();
    return this.db.transaction(() => {
      const find = this.db.prepare<unknown[], { left_at: string | null }>(
        "SELECT left_at FROM channel_subscribers WHERE channel_id = ? AND user_id = ?",
      );
      const insert = this.db.prepare(
        `INSERT INTO channel_subscribers (channel_id, user_id, username, first_name, full_name, added_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      );
      const rejoin = this.db.prepare(
        `UPDATE channel_subscribers SET left_at = NULL, username = ?, first_name = ?, full_name = ?, added_at = ?
         WHERE channel_id = ? AND user_id = ?`,
      );
      let added = 0;
      let updated = 0;
      for (const member of members) {
        const existing = find.get(channelId, member.userId);
        const names = [member.username ?? null, member.firstName ?? null, member.fullName ?? null];
        if (!existing) {
          insert.run(channelId, member.userId, ...names, nowIso);
          added += 1;
        } else if (existing.left_at !== null) {
          rejoin.run(...names, nowIso, channelId, member.userId);
          updated += 1;
        }
      }
      return { added, updated };
    })();
  }

  markSubscriberLeft(channelId: number, userId: number, now: Date = new Date()): boolean {
    const result = this.db
      .prepare("UPDATE channel_subscribers SET left_at = ? WHERE channel_id = ? AND user_id = ? AND left_at IS NULL")
      .run(now.toISOString(), channelId, userId);
    return result.changes > 0;
  }

  touchSubscriberActivity(channelId: number, user: UserProfile, now: Date = new Date()): void {
    const result = this.db
      .prepare(
        "UPDATE channel_subscribers SET last_activity_at = ? WHERE channel_id = ? AND user_id = ? AND left_at IS NULL",
      )
      .run(now.toISOString(), channelId, user.userId);
    if (result.changes === 0) {
      this.upsertChannelSubscribers(channelId, [user], now);
      this.db
        .prepare("UPDATE channel_subscribers SET last_activity_at = ? WHERE channel_id = ? AND user_id = ?")
        .run(now.toISOString(), channelId, user.userId);
    }
  }

  getChannelSubscribers(channelId: number): ChannelSubscriber[] {
    return this.db
      .prepare<unknown[], SubscriberRow>("SELECT * FROM channel_subscribers WHERE channel_id = ? ORDER BY id ASC")
      .all(channelId)
      .map((row) => ({
        ...toProfile(row),
        channelId: row.channel_id,
        addedAt: row.added_at,
        ...(row.left_at ? { leftAt: row.left_at } : {}),
        ...(row.last_activity_at ? { lastActivityAt: row.last_activity_at } : {}),
      }));
  }

  listSubscriberIds(channelId: number, options: { activeWithinDays?: number; now?: Date } = {}): number[] {
    if (options.activeWithinDays === undefined) {
      return this.db
        .prepare<unknown[], { user_id: number }>(
          "SELECT user_id FROM channel_subscribers WHERE channel_id = ? AND left_at IS NULL ORDER BY id ASC",
        )
        .all(channelId)
        .map((row) => row.user_id);
    }
    const now = options.now ?? new Date();
    const cutoff = new Date(now.getTime() - options.activeWithinDays * DAY_MS).toISOString();
    return this.db
      .prepare<unknown[], { user_id: number }>(
        `SELECT user_id FROM channel_subscribers
         WHERE channel_id = ? AND left_at IS NULL AND last_activity_at >= ? ORDER BY id ASC`,
      )
      .all(channelId, cutoff)
      .map((row) => row.user_id);
  }

  countChannelSubscribers(channelId: number): number {
    const row = this.db
      .prepare<unknown[], { total: number }>(
        "SELECT COUNT(*) AS total FROM channel_subscribers WHERE channel_id = ? AND left_at IS NULL",
      )
      .get(channelId);
    return row?.total ?? 0;
  }

  // Mailings

  createMailing(input: {
    channelId: number;
    adminId: number;
    audience: MailingAudience;
    messageText: string;
    totalUsers: number;
  }): Mailing {
    const result = this.db
      .prepare(
        `INSERT INTO mailings (channel_id, admin_id, audience, message_text, total_users, status, created_at)
         VALUES (?, ?, ?, ?, ?, 'sending', ?)`,
      )
      .run(input.channelId, input.adminId, input.audience, input.messageText, input.totalUsers, new Date().toISOString());
    const created = this.getMailing(Number(result.lastInsertRowid));
    if (!created) {
      throw new Error("Mailing insert did not persist.");
    }
    return created;
  }

  getMailing(mailingId: number): Mailing | undefined {
    const row = this.db.prepare<unknown[], MailingRow>("SELECT * FROM mailings WHERE id = ?").get(mailingId);
    return row ? toMailing(row) : undefined;
  }

  updateMailingProgress(mailingId: number, progress: MailingProgress): void {
    this.db
      .prepare("UPDATE mailings SET sent_count = ?, failed_count = ?, blocked_count = ? WHERE id = ?")
      .run(progress.sentCount, progress.failedCount, progress.blockedCount, mailingId);
  }

  completeMailing(mailingId: number, status: Extract<MailingStatus, "done" | "cancelled">, progress: MailingProgress): void {
    this.db
      .prepare(
        `UPDATE mailings SET status = ?, sent_count = ?, failed_count = ?, blocked_count = ?, finished_at = ?
         WHERE id = ?`,
      )
      .run(status, progress.sentCount, progress.failedCount, progress.blockedCount, new Date().toISOString(), mailingId);
  }

  /** Closes mailings left `sending` by a previous process; returns their ids. */
  cancelInterruptedMailings(now: Date = new Date()): number[] {
    return this.db.transaction(() => {
      const ids = this.db
        .prepare<unknown[], { id: number }>("SELECT id FROM mailings WHERE status = 'sending' ORDER BY id ASC")
        .all()
        .map((row) => row.id);
      this.db
        .prepare("UPDATE mailings SET status = 'cancelled', finished_at = ? WHERE status = 'sending'")
        .run(now.toISOString());
      return ids;
    })();
  }
}
