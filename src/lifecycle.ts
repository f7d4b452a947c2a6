import {
  buildAdminSummary,
  buildGiveawayPost,
  buildNoParticipantsAnnouncement,
  buildParticipateKeyboard,
  buildReminderPost,
  buildWinnerNotification,
  buildWinnersAnnouncement,
} from "./bot-ui";
import type { BulkDeliveryEngine, DeliveryReport } from "./delivery";
import { createDrawSeed, createSeededRandom, selectWinners } from "./draw";
import type { EligibilityChecker } from "./eligibility";
import type { SupportedLocale } from "./i18n";
import type { Clock, JobScheduler, SchedulerStatus } from "./job-scheduler";
import type { Logger } from "./logger";
import { normalizeError } from "./logger";
import type { ChatMessenger, SendMessageOptions } from "./messaging";
import { REMINDER_TIERS, ReminderRegistry, type ReminderState, type ReminderTierId } from "./reminders";
import type { GiveawayRepository } from "./repository";
import type { Giveaway, GiveawayChanges, Participant, WinnerDraft } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

export const CLEANUP_JOB_KEY = "cleanup_finished";

export function finishJobKey(giveawayId: number): string {
  return `finish_giveaway_${giveawayId}`;
}

export function reminderJobKey(giveawayId: number, tier: ReminderTierId): string {
  return `reminder_${tier}_${giveawayId}`;
}

export type GiveawayStore = Pick<
  GiveawayRepository,
  | "getActiveGiveaways"
  | "getGiveaway"
  | "getParticipants"
  | "getParticipantsCount"
  | "finishGiveaway"
  | "cancelGiveaway"
  | "deleteGiveaway"
  | "deleteFinishedOlderThan"
  | "getChannel"
  | "updateGiveaway"
  | "setGiveawayMessageId"
>;

export type FinishResult =
  | { status: "skipped"; reason: "not_found" | "not_active" | "in_progress" }
  | { status: "failed"; error: string }
  | { status: "no_participants"; participants: number }
  | {
      status: "finished";
      participants: number;
      eligible: number;
      winners: WinnerDraft[];
      delivery?: DeliveryReport;
    };

/** What happened to the channel post after an edit. */
export type PostRefresh = "unchanged" | "edited" | "republished" | "failed";

export type EditResult = { status: "updated"; giveaway: Giveaway; post: PostRefresh } | { status: "not_active" };

export type LifecycleDeps = {
  store: GiveawayStore;
  chat: ChatMessenger;
  eligibility: EligibilityChecker;
  delivery: BulkDeliveryEngine;
  jobs: JobScheduler;
  logger: Logger;
  locale: SupportedLocale;
  timeZone: string;
  retentionDays: number;
  catchUpOverdue: boolean;
  clock?: Clock;
  createSeed?: () => string;
  reminders?: ReminderRegistry;
};

function toDraft(participant: Participant, place: number): WinnerDraft {
  return {
    userId: participant.userId,
    place,
    ...(participant.username ? { username: participant.username } : {}),
    ...(participant.firstName ? { firstName: participant.firstName } : {}),
    ...(participant.fullName ? { fullName: participant.fullName } : {}),
  };
}

function replyTo(giveaway: Giveaway): SendMessageOptions {
  return { html: true, ...(giveaway.messageId !== undefined ? { replyToMessageId: giveaway.messageId } : {}) };
}

/**
 * Owns every timer job and the reminder flags of each giveaway. Other parts of
 * the bot go through these methods and never touch the jobs or flags directly.
 */
export class GiveawayLifecycleScheduler {
  private readonly store: GiveawayStore;
  private readonly chat: ChatMessenger;
  private readonly eligibility: EligibilityChecker;
  private readonly delivery: BulkDeliveryEngine;
  private readonly jobs: JobScheduler;
  private readonly logger: Logger;
  private readonly locale: SupportedLocale;
  private readonly timeZone: string;
  private readonly retentionDays: number;
  private readonly catchUpOverdue: boolean;
  private readonly clock: Clock;
  private readonly createSeed: () => string;
  private readonly reminders: ReminderRegistry;
  private readonly finishing = new Set<number>();

  constructor(deps: LifecycleDeps) {
    this.store = deps.store;
    this.chat = deps.chat;
    this.eligibility = deps.eligibility;
    this.delivery = deps.delivery;
    this.jobs = deps.jobs;
    this.logger = deps.logger;
    this.locale = deps.locale;
    this.timeZone = deps.timeZone;
    this.retentionDays = deps.retentionDays;
    this.catchUpOverdue = deps.catchUpOverdue;
    this.clock = deps.clock ?? Date.now;
    this.createSeed = deps.createSeed ?? createDrawSeed;
    this.reminders = deps.reminders ?? new ReminderRegistry();
  }

  /** Rebuilds jobs for every active giveaway and starts the daily cleanup. */
  start(): void {
    const active = this.store.getActiveGiveaways();
    let overdue = 0;
    for (const giveaway of active) {
      if (Date.parse(giveaway.endsAt) <= this.clock()) {
        overdue += 1;
      }
      this.scheduleGiveaway(giveaway);
    }
    this.jobs.scheduleRecurring(
      CLEANUP_JOB_KEY,
      DAY_MS,
      () => {
        this.cleanupFinished();
      },
      "Daily cleanup of finished giveaways",
    );
    this.logger.info("lifecycle_started", { active: active.length, overdue, catchUpOverdue: this.catchUpOverdue });
  }

  async stop(): Promise<void> {
    await this.jobs.stop();
  }

  scheduleGiveaway(giveaway: Giveaway): void {
    if (giveaway.status !== "active") {
      return;
    }
    const state = this.reminders.ensure(giveaway.id);
    const endsAt = Date.parse(giveaway.endsAt);
    const now = this.clock();

    if (endsAt <= now) {
      if (!this.catchUpOverdue) {
        this.logger.warn("giveaway_overdue_left_active", { giveawayId: giveaway.id, endsAt: giveaway.endsAt });
        return;
      }
      this.jobs.schedule(
        finishJobKey(giveaway.id),
        new Date(now),
        () => this.runFinishJob(giveaway.id),
        `Finish overdue giveaway #${giveaway.id}`,
      );
      this.logger.info("giveaway_overdue_catch_up", { giveawayId: giveaway.id, endsAt: giveaway.endsAt });
      return;
    }

    this.jobs.schedule(
      finishJobKey(giveaway.id),
      new Date(endsAt),
      () => this.runFinishJob(giveaway.id),
      `Finish giveaway #${giveaway.id}`,
    );
    if (state.enabled) {
      this.scheduleReminders(giveaway, state);
    }
    this.logger.info("giveaway_scheduled", { giveawayId: giveaway.id, endsAt: giveaway.endsAt });
  }

  /** After an end-time change: reminder tiers start over, the enabled flag survives. */
  rescheduleGiveaway(giveaway: Giveaway): void {
    const enabled = this.reminders.get(giveaway.id)?.enabled ?? true;
    this.unschedule(giveaway.id);
    this.reminders.setEnabled(giveaway.id, enabled);
    this.scheduleGiveaway(giveaway);
  }

  /**
   * Changes an active giveaway. A new end time moves the finish and reminder
   * jobs; any change the post shows is pushed to the channel.
   */
  async editGiveaway(giveawayId: number, changes: GiveawayChanges): Promise<EditResult> {
    const updated = this.store.updateGiveaway(giveawayId, changes, new Date(this.clock()));
    if (!updated) {
      return { status: "not_active" };
    }
    if (changes.endsAt !== undefined) {
      this.rescheduleGiveaway(updated);
    }
    const shownInPost = changes.title !== undefined || changes.description !== undefined || changes.endsAt !== undefined;
    const post = shownInPost ? await this.refreshPost(updated) : "unchanged";
    this.logger.info("giveaway_edited", { giveawayId, fields: Object.keys(changes), post });
    return { status: "updated", giveaway: this.store.getGiveaway(giveawayId) ?? updated, post };
  }

  /** Edits the channel post in place; posts it anew when the old one cannot be edited. */
  private async refreshPost(giveaway: Giveaway): Promise<Exclude<PostRefresh, "unchanged">> {
    const participants = this.store.getParticipantsCount(giveaway.id);
    const text = buildGiveawayPost(giveaway, this.locale, this.timeZone);
    const options: SendMessageOptions = {
      html: true,
      keyboard: buildParticipateKeyboard(giveaway.id, participants, this.locale),
    };
    if (giveaway.messageId !== undefined) {
      try {
        await this.chat.editMessage(giveaway.channelId, giveaway.messageId, text, options);
        return "edited";
      } catch (error) {
        this.logger.warn("giveaway_post_edit_failed", {
          giveawayId: giveaway.id,
          messageId: giveaway.messageId,
          ...normalizeError(error),
        });
      }
    }
    try {
      const sent = await this.chat.sendMessage(giveaway.channelId, text, options);
      this.store.setGiveawayMessageId(giveaway.id, sent.messageId);
      return "republished";
    } catch (error) {
      this.logger.error("giveaway_post_republish_failed", { giveawayId: giveaway.id, ...normalizeError(error) });
      return "failed";
    }
  }

  setRemindersEnabled(giveawayId: number, enabled: boolean): boolean {
    const giveaway = this.store.getGiveaway(giveawayId);
    if (!giveaway || giveaway.status !== "active") {
      return false;
    }
    this.reminders.setEnabled(giveawayId, enabled);
    if (enabled) {
      this.scheduleReminders(giveaway, this.reminders.ensure(giveawayId));
    } else {
      this.cancelReminderJobs(giveawayId);
    }
    this.logger.info("giveaway_reminders_toggled", { giveawayId, enabled });
    return true;
  }

  reminderState(giveawayId: number): ReminderState | undefined {
    return this.reminders.snapshot(giveawayId);
  }

  /** Posts one reminder tier; returns whether a post went out. */
  async sendReminder(giveawayId: number, tier: ReminderTierId): Promise<boolean> {
    const state = this.reminders.get(giveawayId);
    if (!state || !state.enabled || state.fired[tier]) {
      return false;
    }
    const giveaway = this.store.getGiveaway(giveawayId);
    if (!giveaway || giveaway.status !== "active") {
      return false;
    }
    const tierInfo = REMINDER_TIERS.find((entry) => entry.id === tier);
    if (!tierInfo) {
      return false;
    }

    const participants = this.store.getParticipantsCount(giveawayId);
    const text = buildReminderPost({
      giveaway,
      tier: tierInfo,
      participants,
      locale: this.locale,
      timeZone: this.timeZone,
    });
    try {
      await this.chat.sendMessage(giveaway.channelId, text, {
        html: true,
        keyboard: buildParticipateKeyboard(giveawayId, participants, this.locale),
      });
    } catch (error) {
      this.logger.warn("reminder_send_failed", { giveawayId, tier, ...normalizeError(error) });
      return false;
    }
    this.reminders.markFired(giveawayId, tier);
    this.logger.info("reminder_sent", { giveawayId, tier, participants });
    return true;
  }

  cancelGiveaway(giveawayId: number): boolean {
    this.unschedule(giveawayId);
    const cancelled = this.store.cancelGiveaway(giveawayId);
    this.logger.info("giveaway_cancelled", { giveawayId, cancelled });
    return cancelled;
  }

  deleteGiveaway(giveawayId: number): boolean {
    this.unschedule(giveawayId);
    const deleted = this.store.deleteGiveaway(giveawayId);
    this.logger.info("giveaway_deleted", { giveawayId, deleted });
    return deleted;
  }

  cleanupFinished(): number {
    const removed = this.store.deleteFinishedOlderThan(this.retentionDays, new Date(this.clock()));
    this.logger.info("finished_giveaways_cleaned", { removed, retentionDays: this.retentionDays });
    return removed;
  }

  status(): SchedulerStatus {
    return this.jobs.status();
  }

  async finishGiveaway(giveawayId: number): Promise<FinishResult> {
    if (this.finishing.has(giveawayId)) {
      return { status: "skipped", reason: "in_progress" };
    }
    this.finishing.add(giveawayId);
    try {
      return await this.runFinish(giveawayId);
    } finally {
      this.finishing.delete(giveawayId);
    }
  }

  private async runFinishJob(giveawayId: number): Promise<void> {
    const result = await this.finishGiveaway(giveawayId);
    if (result.status === "skipped") {
      this.logger.info("giveaway_finish_skipped", { giveawayId, reason: result.reason });
    }
  }

  private async runFinish(giveawayId: number): Promise<FinishResult> {
    const giveaway = this.store.getGiveaway(giveawayId);
    if (!giveaway) {
      return { status: "skipped", reason: "not_found" };
    }
    if (giveaway.status !== "active") {
      return { status: "skipped", reason: "not_active" };
    }

    const participants = this.store.getParticipants(giveawayId);
    const eligible = await this.eligibility.filterEligible(participants, giveaway.channelId);
    this.logger.info("giveaway_draw_pool", {
      giveawayId,
      participants: participants.length,
      eligible: eligible.length,
    });

    if (eligible.length === 0) {
      const persisted = this.persistFinish(giveawayId, []);
      if (persisted !== true) {
        return persisted;
      }
      this.unschedule(giveawayId);
      await this.announce(giveaway, buildNoParticipantsAnnouncement(this.locale));
      if (participants.length > 0) {
        await this.reportToAdmin(giveaway, participants.length, 0, [], undefined);
      }
      this.logger.info("giveaway_finished_without_winners", { giveawayId, participants: participants.length });
      return { status: "no_participants", participants: participants.length };
    }

    const seed = this.createSeed();
    const winners = selectWinners(eligible, giveaway.winnerPlaces, createSeededRandom(seed)).map(
      ({ participant, place }) => toDraft(participant, place),
    );
    const persisted = this.persistFinish(giveawayId, winners, seed);
    if (persisted !== true) {
      return persisted;
    }
    this.unschedule(giveawayId);

    await this.announce(giveaway, buildWinnersAnnouncement(winners, this.locale));
    const delivery = await this.notifyWinners(giveaway, winners);
    await this.reportToAdmin(giveaway, participants.length, eligible.length, winners, delivery);

    this.logger.info("giveaway_finished", {
      giveawayId,
      winners: winners.map((winner) => winner.userId),
      notified: delivery?.stats.successful ?? 0,
    });
    return {
      status: "finished",
      participants: participants.length,
      eligible: eligible.length,
      winners,
      ...(delivery ? { delivery } : {}),
    };
  }

  private persistFinish(
    giveawayId: number,
    winners: readonly WinnerDraft[],
    seed?: string,
  ): true | Extract<FinishResult, { status: "skipped" | "failed" }> {
    try {
      const applied = this.store.finishGiveaway(giveawayId, winners, seed, new Date(this.clock()));
      return applied ? true : { status: "skipped", reason: "not_active" };
    } catch (error) {
      const details = normalizeError(error);
      this.logger.error("giveaway_finish_persist_failed", { giveawayId, ...details });
      return { status: "failed", error: details.message };
    }
  }

  private async announce(giveaway: Giveaway, text: string): Promise<void> {
    try {
      await this.chat.sendMessage(giveaway.channelId, text, replyTo(giveaway));
    } catch (error) {
      this.logger.error("giveaway_announce_failed", { giveawayId: giveaway.id, ...normalizeError(error) });
    }
  }

  private async notifyWinners(giveaway: Giveaway, winners: readonly WinnerDraft[]): Promise<DeliveryReport | undefined> {
    const recipients = winners.map((winner) => ({
      userId: winner.userId,
      text: buildWinnerNotification(giveaway, winner, this.locale),
    }));
    try {
      return await this.delivery.sendBulk(recipients, "", { randomizeOrder: false });
    } catch (error) {
      this.logger.error("winner_notification_failed", { giveawayId: giveaway.id, ...normalizeError(error) });
      return undefined;
    }
  }

  private async reportToAdmin(
    giveaway: Giveaway,
    participants: number,
    eligible: number,
    winners: readonly WinnerDraft[],
    delivery: DeliveryReport | undefined,
  ): Promise<void> {
    const adminId = this.store.getChannel(giveaway.channelId)?.addedBy ?? giveaway.createdBy;
    const text = buildAdminSummary({
      giveaway,
      participants,
      eligible,
      winners,
      results: delivery?.results ?? [],
      locale: this.locale,
    });
    try {
      await this.chat.sendMessage(adminId, text);
    } catch (error) {
      this.logger.warn("admin_summary_failed", { giveawayId: giveaway.id, adminId, ...normalizeError(error) });
    }
  }

  private scheduleReminders(giveaway: Giveaway, state: ReminderState): void {
    const endsAt = Date.parse(giveaway.endsAt);
    const now = this.clock();
    for (const tier of REMINDER_TIERS) {
      const fireAt = endsAt - tier.offsetMs;
      if (fireAt <= now || state.fired[tier.id]) {
        continue;
      }
      this.jobs.schedule(
        reminderJobKey(giveaway.id, tier.id),
        new Date(fireAt),
        async () => {
          await this.sendReminder(giveaway.id, tier.id);
        },
        `Reminder ${tier.id} for giveaway #${giveaway.id}`,
      );
    }
  }

  private cancelReminderJobs(giveawayId: number): void {
    for (const tier of REMINDER_TIERS) {
      this.jobs.cancel(reminderJobKey(giveawayId, tier.id));
    }
  }

  private unschedule(giveawayId: number): void {
    this.jobs.cancel(finishJobKey(giveawayId));
    this.cancelReminderJobs(giveawayId);
    this.reminders.delete(giveawayId);
  }
}
