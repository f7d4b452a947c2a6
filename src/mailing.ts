import { buildMailingReport } from "./bot-ui";
import type { BulkDeliveryEngine, DeliveryStats } from "./delivery";
import type { SupportedLocale } from "./i18n";
import type { Logger } from "./logger";
import { normalizeError } from "./logger";
import type { ChatMessenger } from "./messaging";
import type { GiveawayRepository, MailingProgress } from "./repository";
import type { MailingAudience } from "./types";

const ACTIVE_AUDIENCE_DAYS = 30;

export type MailingStore = Pick<
  GiveawayRepository,
  "listSubscriberIds" | "createMailing" | "updateMailingProgress" | "completeMailing" | "cancelInterruptedMailings"
>;

export type MailingRequest = {
  channelId: number;
  adminId: number;
  audience: MailingAudience;
  text: string;
};

export type MailingStartResult =
  | { status: "started"; mailingId: number; total: number; estimateMs: number }
  | { status: "no_recipients" };

export type MailingServiceDeps = {
  store: MailingStore;
  delivery: BulkDeliveryEngine;
  chat: Pick<ChatMessenger, "sendMessage">;
  logger: Logger;
  locale: SupportedLocale;
};

type RunningMailing = {
  controller: AbortController;
  task: Promise<void>;
};

export function toMailingProgress(stats: DeliveryStats): MailingProgress {
  return {
    sentCount: stats.successful,
    failedCount: stats.throttled + stats.otherErrors,
    blockedCount: stats.blocked,
  };
}

export class MailingService {
  private readonly running = new Map<number, RunningMailing>();

  constructor(private readonly deps: MailingServiceDeps) {}

  /** Run once at startup: nothing from an earlier process is still sending. */
  recoverInterrupted(): number[] {
    const ids = this.deps.store.cancelInterruptedMailings();
    if (ids.length > 0) {
      this.deps.logger.warn("mailings_interrupted", { mailingIds: ids });
    }
    return ids;
  }

  /** Creates the mailing row and sends in the background; the admin gets a report at the end. */
  start(request: MailingRequest): MailingStartResult {
    const { store, delivery, logger } = this.deps;
    const recipients = store.listSubscriberIds(
      request.channelId,
      request.audience === "active_30d" ? { activeWithinDays: ACTIVE_AUDIENCE_DAYS } : {},
    );
    if (recipients.length === 0) {
      return { status: "no_recipients" };
    }

    const mailing = store.createMailing({
      channelId: request.channelId,
      adminId: request.adminId,
      audience: request.audience,
      messageText: request.text,
      totalUsers: recipients.length,
    });
    const controller = new AbortController();
    const task = this.run(mailing.id, recipients, request, controller.signal);
    this.running.set(mailing.id, { controller, task });
    void task.finally(() => this.running.delete(mailing.id));

    logger.info("mailing_started", { mailingId: mailing.id, channelId: request.channelId, total: recipients.length });
    return {
      status: "started",
      mailingId: mailing.id,
      total: recipients.length,
      estimateMs: delivery.estimateDeliveryTime(recipients.length),
    };
  }

  stop(mailingId: number): boolean {
    const entry = this.running.get(mailingId);
    if (!entry) {
      return false;
    }
    entry.controller.abort();
    this.deps.logger.info("mailing_stop_requested", { mailingId });
    return true;
  }

  isRunning(mailingId: number): boolean {
    return this.running.has(mailingId);
  }

  async drain(): Promise<void> {
    await Promise.all([...this.running.values()].map((entry) => entry.task));
  }

  async stopAll(): Promise<void> {
    for (const entry of this.running.values()) {
      entry.controller.abort();
    }
    await this.drain();
  }

  private async run(
    mailingId: number,
    recipients: readonly number[],
    request: MailingRequest,
    signal: AbortSignal,
  ): Promise<void> {
    const { store, delivery, chat, logger, locale } = this.deps;
    try {
      const report = await delivery.sendBulk(
        recipients.map((userId) => ({ userId })),
        request.text,
        {
          signal,
          onProgress: ({ stats }) => store.updateMailingProgress(mailingId, toMailingProgress(stats)),
        },
      );
      store.completeMailing(mailingId, report.cancelled ? "cancelled" : "done", toMailingProgress(report.stats));
      logger.info("mailing_finished", { mailingId, cancelled: report.cancelled, ...toMailingProgress(report.stats) });

      try {
        await chat.sendMessage(request.adminId, buildMailingReport(mailingId, report.stats, report.cancelled, locale));
      } catch (error) {
        logger.warn("mailing_report_failed", { mailingId, ...normalizeError(error) });
      }
    } catch (error) {
      logger.error("mailing_failed", { mailingId, ...normalizeError(error) });
    }
  }
}
