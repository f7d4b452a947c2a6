import "dotenv/config";

import { Telegraf } from "telegraf";

import { createGiveawayBot } from "./bot";
import { loadConfig, type AppConfig } from "./config";
import { BulkDeliveryEngine } from "./delivery";
import { EligibilityChecker } from "./eligibility";
import { JobScheduler } from "./job-scheduler";
import { GiveawayLifecycleScheduler } from "./lifecycle";
import { AppLogger, normalizeError } from "./logger";
import { MailingService } from "./mailing";
import type { DirectMessenger } from "./messaging";
import { GiveawayRepository } from "./repository";
import { SubscriberParser } from "./subscribers";
import { TelegrafMessenger } from "./telegraf-messenger";
import { UserAccountClient } from "./user-client";

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    // Config errors should fail fast before runtime starts.
    console.error("config_load_failed", normalizeError(error));
    process.exit(1);
    throw error;
  }
}

function main(): void {
  const config = loadConfigOrExit();
  const logger = new AppLogger({ logPath: config.logPath, level: config.logLevel });
  const repository = new GiveawayRepository(config.storagePath);
  const telegraf = new Telegraf(config.botToken);
  const messenger = new TelegrafMessenger(telegraf.telegram);
  const userClient = config.userAccount
    ? new UserAccountClient(config.userAccount, logger.child("user_client"))
    : undefined;
  const directMessenger: DirectMessenger = userClient ?? messenger;

  const delivery = new BulkDeliveryEngine({
    messenger: directMessenger,
    logger: logger.child("delivery"),
    defaults: {
      delayRangeMs: config.mailing.delayRangeMs,
      pauseEvery: config.mailing.pauseEvery,
      pauseRangeMs: config.mailing.pauseRangeMs,
      maxRetries: config.mailing.maxRetries,
    },
  });
  const eligibility = new EligibilityChecker(messenger, logger.child("eligibility"));
  const jobs = new JobScheduler({ logger: logger.child("jobs") });
  const lifecycle = new GiveawayLifecycleScheduler({
    store: repository,
    chat: messenger,
    eligibility,
    delivery,
    jobs,
    logger: logger.child("lifecycle"),
    locale: config.defaultLocale,
    timeZone: config.timeZone,
    retentionDays: config.retentionDays,
    catchUpOverdue: config.catchUpOverdue,
  });
  const mailing = new MailingService({
    store: repository,
    delivery,
    chat: messenger,
    logger: logger.child("mailing"),
    locale: config.defaultLocale,
  });
  const bot = createGiveawayBot({
    telegraf,
    config,
    logger: logger.child("bot"),
    repository,
    lifecycle,
    eligibility,
    messenger,
    mailing,
    ...(userClient ? { subscriberParser: new SubscriberParser(userClient, repository, logger.child("parser")) } : {}),
  });
  let shuttingDown = false;

  const shutdown = (reason: string, exitCode: number): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.warn("shutdown_started", { reason, exitCode });

    try {
      bot.shutdown(reason);
    } catch (error) {
      logger.error("bot_stop_failed", normalizeError(error));
    }

    const forceExit = setTimeout(() => {
      logger.error("shutdown_forced_exit", { reason });
      process.exit(exitCode);
    }, 5000);
    forceExit.unref();

    const stopServices = async (): Promise<void> => {
      await mailing.stopAll();
      await lifecycle.stop();
      await userClient?.disconnect();
    };
    stopServices()
      .catch((error: unknown) => {
        logger.error("services_stop_failed", normalizeError(error));
      })
      .finally(() => {
        try {
          repository.close();
        } catch (error) {
          logger.error("repository_close_failed", normalizeError(error));
        }
        clearTimeout(forceExit);
        logger.info("shutdown_completed", { reason, exitCode });
        process.exit(exitCode);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT", 0));
  process.on("SIGTERM", () => shutdown("SIGTERM", 0));
  process.on("uncaughtException", (error) => {
    logger.error("uncaught_exception", normalizeError(error));
    shutdown("uncaughtException", 1);
  });
  process.on("unhandledRejection", (reason) => {
    logger.error("unhandled_rejection", normalizeError(reason));
    shutdown("unhandledRejection", 1);
  });

  mailing.recoverInterrupted();
  lifecycle.start();
  bot.start().catch((error: unknown) => {
    logger.error("bot_launch_failed", normalizeError(error));
    shutdown("launchFailed", 1);
  });
  logger.info("bot_started", {
    storagePath: config.storagePath,
    userAccount: Boolean(userClient),
    admins: config.adminUserIds.size,
  });
}

main();
