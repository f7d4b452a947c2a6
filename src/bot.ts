import type { Context, Telegraf } from "telegraf";

import {
  buildGiveawayPost,
  buildHelpMessage,
  buildParticipateKeyboard,
  formatDateTime,
  formatUserName,
} from "./bot-ui";
import type { AppConfig } from "./config";
import type { EligibilityChecker } from "./eligibility";
import { t, type I18nKey } from "./i18n";
import type { FinishResult, GiveawayLifecycleScheduler, PostRefresh } from "./lifecycle";
import type { Logger } from "./logger";
import { normalizeError } from "./logger";
import type { MailingService } from "./mailing";
import type { GiveawayRepository } from "./repository";
import type { SubscriberParser } from "./subscribers";
import { toInlineMarkup, type TelegrafMessenger } from "./telegraf-messenger";
import type { Giveaway, GiveawayChanges, MailingAudience, NewGiveaway, UserProfile } from "./types";

const COMMAND_COOLDOWN_MS = 1500;
const GIVEAWAY_LIST_LIMIT = 20;
const SUBSCRIBED_STATUSES = new Set(["creator", "administrator", "member"]);

type TelegramUserLike = {
  id: number;
  is_bot?: boolean;
  first_name?: string;
  last_name?: string;
  username?: string;
};

type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export type GiveawayBotDeps = {
  telegraf: Telegraf;
  config: AppConfig;
  logger: Logger;
  repository: GiveawayRepository;
  lifecycle: GiveawayLifecycleScheduler;
  eligibility: EligibilityChecker;
  messenger: TelegrafMessenger;
  mailing: MailingService;
  subscriberParser?: SubscriberParser;
};

export type GiveawayBot = {
  telegraf: Telegraf;
  start(): Promise<void>;
  shutdown(reason: string): void;
};

function extractUser(from: TelegramUserLike | undefined): UserProfile | null {
  if (!from) {
    return null;
  }
  const fullName = [from.first_name, from.last_name].filter(Boolean).join(" ");
  return {
    userId: from.id,
    ...(from.username ? { username: from.username } : {}),
    ...(from.first_name ? { firstName: from.first_name } : {}),
    ...(fullName ? { fullName } : {}),
  };
}

type AdminLookup = Pick<GiveawayRepository, "isAdmin">;

function isAdmin(config: AppConfig, admins: AdminLookup, userId: number): boolean {
  return config.adminUserIds.has(userId) || admins.isAdmin(userId);
}

type RevokeOutcome = "removed" | "configured" | "not_found";

/** Admins from the environment stay; only the ones added by command can be removed. */
function revokeAdmin(config: AppConfig, admins: Pick<GiveawayRepository, "removeAdmin">, userId: number): RevokeOutcome {
  if (config.adminUserIds.has(userId)) {
    return "configured";
  }
  return admins.removeAdmin(userId) ? "removed" : "not_found";
}

type RemoveChannelOutcome = "removed" | "not_found" | "has_active";

function removeChannelIfIdle(
  repository: Pick<GiveawayRepository, "getChannel" | "countActiveGiveaways" | "removeChannel">,
  channelId: number,
): RemoveChannelOutcome {
  if (!repository.getChannel(channelId)) {
    return "not_found";
  }
  if (repository.countActiveGiveaways(channelId) > 0) {
    return "has_active";
  }
  return repository.removeChannel(channelId) ? "removed" : "not_found";
}

function parseId(raw: string): number | null {
  const value = Number(raw.trim());
  return Number.isInteger(value) && value > 0 ? value : null;
}

function parseChatRef(raw: string): number | string | null {
  const value = raw.trim();
  if (/^-?\d+$/.test(value)) {
    return Number(value);
  }
  if (/^@[A-Za-z0-9_]{4,}$/.test(value)) {
    return value;
  }
  return null;
}

function parseEndsAt(raw: string, now: number): ParseResult<string> {
  const parsed = Date.parse(raw.trim());
  if (!Number.isFinite(parsed)) {
    return { ok: false, error: "Неверная дата окончания, используйте ISO-формат: 2026-12-31T20:00:00Z" };
  }
  if (parsed <= now) {
    return { ok: false, error: "Дата окончания должна быть в будущем." };
  }
  return { ok: true, value: new Date(parsed).toISOString() };
}

function parseNewGiveawayArgs(raw: string, now: number): ParseResult<Omit<NewGiveaway, "createdBy">> {
  const [chatRaw = "", titleRaw = "", descriptionRaw = "", endsRaw = "", placesRaw = "", ...rest] = raw
    .split("|")
    .map((value) => value.trim());
  const channelId = Number(chatRaw);
  if (!Number.isInteger(channelId) || channelId === 0) {
    return { ok: false, error: "Неверный chat_id канала." };
  }
  if (!titleRaw || !descriptionRaw) {
    return { ok: false, error: "Укажите название и описание розыгрыша." };
  }
  const endsAt = parseEndsAt(endsRaw, now);
  if (!endsAt.ok) {
    return endsAt;
  }
  const winnerPlaces = Number(placesRaw);
  if (!Number.isInteger(winnerPlaces) || winnerPlaces < 1) {
    return { ok: false, error: "Количество призовых мест должно быть целым числом от 1." };
  }
  const winnerMessage = rest.join(" | ").trim();
  return {
    ok: true,
    value: {
      channelId,
      title: titleRaw,
      description: descriptionRaw,
      endsAt: endsAt.value,
      winnerPlaces,
      ...(winnerMessage ? { winnerMessage } : {}),
    },
  };
}

function parseEditEndArgs(raw: string, now: number): ParseResult<{ giveawayId: number; endsAt: string }> {
  const [idRaw = "", endsRaw = ""] = raw.trim().split(/\s+/);
  const giveawayId = parseId(idRaw);
  if (!giveawayId) {
    return { ok: false, error: "Укажите ID розыгрыша: /editend id 2026-12-31T20:00:00Z" };
  }
  const endsAt = parseEndsAt(endsRaw, now);
  return endsAt.ok ? { ok: true, value: { giveawayId, endsAt: endsAt.value } } : endsAt;
}

function parseEditFieldArgs(raw: string): ParseResult<{ giveawayId: number; changes: GiveawayChanges }> {
  const [head = "", ...rest] = raw.split("|");
  const value = rest.join("|").trim();
  const [idRaw = "", fieldRaw = ""] = head.trim().split(/\s+/);
  const giveawayId = parseId(idRaw);
  if (!giveawayId) {
    return { ok: false, error: "Укажите ID розыгрыша: /edit id title|description|message | текст" };
  }
  if (fieldRaw !== "title" && fieldRaw !== "description" && fieldRaw !== "message") {
    return { ok: false, error: "Поле: title, description или message." };
  }
  if (!value) {
    return { ok: false, error: "Новое значение не может быть пустым." };
  }
  const changes: GiveawayChanges =
    fieldRaw === "title" ? { title: value } : fieldRaw === "description" ? { description: value } : { winnerMessage: value };
  return { ok: true, value: { giveawayId, changes } };
}

function describePostRefresh(post: PostRefresh): string {
  switch (post) {
    case "unchanged":
      return "Пост в канале не менялся.";
    case "edited":
      return "Пост в канале обновлён.";
    case "republished":
      return "Пост в канале опубликован заново.";
    case "failed":
      return "Не удалось обновить пост в канале. Подробности в логе.";
  }
}

function parseToggleArgs(raw: string): { giveawayId: number; enabled: boolean } | null {
  const [idRaw = "", flag = ""] = raw.trim().split(/\s+/);
  const giveawayId = parseId(idRaw);
  if (!giveawayId || (flag !== "on" && flag !== "off")) {
    return null;
  }
  return { giveawayId, enabled: flag === "on" };
}

function parseMailingArgs(raw: string): { channelId: number; audience: MailingAudience; text: string } | null {
  const [head = "", ...rest] = raw.split("|");
  const text = rest.join("|").trim();
  const [chatRaw = "", audienceRaw = ""] = head.trim().split(/\s+/);
  const channelId = Number(chatRaw);
  const audience = audienceRaw === "all" || audienceRaw === "active_30d" ? audienceRaw : null;
  if (!Number.isInteger(channelId) || channelId === 0 || !audience || !text) {
    return null;
  }
  return { channelId, audience, text };
}

function hitCooldown(
  state: Map<string, number>,
  key: string,
  cooldownMs: number,
  now: number = Date.now(),
): { ok: true } | { ok: false; waitSeconds: number } {
  const nextAllowedAt = state.get(key) ?? 0;
  if (nextAllowedAt > now) {
    return {
      ok: false,
      waitSeconds: Math.max(1, Math.ceil((nextAllowedAt - now) / 1000)),
    };
  }
  state.set(key, now + cooldownMs);
  return { ok: true };
}

function formatEstimate(ms: number): string {
  return `${Math.max(1, Math.ceil(ms / 60_000))} мин`;
}

function toGiveawayLine(giveaway: Giveaway, participants: number, timeZone: string): string {
  return `#${giveaway.id} | ${giveaway.title} | ${giveaway.status} | до ${formatDateTime(giveaway.endsAt, timeZone)} | участников: ${participants}`;
}

function describeFinishResult(result: FinishResult): string {
  switch (result.status) {
    case "finished":
      return `Розыгрыш завершён. Победителей: ${result.winners.length}, уведомлено: ${result.delivery?.stats.successful ?? 0}.`;
    case "no_participants":
      return `Розыгрыш завершён без победителей (участников: ${result.participants}).`;
    case "failed":
      return "Не удалось сохранить итоги розыгрыша. Подробности в логе.";
    case "skipped":
      return result.reason === "in_progress" ? "Розыгрыш уже завершается." : "Розыгрыш не активен.";
  }
}

type JoinStatus = "joined" | "already" | "not_found" | "closed" | "not_subscribed";
type JoinOutcome = { status: JoinStatus; participants?: number; giveaway?: Giveaway };

const JOIN_MESSAGE: Record<JoinStatus, I18nKey> = {
  joined: "joinSuccess",
  already: "joinAlready",
  not_found: "giveawayNotFound",
  closed: "joinClosed",
  not_subscribed: "joinNotSubscribed",
};

async function tryJoinGiveaway(
  repository: Pick<
    GiveawayRepository,
    "getGiveaway" | "addParticipant" | "getParticipantsCount" | "touchSubscriberActivity"
  >,
  eligibility: Pick<EligibilityChecker, "isEligible">,
  giveawayId: number,
  user: UserProfile,
  now: number = Date.now(),
): Promise<JoinOutcome> {
  const giveaway = repository.getGiveaway(giveawayId);
  if (!giveaway) {
    return { status: "not_found" };
  }
  if (giveaway.status !== "active" || Date.parse(giveaway.endsAt) <= now) {
    return { status: "closed", giveaway };
  }
  if (!(await eligibility.isEligible(user.userId, giveaway.channelId))) {
    return { status: "not_subscribed", giveaway };
  }
  const added = repository.addParticipant(giveawayId, user, new Date(now));
  repository.touchSubscriberActivity(giveaway.channelId, user, new Date(now));
  return {
    status: added ? "joined" : "already",
    participants: repository.getParticipantsCount(giveawayId),
    giveaway,
  };
}

export function createGiveawayBot(deps: GiveawayBotDeps): GiveawayBot {
  const { config, logger, repository, lifecycle, eligibility, messenger, mailing, subscriberParser } = deps;
  const locale = config.defaultLocale;
  const bot = deps.telegraf;
  const commandCooldowns = new Map<string, number>();

  const guardAdmin = async (ctx: Context, command: string): Promise<UserProfile | null> => {
    const user = extractUser(ctx.from);
    if (!user) {
      await ctx.reply(t(locale, "userNotDetected"));
      return null;
    }
    if (!isAdmin(config, repository, user.userId)) {
      await ctx.reply(t(locale, "adminOnly"));
      return null;
    }
    const cooldown = hitCooldown(commandCooldowns, `${command}:${user.userId}`, COMMAND_COOLDOWN_MS);
    if (!cooldown.ok) {
      await ctx.reply(t(locale, "tooFrequent", { seconds: cooldown.waitSeconds }));
      return null;
    }
    return user;
  };

  const helpHandler = async (ctx: Context): Promise<void> => {
    const user = extractUser(ctx.from);
    await ctx.reply(buildHelpMessage(locale, user ? isAdmin(config, repository, user.userId) : false));
  };
  bot.start(helpHandler);
  bot.help(helpHandler);

  bot.command("whoami", async (ctx) => {
    const user = extractUser(ctx.from);
    if (!user) {
      return ctx.reply(t(locale, "userNotDetected"));
    }
    return ctx.reply(t(locale, "whoami", { userId: user.userId }));
  });

  bot.command("addchannel", async (ctx) => {
    const user = await guardAdmin(ctx, "addchannel");
    if (!user) {
      return;
    }
    const ref = parseChatRef(ctx.payload);
    if (ref === null) {
      return ctx.reply("Укажите канал: /addchannel -1001234567890 или /addchannel @channel");
    }
    try {
      const chat = await ctx.telegram.getChat(ref);
      if (chat.type === "private") {
        return ctx.reply("Это не канал.");
      }
      const status = await messenger.getChatMemberStatus(chat.id, ctx.botInfo.id);
      if (status !== "administrator" && status !== "creator") {
        return ctx.reply("Сделайте бота администратором канала и повторите команду.");
      }
      const title = "title" in chat && typeof chat.title === "string" ? chat.title : String(chat.id);
      const username = "username" in chat && typeof chat.username === "string" ? chat.username : undefined;
      repository.addChannel({ channelId: chat.id, title, addedBy: user.userId, ...(username ? { username } : {}) });
      logger.info("channel_added", { channelId: chat.id, addedBy: user.userId });
      return ctx.reply(`Канал добавлен: ${title} (${chat.id})`);
    } catch (error) {
      logger.warn("channel_add_failed", { ref, ...normalizeError(error) });
      return ctx.reply("Канал не найден или бот в нём не состоит.");
    }
  });

  bot.command("channels", async (ctx) => {
    if (!(await guardAdmin(ctx, "channels"))) {
      return;
    }
    const channels = repository.listChannels();
    if (channels.length === 0) {
      return ctx.reply("Каналов пока нет. Добавьте: /addchannel chat_id");
    }
    return ctx.reply(
      channels
        .map(
          (channel) =>
            `${channel.title} (${channel.channelId}) | подписчиков в базе: ${repository.countChannelSubscribers(channel.channelId)}`,
        )
        .join("\n"),
    );
  });

  bot.command("removechannel", async (ctx) => {
    const user = await guardAdmin(ctx, "removechannel");
    if (!user) {
      return;
    }
    const channelId = Number(ctx.payload.trim());
    if (!Number.isInteger(channelId) || channelId === 0) {
      return ctx.reply("Укажите канал: /removechannel chat_id");
    }
    const outcome = removeChannelIfIdle(repository, channelId);
    if (outcome === "removed") {
      logger.info("channel_removed", { channelId, removedBy: user.userId });
      return ctx.reply("Канал удалён.");
    }
    return ctx.reply(
      outcome === "has_active"
        ? "В канале есть активные розыгрыши: завершите или отмените их."
        : "Канал не найден.",
    );
  });

  bot.command("newgiveaway", async (ctx) => {
    const user = await guardAdmin(ctx, "newgiveaway");
    if (!user) {
      return;
    }
    const parsed = parseNewGiveawayArgs(ctx.payload, Date.now());
    if (!parsed.ok) {
      return ctx.reply(
        `${parsed.error}\nФормат: /newgiveaway chat_id | название | описание | 2026-12-31T20:00:00Z | мест | текст для победителя`,
      );
    }
    if (!repository.getChannel(parsed.value.channelId)) {
      return ctx.reply("Сначала добавьте канал: /addchannel chat_id");
    }

    const giveaway = repository.createGiveaway({ ...parsed.value, createdBy: user.userId });
    try {
      const post = await messenger.sendMessage(giveaway.channelId, buildGiveawayPost(giveaway, locale, config.timeZone), {
        html: true,
        keyboard: buildParticipateKeyboard(giveaway.id, 0, locale),
      });
      repository.setGiveawayMessageId(giveaway.id, post.messageId);
    } catch (error) {
      logger.error("giveaway_publish_failed", { giveawayId: giveaway.id, ...normalizeError(error) });
      lifecycle.deleteGiveaway(giveaway.id);
      return ctx.reply("Не удалось опубликовать розыгрыш в канале. Проверьте права бота.");
    }

    lifecycle.scheduleGiveaway(repository.getGiveaway(giveaway.id) ?? giveaway);
    logger.info("giveaway_created", { giveawayId: giveaway.id, channelId: giveaway.channelId, createdBy: user.userId });
    return ctx.reply(
      `Розыгрыш #${giveaway.id} опубликован. Итоги: ${formatDateTime(giveaway.endsAt, config.timeZone)}`,
    );
  });

  bot.command("giveaways", async (ctx) => {
    if (!(await guardAdmin(ctx, "giveaways"))) {
      return;
    }
    const giveaways = repository.listGiveaways().slice(-GIVEAWAY_LIST_LIMIT);
    if (giveaways.length === 0) {
      return ctx.reply("Розыгрышей пока нет.");
    }
    return ctx.reply(
      giveaways
        .map((giveaway) =>
          toGiveawayLine(giveaway, repository.getParticipantsCount(giveaway.id), config.timeZone),
        )
        .join("\n"),
    );
  });

  bot.command("giveaway", async (ctx) => {
    if (!(await guardAdmin(ctx, "giveaway"))) {
      return;
    }
    const giveawayId = parseId(ctx.payload);
    const giveaway = giveawayId ? repository.getGiveaway(giveawayId) : undefined;
    if (!giveaway) {
      return ctx.reply(t(locale, "giveawayNotFound"));
    }
    const reminders = lifecycle.reminderState(giveaway.id);
    const lines = [
      toGiveawayLine(giveaway, repository.getParticipantsCount(giveaway.id), config.timeZone),
      `Призовых мест: ${giveaway.winnerPlaces}`,
      `Напоминания: ${reminders ? (reminders.enabled ? "включены" : "выключены") : "-"}`,
    ];
    if (giveaway.status === "finished") {
      const winners = repository.getWinners(giveaway.id);
      lines.push(
        "Победители:",
        ...(winners.length > 0
          ? winners.map((winner) => `${winner.place}. ${formatUserName(winner, locale)} (id ${winner.userId})`)
          : ["-"]),
        `Seed: ${giveaway.drawSeed ?? "-"}`,
      );
    }
    return ctx.reply(lines.join("\n"));
  });

  bot.command("editend", async (ctx) => {
    if (!(await guardAdmin(ctx, "editend"))) {
      return;
    }
    const parsed = parseEditEndArgs(ctx.payload, Date.now());
    if (!parsed.ok) {
      return ctx.reply(parsed.error);
    }
    const result = await lifecycle.editGiveaway(parsed.value.giveawayId, { endsAt: parsed.value.endsAt });
    if (result.status === "not_active") {
      return ctx.reply("Изменять можно только активный розыгрыш.");
    }
    return ctx.reply(
      `Новая дата окончания: ${formatDateTime(result.giveaway.endsAt, config.timeZone)}\n${describePostRefresh(result.post)}`,
    );
  });

  bot.command("edit", async (ctx) => {
    if (!(await guardAdmin(ctx, "edit"))) {
      return;
    }
    const parsed = parseEditFieldArgs(ctx.payload);
    if (!parsed.ok) {
      return ctx.reply(parsed.error);
    }
    const result = await lifecycle.editGiveaway(parsed.value.giveawayId, parsed.value.changes);
    if (result.status === "not_active") {
      return ctx.reply("Изменять можно только активный розыгрыш.");
    }
    return ctx.reply(`Розыгрыш #${result.giveaway.id} изменён. ${describePostRefresh(result.post)}`);
  });

  bot.command("reminders", async (ctx) => {
    if (!(await guardAdmin(ctx, "reminders"))) {
      return;
    }
    const parsed = parseToggleArgs(ctx.payload);
    if (!parsed) {
      return ctx.reply("Формат: /reminders id on|off");
    }
    if (!lifecycle.setRemindersEnabled(parsed.giveawayId, parsed.enabled)) {
      return ctx.reply("Напоминания можно менять только у активного розыгрыша.");
    }
    return ctx.reply(parsed.enabled ? "Напоминания включены." : "Напоминания выключены.");
  });

  bot.command("finish", async (ctx) => {
    if (!(await guardAdmin(ctx, "finish"))) {
      return;
    }
    const giveawayId = parseId(ctx.payload);
    if (!giveawayId) {
      return ctx.reply("Укажите ID розыгрыша: /finish id");
    }
    const result = await lifecycle.finishGiveaway(giveawayId);
    if (result.status === "skipped" && result.reason === "not_found") {
      return ctx.reply(t(locale, "giveawayNotFound"));
    }
    return ctx.reply(describeFinishResult(result));
  });

  bot.command("cancelgiveaway", async (ctx) => {
    if (!(await guardAdmin(ctx, "cancelgiveaway"))) {
      return;
    }
    const giveawayId = parseId(ctx.payload);
    if (!giveawayId) {
      return ctx.reply("Укажите ID розыгрыша: /cancelgiveaway id");
    }
    return ctx.reply(lifecycle.cancelGiveaway(giveawayId) ? "Розыгрыш отменён." : "Розыгрыш не активен.");
  });

  bot.command("deletegiveaway", async (ctx) => {
    if (!(await guardAdmin(ctx, "deletegiveaway"))) {
      return;
    }
    const giveawayId = parseId(ctx.payload);
    if (!giveawayId) {
      return ctx.reply("Укажите ID розыгрыша: /deletegiveaway id");
    }
    return ctx.reply(lifecycle.deleteGiveaway(giveawayId) ? "Розыгрыш удалён." : t(locale, "giveawayNotFound"));
  });

  bot.command("jobs", async (ctx) => {
    if (!(await guardAdmin(ctx, "jobs"))) {
      return;
    }
    const status = lifecycle.status();
    const lines = status.jobs.map(
      (job) => `${formatDateTime(job.runAt.toISOString(), config.timeZone)} | ${job.key} | ${job.description}`,
    );
    return ctx.reply([`Задач в очереди: ${status.jobsCount}`, ...lines].join("\n"));
  });

  bot.command("parse", async (ctx) => {
    const user = await guardAdmin(ctx, "parse");
    if (!user) {
      return;
    }
    if (!subscriberParser) {
      return ctx.reply("Пользовательский клиент не настроен (USER_API_ID, USER_API_HASH, USER_SESSION).");
    }
    const channelId = Number(ctx.payload.trim());
    if (!Number.isInteger(channelId) || !repository.getChannel(channelId)) {
      return ctx.reply("Укажите добавленный канал: /parse chat_id");
    }

    const runParse = async (): Promise<void> => {
      try {
        const report = await subscriberParser.parseChannel(channelId);
        await messenger.sendMessage(
          user.userId,
          `Парсинг завершён: получено ${report.fetched}, новых ${report.added}, вернулись ${report.updated}, пропущено ${report.skipped}.`,
        );
      } catch (error) {
        logger.error("subscriber_parse_failed", { channelId, ...normalizeError(error) });
        await messenger.sendMessage(user.userId, "Парсинг не удался. Подробности в логе.").catch((notifyError: unknown) => {
          logger.warn("subscriber_parse_report_failed", { channelId, ...normalizeError(notifyError) });
        });
      }
    };
    void runParse();
    return ctx.reply("Парсинг подписчиков запущен, итоги придут отдельным сообщением.");
  });

  bot.command("mailing", async (ctx) => {
    const user = await guardAdmin(ctx, "mailing");
    if (!user) {
      return;
    }
    const parsed = parseMailingArgs(ctx.payload);
    if (!parsed) {
      return ctx.reply("Формат: /mailing chat_id all|active_30d | текст");
    }
    const result = mailing.start({ ...parsed, adminId: user.userId });
    if (result.status === "no_recipients") {
      return ctx.reply("Нет получателей: сначала выполните /parse для этого канала.");
    }
    return ctx.reply(
      `Рассылка #${result.mailingId} запущена: ${result.total} получателей, примерно ${formatEstimate(result.estimateMs)}. Остановить: /stopmailing ${result.mailingId}`,
    );
  });

  bot.command("stopmailing", async (ctx) => {
    if (!(await guardAdmin(ctx, "stopmailing"))) {
      return;
    }
    const mailingId = parseId(ctx.payload);
    if (!mailingId) {
      return ctx.reply("Укажите ID рассылки: /stopmailing id");
    }
    return ctx.reply(mailing.stop(mailingId) ? "Рассылка останавливается." : "Рассылка не выполняется.");
  });

  bot.command("admins", async (ctx) => {
    if (!(await guardAdmin(ctx, "admins"))) {
      return;
    }
    const configured = [...config.adminUserIds].map((userId) =>
      userId === config.ownerUserId ? `${userId} (владелец)` : `${userId} (из настроек)`,
    );
    const added = repository
      .listAdmins()
      .map((admin) => `${formatUserName(admin, locale)} (id ${admin.userId})`);
    return ctx.reply(["Администраторы:", ...configured, ...added].join("\n"));
  });

  bot.command("addadmin", async (ctx) => {
    const user = await guardAdmin(ctx, "addadmin");
    if (!user) {
      return;
    }
    const userId = parseId(ctx.payload);
    if (!userId) {
      return ctx.reply("Укажите user ID: /addadmin 123456789");
    }
    if (isAdmin(config, repository, userId)) {
      return ctx.reply("Пользователь уже администратор.");
    }
    let profile: UserProfile = { userId };
    try {
      const chat = await ctx.telegram.getChat(userId);
      const firstName = "first_name" in chat && typeof chat.first_name === "string" ? chat.first_name : "";
      const lastName = "last_name" in chat && typeof chat.last_name === "string" ? chat.last_name : "";
      const username = "username" in chat && typeof chat.username === "string" ? chat.username : "";
      profile =
        extractUser({
          id: userId,
          ...(firstName ? { first_name: firstName } : {}),
          ...(lastName ? { last_name: lastName } : {}),
          ...(username ? { username } : {}),
        }) ?? profile;
    } catch (error) {
      logger.debug("admin_profile_lookup_failed", { userId, ...normalizeError(error) });
    }
    repository.addAdmin(profile, user.userId);
    logger.info("admin_added", { userId, addedBy: user.userId });
    return ctx.reply(`Администратор добавлен: ${formatUserName(profile, locale)} (id ${userId})`);
  });

  bot.command("removeadmin", async (ctx) => {
    const user = await guardAdmin(ctx, "removeadmin");
    if (!user) {
      return;
    }
    const userId = parseId(ctx.payload);
    if (!userId) {
      return ctx.reply("Укажите user ID: /removeadmin 123456789");
    }
    const outcome = revokeAdmin(config, repository, userId);
    if (outcome === "removed") {
      logger.info("admin_removed", { userId, removedBy: user.userId });
      return ctx.reply("Администратор удалён.");
    }
    return ctx.reply(
      outcome === "configured"
        ? "Администратора из настроек можно убрать только в ADMIN_USER_IDS."
        : "Такого администратора нет.",
    );
  });

  bot.action(/^join:(\d+)$/, async (ctx) => {
    const user = extractUser(ctx.from);
    if (!user) {
      return ctx.answerCbQuery(t(locale, "userNotDetected"));
    }
    const cooldown = hitCooldown(commandCooldowns, `join:${user.userId}`, COMMAND_COOLDOWN_MS);
    if (!cooldown.ok) {
      return ctx.answerCbQuery(t(locale, "tooFrequent", { seconds: cooldown.waitSeconds }));
    }

    const giveawayId = Number(ctx.match[1]);
    const outcome = await tryJoinGiveaway(repository, eligibility, giveawayId, user);
    await ctx.answerCbQuery(t(locale, JOIN_MESSAGE[outcome.status]), {
      show_alert: outcome.status !== "joined",
    });

    if (outcome.status === "joined" && outcome.participants !== undefined) {
      logger.info("participant_joined", { giveawayId, userId: user.userId });
      try {
        await ctx.editMessageReplyMarkup(
          toInlineMarkup(buildParticipateKeyboard(giveawayId, outcome.participants, locale)),
        );
      } catch (error) {
        logger.debug("participate_button_refresh_failed", { giveawayId, ...normalizeError(error) });
      }
    }
    return undefined;
  });

  bot.on("chat_member", (ctx) => {
    const update = ctx.chatMember;
    if (!repository.getChannel(update.chat.id)) {
      return;
    }
    const member = extractUser(update.new_chat_member.user);
    if (!member || update.new_chat_member.user.is_bot) {
      return;
    }
    if (SUBSCRIBED_STATUSES.has(update.new_chat_member.status)) {
      repository.upsertChannelSubscribers(update.chat.id, [member]);
    } else {
      repository.markSubscriberLeft(update.chat.id, member.userId);
    }
  });

  bot.catch((error, ctx) => {
    logger.error("bot_handler_failed", { updateType: ctx.updateType, ...normalizeError(error) });
  });

  return {
    telegraf: bot,
    async start() {
      await bot.telegram.setMyCommands([
        { command: "start", description: "Помощь и команды" },
        { command: "whoami", description: "Показать ваш user ID" },
        { command: "newgiveaway", description: "Создать розыгрыш" },
        { command: "giveaways", description: "Список розыгрышей" },
        { command: "jobs", description: "Запланированные задачи" },
      ]);
      await bot.launch({ allowedUpdates: ["message", "callback_query", "chat_member"] }, () => {
        logger.info("bot_polling_started", { username: bot.botInfo?.username });
      });
    },
    shutdown(reason: string) {
      bot.stop(reason);
    },
  };
}

export const __testables = {
  extractUser,
  isAdmin,
  revokeAdmin,
  removeChannelIfIdle,
  parseId,
  parseChatRef,
  parseNewGiveawayArgs,
  parseEditEndArgs,
  parseEditFieldArgs,
  describePostRefresh,
  parseToggleArgs,
  parseMailingArgs,
  hitCooldown,
  formatEstimate,
  toGiveawayLine,
  describeFinishResult,
  tryJoinGiveaway,
};
