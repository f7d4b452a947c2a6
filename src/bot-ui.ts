import type { DeliveryOutcome, DeliveryStats, RecipientResult } from "./delivery";
import { deliveryDurationMs } from "./delivery";
import { fillTemplate, t, type I18nKey, type SupportedLocale } from "./i18n";
import type { InlineKeyboard } from "./messaging";
import type { ReminderTier } from "./reminders";
import type { Giveaway, UserProfile, WinnerDraft } from "./types";

const PLACE_MEDALS: Record<number, string> = { 1: "🥇", 2: "🥈", 3: "🥉" };

export const JOIN_CALLBACK_PREFIX = "join:";

export function escapeHtml(value: string): string {
  return value.replaceAll("&", "&amp;").replaceAll("<", "&lt;").replaceAll(">", "&gt;");
}

export function formatUserName(user: UserProfile, locale: SupportedLocale): string {
  if (user.username) {
    return `@${user.username}`;
  }
  return user.fullName || user.firstName || t(locale, "userFallbackName");
}

/** `dd.MM.yyyy HH:mm` in the given IANA time zone. */
export function formatDateTime(iso: string, timeZone: string): string {
  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(new Date(iso));
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((entry) => entry.type === type)?.value ?? "00";
  return `${part("day")}.${part("month")}.${part("year")} ${part("hour")}:${part("minute")}`;
}

export function buildParticipateKeyboard(
  giveawayId: number,
  participants: number,
  locale: SupportedLocale,
): InlineKeyboard {
  return [
    [
      {
        text: t(locale, "participateButton", { count: participants }),
        callbackData: `${JOIN_CALLBACK_PREFIX}${giveawayId}`,
      },
    ],
  ];
}

export function buildGiveawayPost(giveaway: Giveaway, locale: SupportedLocale, timeZone: string): string {
  return t(locale, "giveawayPost", {
    title: escapeHtml(giveaway.title),
    description: escapeHtml(giveaway.description),
    places: giveaway.winnerPlaces,
    endsAt: formatDateTime(giveaway.endsAt, timeZone),
  });
}

export function buildReminderPost(input: {
  giveaway: Giveaway;
  tier: ReminderTier;
  participants: number;
  locale: SupportedLocale;
  timeZone: string;
}): string {
  const { giveaway, tier, participants, locale, timeZone } = input;
  return t(locale, "reminderPost", {
    title: escapeHtml(giveaway.title),
    description: escapeHtml(giveaway.description),
    places: giveaway.winnerPlaces,
    participants,
    timeLeft: t(locale, tier.labelKey),
    endsAt: formatDateTime(giveaway.endsAt, timeZone),
  });
}

export function buildNoParticipantsAnnouncement(locale: SupportedLocale): string {
  return [t(locale, "finishedHeader"), "", t(locale, "noParticipants")].join("\n");
}

export function buildWinnersAnnouncement(winners: readonly WinnerDraft[], locale: SupportedLocale): string {
  const lines = winners.map((winner) => {
    const name = escapeHtml(formatUserName(winner, locale));
    if (winners.length === 1) {
      return t(locale, "singleWinnerLine", { name });
    }
    return t(locale, "placeLine", {
      medal: PLACE_MEDALS[winner.place] ?? "🏅",
      place: winner.place,
      name,
    });
  });
  return [t(locale, "finishedHeader"), "", ...lines, "", t(locale, "congratulations")].join("\n");
}

/** Personal message for a winner; the giveaway's own template wins over the default. */
export function buildWinnerNotification(giveaway: Giveaway, winner: WinnerDraft, locale: SupportedLocale): string {
  const vars = {
    place: winner.place,
    title: giveaway.title,
    name: formatUserName(winner, locale),
  };
  const template = giveaway.winnerMessage?.trim();
  return template ? fillTemplate(template, vars) : t(locale, "winnerNotification", vars);
}

const DELIVERY_LABEL: Record<DeliveryOutcome, I18nKey> = {
  success: "deliverySent",
  blocked: "deliveryBlocked",
  rate_limited: "deliveryRateLimited",
  other_error: "deliveryFailed",
};

export function buildAdminSummary(input: {
  giveaway: Giveaway;
  participants: number;
  eligible: number;
  winners: readonly WinnerDraft[];
  results: readonly RecipientResult[];
  locale: SupportedLocale;
}): string {
  const { giveaway, winners, results, locale } = input;
  const header = [
    t(locale, "adminSummaryHeader", { id: giveaway.id, title: giveaway.title }),
    t(locale, "adminSummaryCounts", { participants: input.participants, eligible: input.eligible }),
    "",
  ];
  if (winners.length === 0) {
    return [...header, t(locale, "adminSummaryNoWinners")].join("\n");
  }

  const outcomeByUser = new Map(results.map((result) => [result.userId, result.outcome]));
  const lines = winners.map((winner) => {
    const outcome = outcomeByUser.get(winner.userId);
    return t(locale, "adminSummaryLine", {
      place: winner.place,
      name: formatUserName(winner, locale),
      userId: winner.userId,
      delivery: t(locale, outcome ? DELIVERY_LABEL[outcome] : "deliveryNotAttempted"),
    });
  });
  const needsFollowUp = winners.some((winner) => outcomeByUser.get(winner.userId) !== "success");
  return [...header, ...lines, ...(needsFollowUp ? ["", t(locale, "adminSummaryFollowUp")] : [])].join("\n");
}

export function buildMailingReport(
  mailingId: number,
  stats: DeliveryStats,
  cancelled: boolean,
  locale: SupportedLocale,
): string {
  return t(locale, "mailingReport", {
    id: mailingId,
    status: t(locale, cancelled ? "mailingCancelled" : "mailingDone"),
    total: stats.totalSent,
    successful: stats.successful,
    blocked: stats.blocked,
    throttled: stats.throttled,
    errors: stats.otherErrors,
    duration: Math.round(deliveryDurationMs(stats) / 1000),
  });
}

export function buildHelpMessage(locale: SupportedLocale, canManage: boolean): string {
  const publicPart =
    locale === "en"
      ? ["Giveaway bot.", "", "Commands:", "/help", "/whoami"]
      : ["Бот розыгрышей.", "", "Команды:", "/help", "/whoami"];
  if (!canManage) {
    return publicPart.join("\n");
  }
  return [
    ...publicPart,
    "",
    locale === "en" ? "Admin commands:" : "Команды администратора:",
    "/addchannel chat_id|@username",
    "/removechannel chat_id",
    "/channels",
    "/giveaways",
    "/giveaway id",
    "/newgiveaway chat_id | title | description | 2026-12-31T20:00:00Z | places | winner message",
    "/editend id ISO-date",
    "/edit id title|description|message | text",
    "/reminders id on|off",
    "/finish id",
    "/cancelgiveaway id",
    "/deletegiveaway id",
    "/jobs",
    "/parse chat_id",
    "/mailing chat_id all|active_30d | text",
    "/stopmailing id",
    "/admins",
    "/addadmin user_id",
    "/removeadmin user_id",
  ].join("\n");
}
