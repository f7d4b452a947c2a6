export type SupportedLocale = "ru" | "en";

export type I18nKey =
  | "userNotDetected"
  | "adminOnly"
  | "tooFrequent"
  | "giveawayNotFound"
  | "whoami"
  | "joinSuccess"
  | "joinAlready"
  | "joinClosed"
  | "joinNotSubscribed"
  | "reminderPost"
  | "reminderIn3Days"
  | "reminderIn1Day"
  | "reminderIn3Hours"
  | "giveawayPost"
  | "participateButton"
  | "finishedHeader"
  | "noParticipants"
  | "singleWinnerLine"
  | "placeLine"
  | "congratulations"
  | "userFallbackName"
  | "winnerNotification"
  | "adminSummaryHeader"
  | "adminSummaryCounts"
  | "adminSummaryLine"
  | "adminSummaryNoWinners"
  | "adminSummaryFollowUp"
  | "deliverySent"
  | "deliveryBlocked"
  | "deliveryRateLimited"
  | "deliveryFailed"
  | "deliveryNotAttempted"
  | "mailingReport"
  | "mailingDone"
  | "mailingCancelled";

const DICT: Record<SupportedLocale, Record<I18nKey, string>> = {
  ru: {
    userNotDetected: "Не удалось определить пользователя.",
    adminOnly: "Эта команда доступна только администраторам.",
    tooFrequent: "Слишком часто. Повторите через {{seconds}} сек.",
    giveawayNotFound: "Розыгрыш не найден.",
    whoami: "Ваш user ID: {{userId}}",
    joinSuccess: "Вы участвуете в розыгрыше! Удачи 🍀",
    joinAlready: "Вы уже участвуете в этом розыгрыше.",
    joinClosed: "Этот розыгрыш уже завершён.",
    joinNotSubscribed: "Чтобы участвовать, подпишитесь на канал.",
    reminderPost:
      "⏰ <b>Напоминание!</b>\n\n🎁 <b>{{title}}</b>\n\n{{description}}\n\n🏆 Призовых мест: {{places}}\n👥 Участников: {{participants}}\n⏳ Итоги {{timeLeft}}: {{endsAt}}",
    reminderIn3Days: "через 3 дня",
    reminderIn1Day: "завтра",
    reminderIn3Hours: "через 3 часа",
    giveawayPost:
      "🎁 <b>{{title}}</b>\n\n{{description}}\n\n🏆 Призовых мест: {{places}}\n⏳ Итоги: {{endsAt}}\n\nНажмите кнопку ниже, чтобы участвовать.",
    participateButton: "🎁 Участвовать ({{count}})",
    finishedHeader: "🎊 <b>РОЗЫГРЫШ ЗАВЕРШЕН!</b>",
    noParticipants: "😔 К сожалению, в розыгрыше не было участников.",
    singleWinnerLine: "🏆 <b>Победитель:</b> {{name}}",
    placeLine: "{{medal}} <b>{{place}} место:</b> {{name}}",
    congratulations: "🎉 Поздравляем!",
    userFallbackName: "Пользователь",
    winnerNotification: "🎉 Поздравляем! Вы заняли {{place}} место в розыгрыше «{{title}}».",
    adminSummaryHeader: "📋 Итоги розыгрыша #{{id}} «{{title}}»",
    adminSummaryCounts: "Участников: {{participants}}, прошли проверку подписки: {{eligible}}",
    adminSummaryLine: "{{place}}. {{name}} (id {{userId}}): {{delivery}}",
    adminSummaryNoWinners: "Победителей нет: ни один участник не прошёл проверку подписки.",
    adminSummaryFollowUp: "Свяжитесь вручную с победителями, которым не удалось отправить уведомление.",
    deliverySent: "✅ уведомлён",
    deliveryBlocked: "⛔ закрыл личные сообщения",
    deliveryRateLimited: "⏳ лимит отправки",
    deliveryFailed: "❌ не доставлено",
    deliveryNotAttempted: "❔ не отправлялось",
    mailingReport:
      "📨 Рассылка #{{id}} {{status}}\nОтправлено: {{total}}, успешно: {{successful}}, заблокировали: {{blocked}}, лимит: {{throttled}}, ошибки: {{errors}}\nДлительность: {{duration}} сек.",
    mailingDone: "завершена",
    mailingCancelled: "остановлена",
  },
  en: {
    userNotDetected: "Could not detect user.",
    adminOnly: "This command is available to admins only.",
    tooFrequent: "Too frequent. Try again in {{seconds}} sec.",
    giveawayNotFound: "Giveaway not found.",
    whoami: "Your user ID: {{userId}}",
    joinSuccess: "You are in the giveaway! Good luck 🍀",
    joinAlready: "You already participate in this giveaway.",
    joinClosed: "This giveaway is already over.",
    joinNotSubscribed: "Subscribe to the channel to participate.",
    reminderPost:
      "⏰ <b>Reminder!</b>\n\n🎁 <b>{{title}}</b>\n\n{{description}}\n\n🏆 Prize places: {{places}}\n👥 Participants: {{participants}}\n⏳ Results {{timeLeft}}: {{endsAt}}",
    reminderIn3Days: "in 3 days",
    reminderIn1Day: "tomorrow",
    reminderIn3Hours: "in 3 hours",
    giveawayPost:
      "🎁 <b>{{title}}</b>\n\n{{description}}\n\n🏆 Prize places: {{places}}\n⏳ Results: {{endsAt}}\n\nPress the button below to participate.",
    participateButton: "🎁 Participate ({{count}})",
    finishedHeader: "🎊 <b>GIVEAWAY FINISHED!</b>",
    noParticipants: "😔 Unfortunately, the giveaway had no participants.",
    singleWinnerLine: "🏆 <b>Winner:</b> {{name}}",
    placeLine: "{{medal}} <b>Place {{place}}:</b> {{name}}",
    congratulations: "🎉 Congratulations!",
    userFallbackName: "User",
    winnerNotification: "🎉 Congratulations! You took place {{place}} in the giveaway \"{{title}}\".",
    adminSummaryHeader: "📋 Results of giveaway #{{id}} \"{{title}}\"",
    adminSummaryCounts: "Participants: {{participants}}, passed the subscription check: {{eligible}}",
    adminSummaryLine: "{{place}}. {{name}} (id {{userId}}): {{delivery}}",
    adminSummaryNoWinners: "No winners: no participant passed the subscription check.",
    adminSummaryFollowUp: "Contact the winners who could not be notified manually.",
    deliverySent: "✅ notified",
    deliveryBlocked: "⛔ direct messages closed",
    deliveryRateLimited: "⏳ rate limited",
    deliveryFailed: "❌ not delivered",
    deliveryNotAttempted: "❔ not attempted",
    mailingReport:
      "📨 Mailing #{{id}} {{status}}\nSent: {{total}}, successful: {{successful}}, blocked: {{blocked}}, rate limited: {{throttled}}, errors: {{errors}}\nDuration: {{duration}} sec.",
    mailingDone: "finished",
    mailingCancelled: "stopped",
  },
};

export function t(
  locale: SupportedLocale,
  key: I18nKey,
  vars?: Record<string, string | number>,
): string {
  return fillTemplate(DICT[locale][key], vars);
}

export function fillTemplate(template: string, vars?: Record<string, string | number>): string {
  if (!vars) {
    return template;
  }
  return Object.entries(vars).reduce(
    (acc, [varName, value]) => acc.replaceAll(`{{${varName}}}`, String(value)),
    template,
  );
}
