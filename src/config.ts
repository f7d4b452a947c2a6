import { z } from "zod";

import type { SupportedLocale } from "./i18n";
import type { LogLevel } from "./logger";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z
  .object({
    BOT_TOKEN: z.string().min(10, "BOT_TOKEN is required"),
    OWNER_USER_ID: z.string().optional().default(""),
    ADMIN_USER_IDS: z.string().optional().default(""),
    STORAGE_PATH: z.string().optional().default("data/giveaways.db"),
    LOG_PATH: z.string().optional().default("data/bot.log"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    DEFAULT_LOCALE: z.enum(["ru", "en"]).default("ru"),
    TIMEZONE: z.string().optional().default("Europe/Moscow"),
    RETENTION_DAYS: z.coerce.number().int().min(1).default(15),
    CATCH_UP_OVERDUE: booleanFlag,
    USER_API_ID: z.string().optional().default(""),
    USER_API_HASH: z.string().optional().default(""),
    USER_SESSION: z.string().optional().default(""),
    MAILING_DELAY_MIN_MS: z.coerce.number().int().min(0).default(1000),
    MAILING_DELAY_MAX_MS: z.coerce.number().int().min(0).default(3000),
    MAILING_PAUSE_EVERY: z.coerce.number().int().min(1).default(50),
    MAILING_PAUSE_MIN_MS: z.coerce.number().int().min(0).default(10_000),
    MAILING_PAUSE_MAX_MS: z.coerce.number().int().min(0).default(20_000),
    MAILING_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  })
  .refine((env) => env.MAILING_DELAY_MAX_MS >= env.MAILING_DELAY_MIN_MS, {
    message: "MAILING_DELAY_MAX_MS must be >= MAILING_DELAY_MIN_MS",
  })
  .refine((env) => env.MAILING_PAUSE_MAX_MS >= env.MAILING_PAUSE_MIN_MS, {
    message: "MAILING_PAUSE_MAX_MS must be >= MAILING_PAUSE_MIN_MS",
  });

export type UserAccountConfig = {
  apiId: number;
  apiHash: string;
  session: string;
};

export type MailingConfig = {
  delayRangeMs: [number, number];
  pauseEvery: number;
  pauseRangeMs: [number, number];
  maxRetries: number;
};

export type AppConfig = {
  botToken: string;
  ownerUserId?: number;
  adminUserIds: Set<number>;
  storagePath: string;
  logPath: string;
  logLevel: LogLevel;
  defaultLocale: SupportedLocale;
  timeZone: string;
  retentionDays: number;
  catchUpOverdue: boolean;
  userAccount?: UserAccountConfig;
  mailing: MailingConfig;
};

function parseIdList(raw: string): Set<number> {
  return new Set(
    raw
      .split(",")
      .map((value) => Number(value.trim()))
      .filter((value) => Number.isInteger(value) && value !== 0),
  );
}

export function loadConfig(): AppConfig {
  const parsed = EnvSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new Error(
      `Invalid environment: ${parsed.error.issues.map((issue) => issue.message).join(", ")}`,
    );
  }
  const env = parsed.data;

  const ownerUserId = Number(env.OWNER_USER_ID.trim());
  const hasOwner = Number.isInteger(ownerUserId) && ownerUserId !== 0;
  const adminUserIds = parseIdList(env.ADMIN_USER_IDS);
  if (hasOwner) {
    adminUserIds.add(ownerUserId);
  }

  const apiId = Number(env.USER_API_ID.trim());
  const apiHash = env.USER_API_HASH.trim();
  const session = env.USER_SESSION.trim();
  const userAccount =
    Number.isInteger(apiId) && apiId > 0 && apiHash && session ? { apiId, apiHash, session } : undefined;

  return {
    botToken: env.BOT_TOKEN,
    ...(hasOwner ? { ownerUserId } : {}),
    adminUserIds,
    storagePath: env.STORAGE_PATH,
    logPath: env.LOG_PATH,
    logLevel: env.LOG_LEVEL,
    defaultLocale: env.DEFAULT_LOCALE,
    timeZone: env.TIMEZONE.trim() || "Europe/Moscow",
    retentionDays: env.RETENTION_DAYS,
    catchUpOverdue: env.CATCH_UP_OVERDUE,
    ...(userAccount ? { userAccount } : {}),
    mailing: {
      delayRangeMs: [env.MAILING_DELAY_MIN_MS, env.MAILING_DELAY_MAX_MS],
      pauseEvery: env.MAILING_PAUSE_EVERY,
      pauseRangeMs: [env.MAILING_PAUSE_MIN_MS, env.MAILING_PAUSE_MAX_MS],
      maxRetries: env.MAILING_MAX_RETRIES,
    },
  };
}
