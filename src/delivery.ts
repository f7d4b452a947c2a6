import { setTimeout as sleepFor } from "node:timers/promises";

import type { RandomSource } from "./draw";
import { shuffle } from "./draw";
import type { Clock } from "./job-scheduler";
import type { Logger } from "./logger";
import { normalizeError } from "./logger";
import type { DirectMessenger, DirectSendOutcome } from "./messaging";

export type DeliveryOutcome = "success" | "blocked" | "rate_limited" | "other_error";

export type DeliveryRecipient = {
  userId: number;
  /** Overrides the bulk text for this recipient. */
  text?: string;
};

export type DeliveryStats = {
  totalSent: number;
  successful: number;
  failed: number;
  blocked: number;
  throttled: number;
  otherErrors: number;
  startedAt: number;
  finishedAt: number;
};

export type RecipientResult = {
  userId: number;
  outcome: DeliveryOutcome;
  attempts: number;
  detail?: string;
};

export type DeliveryReport = {
  stats: DeliveryStats;
  results: RecipientResult[];
  cancelled: boolean;
};

export type DeliveryProgress = {
  processed: number;
  total: number;
  stats: DeliveryStats;
};

export type DelayRange = readonly [number, number];

export type DeliveryOptions = {
  delayRangeMs: DelayRange;
  /** An extra pause follows every `pauseEvery` sends. */
  pauseEvery: number;
  pauseRangeMs: DelayRange;
  maxRetries: number;
  /** Used when a rate-limit response carries no wait time. */
  fallbackRetryAfterSeconds: number;
  progressEvery: number;
  randomizeOrder: boolean;
  signal?: AbortSignal;
  onProgress?: (progress: DeliveryProgress) => void | Promise<void>;
};

export const DEFAULT_DELIVERY_OPTIONS: DeliveryOptions = {
  delayRangeMs: [1000, 3000],
  pauseEvery: 50,
  pauseRangeMs: [10_000, 20_000],
  maxRetries: 3,
  fallbackRetryAfterSeconds: 30,
  progressEvery: 10,
  randomizeOrder: true,
};

/** Rejects once `signal` aborts. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type BulkDeliveryDeps = {
  messenger: DirectMessenger;
  logger: Logger;
  defaults?: Partial<DeliveryOptions>;
  random?: RandomSource;
  sleep?: Sleep;
  clock?: Clock;
};

export function createDeliveryStats(startedAt: number): DeliveryStats {
  return {
    totalSent: 0,
    successful: 0,
    failed: 0,
    blocked: 0,
    throttled: 0,
    otherErrors: 0,
    startedAt,
    finishedAt: 0,
  };
}

export function deliveryDurationMs(stats: DeliveryStats): number {
  return stats.finishedAt ? stats.finishedAt - stats.startedAt : 0;
}

export function deliverySuccessRate(stats: DeliveryStats): number {
  return stats.totalSent > 0 ? (stats.successful / stats.totalSent) * 100 : 0;
}

function average(range: DelayRange): number {
  return (range[0] + range[1]) / 2;
}

/** Pre-flight duration estimate in milliseconds. */
export function estimateDeliveryTime(
  count: number,
  delayRangeMs: DelayRange = DEFAULT_DELIVERY_OPTIONS.delayRangeMs,
  pause: { every: number; rangeMs: DelayRange } = {
    every: DEFAULT_DELIVERY_OPTIONS.pauseEvery,
    rangeMs: DEFAULT_DELIVERY_OPTIONS.pauseRangeMs,
  },
): number {
  if (count <= 0) {
    return 0;
  }
  const pauses = pause.every > 0 ? Math.floor(count / pause.every) : 0;
  return Math.round(count * average(delayRangeMs) + pauses * average(pause.rangeMs));
}

function recordOutcome(stats: DeliveryStats, outcome: DeliveryOutcome): void {
  if (outcome === "success") {
    stats.successful += 1;
    return;
  }
  stats.failed += 1;
  if (outcome === "blocked") {
    stats.blocked += 1;
  } else if (outcome === "rate_limited") {
    stats.throttled += 1;
  } else {
    stats.otherErrors += 1;
  }
}

export class BulkDeliveryEngine {
  private readonly messenger: DirectMessenger;
  private readonly logger: Logger;
  private readonly defaults: DeliveryOptions;
  private readonly random: RandomSource;
  private readonly sleep: Sleep;
  private readonly clock: Clock;

  constructor(deps: BulkDeliveryDeps) {
    this.messenger = deps.messenger;
    this.logger = deps.logger;
    this.defaults = { ...DEFAULT_DELIVERY_OPTIONS, ...deps.defaults };
    this.random = deps.random ?? Math.random;
    this.sleep = deps.sleep ?? ((ms, signal) => sleepFor(ms, undefined, signal ? { signal } : {}));
    this.clock = deps.clock ?? Date.now;
  }

  estimateDeliveryTime(count: number, delayRangeMs: DelayRange = this.defaults.delayRangeMs): number {
    return estimateDeliveryTime(count, delayRangeMs, {
      every: this.defaults.pauseEvery,
      rangeMs: this.defaults.pauseRangeMs,
    });
  }

  /**
   * Sends to every recipient in turn. A stop requested through `signal` cuts
   * the current wait short and skips the remaining sends; whatever was
   * attempted so far is reported.
   */
  async sendBulk(
    recipients: readonly DeliveryRecipient[],
    messageText: string,
    overrides: Partial<DeliveryOptions> = {},
  ): Promise<DeliveryReport> {
    const options: DeliveryOptions = { ...this.defaults, ...overrides };
    const stats = createDeliveryStats(this.clock());
    const results: RecipientResult[] = [];
    const ordered = options.randomizeOrder ? shuffle(recipients, this.random) : [...recipients];
    let cancelled = false;

    this.logger.info("delivery_started", { recipients: ordered.length });

    for (let i = 0; i < ordered.length; i++) {
      const recipient = ordered[i];
      if (!recipient) {
        continue;
      }
      if (options.signal?.aborted) {
        cancelled = true;
        this.logger.info("delivery_stopped", { processed: i, total: ordered.length });
        break;
      }

      stats.totalSent += 1;
      const result = await this.deliverOne(recipient, messageText, options);
      recordOutcome(stats, result.outcome);
      results.push(result);

      const processed = i + 1;
      if (options.onProgress && processed % options.progressEvery === 0) {
        await this.reportProgress(options.onProgress, { processed, total: ordered.length, stats: { ...stats } });
      }

      if (processed < ordered.length) {
        let waited = await this.wait(this.pickDelay(options.delayRangeMs), options.signal);
        if (waited && processed % options.pauseEvery === 0) {
          const pause = this.pickDelay(options.pauseRangeMs);
          this.logger.debug("delivery_extended_pause", { processed, pauseMs: pause });
          waited = await this.wait(pause, options.signal);
        }
        if (!waited) {
          cancelled = true;
          this.logger.info("delivery_stopped", { processed, total: ordered.length });
          break;
        }
      }
    }

    stats.finishedAt = this.clock();
    this.logger.info("delivery_finished", {
      totalSent: stats.totalSent,
      successful: stats.successful,
      blocked: stats.blocked,
      throttled: stats.throttled,
      otherErrors: stats.otherErrors,
      cancelled,
    });
    return { stats, results, cancelled };
  }

  private async deliverOne(
    recipient: DeliveryRecipient,
    fallbackText: string,
    options: DeliveryOptions,
  ): Promise<RecipientResult> {
    const text = recipient.text ?? fallbackText;
    let attempts = 0;

    for (;;) {
      attempts += 1;
      const outcome = await this.attempt(recipient.userId, text);

      switch (outcome.kind) {
        case "sent":
          return { userId: recipient.userId, outcome: "success", attempts };
        case "blocked":
          this.logger.debug("delivery_blocked", { userId: recipient.userId, reason: outcome.reason });
          return { userId: recipient.userId, outcome: "blocked", attempts, detail: outcome.reason };
        case "failed":
          this.logger.warn("delivery_failed", { userId: recipient.userId, reason: outcome.reason });
          return { userId: recipient.userId, outcome: "other_error", attempts, detail: outcome.reason };
        case "rate_limited": {
          const waitSeconds =
            outcome.retryAfterSeconds > 0 ? outcome.retryAfterSeconds : options.fallbackRetryAfterSeconds;
          if (attempts > options.maxRetries || options.signal?.aborted) {
            this.logger.warn("delivery_rate_limit_exhausted", { userId: recipient.userId, attempts });
            return {
              userId: recipient.userId,
              outcome: "rate_limited",
              attempts,
              detail: `retry after ${waitSeconds}s`,
            };
          }
          this.logger.warn("delivery_rate_limited", { userId: recipient.userId, waitSeconds, attempts });
          if (!(await this.wait(waitSeconds * 1000, options.signal))) {
            return {
              userId: recipient.userId,
              outcome: "rate_limited",
              attempts,
              detail: "stopped during backoff",
            };
          }
          break;
        }
      }
    }
  }

  /** False when the wait was cut short by a stop request. */
  private async wait(ms: number, signal: AbortSignal | undefined): Promise<boolean> {
    if (signal?.aborted) {
      return false;
    }
    try {
      await this.sleep(ms, signal);
    } catch (error) {
      if (signal?.aborted) {
        return false;
      }
      throw error;
    }
    return !signal?.aborted;
  }

  private async attempt(userId: number, text: string): Promise<DirectSendOutcome> {
    try {
      return await this.messenger.sendDirect(userId, text);
    } catch (error) {
      return { kind: "failed", reason: normalizeError(error).message };
    }
  }

  private async reportProgress(
    onProgress: NonNullable<DeliveryOptions["onProgress"]>,
    progress: DeliveryProgress,
  ): Promise<void> {
    try {
      await onProgress(progress);
    } catch (error) {
      this.logger.warn("delivery_progress_callback_failed", normalizeError(error));
    }
  }

  private pickDelay(range: DelayRange): number {
    const [min, max] = range;
    return min + this.random() * Math.max(0, max - min);
  }
}
