import type { Logger } from "./logger";
import { normalizeError } from "./logger";

export type Clock = () => number;

export type JobCallback = () => void | Promise<void>;

/** Arms a one-shot timer and returns its canceller. */
export type TimerDriver = (callback: () => void, delayMs: number) => () => void;

export type ScheduledJobInfo = {
  key: string;
  description: string;
  runAt: Date;
};

export type SchedulerStatus = {
  running: boolean;
  jobsCount: number;
  jobs: ScheduledJobInfo[];
};

type JobEntry = {
  key: string;
  description: string;
  runAt: number;
  callback: JobCallback;
  disarm: () => void;
};

// setTimeout overflows above this and fires immediately.
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const nodeTimerDriver: TimerDriver = (callback, delayMs) => {
  const handle = setTimeout(callback, delayMs);
  return () => clearTimeout(handle);
};

export type JobSchedulerOptions = {
  logger: Logger;
  clock?: Clock;
  timers?: TimerDriver;
};

export class JobScheduler {
  private readonly jobs = new Map<string, JobEntry>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly timers: TimerDriver;
  private running = true;

  constructor(options: JobSchedulerOptions) {
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
    this.timers = options.timers ?? nodeTimerDriver;
  }

  /** Registers a one-shot job; an existing job under `key` is replaced. */
  schedule(key: string, runAt: Date, callback: JobCallback, description = key): void {
    if (!this.running) {
      this.logger.warn("job_schedule_after_stop", { key });
      return;
    }
    this.cancel(key);
    const entry: JobEntry = {
      key,
      description,
      runAt: runAt.getTime(),
      callback,
      disarm: () => undefined,
    };
    this.jobs.set(key, entry);
    this.arm(entry);
  }

  /** Runs `callback` every `intervalMs`, first time one interval from now. */
  scheduleRecurring(key: string, intervalMs: number, callback: JobCallback, description = key): void {
    const next = (): void => {
      this.schedule(
        key,
        new Date(this.clock() + intervalMs),
        async () => {
          next();
          await callback();
        },
        description,
      );
    };
    next();
  }

  cancel(key: string): boolean {
    const entry = this.jobs.get(key);
    if (!entry) {
      return false;
    }
    entry.disarm();
    this.jobs.delete(key);
    return true;
  }

  has(key: string): boolean {
    return this.jobs.has(key);
  }

  status(): SchedulerStatus {
    const jobs = [...this.jobs.values()]
      .sort((a, b) => a.runAt - b.runAt)
      .map((entry) => ({ key: entry.key, description: entry.description, runAt: new Date(entry.runAt) }));
    return { running: this.running, jobsCount: jobs.length, jobs };
  }

  /** Cancels every pending job and waits for the ones already running. */
  async stop(): Promise<void> {
    this.running = false;
    for (const key of [...this.jobs.keys()]) {
      this.cancel(key);
    }
    await this.drain();
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private arm(entry: JobEntry): void {
    const delay = Math.max(0, entry.runAt - this.clock());
    const step = Math.min(delay, MAX_TIMER_DELAY_MS);
    entry.disarm = this.timers(() => {
      if (this.jobs.get(entry.key) !== entry) {
        return;
      }
      if (entry.runAt > this.clock()) {
        this.arm(entry);
        return;
      }
      this.jobs.delete(entry.key);
      this.fire(entry);
    }, step);
  }

  private fire(entry: JobEntry): void {
    const run = (async () => {
      try {
        await entry.callback();
      } catch (error) {
        this.logger.error("job_failed", { key: entry.key, ...normalizeError(error) });
      }
    })();
    this.inFlight.add(run);
    void run.finally(() => this.inFlight.delete(run));
  }
}
