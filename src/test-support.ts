import type { LogLevel, LogPayload, Logger } from "./logger";
import type { TimerDriver } from "./job-scheduler";
import type {
  ChatMemberStatus,
  ChatMessenger,
  DirectMessenger,
  DirectSendOutcome,
  SendMessageOptions,
  SentMessage,
} from "./messaging";

export type LogEntry = {
  level: LogLevel;
  scope?: string;
  event: string;
  payload?: LogPayload;
};

export class MemoryLogger implements Logger {
  constructor(
    readonly entries: LogEntry[] = [],
    private readonly scope?: string,
  ) {}

  debug(event: string, payload?: LogPayload): void {
    this.push("debug", event, payload);
  }

  info(event: string, payload?: LogPayload): void {
    this.push("info", event, payload);
  }

  warn(event: string, payload?: LogPayload): void {
    this.push("warn", event, payload);
  }

  error(event: string, payload?: LogPayload): void {
    this.push("error", event, payload);
  }

  child(scope: string): Logger {
    return new MemoryLogger(this.entries, this.scope ? `${this.scope}.${scope}` : scope);
  }

  events(level?: LogLevel): string[] {
    return this.entries.filter((entry) => !level || entry.level === level).map((entry) => entry.event);
  }

  private push(level: LogLevel, event: string, payload?: LogPayload): void {
    this.entries.push({
      level,
      event,
      ...(this.scope ? { scope: this.scope } : {}),
      ...(payload ? { payload } : {}),
    });
  }
}

type PendingTimer = {
  id: number;
  dueAt: number;
  callback: () => void;
};

/** Virtual time: timers only fire on `advance`. */
export class ManualTimers {
  private pending: PendingTimer[] = [];
  private nextId = 1;

  constructor(public now: number = Date.parse("2026-01-10T12:00:00.000Z")) {}

  readonly clock = (): number => this.now;

  readonly driver: TimerDriver = (callback, delayMs) => {
    const timer = { id: this.nextId++, dueAt: this.now + delayMs, callback };
    this.pending.push(timer);
    return () => {
      this.pending = this.pending.filter((entry) => entry.id !== timer.id);
    };
  };

  get pendingCount(): number {
    return this.pending.length;
  }

  advance(ms: number): void {
    this.now += ms;
    for (;;) {
      const due = this.pending
        .filter((entry) => entry.dueAt <= this.now)
        .sort((a, b) => a.dueAt - b.dueAt || a.id - b.id)[0];
      if (!due) {
        return;
      }
      this.pending = this.pending.filter((entry) => entry.id !== due.id);
      due.callback();
    }
  }
}

export type SentChatMessage = {
  chatId: number;
  text: string;
  options?: SendMessageOptions;
};

export type EditedChatMessage = SentChatMessage & { messageId: number };

export class FakeChatMessenger implements ChatMessenger {
  readonly sent: SentChatMessage[] = [];
  readonly edited: EditedChatMessage[] = [];
  /** Edits of these message ids fail, as for a post removed from the channel. */
  readonly missingMessages = new Set<number>();
  readonly members = new Map<string, ChatMemberStatus | Error>();
  readonly failingChats = new Set<number>();
  private nextMessageId = 100;

  setMember(chatId: number, userId: number, status: ChatMemberStatus | Error): void {
    this.members.set(`${chatId}:${userId}`, status);
  }

  async sendMessage(chatId: number, text: string, options?: SendMessageOptions): Promise<SentMessage> {
    if (this.failingChats.has(chatId)) {
      throw new Error(`chat ${chatId} unavailable`);
    }
    this.sent.push({ chatId, text, ...(options ? { options } : {}) });
    return { messageId: this.nextMessageId++ };
  }

  async editMessage(chatId: number, messageId: number, text: string, options?: SendMessageOptions): Promise<void> {
    if (this.failingChats.has(chatId) || this.missingMessages.has(messageId)) {
      throw new Error(`message ${messageId} to edit not found`);
    }
    this.edited.push({ chatId, messageId, text, ...(options ? { options } : {}) });
  }

  async getChatMemberStatus(chatId: number, userId: number): Promise<ChatMemberStatus> {
    const status = this.members.get(`${chatId}:${userId}`) ?? "left";
    if (status instanceof Error) {
      throw status;
    }
    return status;
  }

  textsTo(chatId: number): string[] {
    return this.sent.filter((message) => message.chatId === chatId).map((message) => message.text);
  }
}

export class FakeDirectMessenger implements DirectMessenger {
  readonly calls: Array<{ userId: number; text: string }> = [];
  private readonly scripted = new Map<number, Array<DirectSendOutcome | Error>>();

  /** Queues outcomes for a user; once drained, sends succeed. */
  script(userId: number, ...outcomes: Array<DirectSendOutcome | Error>): void {
    this.scripted.set(userId, [...(this.scripted.get(userId) ?? []), ...outcomes]);
  }

  async sendDirect(userId: number, text: string): Promise<DirectSendOutcome> {
    this.calls.push({ userId, text });
    const next = this.scripted.get(userId)?.shift();
    if (next instanceof Error) {
      throw next;
    }
    return next ?? { kind: "sent" };
  }
}

export function recordingSleep(): { sleep: (ms: number) => Promise<void>; waits: number[] } {
  const waits: number[] = [];
  return {
    waits,
    sleep: async (ms: number) => {
      waits.push(ms);
    },
  };
}

/** Cycles through `values`; handy as a deterministic `RandomSource`. */
export function sequenceRandom(values: readonly number[]): () => number {
  let index = 0;
  return () => {
    const value = values[index % values.length] ?? 0;
    index += 1;
    return value;
  };
}
