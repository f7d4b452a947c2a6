import fs from "node:fs";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogPayload = Record<string, unknown>;

export interface Logger {
  debug(event: string, payload?: LogPayload): void;
  info(event: string, payload?: LogPayload): void;
  warn(event: string, payload?: LogPayload): void;
  error(event: string, payload?: LogPayload): void;
  child(scope: string): Logger;
}

export type LoggerConfig = {
  logPath: string;
  level?: LogLevel;
  console?: boolean;
};

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function normalizeError(reason: unknown): { message: string; stack?: string } {
  if (reason instanceof Error) {
    return { message: reason.message, ...(reason.stack ? { stack: reason.stack } : {}) };
  }
  return { message: String(reason) };
}

export class AppLogger implements Logger {
  private readonly logPath: string;
  private readonly level: LogLevel;
  private readonly mirrorToConsole: boolean;
  private readonly scope: string | undefined;

  constructor(config: LoggerConfig, scope?: string) {
    this.logPath = config.logPath;
    this.level = config.level ?? "info";
    this.mirrorToConsole = config.console ?? true;
    this.scope = scope;
    if (!scope) {
      fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
    }
  }

  debug(event: string, payload?: LogPayload): void {
    this.write("debug", event, payload);
  }

  info(event: string, payload?: LogPayload): void {
    this.write("info", event, payload);
  }

  warn(event: string, payload?: LogPayload): void {
    this.write("warn", event, payload);
  }

  error(event: string, payload?: LogPayload): void {
    this.write("error", event, payload);
  }

  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}.${scope}` : scope;
    return new AppLogger(
      { logPath: this.logPath, level: this.level, console: this.mirrorToConsole },
      nested,
    );
  }

  private write(level: LogLevel, event: string, payload?: LogPayload): void {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.level]) {
      return;
    }
    const entry = {
      ts: new Date().toISOString(),
      level,
      ...(this.scope ? { scope: this.scope } : {}),
      event,
      ...(payload ? { payload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    fs.appendFileSync(this.logPath, line, "utf8");
    if (this.mirrorToConsole) {
      // eslint-disable-next-line no-console
      console.log(line.trim());
    }
  }
}
