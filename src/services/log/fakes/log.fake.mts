import type { JsonAny, LogLevel, LogService } from "../types.mjs";

export interface LoggedEntry {
  level: LogLevel;
  error: Error | string;
  extra: ReadonlyMap<string, JsonAny> | undefined;
}

export class FakeLogService implements LogService {
  readonly entries: LoggedEntry[] = [];

  debug(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.entries.push({ level: "debug", error, extra });
  }
  info(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.entries.push({ level: "info", error, extra });
  }
  warn(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.entries.push({ level: "warn", error, extra });
  }
  error(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.entries.push({ level: "error", error, extra });
  }
  fatal(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.entries.push({ level: "fatal", error, extra });
  }

  messages(level: LogLevel): string[] {
    return this.entries
      .filter((entry) => entry.level === level)
      .map(({ error }) => (error instanceof Error ? error.message : error));
  }
}

export function aFakeLogServiceWith(): FakeLogService {
  return new FakeLogService();
}
