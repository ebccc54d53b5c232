export type JsonAny = boolean | number | string | null | undefined | JsonAny[] | { [key: string]: JsonAny };

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

/** Structured context attached to a log entry, such as the guild or user involved. */
export type LogExtra = ReadonlyMap<string, JsonAny>;

/**
 * Every level takes either a message or an error. Clients that report to an aggregator send
 * `error` and `fatal` as exceptions and the lower levels as breadcrumbs.
 */
export interface LogService {
  debug(error: Error | string, extra?: LogExtra): void;
  info(error: Error | string, extra?: LogExtra): void;
  warn(error: Error | string, extra?: LogExtra): void;
  error(error: Error | string, extra?: LogExtra): void;
  fatal(error: Error | string, extra?: LogExtra): void;
}
