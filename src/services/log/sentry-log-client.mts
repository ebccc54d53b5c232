import { captureException, addBreadcrumb, captureMessage } from "@sentry/node";
import type { Mode } from "../../config.mjs";
import type { LogService, JsonAny } from "./types.mjs";

/**
 * Sentry-based logging client that uses breadcrumbs for info/debug and
 * only creates issues for actual errors and warnings with Error objects.
 */
export class SentryLogClient implements LogService {
  private readonly shouldLog: boolean;

  constructor(mode: Mode = "production") {
    this.shouldLog = mode === "production";
  }

  debug(error: Error | string, extra: ReadonlyMap<string, JsonAny> = new Map()): void {
    this.breadcrumb("debug", error, extra);
  }

  info(error: Error | string, extra: ReadonlyMap<string, JsonAny> = new Map()): void {
    this.breadcrumb("info", error, extra);
  }

  warn(error: Error | string, extra: ReadonlyMap<string, JsonAny> = new Map()): void {
    if (error instanceof Error) {
      this.capture("warning", error, extra);
    } else {
      this.breadcrumb("warning", error, extra);
    }
  }

  error(error: Error | string, extra: ReadonlyMap<string, JsonAny> = new Map()): void {
    this.capture("error", error, extra);
  }

  fatal(error: Error | string, extra: ReadonlyMap<string, JsonAny> = new Map()): void {
    this.capture("fatal", error, extra);
  }

  private breadcrumb(
    level: "debug" | "info" | "warning",
    error: Error | string,
    extra: ReadonlyMap<string, JsonAny>,
  ): void {
    if (!this.shouldLog) {
      return;
    }

    addBreadcrumb({
      category: level,
      message: error instanceof Error ? error.message : error,
      level,
      data: Object.fromEntries(extra),
    });
  }

  private capture(level: "warning" | "error" | "fatal", error: Error | string, extra: ReadonlyMap<string, JsonAny>): void {
    if (!this.shouldLog) {
      return;
    }

    if (error instanceof Error) {
      captureException(error, {
        level,
        extra: Object.fromEntries(extra),
      });
    } else {
      captureMessage(error, {
        level,
        extra: Object.fromEntries(extra),
      });
    }
  }
}
