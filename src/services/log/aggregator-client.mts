import type { LogService, JsonAny, LogLevel } from "./types.mjs";

/**
 * Fans every log call out to each of the wrapped clients. A client that throws does not stop the
 * remaining clients from receiving the entry.
 */
export class AggregatorClient implements LogService {
  private readonly clients: readonly LogService[];

  constructor(clients: readonly LogService[]) {
    this.clients = clients;
  }

  debug(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.dispatch("debug", error, extra);
  }

  info(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.dispatch("info", error, extra);
  }

  warn(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.dispatch("warn", error, extra);
  }

  error(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.dispatch("error", error, extra);
  }

  fatal(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    this.dispatch("fatal", error, extra);
  }

  private dispatch(level: LogLevel, error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    for (const client of this.clients) {
      try {
        client[level](error, extra);
      } catch (clientError) {
        console.error("Log client failed", clientError);
      }
    }
  }
}
