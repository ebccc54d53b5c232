import type { Mode } from "../../config.mjs";
import type { LogService, JsonAny } from "./types.mjs";

export class ConsoleLogClient implements LogService {
  private readonly verbose: boolean;

  constructor(mode: Mode = "production") {
    this.verbose = mode === "development";
  }

  debug(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    if (!this.verbose) {
      return;
    }

    console.debug(this.timestamp(), error, this.formatExtra(extra));
  }

  info(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    console.info(this.timestamp(), error, this.formatExtra(extra));
  }

  warn(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    console.warn(this.timestamp(), error, this.formatExtra(extra));
  }

  error(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    console.error(this.timestamp(), error, this.formatExtra(extra));
  }

  fatal(error: Error | string, extra?: ReadonlyMap<string, JsonAny>): void {
    console.error(this.timestamp(), "FATAL:", error, this.formatExtra(extra));
  }

  private timestamp(): string {
    return `[${new Date().toISOString()}]`;
  }

  private formatExtra(extra?: ReadonlyMap<string, JsonAny>): string {
    return extra && extra.size > 0 ? JSON.stringify(Object.fromEntries(extra)) : "";
  }
}
