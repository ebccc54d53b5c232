import { describe, expect, it, vi } from "vitest";
import { AggregatorClient } from "../aggregator-client.mjs";
import { aFakeLogServiceWith } from "../fakes/log.fake.mjs";
import type { LogService } from "../types.mjs";

describe("AggregatorClient", () => {
  it("forwards each level to every client", () => {
    const first = aFakeLogServiceWith();
    const second = aFakeLogServiceWith();
    const client = new AggregatorClient([first, second]);
    const extra = new Map([["guildId", "guild-1"]]);

    client.debug("debug message");
    client.info("info message", extra);
    client.warn("warn message");
    client.error(new Error("error message"));
    client.fatal("fatal message");

    for (const service of [first, second]) {
      expect(service.entries.map(({ level }) => level)).toEqual(["debug", "info", "warn", "error", "fatal"]);
      expect(service.messages("info")).toEqual(["info message"]);
      expect(service.messages("error")).toEqual(["error message"]);
      expect(service.entries[1]?.extra).toBe(extra);
    }
  });

  it("keeps delivering when one client throws", () => {
    const consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const failing: LogService = {
      debug: vi.fn(),
      info: vi.fn(() => {
        throw new Error("broken client");
      }),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
    };
    const healthy = aFakeLogServiceWith();
    const client = new AggregatorClient([failing, healthy]);

    client.info("still delivered");

    expect(healthy.messages("info")).toEqual(["still delivered"]);
    expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
  });
});
