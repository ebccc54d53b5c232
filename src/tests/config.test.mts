import { describe, expect, it } from "vitest";
import { loadEnv } from "../config.mjs";

const required = {
  DISCORD_APP_ID: "app-id",
  DISCORD_TOKEN: "test-token",
  DISCORD_PUBLIC_KEY: "test-public-key",
};

describe("loadEnv", () => {
  it("applies defaults for everything optional", () => {
    const env = loadEnv(required);

    expect(env).toEqual({
      MODE: "production",
      PORT: 3000,
      DISCORD_APP_ID: "app-id",
      DISCORD_TOKEN: "test-token",
      DISCORD_PUBLIC_KEY: "test-public-key",
      VALORANT_API_KEY: undefined,
      VALORANT_API_REQUESTS_PER_MINUTE: 30,
      DATABASE_PATH: "squad-tracker.db",
      SENTRY_DSN: undefined,
      GAME_ACTIVITY_NAME: "valorant",
      COMPETITIVE_ONLY: true,
      GROUP_WAIT_TIME_MS: 30_000,
      GROUP_MAX_WAIT_TIME_MS: 120_000,
      API_WAIT_TIME_MS: 60_000,
      RESOLUTION_RETRY_DELAY_MS: 15_000,
      FETCH_RATE_LIMIT_MAX_ATTEMPTS: 5,
      FETCH_UNAVAILABLE_MAX_ATTEMPTS: 3,
      FETCH_MAX_ATTEMPTS_PER_CYCLE: 8,
      FETCH_BACKOFF_BASE_MS: 1_000,
      FETCH_BACKOFF_MAX_MS: 60_000,
    });
  });

  it("throws when a required variable is missing", () => {
    expect(() => loadEnv({ DISCORD_APP_ID: "app-id", DISCORD_TOKEN: "test-token" })).toThrow(
      "Missing required environment variable DISCORD_PUBLIC_KEY",
    );
  });

  it("treats blank values as missing", () => {
    expect(() => loadEnv({ ...required, DISCORD_TOKEN: "  " })).toThrow(
      "Missing required environment variable DISCORD_TOKEN",
    );
  });

  it("raises the request budget when an api key is configured", () => {
    const env = loadEnv({ ...required, VALORANT_API_KEY: "test-secret" });

    expect(env.VALORANT_API_KEY).toBe("test-secret");
    expect(env.VALORANT_API_REQUESTS_PER_MINUTE).toBe(90);
  });

  it("parses numbers and booleans", () => {
    const env = loadEnv({
      ...required,
      MODE: "development",
      PORT: "8787",
      COMPETITIVE_ONLY: "false",
      GROUP_WAIT_TIME_MS: "5000",
      GAME_ACTIVITY_NAME: "VALORANT",
    });

    expect(env.MODE).toBe("development");
    expect(env.PORT).toBe(8787);
    expect(env.COMPETITIVE_ONLY).toBe(false);
    expect(env.GROUP_WAIT_TIME_MS).toBe(5000);
    expect(env.GAME_ACTIVITY_NAME).toBe("valorant");
  });

  it("rejects malformed numbers", () => {
    expect(() => loadEnv({ ...required, API_WAIT_TIME_MS: "soon" })).toThrow(
      'Environment variable API_WAIT_TIME_MS must be an integer >= 0, got "soon"',
    );
  });

  it("rejects malformed booleans", () => {
    expect(() => loadEnv({ ...required, COMPETITIVE_ONLY: "maybe" })).toThrow(
      'Environment variable COMPETITIVE_ONLY must be a boolean, got "maybe"',
    );
  });

  it("rejects an unknown mode", () => {
    expect(() => loadEnv({ ...required, MODE: "staging" })).toThrow(
      'Environment variable MODE must be "development" or "production", got "staging"',
    );
  });

  it("rejects a max group wait shorter than the group wait", () => {
    expect(() => loadEnv({ ...required, GROUP_WAIT_TIME_MS: "60000", GROUP_MAX_WAIT_TIME_MS: "30000" })).toThrow(
      "GROUP_MAX_WAIT_TIME_MS must not be less than GROUP_WAIT_TIME_MS",
    );
  });
});
