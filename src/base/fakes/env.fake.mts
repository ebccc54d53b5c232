import type { Env } from "../../config.mjs";

export function aFakeEnvWith(env: Partial<Env> = {}): Env {
  const defaultOpts: Env = {
    MODE: "development",
    PORT: 3000,
    DISCORD_APP_ID: "DISCORD_APP_ID",
    DISCORD_TOKEN: "DISCORD_TOKEN",
    DISCORD_PUBLIC_KEY: "DISCORD_PUBLIC_KEY",
    VALORANT_API_KEY: undefined,
    VALORANT_API_REQUESTS_PER_MINUTE: 30,
    DATABASE_PATH: ":memory:",
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
  };

  return {
    ...defaultOpts,
    ...env,
  };
}
