import { Preconditions } from "./base/preconditions.mjs";

export type Mode = "development" | "production";

export interface Env {
  MODE: Mode;
  PORT: number;

  DISCORD_APP_ID: string;
  DISCORD_TOKEN: string;
  DISCORD_PUBLIC_KEY: string;

  VALORANT_API_KEY: string | undefined;
  VALORANT_API_REQUESTS_PER_MINUTE: number;

  DATABASE_PATH: string;
  SENTRY_DSN: string | undefined;

  GAME_ACTIVITY_NAME: string;
  COMPETITIVE_ONLY: boolean;

  GROUP_WAIT_TIME_MS: number;
  GROUP_MAX_WAIT_TIME_MS: number;
  API_WAIT_TIME_MS: number;
  RESOLUTION_RETRY_DELAY_MS: number;

  FETCH_RATE_LIMIT_MAX_ATTEMPTS: number;
  FETCH_UNAVAILABLE_MAX_ATTEMPTS: number;
  FETCH_MAX_ATTEMPTS_PER_CYCLE: number;
  FETCH_BACKOFF_BASE_MS: number;
  FETCH_BACKOFF_MAX_MS: number;
}

type EnvSource = Readonly<Record<string, string | undefined>>;

const UNAUTHENTICATED_REQUESTS_PER_MINUTE = 30;
const AUTHENTICATED_REQUESTS_PER_MINUTE = 90;

function optionalString(source: EnvSource, name: string): string | undefined {
  const value = source[name]?.trim();
  return value != null && value !== "" ? value : undefined;
}

function requiredString(source: EnvSource, name: string): string {
  return Preconditions.checkExists(optionalString(source, name), `Missing required environment variable ${name}`);
}

function integer(source: EnvSource, name: string, defaultValue: number, min = 0): number {
  const raw = optionalString(source, name);
  if (raw === undefined) {
    return defaultValue;
  }

  const value = Number(raw);
  Preconditions.checkArgument(
    Number.isInteger(value) && value >= min,
    `Environment variable ${name} must be an integer >= ${min.toString()}, got "${raw}"`,
  );

  return value;
}

function boolean(source: EnvSource, name: string, defaultValue: boolean): boolean {
  const raw = optionalString(source, name)?.toLowerCase();
  switch (raw) {
    case undefined: {
      return defaultValue;
    }
    case "true":
    case "1":
    case "yes": {
      return true;
    }
    case "false":
    case "0":
    case "no": {
      return false;
    }
    default: {
      throw new Error(`Environment variable ${name} must be a boolean, got "${raw}"`);
    }
  }
}

function mode(source: EnvSource): Mode {
  const raw = optionalString(source, "MODE") ?? "production";
  Preconditions.checkArgument(
    raw === "development" || raw === "production",
    `Environment variable MODE must be "development" or "production", got "${raw}"`,
  );

  return raw === "development" ? "development" : "production";
}

export function loadEnv(source: EnvSource = process.env): Env {
  const valorantApiKey = optionalString(source, "VALORANT_API_KEY");
  const groupWaitTimeMs = integer(source, "GROUP_WAIT_TIME_MS", 30_000);
  const groupMaxWaitTimeMs = integer(source, "GROUP_MAX_WAIT_TIME_MS", 120_000);

  Preconditions.checkArgument(
    groupMaxWaitTimeMs >= groupWaitTimeMs,
    "GROUP_MAX_WAIT_TIME_MS must not be less than GROUP_WAIT_TIME_MS",
  );

  return {
    MODE: mode(source),
    PORT: integer(source, "PORT", 3000, 1),

    DISCORD_APP_ID: requiredString(source, "DISCORD_APP_ID"),
    DISCORD_TOKEN: requiredString(source, "DISCORD_TOKEN"),
    DISCORD_PUBLIC_KEY: requiredString(source, "DISCORD_PUBLIC_KEY"),

    VALORANT_API_KEY: valorantApiKey,
    VALORANT_API_REQUESTS_PER_MINUTE: integer(
      source,
      "VALORANT_API_REQUESTS_PER_MINUTE",
      valorantApiKey !== undefined ? AUTHENTICATED_REQUESTS_PER_MINUTE : UNAUTHENTICATED_REQUESTS_PER_MINUTE,
      1,
    ),

    DATABASE_PATH: optionalString(source, "DATABASE_PATH") ?? "squad-tracker.db",
    SENTRY_DSN: optionalString(source, "SENTRY_DSN"),

    GAME_ACTIVITY_NAME: (optionalString(source, "GAME_ACTIVITY_NAME") ?? "valorant").toLowerCase(),
    COMPETITIVE_ONLY: boolean(source, "COMPETITIVE_ONLY", true),

    GROUP_WAIT_TIME_MS: groupWaitTimeMs,
    GROUP_MAX_WAIT_TIME_MS: groupMaxWaitTimeMs,
    API_WAIT_TIME_MS: integer(source, "API_WAIT_TIME_MS", 60_000),
    RESOLUTION_RETRY_DELAY_MS: integer(source, "RESOLUTION_RETRY_DELAY_MS", 15_000),

    FETCH_RATE_LIMIT_MAX_ATTEMPTS: integer(source, "FETCH_RATE_LIMIT_MAX_ATTEMPTS", 5, 1),
    FETCH_UNAVAILABLE_MAX_ATTEMPTS: integer(source, "FETCH_UNAVAILABLE_MAX_ATTEMPTS", 3, 1),
    FETCH_MAX_ATTEMPTS_PER_CYCLE: integer(source, "FETCH_MAX_ATTEMPTS_PER_CYCLE", 8, 1),
    FETCH_BACKOFF_BASE_MS: integer(source, "FETCH_BACKOFF_BASE_MS", 1_000),
    FETCH_BACKOFF_MAX_MS: integer(source, "FETCH_BACKOFF_MAX_MS", 60_000),
  };
}
