import type { Env } from "../../config.mjs";
import type { LogService } from "../log/types.mjs";
import { ValorantApiError, ValorantPayloadError } from "./valorant-api-error.mjs";
import type { MatchRecord, RiotAccount } from "./types.mjs";
import { accountKey, isCompetitive, riotId } from "./types.mjs";

export enum MatchFetchErrorKind {
  NOT_FOUND = "NotFound",
  RATE_LIMITED = "RateLimited",
  UNAVAILABLE = "Unavailable",
  MODE_EXCLUDED = "ModeExcluded",
}

export interface MatchFetchError {
  kind: MatchFetchErrorKind;
  message: string;
  /** Requests made for the account in this cycle when the failure was reported. */
  attempts: number;
  /** Whether a later request in the same cycle may succeed. */
  retryable: boolean;
}

export type MatchFetchResult = { ok: true; match: MatchRecord } | { ok: false; error: MatchFetchError };

export interface LastMatchSource {
  getLastMatch(account: RiotAccount): Promise<MatchRecord | undefined>;
}

export type MatchFetcherConfig = Pick<
  Env,
  | "API_WAIT_TIME_MS"
  | "COMPETITIVE_ONLY"
  | "FETCH_RATE_LIMIT_MAX_ATTEMPTS"
  | "FETCH_UNAVAILABLE_MAX_ATTEMPTS"
  | "FETCH_MAX_ATTEMPTS_PER_CYCLE"
  | "FETCH_BACKOFF_BASE_MS"
  | "FETCH_BACKOFF_MAX_MS"
>;

export interface MatchFetcherOpts {
  source: LastMatchSource;
  logService: LogService;
  config: MatchFetcherConfig;
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class MatchFetcher {
  private readonly source: LastMatchSource;
  private readonly logService: LogService;
  private readonly config: MatchFetcherConfig;

  constructor({ source, logService, config }: MatchFetcherOpts) {
    this.source = source;
    this.logService = logService;
    this.config = config;
  }

  /**
   * Starts a fetch cycle for one squad resolution. Results are cached per account for the lifetime of
   * the cycle and the provider settle wait is shared by every account in it.
   */
  startCycle(): MatchFetchCycle {
    return new MatchFetchCycle(this.source, this.logService, this.config);
  }
}

export class MatchFetchCycle {
  private settled: Promise<void> | undefined;
  private readonly results = new Map<string, Promise<MatchFetchResult>>();
  private readonly attempts = new Map<string, number>();

  constructor(
    private readonly source: LastMatchSource,
    private readonly logService: LogService,
    private readonly config: MatchFetcherConfig,
  ) {}

  async fetch(account: RiotAccount): Promise<MatchFetchResult> {
    const key = accountKey(account);
    let result = this.results.get(key);
    if (!result) {
      result = this.run(account);
      this.results.set(key, result);
    }

    return result;
  }

  async refetch(account: RiotAccount): Promise<MatchFetchResult> {
    const result = this.run(account);
    this.results.set(accountKey(account), result);
    return result;
  }

  attemptsFor(account: RiotAccount): number {
    return this.attempts.get(accountKey(account)) ?? 0;
  }

  private async waitForSettle(): Promise<void> {
    this.settled ??= sleep(this.config.API_WAIT_TIME_MS);
    return this.settled;
  }

  /**
   * Exponential delay seeded with the provider's hint and capped at FETCH_BACKOFF_MAX_MS. The cap never
   * brings the delay below the hint itself.
   */
  private backoffMs(attempt: number, hintMs: number | undefined): number {
    const base = hintMs ?? this.config.FETCH_BACKOFF_BASE_MS;
    const exponential = Math.min(this.config.FETCH_BACKOFF_MAX_MS, base * Math.pow(2, attempt - 1));
    return Math.max(hintMs ?? 0, exponential);
  }

  private failure(
    account: RiotAccount,
    kind: MatchFetchErrorKind,
    message: string,
    retryable = false,
  ): MatchFetchResult {
    const attempts = this.attemptsFor(account);
    this.logService.info(
      `Match fetch for ${riotId(account)} failed: ${kind}`,
      new Map<string, string | number>([
        ["kind", kind],
        ["message", message],
        ["attempts", attempts],
      ]),
    );

    return { ok: false, error: { kind, message, attempts, retryable } };
  }

  private async run(account: RiotAccount): Promise<MatchFetchResult> {
    await this.waitForSettle();

    const key = accountKey(account);
    let rateLimitedAttempts = 0;
    let unavailableAttempts = 0;
    let lastFailure = MatchFetchErrorKind.UNAVAILABLE;

    for (;;) {
      const used = this.attempts.get(key) ?? 0;
      if (used >= this.config.FETCH_MAX_ATTEMPTS_PER_CYCLE) {
        return this.failure(account, lastFailure, "Attempt budget for this cycle exhausted");
      }
      this.attempts.set(key, used + 1);

      let delayMs: number;
      try {
        const match = await this.source.getLastMatch(account);
        if (!match) {
          return this.failure(account, MatchFetchErrorKind.NOT_FOUND, "No match history");
        }

        if (this.config.COMPETITIVE_ONLY && !isCompetitive(match)) {
          return this.failure(account, MatchFetchErrorKind.MODE_EXCLUDED, `Latest match mode is ${match.mode}`);
        }

        return { ok: true, match };
      } catch (error) {
        if (error instanceof ValorantApiError && error.isNotFound) {
          return this.failure(account, MatchFetchErrorKind.NOT_FOUND, error.message);
        }

        if (error instanceof ValorantPayloadError) {
          return this.failure(account, MatchFetchErrorKind.UNAVAILABLE, error.message);
        }

        if (error instanceof ValorantApiError && error.isRateLimited) {
          rateLimitedAttempts += 1;
          lastFailure = MatchFetchErrorKind.RATE_LIMITED;
          if (rateLimitedAttempts >= this.config.FETCH_RATE_LIMIT_MAX_ATTEMPTS) {
            return this.failure(account, MatchFetchErrorKind.RATE_LIMITED, error.message, true);
          }

          delayMs = this.backoffMs(rateLimitedAttempts, error.retryAfterMs);
        } else if (!(error instanceof ValorantApiError) || error.isServerError) {
          unavailableAttempts += 1;
          lastFailure = MatchFetchErrorKind.UNAVAILABLE;
          const message = error instanceof Error ? error.message : String(error);
          if (unavailableAttempts >= this.config.FETCH_UNAVAILABLE_MAX_ATTEMPTS) {
            return this.failure(account, MatchFetchErrorKind.UNAVAILABLE, message, true);
          }

          delayMs = this.backoffMs(unavailableAttempts, undefined);
        } else {
          return this.failure(account, MatchFetchErrorKind.UNAVAILABLE, error.message);
        }
      }

      this.logService.debug(
        `Retrying match fetch for ${riotId(account)} in ${delayMs.toString()}ms`,
        new Map([["attempt", this.attemptsFor(account)]]),
      );
      await sleep(delayMs);
    }
  }
}
