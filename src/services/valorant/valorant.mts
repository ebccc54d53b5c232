import { differenceInMilliseconds } from "date-fns";
import type { LogService } from "../log/types.mjs";
import type { IRequestRateLimiter } from "./request-rate-limiter.mjs";
import { ValorantApiError, ValorantPayloadError } from "./valorant-api-error.mjs";
import { parseAccount, parseMatch, readMatchHistory } from "./parse.mjs";
import type { MatchRecord, RiotAccount, ValorantAccount } from "./types.mjs";
import { riotId } from "./types.mjs";

export const VALORANT_API_BASE_URL = "https://api.henrikdev.xyz";

export interface ValorantServiceOpts {
  logService: LogService;
  rateLimiter: IRequestRateLimiter;
  apiKey?: string | undefined;
  fetch?: typeof fetch;
  baseUrl?: string;
}

/**
 * Parses the provider's throttling hints into milliseconds. `retry-after` may be delta-seconds or an
 * HTTP date; `x-ratelimit-reset` is the number of seconds until the window resets.
 */
export function getRetryAfterMs(headers: Headers): number | undefined {
  const retryAfter = headers.get("retry-after");
  if (retryAfter !== null && retryAfter !== "") {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds)) {
      return Math.max(0, seconds * 1000);
    }

    const retryDate = new Date(retryAfter);
    if (!Number.isNaN(retryDate.getTime())) {
      return Math.max(0, differenceInMilliseconds(retryDate, new Date()));
    }
  }

  const reset = headers.get("x-ratelimit-reset");
  if (reset !== null && reset !== "") {
    const seconds = Number(reset);
    if (Number.isFinite(seconds)) {
      return Math.max(0, seconds * 1000);
    }
  }

  return undefined;
}

export class ValorantService {
  private readonly logService: LogService;
  private readonly rateLimiter: IRequestRateLimiter;
  private readonly apiKey: string | undefined;
  private readonly fetch: typeof fetch;
  private readonly baseUrl: string;

  constructor({ logService, rateLimiter, apiKey, fetch: fetchFn, baseUrl }: ValorantServiceOpts) {
    this.logService = logService;
    this.rateLimiter = rateLimiter;
    this.apiKey = apiKey;
    this.fetch = fetchFn ?? globalThis.fetch.bind(globalThis);
    this.baseUrl = baseUrl ?? VALORANT_API_BASE_URL;
  }

  /**
   * Looks up an account by Riot id. Resolves `undefined` when the provider does not know the account.
   */
  async getAccount(name: string, tag: string): Promise<ValorantAccount | undefined> {
    try {
      const body = await this.request(`/valorant/v1/account/${encodeURIComponent(name)}/${encodeURIComponent(tag)}`);
      return parseAccount(body) ?? undefined;
    } catch (error) {
      if (error instanceof ValorantApiError && error.isNotFound) {
        return undefined;
      }

      throw error;
    }
  }

  /**
   * Recent matches for the account, newest first. Malformed entries are logged and left out.
   */
  async getMatchHistory(account: RiotAccount): Promise<MatchRecord[]> {
    const entries = await this.requestMatchHistory(account);

    const matches: MatchRecord[] = [];
    for (const [index, entry] of entries.entries()) {
      try {
        matches.push(parseMatch(entry));
      } catch (error) {
        if (!(error instanceof ValorantPayloadError)) {
          throw error;
        }

        this.logService.warn(
          error,
          new Map<string, string | number>([
            ["account", riotId(account)],
            ["index", index],
          ]),
        );
      }
    }

    return matches;
  }

  /**
   * The newest match only. Older entries are never parsed, so a malformed one cannot hide it.
   */
  async getLastMatch(account: RiotAccount): Promise<MatchRecord | undefined> {
    const [latest] = await this.requestMatchHistory(account);
    return latest === undefined ? undefined : parseMatch(latest);
  }

  private async requestMatchHistory({ name, tag, region }: RiotAccount): Promise<readonly unknown[]> {
    const body = await this.request(
      `/valorant/v3/matches/${region}/${encodeURIComponent(name)}/${encodeURIComponent(tag)}`,
    );

    return readMatchHistory(body);
  }

  private async request(path: string): Promise<unknown> {
    const url = new URL(path, this.baseUrl).toString();
    const headers = new Headers({ Accept: "application/json" });
    if (this.apiKey !== undefined) {
      headers.set("Authorization", this.apiKey);
    }

    const response = await this.rateLimiter.execute(async () => this.fetch(url, { method: "GET", headers }));

    if (!response.ok) {
      const retryAfterMs = getRetryAfterMs(response.headers);
      this.logService.debug(
        `Valorant API responded ${response.status.toString()}`,
        new Map<string, string | number | null>([
          ["url", url],
          ["retryAfterMs", retryAfterMs ?? null],
        ]),
      );

      throw new ValorantApiError(response.status, url, retryAfterMs);
    }

    return response.json();
  }
}
