import { aFakeLogServiceWith } from "../../log/fakes/log.fake.mjs";
import type { LastMatchSource } from "../match-fetcher.mjs";
import type { IRequestRateLimiter } from "../request-rate-limiter.mjs";
import type { MatchRecord, PlayerMatchStats, RiotAccount } from "../types.mjs";
import { accountKey } from "../types.mjs";
import type { ValorantServiceOpts } from "../valorant.mjs";
import { ValorantService } from "../valorant.mjs";

export function aFakePlayerStatsWith(opts: Partial<PlayerMatchStats> = {}): PlayerMatchStats {
  const defaultOpts: PlayerMatchStats = {
    puuid: "puuid-playerone",
    name: "PlayerOne",
    tag: "NA1",
    agent: "Jett",
    team: "red",
    kills: 20,
    deaths: 10,
    assists: 5,
    score: 5000,
    result: "win",
  };

  return {
    ...defaultOpts,
    ...opts,
  };
}

export function aFakeMatchRecordWith(
  opts: Partial<Omit<MatchRecord, "players">> & { players?: PlayerMatchStats[] } = {},
): MatchRecord {
  const { players = [aFakePlayerStatsWith()], ...rest } = opts;

  return {
    matchId: "match-1",
    map: "Ascent",
    mode: "Competitive",
    startedAt: new Date("2025-01-01T00:00:00.000Z"),
    score: { red: 13, blue: 8 },
    ...rest,
    players: new Map(players.map((player) => [accountKey(player), player])),
  };
}

export function aFakeRiotAccountWith(opts: Partial<RiotAccount> = {}): RiotAccount {
  return {
    name: "PlayerOne",
    tag: "NA1",
    region: "na",
    ...opts,
  };
}

export type ScriptedResponse = MatchRecord | undefined | Error;

/**
 * Answers `getLastMatch` from a per-account script. Each call consumes the next scripted response;
 * the last one repeats once the script runs out.
 */
export class FakeLastMatchSource implements LastMatchSource {
  readonly calls: RiotAccount[] = [];
  private readonly scripts = new Map<string, ScriptedResponse[]>();

  async getLastMatch(account: RiotAccount): Promise<MatchRecord | undefined> {
    this.calls.push(account);

    const script = this.scripts.get(accountKey(account));
    if (!script || script.length === 0) {
      return Promise.resolve(undefined);
    }

    const next = script.length > 1 ? script.shift() : script[0];
    if (next instanceof Error) {
      return Promise.reject(next);
    }

    return Promise.resolve(next);
  }

  script(account: Pick<RiotAccount, "name" | "tag">, ...responses: ScriptedResponse[]): this {
    this.scripts.set(accountKey(account), responses);
    return this;
  }

  callsFor(account: Pick<RiotAccount, "name" | "tag">): number {
    return this.calls.filter((called) => accountKey(called) === accountKey(account)).length;
  }
}

export function aFakeLastMatchSourceWith(): FakeLastMatchSource {
  return new FakeLastMatchSource();
}

/**
 * Executes immediately without spacing so tests are not coupled to the request budget.
 */
export class FakeRequestRateLimiter implements IRequestRateLimiter {
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    return fn();
  }
}

export function aFakeRequestRateLimiterWith(): IRequestRateLimiter {
  return new FakeRequestRateLimiter();
}

async function fakeFetch(): Promise<Response> {
  return Promise.resolve(new Response("{}", { status: 404 }));
}

export function aFakeValorantServiceWith(opts: Partial<ValorantServiceOpts> = {}): ValorantService {
  return new ValorantService({
    logService: opts.logService ?? aFakeLogServiceWith(),
    rateLimiter: opts.rateLimiter ?? aFakeRequestRateLimiterWith(),
    apiKey: opts.apiKey,
    fetch: opts.fetch ?? fakeFetch,
    baseUrl: opts.baseUrl ?? "https://valorant.example.test",
  });
}
