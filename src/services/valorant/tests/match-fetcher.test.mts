import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { MatchFetcherConfig } from "../match-fetcher.mjs";
import { MatchFetcher, MatchFetchErrorKind } from "../match-fetcher.mjs";
import { ValorantApiError, ValorantPayloadError } from "../valorant-api-error.mjs";
import type { FakeLastMatchSource } from "../fakes/valorant.fake.mjs";
import { aFakeLastMatchSourceWith, aFakeMatchRecordWith, aFakeRiotAccountWith } from "../fakes/valorant.fake.mjs";
import { aFakeLogServiceWith } from "../../log/fakes/log.fake.mjs";

const config: MatchFetcherConfig = {
  API_WAIT_TIME_MS: 60_000,
  COMPETITIVE_ONLY: true,
  FETCH_RATE_LIMIT_MAX_ATTEMPTS: 5,
  FETCH_UNAVAILABLE_MAX_ATTEMPTS: 3,
  FETCH_MAX_ATTEMPTS_PER_CYCLE: 8,
  FETCH_BACKOFF_BASE_MS: 1000,
  FETCH_BACKOFF_MAX_MS: 60_000,
};

const START = new Date("2025-01-01T00:00:00.000Z").getTime();

const rateLimited = (retryAfterMs?: number): ValorantApiError =>
  new ValorantApiError(429, "https://api.henrikdev.xyz/valorant/v3/matches/na/PlayerOne/NA1", retryAfterMs);

describe("MatchFetcher", () => {
  let source: FakeLastMatchSource;
  let fetcher: MatchFetcher;
  const account = aFakeRiotAccountWith();
  const teammate = aFakeRiotAccountWith({ name: "PlayerTwo", tag: "EUW" });

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
    source = aFakeLastMatchSourceWith();
    fetcher = new MatchFetcher({ source, logService: aFakeLogServiceWith(), config });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("waits for the provider to settle once per cycle", async () => {
    source.script(account, aFakeMatchRecordWith()).script(teammate, aFakeMatchRecordWith());
    const cycle = fetcher.startCycle();

    const results = Promise.all([cycle.fetch(account), cycle.fetch(teammate)]);

    await vi.advanceTimersByTimeAsync(59_999);
    expect(source.calls).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1);
    expect(source.calls).toHaveLength(2);

    const [first, second] = await results;
    expect(first.ok).toBe(true);
    expect(second.ok).toBe(true);
  });

  it("caches the result per account within a cycle", async () => {
    source.script(account, aFakeMatchRecordWith({ matchId: "match-1" }));
    const cycle = fetcher.startCycle();

    const first = cycle.fetch(aFakeRiotAccountWith({ name: "playerone", tag: "na1" }));
    const second = cycle.fetch(account);
    await vi.runAllTimersAsync();

    expect(await first).toEqual(await second);
    expect(source.callsFor(account)).toBe(1);
  });

  it("does not share results between cycles", async () => {
    source.script(account, aFakeMatchRecordWith());

    const firstCycle = fetcher.startCycle().fetch(account);
    const secondCycle = fetcher.startCycle().fetch(account);
    await vi.runAllTimersAsync();
    await Promise.all([firstCycle, secondCycle]);

    expect(source.callsFor(account)).toBe(2);
  });

  it("retries through rate limiting with exponential backoff", async () => {
    source.script(account, rateLimited(), rateLimited(), rateLimited(), aFakeMatchRecordWith({ matchId: "match-9" }));
    const cycle = fetcher.startCycle();

    const pending = cycle.fetch(account);
    await vi.runAllTimersAsync();
    const result = await pending;

    expect(result).toEqual({ ok: true, match: aFakeMatchRecordWith({ matchId: "match-9" }) });
    expect(source.callsFor(account)).toBe(4);
    expect(cycle.attemptsFor(account)).toBe(4);
    expect(Date.now()).toBe(START + 60_000 + 1000 + 2000 + 4000);
  });

  it("seeds the backoff with the provider's retry hint", async () => {
    source.script(account, rateLimited(5000), aFakeMatchRecordWith());
    const cycle = fetcher.startCycle();

    const pending = cycle.fetch(account);
    await vi.advanceTimersByTimeAsync(60_000 + 4999);
    expect(source.callsFor(account)).toBe(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(source.callsFor(account)).toBe(2);
    expect((await pending).ok).toBe(true);
  });

  it("caps the backoff delay", async () => {
    source.script(account, rateLimited(50_000), rateLimited(50_000), aFakeMatchRecordWith());
    const cycle = fetcher.startCycle();

    const pending = cycle.fetch(account);
    await vi.runAllTimersAsync();
    await pending;

    expect(Date.now()).toBe(START + 60_000 + 50_000 + 60_000);
  });

  it("never retries before the provider's hint, even past the cap", async () => {
    source.script(account, rateLimited(90_000), aFakeMatchRecordWith());
    const cycle = fetcher.startCycle();

    const pending = cycle.fetch(account);
    await vi.advanceTimersByTimeAsync(60_000 + 60_000);
    expect(source.callsFor(account)).toBe(1);

    await vi.advanceTimersByTimeAsync(30_000);
    expect(source.callsFor(account)).toBe(2);
    expect((await pending).ok).toBe(true);
  });

  it("reports RateLimited once the rate limit attempts are exhausted", async () => {
    source.script(account, rateLimited());
    const cycle = fetcher.startCycle();

    const pending = cycle.fetch(account);
    await vi.runAllTimersAsync();

    expect(await pending).toEqual({
      ok: false,
      error: { kind: MatchFetchErrorKind.RATE_LIMITED, message: expect.any(String), attempts: 5, retryable: true },
    });
    expect(source.callsFor(account)).toBe(5);
  });

  it("reports Unavailable after repeated server errors", async () => {
    source.script(account, new ValorantApiError(503, "url"));
    const cycle = fetcher.startCycle();

    const pending = cycle.fetch(account);
    await vi.runAllTimersAsync();
    const result = await pending;

    expect(result.ok).toBe(false);
    expect(result.ok ? undefined : result.error.kind).toBe(MatchFetchErrorKind.UNAVAILABLE);
    expect(source.callsFor(account)).toBe(3);
  });

  it("retries transport errors", async () => {
    source.script(account, new TypeError("fetch failed"), aFakeMatchRecordWith());
    const cycle = fetcher.startCycle();

    const pending = cycle.fetch(account);
    await vi.runAllTimersAsync();

    expect((await pending).ok).toBe(true);
    expect(Date.now()).toBe(START + 60_000 + 1000);
  });

  it("does not retry other client errors", async () => {
    source.script(account, new ValorantApiError(400, "url"));
    const cycle = fetcher.startCycle();

    const pending = cycle.fetch(account);
    await vi.runAllTimersAsync();
    const result = await pending;

    expect(result.ok ? undefined : result.error.kind).toBe(MatchFetchErrorKind.UNAVAILABLE);
    expect(source.callsFor(account)).toBe(1);
  });

  it("reports an unreadable match as Unavailable without retrying", async () => {
    source.script(account, new ValorantPayloadError("Invalid match player payload"), aFakeMatchRecordWith());
    const cycle = fetcher.startCycle();

    const pending = cycle.fetch(account);
    await vi.runAllTimersAsync();

    expect(await pending).toEqual({
      ok: false,
      error: {
        kind: MatchFetchErrorKind.UNAVAILABLE,
        message: "Invalid match player payload",
        attempts: 1,
        retryable: false,
      },
    });
    expect(source.callsFor(account)).toBe(1);
  });

  it("marks exhausted server errors as retryable", async () => {
    source.script(account, new ValorantApiError(503, "url"));
    const cycle = fetcher.startCycle();

    const pending = cycle.fetch(account);
    await vi.runAllTimersAsync();
    const result = await pending;

    expect(result.ok ? undefined : result.error.retryable).toBe(true);
  });

  it("reports NotFound without retrying", async () => {
    source.script(account, new ValorantApiError(404, "url"));
    source.script(teammate, undefined);
    const cycle = fetcher.startCycle();

    const pending = Promise.all([cycle.fetch(account), cycle.fetch(teammate)]);
    await vi.runAllTimersAsync();
    const [missing, empty] = await pending;

    expect(missing.ok ? undefined : missing.error.kind).toBe(MatchFetchErrorKind.NOT_FOUND);
    expect(empty.ok ? undefined : empty.error.kind).toBe(MatchFetchErrorKind.NOT_FOUND);
    expect(source.calls).toHaveLength(2);
  });

  it("excludes non-competitive matches", async () => {
    source.script(account, aFakeMatchRecordWith({ mode: "Unrated" }));
    const cycle = fetcher.startCycle();

    const pending = cycle.fetch(account);
    await vi.runAllTimersAsync();
    const result = await pending;

    expect(result.ok ? undefined : result.error).toEqual({
      kind: MatchFetchErrorKind.MODE_EXCLUDED,
      message: "Latest match mode is Unrated",
      attempts: 1,
      retryable: false,
    });
  });

  it("accepts any mode when competitive filtering is off", async () => {
    const allModes = new MatchFetcher({
      source,
      logService: aFakeLogServiceWith(),
      config: { ...config, COMPETITIVE_ONLY: false },
    });
    source.script(account, aFakeMatchRecordWith({ mode: "Unrated" }));

    const pending = allModes.startCycle().fetch(account);
    await vi.runAllTimersAsync();

    expect((await pending).ok).toBe(true);
  });

  it("bypasses the cache on refetch", async () => {
    source.script(account, new ValorantApiError(503, "url"), new ValorantApiError(503, "url"), new ValorantApiError(503, "url"), aFakeMatchRecordWith());
    const cycle = fetcher.startCycle();

    const first = cycle.fetch(account);
    await vi.runAllTimersAsync();
    expect((await first).ok).toBe(false);

    const second = cycle.refetch(account);
    await vi.runAllTimersAsync();
    expect((await second).ok).toBe(true);
    expect(await cycle.fetch(account)).toEqual(await second);
    expect(source.callsFor(account)).toBe(4);
  });

  it("never exceeds the per-cycle attempt budget across refetches", async () => {
    source.script(account, rateLimited());
    const cycle = fetcher.startCycle();

    const first = cycle.fetch(account);
    await vi.runAllTimersAsync();
    await first;

    const second = cycle.refetch(account);
    await vi.runAllTimersAsync();
    const result = await second;

    expect(result).toEqual({
      ok: false,
      error: {
        kind: MatchFetchErrorKind.RATE_LIMITED,
        message: "Attempt budget for this cycle exhausted",
        attempts: 8,
        retryable: false,
      },
    });
    expect(source.callsFor(account)).toBe(8);
  });
});
