import type { Env } from "../../config.mjs";
import { UnreachableError } from "../../base/unreachable-error.mjs";
import type { ActivityTracker } from "../activity/activity-tracker.mjs";
import type { SessionEnded } from "../activity/types.mjs";
import type { RegistrationsRow } from "../database/types/registrations.mjs";
import type { LogService } from "../log/types.mjs";
import type { MatchFetcher, MatchFetchResult } from "../valorant/match-fetcher.mjs";
import { MatchFetchErrorKind } from "../valorant/match-fetcher.mjs";
import type { MatchRecord, RiotAccount } from "../valorant/types.mjs";
import { accountKey } from "../valorant/types.mjs";
import type { AnnouncementBatch, DroppedMember, SquadMember, SquadResolution } from "./types.mjs";
import { DropReason } from "./types.mjs";

export interface RegistrationSource {
  getRegistration(tenant: string, userId: string): RegistrationsRow | undefined;
}

export interface SquadResolverOpts {
  registrations: RegistrationSource;
  matchFetcher: Pick<MatchFetcher, "startCycle">;
  activityTracker: Pick<ActivityTracker, "completeResolution">;
  logService: LogService;
  config: Pick<Env, "RESOLUTION_RETRY_DELAY_MS">;
}

interface Candidate {
  session: SessionEnded;
  account: RiotAccount;
  result: MatchFetchResult;
}

function dropReasonFor(kind: MatchFetchErrorKind): DropReason {
  switch (kind) {
    case MatchFetchErrorKind.NOT_FOUND: {
      return DropReason.NOT_FOUND;
    }
    case MatchFetchErrorKind.MODE_EXCLUDED: {
      return DropReason.MODE_EXCLUDED;
    }
    case MatchFetchErrorKind.RATE_LIMITED: {
      return DropReason.RATE_LIMITED;
    }
    case MatchFetchErrorKind.UNAVAILABLE: {
      return DropReason.UNAVAILABLE;
    }
    default: {
      throw new UnreachableError(kind);
    }
  }
}

function isTransient(result: MatchFetchResult): boolean {
  return !result.ok && result.error.retryable;
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Turns a collected group into per-match announcement batches. Members are only ever announced
 * together when their latest matches carry the same match id.
 */
export class SquadResolver {
  private readonly registrations: RegistrationSource;
  private readonly matchFetcher: Pick<MatchFetcher, "startCycle">;
  private readonly activityTracker: Pick<ActivityTracker, "completeResolution">;
  private readonly logService: LogService;
  private readonly config: Pick<Env, "RESOLUTION_RETRY_DELAY_MS">;

  constructor({ registrations, matchFetcher, activityTracker, logService, config }: SquadResolverOpts) {
    this.registrations = registrations;
    this.matchFetcher = matchFetcher;
    this.activityTracker = activityTracker;
    this.logService = logService;
    this.config = config;
  }

  async resolve(tenant: string, members: readonly SessionEnded[]): Promise<SquadResolution> {
    const sessions = this.uniqueByUser(members);

    try {
      return await this.resolveSessions(tenant, sessions);
    } finally {
      this.activityTracker.completeResolution(
        tenant,
        sessions.map(({ userId }) => userId),
      );
    }
  }

  private async resolveSessions(tenant: string, sessions: readonly SessionEnded[]): Promise<SquadResolution> {
    const dropped: DroppedMember[] = [];
    const registered: { session: SessionEnded; account: RiotAccount }[] = [];

    for (const session of sessions) {
      const registration = this.registrations.getRegistration(tenant, session.userId);
      if (!registration) {
        dropped.push({ userId: session.userId, reason: DropReason.NOT_REGISTERED });
        continue;
      }

      registered.push({
        session,
        account: { name: registration.RiotName, tag: registration.RiotTag, region: registration.Region },
      });
    }

    if (registered.length === 0) {
      return { tenant, batches: [], dropped };
    }

    const cycle = this.matchFetcher.startCycle();
    const candidates: Candidate[] = await Promise.all(
      registered.map(async (member) => ({ ...member, result: await cycle.fetch(member.account) })),
    );

    const transient = candidates.filter(({ result }) => isTransient(result));
    if (transient.length > 0) {
      this.logService.info(
        `Retrying ${transient.length.toString()} member(s) after transient fetch failures`,
        new Map<string, string | number>([
          ["guildId", tenant],
          ["delayMs", this.config.RESOLUTION_RETRY_DELAY_MS],
        ]),
      );

      await sleep(this.config.RESOLUTION_RETRY_DELAY_MS);
      await Promise.all(
        transient.map(async (candidate) => {
          candidate.result = await cycle.refetch(candidate.account);
        }),
      );
    }

    const partitions = new Map<string, { match: MatchRecord; members: SquadMember[] }>();
    for (const { session, account, result } of candidates) {
      if (!result.ok) {
        const reason = dropReasonFor(result.error.kind);
        dropped.push({ userId: session.userId, reason, detail: result.error.message });
        if (reason === DropReason.RATE_LIMITED || reason === DropReason.UNAVAILABLE) {
          this.logService.warn(
            `Dropped member after retry: ${reason}`,
            new Map([
              ["guildId", tenant],
              ["userId", session.userId],
            ]),
          );
        }
        continue;
      }

      let partition = partitions.get(result.match.matchId);
      if (!partition) {
        partition = { match: result.match, members: [] };
        partitions.set(result.match.matchId, partition);
      }

      const stats = partition.match.players.get(accountKey(account));
      if (!stats) {
        dropped.push({
          userId: session.userId,
          reason: DropReason.MISSING_FROM_MATCH,
          detail: `Account not in roster of match ${result.match.matchId}`,
        });
        continue;
      }

      partition.members.push({ userId: session.userId, account, stats, isStreaming: session.isStreaming });
    }

    const batches: AnnouncementBatch[] = [];
    for (const [matchId, { match, members }] of partitions) {
      if (members.length > 0) {
        batches.push({ tenant, matchId, match, members });
      }
    }

    this.logService.info(
      `Resolved group into ${batches.length.toString()} batch(es)`,
      new Map<string, string | number>([
        ["guildId", tenant],
        ["members", sessions.length],
        ["dropped", dropped.length],
      ]),
    );

    return { tenant, batches, dropped };
  }

  private uniqueByUser(members: readonly SessionEnded[]): SessionEnded[] {
    const byUser = new Map<string, SessionEnded>();
    for (const member of members) {
      if (!byUser.has(member.userId)) {
        byUser.set(member.userId, member);
      }
    }
    return Array.from(byUser.values());
  }
}
