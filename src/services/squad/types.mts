import type { MatchRecord, PlayerMatchStats, RiotAccount } from "../valorant/types.mjs";

export enum DropReason {
  NOT_REGISTERED = "NotRegistered",
  NOT_FOUND = "NotFound",
  MODE_EXCLUDED = "ModeExcluded",
  RATE_LIMITED = "RateLimited",
  UNAVAILABLE = "Unavailable",
  MISSING_FROM_MATCH = "MissingFromMatch",
}

export interface SquadMember {
  userId: string;
  account: RiotAccount;
  stats: PlayerMatchStats;
  isStreaming: boolean;
}

export interface AnnouncementBatch {
  tenant: string;
  matchId: string;
  match: MatchRecord;
  /** In the order the members' sessions ended. */
  members: SquadMember[];
}

export interface DroppedMember {
  userId: string;
  reason: DropReason;
  detail?: string;
}

export interface SquadResolution {
  tenant: string;
  batches: AnnouncementBatch[];
  dropped: DroppedMember[];
}
