import { aFakeMatchRecordWith, aFakePlayerStatsWith, aFakeRiotAccountWith } from "../../valorant/fakes/valorant.fake.mjs";
import type { AnnouncementBatch, SquadMember } from "../types.mjs";

export function aFakeSquadMemberWith(opts: Partial<SquadMember> = {}): SquadMember {
  const account = opts.account ?? aFakeRiotAccountWith();

  return {
    userId: "user-a",
    account,
    stats: aFakePlayerStatsWith({ name: account.name, tag: account.tag }),
    isStreaming: false,
    ...opts,
  };
}

export function aFakeAnnouncementBatchWith(opts: Partial<AnnouncementBatch> = {}): AnnouncementBatch {
  const members = opts.members ?? [aFakeSquadMemberWith()];
  const matchId = opts.matchId ?? "match-1";

  return {
    tenant: "guild-1",
    matchId,
    match: aFakeMatchRecordWith({ matchId, players: members.map(({ stats }) => stats) }),
    members,
    ...opts,
  };
}
