import type { Env } from "../../config.mjs";
import { aFakeEnvWith } from "../../base/fakes/env.fake.mjs";
import { Scheduler } from "../../base/scheduler.mjs";
import { TenantStore } from "../../base/tenant-store.mjs";
import { ActivityTracker } from "../activity/activity-tracker.mjs";
import type { PendingGroup } from "../activity/group-collector.mjs";
import { GroupCollector } from "../activity/group-collector.mjs";
import type { ActivitySession } from "../activity/types.mjs";
import { AnnouncementDeduplicator } from "../announcement/announcement-deduplicator.mjs";
import { aFakeAnnouncementDeliveryWith } from "../announcement/fakes/delivery.fake.mjs";
import { aFakeDatabaseServiceWith } from "../database/fakes/database.fake.mjs";
import { aFakeDiscordServiceWith } from "../discord/fakes/discord.fake.mjs";
import type { Services } from "../install.mjs";
import { aFakeLogServiceWith } from "../log/fakes/log.fake.mjs";
import { PresenceGateway } from "../presence/presence.mjs";
import { SquadResolver } from "../squad/squad-resolver.mjs";
import { SquadTrackerService } from "../squad-tracker/squad-tracker.mjs";
import { aFakeLastMatchSourceWith, aFakeValorantServiceWith } from "../valorant/fakes/valorant.fake.mjs";
import { MatchFetcher } from "../valorant/match-fetcher.mjs";

export function installFakeServicesWith(opts: Partial<Services & { env: Env }> = {}): Services {
  const env = opts.env ?? aFakeEnvWith();
  const logService = opts.logService ?? aFakeLogServiceWith();
  const databaseService = opts.databaseService ?? aFakeDatabaseServiceWith({ logService });
  const discordService = opts.discordService ?? aFakeDiscordServiceWith({ env, logService });
  const valorantService = opts.valorantService ?? aFakeValorantServiceWith({ logService });

  const activityTracker = new ActivityTracker({
    sessions: new TenantStore<ActivitySession>(),
    registrations: databaseService,
    logService,
  });
  const squadTrackerService =
    opts.squadTrackerService ??
    new SquadTrackerService({
      activityTracker,
      groupCollector: new GroupCollector({
        groups: new TenantStore<PendingGroup>(),
        scheduler: new Scheduler(),
        logService,
        config: env,
      }),
      squadResolver: new SquadResolver({
        registrations: databaseService,
        matchFetcher: new MatchFetcher({ source: aFakeLastMatchSourceWith(), logService, config: env }),
        activityTracker,
        logService,
        config: env,
      }),
      deduplicator: new AnnouncementDeduplicator({
        ledger: databaseService,
        delivery: aFakeAnnouncementDeliveryWith(),
        logService,
      }),
      logService,
    });
  const presenceGateway =
    opts.presenceGateway ?? new PresenceGateway({ squadTracker: squadTrackerService, logService, config: env });

  return {
    logService,
    databaseService,
    discordService,
    valorantService,
    squadTrackerService,
    presenceGateway,
  };
}
