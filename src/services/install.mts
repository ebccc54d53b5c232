import type BetterSqlite3 from "better-sqlite3";
import { verifyKey } from "discord-interactions";
import type { Env } from "../config.mjs";
import { Scheduler } from "../base/scheduler.mjs";
import { TenantStore } from "../base/tenant-store.mjs";
import { DatabaseService } from "./database/database.mjs";
import { DiscordService } from "./discord/discord.mjs";
import { ValorantService } from "./valorant/valorant.mjs";
import { RequestRateLimiter } from "./valorant/request-rate-limiter.mjs";
import { MatchFetcher } from "./valorant/match-fetcher.mjs";
import { ActivityTracker } from "./activity/activity-tracker.mjs";
import type { PendingGroup } from "./activity/group-collector.mjs";
import { GroupCollector } from "./activity/group-collector.mjs";
import type { ActivitySession } from "./activity/types.mjs";
import { SquadResolver } from "./squad/squad-resolver.mjs";
import { AnnouncementDeduplicator } from "./announcement/announcement-deduplicator.mjs";
import { DiscordDelivery } from "./announcement/discord-delivery.mjs";
import { SquadTrackerService } from "./squad-tracker/squad-tracker.mjs";
import { PresenceGateway } from "./presence/presence.mjs";
import type { LogService } from "./log/types.mjs";
import { AggregatorClient } from "./log/aggregator-client.mjs";
import { ConsoleLogClient } from "./log/console-log-client.mjs";
import { SentryLogClient } from "./log/sentry-log-client.mjs";

export interface Services {
  logService: LogService;
  databaseService: DatabaseService;
  discordService: DiscordService;
  valorantService: ValorantService;
  squadTrackerService: SquadTrackerService;
  presenceGateway: PresenceGateway;
}

interface InstallServicesOpts {
  env: Env;
  db: BetterSqlite3.Database;
}

export function installServices({ env, db }: InstallServicesOpts): Services {
  const logService = new AggregatorClient(
    env.MODE === "production" ? [new SentryLogClient(), new ConsoleLogClient()] : [new ConsoleLogClient()],
  );
  const databaseService = new DatabaseService({ db, logService });
  const discordService = new DiscordService({ env, logService, fetch, verifyKey });
  const valorantService = new ValorantService({
    logService,
    rateLimiter: new RequestRateLimiter({ logService, maxCallsPerMinute: env.VALORANT_API_REQUESTS_PER_MINUTE }),
    apiKey: env.VALORANT_API_KEY,
  });

  const activityTracker = new ActivityTracker({
    sessions: new TenantStore<ActivitySession>(),
    registrations: databaseService,
    logService,
  });
  const squadTrackerService = new SquadTrackerService({
    activityTracker,
    groupCollector: new GroupCollector({
      groups: new TenantStore<PendingGroup>(),
      scheduler: new Scheduler(),
      logService,
      config: env,
    }),
    squadResolver: new SquadResolver({
      registrations: databaseService,
      matchFetcher: new MatchFetcher({ source: valorantService, logService, config: env }),
      activityTracker,
      logService,
      config: env,
    }),
    deduplicator: new AnnouncementDeduplicator({
      ledger: databaseService,
      delivery: new DiscordDelivery({ discordService, databaseService, logService }),
      logService,
    }),
    logService,
  });
  const presenceGateway = new PresenceGateway({ squadTracker: squadTrackerService, logService, config: env });

  return {
    logService,
    databaseService,
    discordService,
    valorantService,
    squadTrackerService,
    presenceGateway,
  };
}
