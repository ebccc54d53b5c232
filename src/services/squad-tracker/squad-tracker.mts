import { differenceInMilliseconds, min } from "date-fns";
import type { ActivityTracker } from "../activity/activity-tracker.mjs";
import type { GroupCollector, PendingGroup } from "../activity/group-collector.mjs";
import type { ActivitySignal } from "../activity/types.mjs";
import type { AnnouncementDeduplicator } from "../announcement/announcement-deduplicator.mjs";
import type { PublishOutcome } from "../announcement/types.mjs";
import type { LogService } from "../log/types.mjs";
import type { SquadResolver } from "../squad/squad-resolver.mjs";
import type { SquadResolution } from "../squad/types.mjs";

export interface SquadTrackerServiceOpts {
  activityTracker: ActivityTracker;
  groupCollector: GroupCollector;
  squadResolver: Pick<SquadResolver, "resolve">;
  deduplicator: Pick<AnnouncementDeduplicator, "publish">;
  logService: LogService;
}

export interface GroupReport {
  resolution: SquadResolution;
  outcomes: PublishOutcome[];
}

/**
 * Entry point for presence events: runs an activity signal through the tracker and collector, and
 * resolves and publishes each group once its window closes.
 */
export class SquadTrackerService {
  private readonly activityTracker: ActivityTracker;
  private readonly groupCollector: GroupCollector;
  private readonly squadResolver: Pick<SquadResolver, "resolve">;
  private readonly deduplicator: Pick<AnnouncementDeduplicator, "publish">;
  private readonly logService: LogService;

  constructor({ activityTracker, groupCollector, squadResolver, deduplicator, logService }: SquadTrackerServiceOpts) {
    this.activityTracker = activityTracker;
    this.groupCollector = groupCollector;
    this.squadResolver = squadResolver;
    this.deduplicator = deduplicator;
    this.logService = logService;

    this.groupCollector.setGroupReadyHandler(async (group) => {
      await this.onGroupReady(group);
    });
  }

  onActivitySignal(signal: ActivitySignal): void {
    const ended = this.activityTracker.onActivitySignal(signal);
    if (ended) {
      this.groupCollector.onSessionEnded(ended);
    }
  }

  onVoiceChannelChanged(tenant: string, userId: string, voiceChannelId: string | undefined): void {
    this.activityTracker.onVoiceChannelChanged(tenant, userId, voiceChannelId);
  }

  async onGroupReady({ tenant, groupKey, members }: PendingGroup): Promise<GroupReport> {
    // time since the first member of the group stopped playing
    const waitedMs =
      members.length > 0 ? differenceInMilliseconds(new Date(), min(members.map(({ endedAt }) => endedAt))) : 0;
    this.logService.info(
      `Resolving group ${groupKey}`,
      new Map<string, string | number>([
        ["guildId", tenant],
        ["members", members.length],
        ["waitedMs", waitedMs],
      ]),
    );

    const resolution = await this.squadResolver.resolve(tenant, members);
    for (const { userId, reason, detail } of resolution.dropped) {
      this.logService.info(
        `Dropped ${userId} from group ${groupKey}: ${reason}`,
        new Map([
          ["guildId", tenant],
          ["detail", detail ?? ""],
        ]),
      );
    }

    const outcomes: PublishOutcome[] = [];
    for (const batch of resolution.batches) {
      outcomes.push(await this.deduplicator.publish(batch));
    }

    return { resolution, outcomes };
  }

  stop(): void {
    this.groupCollector.stop();
  }
}
