import { addMilliseconds, min } from "date-fns";
import type { Env } from "../../config.mjs";
import type { Scheduler } from "../../base/scheduler.mjs";
import type { TenantStore } from "../../base/tenant-store.mjs";
import type { LogService } from "../log/types.mjs";
import type { SessionEnded } from "./types.mjs";

export interface PendingGroup {
  tenant: string;
  groupKey: string;
  members: SessionEnded[];
  createdAt: Date;
  deadline: Date;
}

export type GroupReadyHandler = (group: PendingGroup) => Promise<void>;

export interface GroupCollectorOpts {
  groups: TenantStore<PendingGroup>;
  scheduler: Scheduler;
  logService: LogService;
  config: Pick<Env, "GROUP_WAIT_TIME_MS" | "GROUP_MAX_WAIT_TIME_MS">;
}

export function groupKeyFor({ voiceChannelId, userId }: Pick<SessionEnded, "voiceChannelId" | "userId">): string {
  return voiceChannelId !== undefined ? `voice:${voiceChannelId}` : `solo:${userId}`;
}

/**
 * Debounces ended sessions into candidate squads. Sessions that end in the same voice channel within
 * the grouping window are collected together; each new member extends the window up to the maximum
 * wait measured from the first member.
 */
export class GroupCollector {
  private readonly groups: TenantStore<PendingGroup>;
  private readonly scheduler: Scheduler;
  private readonly logService: LogService;
  private readonly config: Pick<Env, "GROUP_WAIT_TIME_MS" | "GROUP_MAX_WAIT_TIME_MS">;
  private groupReadyHandler: GroupReadyHandler | undefined;

  constructor({ groups, scheduler, logService, config }: GroupCollectorOpts) {
    this.groups = groups;
    this.scheduler = scheduler;
    this.logService = logService;
    this.config = config;
  }

  setGroupReadyHandler(handler: GroupReadyHandler): void {
    this.groupReadyHandler = handler;
  }

  onSessionEnded(event: SessionEnded): PendingGroup {
    const { tenant } = event;
    const groupKey = groupKeyFor(event);
    const now = new Date();
    const existing = this.getGroup(tenant, groupKey);

    let group: PendingGroup;
    if (existing) {
      const members = existing.members.filter(({ userId }) => userId !== event.userId);
      group = {
        ...existing,
        members: [...members, event],
        deadline: min([
          addMilliseconds(now, this.config.GROUP_WAIT_TIME_MS),
          addMilliseconds(existing.createdAt, this.config.GROUP_MAX_WAIT_TIME_MS),
        ]),
      };
    } else {
      group = {
        tenant,
        groupKey,
        members: [event],
        createdAt: now,
        deadline: addMilliseconds(now, this.config.GROUP_WAIT_TIME_MS),
      };
    }

    this.groups.set(tenant, groupKey, group);
    this.scheduler.schedule(this.schedulerKey(tenant, groupKey), group.deadline, () => {
      this.expire(tenant, groupKey);
    });

    this.logService.debug(
      `Group ${groupKey} now has ${group.members.length.toString()} member(s)`,
      new Map([
        ["guildId", tenant],
        ["deadline", group.deadline.toISOString()],
      ]),
    );

    return group;
  }

  getGroup(tenant: string, groupKey: string): PendingGroup | undefined {
    return this.groups.get(tenant, groupKey);
  }

  /**
   * Cancels every pending window. Groups still collecting are dropped.
   */
  stop(): void {
    this.scheduler.cancelAll();
    this.groups.clear();
  }

  private schedulerKey(tenant: string, groupKey: string): string {
    return `${tenant}:${groupKey}`;
  }

  private expire(tenant: string, groupKey: string): void {
    const group = this.getGroup(tenant, groupKey);
    if (!group) {
      return;
    }

    this.groups.delete(tenant, groupKey);

    const handler = this.groupReadyHandler;
    if (!handler) {
      this.logService.warn("Group ready without a handler", new Map([["guildId", tenant]]));
      return;
    }

    handler(group).catch((error: unknown) => {
      this.logService.error(
        error instanceof Error ? error : new Error(String(error)),
        new Map([
          ["guildId", tenant],
          ["groupKey", groupKey],
        ]),
      );
    });
  }
}
