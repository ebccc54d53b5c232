import { UnreachableError } from "../../base/unreachable-error.mjs";
import type { TenantStore } from "../../base/tenant-store.mjs";
import type { LogService } from "../log/types.mjs";
import type { ActivitySession, ActivitySignal, RegistrationLookup, SessionEnded } from "./types.mjs";
import { ActivitySignalKind, SessionState } from "./types.mjs";

export interface ActivityTrackerOpts {
  sessions: TenantStore<ActivitySession>;
  registrations: RegistrationLookup;
  logService: LogService;
}

/**
 * Per-user game session state machine, partitioned by tenant.
 *
 * Idle is represented by the absence of a session. A stop signal moves a playing session to
 * PendingResolution and reports the ended session; the session returns to Idle once the squad
 * resolution that consumed it calls {@link ActivityTracker.completeResolution}.
 */
export class ActivityTracker {
  private readonly sessions: TenantStore<ActivitySession>;
  private readonly registrations: RegistrationLookup;
  private readonly logService: LogService;

  constructor({ sessions, registrations, logService }: ActivityTrackerOpts) {
    this.sessions = sessions;
    this.registrations = registrations;
    this.logService = logService;
  }

  onActivitySignal(signal: ActivitySignal): SessionEnded | undefined {
    const { tenant, userId } = signal;

    if (!this.registrations.isRegistered(tenant, userId)) {
      if (this.sessions.delete(tenant, userId)) {
        this.logService.info(
          "Discarded session of unregistered user",
          new Map([
            ["guildId", tenant],
            ["userId", userId],
          ]),
        );
      }

      return undefined;
    }

    switch (signal.kind) {
      case ActivitySignalKind.STARTED: {
        this.start(signal);
        return undefined;
      }
      case ActivitySignalKind.STOPPED: {
        return this.stop(signal);
      }
      default: {
        throw new UnreachableError(signal.kind);
      }
    }
  }

  onVoiceChannelChanged(tenant: string, userId: string, voiceChannelId: string | undefined): void {
    const session = this.getSession(tenant, userId);
    if (session?.state !== SessionState.PLAYING) {
      return;
    }

    this.sessions.set(tenant, userId, { ...session, voiceChannelId });
  }

  completeResolution(tenant: string, userIds: readonly string[]): void {
    for (const userId of userIds) {
      if (this.getState(tenant, userId) === SessionState.PENDING_RESOLUTION) {
        this.sessions.delete(tenant, userId);
      }
    }
  }

  getState(tenant: string, userId: string): SessionState {
    return this.sessions.get(tenant, userId)?.state ?? SessionState.IDLE;
  }

  getSession(tenant: string, userId: string): ActivitySession | undefined {
    return this.sessions.get(tenant, userId);
  }

  private start({ tenant, userId, voiceChannelId, isStreaming = false }: ActivitySignal): void {
    const session = this.getSession(tenant, userId);

    if (!session) {
      this.sessions.set(tenant, userId, {
        state: SessionState.PLAYING,
        startedAt: new Date(),
        voiceChannelId,
        isStreaming,
      });
      this.logService.debug(
        "Session started",
        new Map<string, string | null>([
          ["guildId", tenant],
          ["userId", userId],
          ["voiceChannelId", voiceChannelId ?? null],
        ]),
      );
      return;
    }

    if (session.state === SessionState.PLAYING) {
      this.sessions.set(tenant, userId, { ...session, voiceChannelId, isStreaming });
    }
  }

  /**
   * A voice channel carried by the stop signal is the member's channel at stop time and wins over the
   * one tracked on the session.
   */
  private stop({ tenant, userId, voiceChannelId: stoppedIn }: ActivitySignal): SessionEnded | undefined {
    const session = this.getSession(tenant, userId);
    if (session?.state !== SessionState.PLAYING) {
      return undefined;
    }

    const voiceChannelId = stoppedIn ?? session.voiceChannelId;
    this.sessions.set(tenant, userId, { ...session, voiceChannelId, state: SessionState.PENDING_RESOLUTION });

    const ended: SessionEnded = {
      tenant,
      userId,
      voiceChannelId,
      startedAt: session.startedAt,
      endedAt: new Date(),
      isStreaming: session.isStreaming,
    };
    this.logService.debug(
      "Session ended",
      new Map<string, string | null>([
        ["guildId", tenant],
        ["userId", userId],
        ["voiceChannelId", ended.voiceChannelId ?? null],
      ]),
    );

    return ended;
  }
}
