import type { Client, Presence, VoiceState } from "discord.js";
import { ActivityType, Events } from "discord.js";
import type { Env } from "../../config.mjs";
import type { LogService } from "../log/types.mjs";
import { ActivitySignalKind } from "../activity/types.mjs";
import type { SquadTrackerService } from "../squad-tracker/squad-tracker.mjs";

export interface ActivitySnapshot {
  name: string;
  type: ActivityType;
  /** For streaming activities, the game being streamed. */
  state: string | null;
}

export interface PresenceSnapshot {
  guildId: string;
  userId: string;
  activities: readonly ActivitySnapshot[];
  voiceChannelId: string | null;
}

export interface PresenceGatewayOpts {
  squadTracker: Pick<SquadTrackerService, "onActivitySignal" | "onVoiceChannelChanged">;
  logService: LogService;
  config: Pick<Env, "GAME_ACTIVITY_NAME">;
}

export function toPresenceSnapshot(presence: Presence | null): PresenceSnapshot | null {
  if (presence?.guild == null) {
    return null;
  }

  return {
    guildId: presence.guild.id,
    userId: presence.userId,
    activities: presence.activities.map(({ name, type, state }) => ({ name, type, state })),
    voiceChannelId: presence.member?.voice.channelId ?? null,
  };
}

/**
 * Translates gateway presence and voice events into activity signals for the configured game.
 */
export class PresenceGateway {
  private readonly squadTracker: PresenceGatewayOpts["squadTracker"];
  private readonly logService: LogService;
  private readonly gameName: string;

  constructor({ squadTracker, logService, config }: PresenceGatewayOpts) {
    this.squadTracker = squadTracker;
    this.logService = logService;
    this.gameName = config.GAME_ACTIVITY_NAME;
  }

  attach(client: Client): void {
    client.on(Events.PresenceUpdate, (oldPresence, newPresence) => {
      this.guard(() => {
        const after = toPresenceSnapshot(newPresence);
        if (after) {
          this.onPresenceUpdate(toPresenceSnapshot(oldPresence), after);
        }
      });
    });

    client.on(Events.VoiceStateUpdate, (oldState: VoiceState, newState: VoiceState) => {
      this.guard(() => {
        if (oldState.channelId !== newState.channelId) {
          this.onVoiceStateUpdate(newState.guild.id, newState.id, newState.channelId);
        }
      });
    });
  }

  onPresenceUpdate(before: PresenceSnapshot | null, after: PresenceSnapshot): void {
    const wasPlaying = before != null && this.isPlaying(before);
    const isPlaying = this.isPlaying(after);
    const { guildId: tenant, userId } = after;
    const voiceChannelId = after.voiceChannelId ?? undefined;

    if (isPlaying) {
      // repeated while playing so the session picks up the latest voice channel and streaming state
      this.squadTracker.onActivitySignal({
        tenant,
        userId,
        kind: ActivitySignalKind.STARTED,
        voiceChannelId,
        isStreaming: this.isStreaming(after),
      });
    } else if (wasPlaying) {
      this.squadTracker.onActivitySignal({ tenant, userId, kind: ActivitySignalKind.STOPPED, voiceChannelId });
    }
  }

  onVoiceStateUpdate(guildId: string, userId: string, channelId: string | null): void {
    this.squadTracker.onVoiceChannelChanged(guildId, userId, channelId ?? undefined);
  }

  isPlaying({ activities }: Pick<PresenceSnapshot, "activities">): boolean {
    return activities.some(({ name, type, state }) =>
      type === ActivityType.Streaming ? this.matchesGame(state) : this.matchesGame(name),
    );
  }

  isStreaming({ activities }: Pick<PresenceSnapshot, "activities">): boolean {
    return activities.some(({ type, state }) => type === ActivityType.Streaming && this.matchesGame(state));
  }

  private matchesGame(value: string | null): boolean {
    return value?.toLowerCase().includes(this.gameName) ?? false;
  }

  private guard(handler: () => void): void {
    try {
      handler();
    } catch (error) {
      this.logService.error(error instanceof Error ? error : String(error));
    }
  }
}
