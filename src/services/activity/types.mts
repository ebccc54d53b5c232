export enum SessionState {
  IDLE = "Idle",
  PLAYING = "Playing",
  PENDING_RESOLUTION = "PendingResolution",
}

export enum ActivitySignalKind {
  STARTED = "Started",
  STOPPED = "Stopped",
}

export interface ActivitySignal {
  tenant: string;
  userId: string;
  kind: ActivitySignalKind;
  voiceChannelId?: string | undefined;
  isStreaming?: boolean | undefined;
}

export interface ActivitySession {
  state: SessionState.PLAYING | SessionState.PENDING_RESOLUTION;
  startedAt: Date;
  voiceChannelId: string | undefined;
  isStreaming: boolean;
}

export interface SessionEnded {
  tenant: string;
  userId: string;
  voiceChannelId: string | undefined;
  startedAt: Date;
  endedAt: Date;
  isStreaming: boolean;
}

export interface RegistrationLookup {
  isRegistered(tenant: string, userId: string): boolean;
}
