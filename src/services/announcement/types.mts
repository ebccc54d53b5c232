import type { AnnouncementBatch } from "../squad/types.mjs";

export enum PublishOutcome {
  DELIVERED = "Delivered",
  SUPPRESSED = "Suppressed",
  FAILED = "Failed",
}

export enum DeliveryOutcome {
  DELIVERED = "Delivered",
  FAILED = "Failed",
}

export interface AnnouncementLedger {
  getLastAnnouncedMatchId(tenant: string, userId: string): string | undefined;
  recordAnnouncement(tenant: string, userIds: readonly string[], matchId: string, announcedAt: Date): void;
}

export interface AnnouncementDelivery {
  deliver(batch: AnnouncementBatch): Promise<DeliveryOutcome>;
}
