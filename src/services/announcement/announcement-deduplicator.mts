import type { LogService } from "../log/types.mjs";
import type { AnnouncementBatch } from "../squad/types.mjs";
import type { AnnouncementDelivery, AnnouncementLedger } from "./types.mjs";
import { DeliveryOutcome, PublishOutcome } from "./types.mjs";

export interface AnnouncementDeduplicatorOpts {
  ledger: AnnouncementLedger;
  delivery: AnnouncementDelivery;
  logService: LogService;
}

/**
 * Publishes announcement batches at most once per guild, match and member. Publishes within one guild
 * run one after another so the ledger check and the ledger update cannot interleave.
 */
export class AnnouncementDeduplicator {
  private readonly ledger: AnnouncementLedger;
  private readonly delivery: AnnouncementDelivery;
  private readonly logService: LogService;
  private readonly tails = new Map<string, Promise<unknown>>();

  constructor({ ledger, delivery, logService }: AnnouncementDeduplicatorOpts) {
    this.ledger = ledger;
    this.delivery = delivery;
    this.logService = logService;
  }

  async publish(batch: AnnouncementBatch): Promise<PublishOutcome> {
    const previous = this.tails.get(batch.tenant) ?? Promise.resolve();
    const current = previous.then(async () => this.publishNow(batch));
    const tail = current.catch(() => undefined);
    this.tails.set(batch.tenant, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(batch.tenant) === tail) {
        this.tails.delete(batch.tenant);
      }
    }
  }

  private async publishNow(batch: AnnouncementBatch): Promise<PublishOutcome> {
    const { tenant, matchId } = batch;
    const members = batch.members.filter(
      ({ userId }) => this.ledger.getLastAnnouncedMatchId(tenant, userId) !== matchId,
    );

    if (members.length === 0) {
      this.logService.debug(
        `Suppressed duplicate announcement for match ${matchId}`,
        new Map([["guildId", tenant]]),
      );
      return PublishOutcome.SUPPRESSED;
    }

    const reduced: AnnouncementBatch = { ...batch, members };
    let outcome: DeliveryOutcome;
    try {
      outcome = await this.delivery.deliver(reduced);
    } catch (error) {
      this.logService.error(
        error instanceof Error ? error : new Error(String(error)),
        new Map([
          ["guildId", tenant],
          ["matchId", matchId],
        ]),
      );
      return PublishOutcome.FAILED;
    }

    if (outcome !== DeliveryOutcome.DELIVERED) {
      this.logService.warn(
        `Announcement for match ${matchId} was not delivered`,
        new Map([["guildId", tenant]]),
      );
      return PublishOutcome.FAILED;
    }

    this.ledger.recordAnnouncement(
      tenant,
      members.map(({ userId }) => userId),
      matchId,
      new Date(),
    );

    this.logService.info(
      `Announced match ${matchId}`,
      new Map<string, string | number>([
        ["guildId", tenant],
        ["members", members.length],
      ]),
    );

    return PublishOutcome.DELIVERED;
  }
}
