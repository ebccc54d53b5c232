import type { AnnouncementBatch } from "../../squad/types.mjs";
import type { AnnouncementDelivery } from "../types.mjs";
import { DeliveryOutcome } from "../types.mjs";

export class FakeAnnouncementDelivery implements AnnouncementDelivery {
  readonly delivered: AnnouncementBatch[] = [];
  outcome: DeliveryOutcome | Error = DeliveryOutcome.DELIVERED;

  async deliver(batch: AnnouncementBatch): Promise<DeliveryOutcome> {
    if (this.outcome instanceof Error) {
      return Promise.reject(this.outcome);
    }

    if (this.outcome === DeliveryOutcome.DELIVERED) {
      this.delivered.push(batch);
    }

    return Promise.resolve(this.outcome);
  }
}

export function aFakeAnnouncementDeliveryWith(outcome?: DeliveryOutcome | Error): FakeAnnouncementDelivery {
  const delivery = new FakeAnnouncementDelivery();
  if (outcome !== undefined) {
    delivery.outcome = outcome;
  }
  return delivery;
}
