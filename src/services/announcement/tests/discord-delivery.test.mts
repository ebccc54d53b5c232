import type { MockInstance } from "vitest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RESTJSONErrorCodes } from "discord-api-types/v10";
import { DiscordDelivery } from "../discord-delivery.mjs";
import { DeliveryOutcome } from "../types.mjs";
import type { DatabaseService } from "../../database/database.mjs";
import { aFakeDatabaseServiceWith } from "../../database/fakes/database.fake.mjs";
import type { DiscordService } from "../../discord/discord.mjs";
import { DiscordError } from "../../discord/discord-error.mjs";
import { aFakeDiscordServiceWith } from "../../discord/fakes/discord.fake.mjs";
import { apiMessage, fakeGuildMember } from "../../discord/fakes/data.mjs";
import type { FakeLogService } from "../../log/fakes/log.fake.mjs";
import { aFakeLogServiceWith } from "../../log/fakes/log.fake.mjs";
import { aFakeAnnouncementBatchWith, aFakeSquadMemberWith } from "../../squad/fakes/batch.fake.mjs";
import { aFakePlayerStatsWith, aFakeRiotAccountWith } from "../../valorant/fakes/valorant.fake.mjs";
import type { AnnouncementBatch } from "../../squad/types.mjs";

const cannotMessageUser = new DiscordError(403, {
  code: RESTJSONErrorCodes.CannotSendMessagesToThisUser,
  message: "Cannot send messages to this user",
});

describe("DiscordDelivery", () => {
  let discordService: DiscordService;
  let databaseService: DatabaseService;
  let logService: FakeLogService;
  let delivery: DiscordDelivery;
  let batch: AnnouncementBatch;
  let getGuildMemberSpy: MockInstance<DiscordService["getGuildMember"]>;
  let createMessageSpy: MockInstance<DiscordService["createMessage"]>;
  let createDirectMessageSpy: MockInstance<DiscordService["createDirectMessage"]>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime("2025-01-01T00:45:00.000Z");

    discordService = aFakeDiscordServiceWith();
    databaseService = aFakeDatabaseServiceWith();
    logService = aFakeLogServiceWith();
    delivery = new DiscordDelivery({ discordService, databaseService, logService });

    const bravo = aFakeRiotAccountWith({ name: "Bravo", tag: "EU1" });
    batch = aFakeAnnouncementBatchWith({
      members: [
        aFakeSquadMemberWith({ userId: "user-a" }),
        aFakeSquadMemberWith({
          userId: "user-b",
          account: bravo,
          stats: aFakePlayerStatsWith({ puuid: "puuid-bravo", name: "Bravo", tag: "EU1" }),
        }),
      ],
    });

    getGuildMemberSpy = vi.spyOn(discordService, "getGuildMember").mockResolvedValue(fakeGuildMember);
    createMessageSpy = vi.spyOn(discordService, "createMessage").mockResolvedValue(apiMessage);
    createDirectMessageSpy = vi.spyOn(discordService, "createDirectMessage").mockResolvedValue(apiMessage);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("with an announcement channel", () => {
    beforeEach(() => {
      databaseService.setAnnouncementChannel("guild-1", "announcements-channel");
    });

    it("posts the announcement with mentions and DMs every member", async () => {
      expect(await delivery.deliver(batch)).toBe(DeliveryOutcome.DELIVERED);

      expect(getGuildMemberSpy).toHaveBeenCalledWith("guild-1", "user-a");
      expect(getGuildMemberSpy).toHaveBeenCalledWith("guild-1", "user-b");
      expect(createMessageSpy).toHaveBeenCalledOnce();
      expect(createMessageSpy).toHaveBeenCalledWith(
        "announcements-channel",
        expect.objectContaining({
          content: "<@user-a> <@user-b>",
          allowed_mentions: { users: ["user-a", "user-b"] },
        }),
      );
      expect(createDirectMessageSpy.mock.calls.map(([userId]) => userId)).toEqual(["user-a", "user-b"]);
    });

    it("names members by their guild display name", async () => {
      await delivery.deliver(batch);

      const embed = createMessageSpy.mock.calls[0]?.[1].embeds?.[0];
      expect(embed?.title).toBe("🎮 Squad Match Complete! (2 players)");
      expect(embed?.fields?.slice(4).map(({ name }) => name)).toEqual(["P1", "P1"]);
    });

    it("falls back to the riot id when the member cannot be fetched", async () => {
      getGuildMemberSpy.mockRejectedValueOnce(new Error("Unknown Member"));

      expect(await delivery.deliver(batch)).toBe(DeliveryOutcome.DELIVERED);

      const embed = createMessageSpy.mock.calls[0]?.[1].embeds?.[0];
      expect(embed?.fields?.slice(4).map(({ name }) => name)).toEqual(["PlayerOne#NA1", "P1"]);
      expect(logService.messages("warn")).toEqual(["Unknown Member"]);
    });

    it("fails without sending DMs when the channel post fails", async () => {
      createMessageSpy.mockRejectedValue(new Error("Missing Access"));

      expect(await delivery.deliver(batch)).toBe(DeliveryOutcome.FAILED);

      expect(createDirectMessageSpy).not.toHaveBeenCalled();
      expect(logService.messages("error")).toEqual(["Missing Access"]);
    });

    it("ignores members who do not accept DMs", async () => {
      createDirectMessageSpy.mockRejectedValueOnce(cannotMessageUser);

      expect(await delivery.deliver(batch)).toBe(DeliveryOutcome.DELIVERED);

      expect(createDirectMessageSpy).toHaveBeenCalledTimes(2);
      expect(logService.messages("debug")).toContain("Member does not accept direct messages");
      expect(logService.messages("warn")).toEqual([]);
    });

    it("logs unexpected DM failures and carries on", async () => {
      createDirectMessageSpy.mockRejectedValueOnce(new Error("socket hang up"));

      expect(await delivery.deliver(batch)).toBe(DeliveryOutcome.DELIVERED);

      expect(createDirectMessageSpy).toHaveBeenCalledTimes(2);
      expect(logService.messages("warn")).toEqual(["socket hang up"]);
    });
  });

  describe("without an announcement channel", () => {
    it("is delivered when at least one DM went out", async () => {
      createDirectMessageSpy.mockRejectedValueOnce(cannotMessageUser);

      expect(await delivery.deliver(batch)).toBe(DeliveryOutcome.DELIVERED);

      expect(createMessageSpy).not.toHaveBeenCalled();
      expect(logService.messages("info")).toEqual(["No announcement channel configured, sending DMs only"]);
    });

    it("fails when no DM went out", async () => {
      createDirectMessageSpy.mockRejectedValue(cannotMessageUser);

      expect(await delivery.deliver(batch)).toBe(DeliveryOutcome.FAILED);
    });
  });
});
