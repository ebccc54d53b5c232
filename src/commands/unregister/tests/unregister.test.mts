import { beforeEach, describe, expect, it } from "vitest";
import type { APIInteractionResponse } from "discord-api-types/v10";
import { InteractionResponseType, MessageFlags } from "discord-api-types/v10";
import { UnregisterCommand } from "../unregister.mjs";
import type { Services } from "../../../services/install.mjs";
import { installFakeServicesWith } from "../../../services/fakes/services.mjs";
import { aChatInputInteractionWith } from "../../../services/discord/fakes/data.mjs";
import { aFakeEnvWith } from "../../../base/fakes/env.fake.mjs";
import { aFakeRegistrationsRow } from "../../../services/database/fakes/database.fake.mjs";
import { EndUserErrorColor } from "../../../base/end-user-error.mjs";

describe("UnregisterCommand", () => {
  let services: Services;
  let command: UnregisterCommand;

  beforeEach(() => {
    services = installFakeServicesWith();
    command = new UnregisterCommand(services, aFakeEnvWith());
  });

  it("removes the member's registration in this server only", () => {
    services.databaseService.upsertRegistration(aFakeRegistrationsRow());
    services.databaseService.upsertRegistration(aFakeRegistrationsRow({ GuildId: "guild-2" }));

    const { response, jobToComplete } = command.execute(aChatInputInteractionWith("unregister"));

    expect(response).toEqual<APIInteractionResponse>({
      type: InteractionResponseType.ChannelMessageWithSource,
      data: {
        content: "✅ You've been unregistered from this server. Your games will no longer be tracked here.",
        flags: MessageFlags.Ephemeral,
      },
    });
    expect(jobToComplete).toBeUndefined();
    expect(services.databaseService.isRegistered("guild-1", "discord_user_01")).toBe(false);
    expect(services.databaseService.isRegistered("guild-2", "discord_user_01")).toBe(true);
  });

  it("tells an unregistered member", () => {
    const { response } = command.execute(aChatInputInteractionWith("unregister"));

    expect(response).toEqual<APIInteractionResponse>({
      type: InteractionResponseType.ChannelMessageWithSource,
      data: {
        content: "❌ You're not currently registered in this server.",
        flags: MessageFlags.Ephemeral,
      },
    });
  });

  it("replies with a warning outside a server", () => {
    const { response } = command.execute(aChatInputInteractionWith("unregister", [], { guild_id: undefined }));

    expect(response).toEqual<APIInteractionResponse>({
      type: InteractionResponseType.ChannelMessageWithSource,
      data: {
        embeds: [
          {
            title: "Server only",
            description: "This command can only be used inside a server.",
            color: EndUserErrorColor.WARNING,
            fields: [],
          },
        ],
        flags: MessageFlags.Ephemeral,
      },
    });
  });
});
