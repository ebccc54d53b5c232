import {
  ApplicationCommandOptionType,
  ApplicationCommandType,
  InteractionResponseType,
  MessageFlags,
} from "discord-api-types/v10";
import type { BaseInteraction, CommandData, ExecuteResponse } from "../base/base.mjs";
import { BaseCommand } from "../base/base.mjs";
import { Preconditions } from "../../base/preconditions.mjs";
import { EndUserError } from "../../base/end-user-error.mjs";
import type { Region } from "../../services/valorant/types.mjs";
import { REGION_NAMES, REGIONS, isRegion, riotId } from "../../services/valorant/types.mjs";

export class RegisterCommand extends BaseCommand {
  readonly data: CommandData = {
    type: ApplicationCommandType.ChatInput,
    name: "register",
    description: "Register your Riot ID to track Valorant games",
    default_member_permissions: null,
    options: [
      {
        type: ApplicationCommandOptionType.String,
        name: "riot_name",
        description: "Your Riot username (e.g., PlayerName)",
        required: true,
        max_length: 16,
      },
      {
        type: ApplicationCommandOptionType.String,
        name: "riot_tag",
        description: "Your Riot tag (e.g., NA1)",
        required: true,
        max_length: 6,
      },
      {
        type: ApplicationCommandOptionType.String,
        name: "region",
        description: "Your region",
        required: false,
        choices: REGIONS.map((region) => ({ name: REGION_NAMES[region], value: region })),
      },
    ],
  };

  override execute(interaction: BaseInteraction): ExecuteResponse {
    return {
      response: {
        type: InteractionResponseType.DeferredChannelMessageWithSource,
        data: { flags: MessageFlags.Ephemeral },
      },
      jobToComplete: async () => this.registerJob(interaction),
    };
  }

  private async registerJob(interaction: BaseInteraction): Promise<void> {
    const { discordService, databaseService, valorantService } = this.services;

    try {
      const guildId = discordService.getGuildId(interaction);
      const userId = discordService.getDiscordUserId(interaction);
      const name = Preconditions.checkExists(this.getStringOption(interaction, "riot_name"), "Missing riot_name").trim();
      const tag = Preconditions.checkExists(this.getStringOption(interaction, "riot_tag"), "Missing riot_tag")
        .trim()
        .replace(/^#/, "");

      const account = await valorantService.getAccount(name, tag).catch((error: unknown) => {
        throw new EndUserError("Could not reach the Valorant API. Please try again later.", {
          title: "Valorant API unavailable",
          innerError: error instanceof Error ? error : new Error(String(error)),
        });
      });

      if (!account) {
        await discordService.updateDeferredReply(interaction.token, {
          content: `❌ Could not find account **${riotId({ name, tag })}**. Please check your Riot ID and try again.`,
        });
        return;
      }

      const region = this.resolveRegion(this.getStringOption(interaction, "region"), account.region);
      databaseService.upsertRegistration({
        GuildId: guildId,
        DiscordId: userId,
        RiotName: account.name,
        RiotTag: account.tag,
        Region: region,
        RegisteredAt: Date.now(),
      });

      const games = this.env.COMPETITIVE_ONLY ? "Competitive Valorant games" : "Valorant games";
      await discordService.updateDeferredReply(interaction.token, {
        content: [
          `✅ Successfully registered **${riotId(account)}** (${region.toUpperCase()}) in this server!`,
          `I'll now track your ${games} and report results in this server.`,
        ].join("\n"),
      });
    } catch (error) {
      await discordService.updateDeferredReplyWithError(interaction.token, error);
    }
  }

  /**
   * The chosen region, else the account's own region, else North America.
   */
  private resolveRegion(option: string | undefined, accountRegion: string): Region {
    if (option !== undefined && isRegion(option)) {
      return option;
    }

    const normalized = accountRegion.toLowerCase();
    return isRegion(normalized) ? normalized : "na";
  }
}
