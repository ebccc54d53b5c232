import { ApplicationCommandType, InteractionResponseType } from "discord-api-types/v10";
import type { BaseInteraction, CommandData, ExecuteResponse } from "../base/base.mjs";
import { BaseCommand } from "../base/base.mjs";
import { getCompetitiveMatches, getRegisteredAccount } from "../base/registration.mjs";
import { RecentStatsEmbed } from "../../embeds/recent-stats-embed.mjs";

export class StatsCommand extends BaseCommand {
  readonly data: CommandData = {
    type: ApplicationCommandType.ChatInput,
    name: "stats",
    description: "Check your recent Valorant Competitive stats",
    default_member_permissions: null,
    options: [],
  };

  override execute(interaction: BaseInteraction): ExecuteResponse {
    return {
      response: {
        type: InteractionResponseType.DeferredChannelMessageWithSource,
      },
      jobToComplete: async () => this.statsJob(interaction),
    };
  }

  private async statsJob(interaction: BaseInteraction): Promise<void> {
    const { discordService } = this.services;

    try {
      const account = getRegisteredAccount(this.services, interaction);
      const matches = await getCompetitiveMatches(this.services, account);
      const statsEmbed = new RecentStatsEmbed({ account, matches });

      if (statsEmbed.matchCount === 0) {
        await discordService.updateDeferredReply(interaction.token, {
          content: "❌ No recent competitive matches found.",
        });
        return;
      }

      await discordService.updateDeferredReply(interaction.token, { embeds: [statsEmbed.embed] });
    } catch (error) {
      await discordService.updateDeferredReplyWithError(interaction.token, error);
    }
  }
}
