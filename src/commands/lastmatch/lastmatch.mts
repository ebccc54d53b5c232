import { ApplicationCommandType, InteractionResponseType } from "discord-api-types/v10";
import type { BaseInteraction, CommandData, ExecuteResponse } from "../base/base.mjs";
import { BaseCommand } from "../base/base.mjs";
import { getCompetitiveMatches, getRegisteredAccount } from "../base/registration.mjs";
import { LastMatchEmbed } from "../../embeds/last-match-embed.mjs";
import { accountKey } from "../../services/valorant/types.mjs";

export class LastMatchCommand extends BaseCommand {
  readonly data: CommandData = {
    type: ApplicationCommandType.ChatInput,
    name: "lastmatch",
    description: "Get details about your last competitive match",
    default_member_permissions: null,
    options: [],
  };

  override execute(interaction: BaseInteraction): ExecuteResponse {
    return {
      response: {
        type: InteractionResponseType.DeferredChannelMessageWithSource,
      },
      jobToComplete: async () => this.lastMatchJob(interaction),
    };
  }

  private async lastMatchJob(interaction: BaseInteraction): Promise<void> {
    const { discordService } = this.services;

    try {
      const account = getRegisteredAccount(this.services, interaction);
      const [match] = await getCompetitiveMatches(this.services, account);
      if (!match) {
        await discordService.updateDeferredReply(interaction.token, {
          content: "❌ No recent competitive matches found.",
        });
        return;
      }

      const stats = match.players.get(accountKey(account));
      if (!stats) {
        await discordService.updateDeferredReply(interaction.token, {
          content: "❌ Could not find your data in the match.",
        });
        return;
      }

      const lastMatchEmbed = new LastMatchEmbed({ match, stats });
      await discordService.updateDeferredReply(interaction.token, { embeds: [lastMatchEmbed.embed] });
    } catch (error) {
      await discordService.updateDeferredReplyWithError(interaction.token, error);
    }
  }
}
