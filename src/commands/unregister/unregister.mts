import { ApplicationCommandType, InteractionResponseType, MessageFlags } from "discord-api-types/v10";
import type { BaseInteraction, CommandData, ExecuteResponse } from "../base/base.mjs";
import { BaseCommand } from "../base/base.mjs";

export class UnregisterCommand extends BaseCommand {
  readonly data: CommandData = {
    type: ApplicationCommandType.ChatInput,
    name: "unregister",
    description: "Stop tracking your Valorant games in this server",
    default_member_permissions: null,
    options: [],
  };

  override execute(interaction: BaseInteraction): ExecuteResponse {
    const { discordService, databaseService, logService } = this.services;

    try {
      const guildId = discordService.getGuildId(interaction);
      const userId = discordService.getDiscordUserId(interaction);
      const removed = databaseService.deleteRegistration(guildId, userId);

      if (removed) {
        logService.info(
          "Member unregistered",
          new Map([
            ["guildId", guildId],
            ["userId", userId],
          ]),
        );
      }

      return {
        response: {
          type: InteractionResponseType.ChannelMessageWithSource,
          data: {
            content: removed
              ? "✅ You've been unregistered from this server. Your games will no longer be tracked here."
              : "❌ You're not currently registered in this server.",
            flags: MessageFlags.Ephemeral,
          },
        },
      };
    } catch (error) {
      return this.errorResponse(error);
    }
  }
}
