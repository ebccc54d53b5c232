import {
  ApplicationCommandOptionType,
  ApplicationCommandType,
  ChannelType,
  InteractionResponseType,
  PermissionFlagsBits,
} from "discord-api-types/v10";
import type { BaseInteraction, CommandData, ExecuteResponse } from "../base/base.mjs";
import { BaseCommand } from "../base/base.mjs";
import { Preconditions } from "../../base/preconditions.mjs";
import { EndUserError, EndUserErrorType } from "../../base/end-user-error.mjs";

export class SetChannelCommand extends BaseCommand {
  readonly data: CommandData = {
    type: ApplicationCommandType.ChatInput,
    name: "setchannel",
    description: "Set the channel for match announcements (Admin only)",
    default_member_permissions: PermissionFlagsBits.Administrator.toString(),
    options: [
      {
        type: ApplicationCommandOptionType.Channel,
        name: "channel",
        description: "The channel to post match announcements in",
        required: true,
        channel_types: [ChannelType.GuildText, ChannelType.GuildAnnouncement],
      },
    ],
  };

  override execute(interaction: BaseInteraction): ExecuteResponse {
    const { discordService, databaseService, logService } = this.services;

    try {
      const guildId = discordService.getGuildId(interaction);
      if (!discordService.hasPermission(interaction, PermissionFlagsBits.Administrator)) {
        throw new EndUserError("You need the Administrator permission to change the announcement channel.", {
          title: "Missing permission",
          errorType: EndUserErrorType.WARNING,
          handled: true,
        });
      }

      const channelId = Preconditions.checkExists(this.getStringOption(interaction, "channel"), "Missing channel");
      databaseService.setAnnouncementChannel(guildId, channelId);
      logService.info(
        "Announcement channel updated",
        new Map([
          ["guildId", guildId],
          ["channelId", channelId],
        ]),
      );

      return {
        response: {
          type: InteractionResponseType.ChannelMessageWithSource,
          data: { content: `✅ Match announcements will now be posted in <#${channelId}>` },
        },
      };
    } catch (error) {
      return this.errorResponse(error);
    }
  }
}
