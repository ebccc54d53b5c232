import type { APIEmbed } from "discord-api-types/v10";
import { MatchAnnouncementEmbed } from "../../embeds/match-announcement-embed.mjs";
import type { DatabaseService } from "../database/database.mjs";
import type { DiscordService } from "../discord/discord.mjs";
import { DiscordError } from "../discord/discord-error.mjs";
import type { LogService } from "../log/types.mjs";
import type { AnnouncementBatch } from "../squad/types.mjs";
import type { AnnouncementDelivery } from "./types.mjs";
import { DeliveryOutcome } from "./types.mjs";

export interface DiscordDeliveryOpts {
  discordService: DiscordService;
  databaseService: Pick<DatabaseService, "getGuildConfig">;
  logService: LogService;
}

/**
 * Posts the announcement to the guild's announcement channel with member mentions, then sends each
 * member a copy by DM.
 *
 * A batch counts as delivered once the channel post succeeds. Guilds without an announcement channel
 * only get DMs, and the batch is delivered when at least one of them went out.
 */
export class DiscordDelivery implements AnnouncementDelivery {
  private readonly discordService: DiscordService;
  private readonly databaseService: Pick<DatabaseService, "getGuildConfig">;
  private readonly logService: LogService;

  constructor({ discordService, databaseService, logService }: DiscordDeliveryOpts) {
    this.discordService = discordService;
    this.databaseService = databaseService;
    this.logService = logService;
  }

  async deliver(batch: AnnouncementBatch): Promise<DeliveryOutcome> {
    const { tenant, matchId, members } = batch;
    const announcement = new MatchAnnouncementEmbed(
      { discordService: this.discordService },
      { batch, displayNames: await this.getDisplayNames(batch) },
    );
    const { embed } = announcement;

    const channelId = this.databaseService.getGuildConfig(tenant).AnnouncementChannelId;
    if (channelId != null) {
      try {
        await this.discordService.createMessage(channelId, {
          content: announcement.content,
          embeds: [embed],
          allowed_mentions: { users: members.map(({ userId }) => userId) },
        });
      } catch (error) {
        this.logService.error(
          error instanceof Error ? error : String(error),
          new Map([
            ["guildId", tenant],
            ["channelId", channelId],
            ["matchId", matchId],
          ]),
        );
        return DeliveryOutcome.FAILED;
      }
    } else {
      this.logService.info("No announcement channel configured, sending DMs only", new Map([["guildId", tenant]]));
    }

    const directMessagesSent = await this.sendDirectMessages(batch, embed);

    return channelId != null || directMessagesSent > 0 ? DeliveryOutcome.DELIVERED : DeliveryOutcome.FAILED;
  }

  private async getDisplayNames({ tenant, members }: AnnouncementBatch): Promise<Map<string, string>> {
    const displayNames = new Map<string, string>();

    await Promise.all(
      members.map(async ({ userId }) => {
        try {
          const member = await this.discordService.getGuildMember(tenant, userId);
          const displayName = this.discordService.getDisplayName(member);
          if (displayName != null) {
            displayNames.set(userId, displayName);
          }
        } catch (error) {
          this.logService.warn(
            error instanceof Error ? error : String(error),
            new Map([
              ["guildId", tenant],
              ["userId", userId],
            ]),
          );
        }
      }),
    );

    return displayNames;
  }

  private async sendDirectMessages({ tenant, members }: AnnouncementBatch, embed: APIEmbed): Promise<number> {
    let sent = 0;

    for (const { userId } of members) {
      try {
        await this.discordService.createDirectMessage(userId, { embeds: [embed] });
        sent++;
      } catch (error) {
        if (error instanceof DiscordError && error.isForbidden) {
          this.logService.debug("Member does not accept direct messages", new Map([["userId", userId]]));
          continue;
        }

        this.logService.warn(
          error instanceof Error ? error : String(error),
          new Map([
            ["guildId", tenant],
            ["userId", userId],
          ]),
        );
      }
    }

    return sent;
  }
}
