import type { APIEmbed, APIEmbedField } from "discord-api-types/v10";
import type { DiscordService } from "../services/discord/discord.mjs";
import type { AnnouncementBatch, SquadMember } from "../services/squad/types.mjs";
import type { MatchResult, MatchScore } from "../services/valorant/types.mjs";
import { riotId } from "../services/valorant/types.mjs";
import { EmbedColor } from "./colors.mjs";

interface MatchAnnouncementEmbedServices {
  discordService: DiscordService;
}

export interface MatchAnnouncementEmbedData {
  batch: AnnouncementBatch;
  /** Guild display name per user id; members without one are shown by riot id. */
  displayNames: ReadonlyMap<string, string>;
}

const RESULT_EMOJI: Record<MatchResult, string> = {
  win: "🏆",
  loss: "💀",
  draw: "🤝",
  unknown: "❔",
};

export function formatKda(kills: number, deaths: number, assists: number): string {
  return ((kills + assists) / Math.max(deaths, 1)).toFixed(2);
}

export function formatScore(score: MatchScore | null): string {
  if (score == null) {
    return "Unknown";
  }

  return `🔴 ${score.red.toString()} - ${score.blue.toString()} 🔵`;
}

export class MatchAnnouncementEmbed {
  private readonly services: MatchAnnouncementEmbedServices;
  private readonly data: MatchAnnouncementEmbedData;

  constructor(services: MatchAnnouncementEmbedServices, data: MatchAnnouncementEmbedData) {
    this.services = services;
    this.data = data;
  }

  get content(): string {
    return this.data.batch.members.map(({ userId }) => `<@${userId}>`).join(" ");
  }

  get embed(): APIEmbed {
    const { match, members } = this.data.batch;
    const { discordService } = this.services;
    const isStreaming = members.some((member) => member.isStreaming);

    return {
      title:
        members.length === 1
          ? "🎮 Valorant Match Complete!"
          : `🎮 Squad Match Complete! (${members.length.toString()} players)`,
      description: `Started ${discordService.getTimestamp(match.startedAt.toISOString(), "R")}`,
      color: this.getColor(members),
      fields: [
        { name: "Map", value: match.map, inline: true },
        { name: "Mode", value: match.mode, inline: true },
        { name: "Score", value: formatScore(match.score), inline: true },
        { name: "\u200b", value: "**Player Stats**", inline: false },
        ...members.map((member) => this.getPlayerField(member)),
      ],
      footer: {
        text: `${members.map(({ account }) => riotId(account)).join(", ")}${isStreaming ? " 📺 Streaming" : ""}`,
      },
      timestamp: new Date().toISOString(),
    };
  }

  private getColor(members: SquadMember[]): EmbedColor {
    const teams = new Set(members.map(({ stats }) => stats.team));
    if (teams.size > 1) {
      return EmbedColor.GOLD;
    }

    // the squad shares a team, so the first member's result stands for everyone
    switch (members[0]?.stats.result) {
      case "win":
        return EmbedColor.GREEN;
      case "draw":
        return EmbedColor.GOLD;
      default:
        return EmbedColor.RED;
    }
  }

  private getPlayerField({ userId, account, stats }: SquadMember): APIEmbedField {
    const { kills, deaths, assists } = stats;
    const teamEmoji = stats.team === "red" ? "🔴" : "🔵";

    return {
      name: this.data.displayNames.get(userId) ?? riotId(account),
      value: `${RESULT_EMOJI[stats.result]} ${teamEmoji} **${stats.agent}** | K/D/A: **${kills.toString()}/${deaths.toString()}/${assists.toString()}** (KDA: ${formatKda(kills, deaths, assists)})`,
      inline: false,
    };
  }
}
