import type { APIEmbed } from "discord-api-types/v10";
import type { MatchRecord, PlayerMatchStats } from "../services/valorant/types.mjs";
import { EmbedColor } from "./colors.mjs";

export interface LastMatchEmbedData {
  match: MatchRecord;
  stats: PlayerMatchStats;
}

export class LastMatchEmbed {
  private readonly data: LastMatchEmbedData;

  constructor(data: LastMatchEmbedData) {
    this.data = data;
  }

  get embed(): APIEmbed {
    const { match, stats } = this.data;

    return {
      title: "🎮 Last Competitive Match",
      color: stats.result === "win" ? EmbedColor.GREEN : EmbedColor.RED,
      fields: [
        { name: "Result", value: this.result, inline: true },
        { name: "Score", value: this.score, inline: true },
        { name: "Map", value: match.map, inline: true },
        { name: "Agent", value: stats.agent, inline: true },
        {
          name: "K/D/A",
          value: `${stats.kills.toString()}/${stats.deaths.toString()}/${stats.assists.toString()}`,
          inline: true,
        },
        { name: "Mode", value: match.mode, inline: true },
      ],
    };
  }

  private get result(): string {
    switch (this.data.stats.result) {
      case "win":
        return "🏆 Victory";
      case "draw":
        return "🤝 Draw";
      default:
        return "💀 Defeat";
    }
  }

  // own team first
  private get score(): string {
    const { match, stats } = this.data;
    if (match.score == null) {
      return "Unknown";
    }

    const { red, blue } = match.score;
    return stats.team === "blue" ? `${blue.toString()}-${red.toString()}` : `${red.toString()}-${blue.toString()}`;
  }
}
