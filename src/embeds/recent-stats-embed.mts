import type { APIEmbed } from "discord-api-types/v10";
import type { MatchRecord, PlayerMatchStats, RiotAccount } from "../services/valorant/types.mjs";
import { accountKey, riotId } from "../services/valorant/types.mjs";
import { EmbedColor } from "./colors.mjs";

export const RECENT_STATS_MATCH_COUNT = 5;

export interface RecentStatsEmbedData {
  account: RiotAccount;
  /** Newest first. Matches the account does not appear in are skipped. */
  matches: MatchRecord[];
}

export class RecentStatsEmbed {
  private readonly data: RecentStatsEmbedData;

  constructor(data: RecentStatsEmbedData) {
    this.data = data;
  }

  get matchCount(): number {
    return this.playerStats.length;
  }

  get embed(): APIEmbed {
    const { account } = this.data;
    const stats = this.playerStats;
    const count = stats.length;
    const wins = stats.filter(({ result }) => result === "win").length;
    const kills = stats.reduce((total, { kills: k }) => total + k, 0);
    const deaths = stats.reduce((total, { deaths: d }) => total + d, 0);
    const assists = stats.reduce((total, { assists: a }) => total + a, 0);

    return {
      title: `📊 Recent Competitive Stats for ${riotId(account)}`,
      color: EmbedColor.BLURPLE,
      fields: [
        {
          name: `Last ${count.toString()} Comp Games`,
          value: `${wins.toString()}W - ${(count - wins).toString()}L`,
          inline: true,
        },
        {
          name: "Total K/D/A",
          value: `${kills.toString()}/${deaths.toString()}/${assists.toString()}`,
          inline: true,
        },
        {
          name: "Avg K/D",
          value: count > 0 ? `${(kills / count).toFixed(1)}/${(deaths / count).toFixed(1)}` : "-",
          inline: true,
        },
      ],
    };
  }

  private get playerStats(): PlayerMatchStats[] {
    const key = accountKey(this.data.account);

    return this.data.matches
      .slice(0, RECENT_STATS_MATCH_COUNT)
      .flatMap((match) => {
        const stats = match.players.get(key);
        return stats ? [stats] : [];
      });
  }
}
