import { EndUserError, EndUserErrorType } from "../../base/end-user-error.mjs";
import type { Services } from "../../services/install.mjs";
import type { MatchRecord, RiotAccount } from "../../services/valorant/types.mjs";
import { isCompetitive } from "../../services/valorant/types.mjs";
import type { BaseInteraction } from "./base.mjs";

/**
 * The Riot account the invoking member registered in this guild.
 */
export function getRegisteredAccount(
  { discordService, databaseService }: Pick<Services, "discordService" | "databaseService">,
  interaction: BaseInteraction,
): RiotAccount {
  const guildId = discordService.getGuildId(interaction);
  const registration = databaseService.getRegistration(guildId, discordService.getDiscordUserId(interaction));
  if (!registration) {
    throw new EndUserError("You're not registered in this server. Use `/register` first!", {
      title: "Not registered",
      errorType: EndUserErrorType.WARNING,
      handled: true,
    });
  }

  return { name: registration.RiotName, tag: registration.RiotTag, region: registration.Region };
}

/**
 * Recent competitive matches of the account, newest first.
 */
export async function getCompetitiveMatches(
  { valorantService }: Pick<Services, "valorantService">,
  account: RiotAccount,
): Promise<MatchRecord[]> {
  try {
    const matches = await valorantService.getMatchHistory(account);

    return matches.filter((match) => isCompetitive(match));
  } catch (error) {
    throw new EndUserError("Could not fetch your match history.", {
      title: "Match history unavailable",
      innerError: error instanceof Error ? error : new Error(String(error)),
    });
  }
}
