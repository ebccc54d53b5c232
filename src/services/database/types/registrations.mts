import type { Region } from "../../valorant/types.mjs";

export interface RegistrationsRow {
  GuildId: string;
  DiscordId: string;
  RiotName: string;
  RiotTag: string;
  Region: Region;
  RegisteredAt: number;
}
