export interface AnnouncementLedgerRow {
  GuildId: string;
  DiscordId: string;
  MatchId: string;
  AnnouncedAt: number;
}
