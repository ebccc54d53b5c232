export interface GuildConfigRow {
  GuildId: string;
  AnnouncementChannelId: string | null;
}
