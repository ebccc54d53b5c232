export const SCHEMA = `
CREATE TABLE IF NOT EXISTS Registrations (
  GuildId TEXT NOT NULL,
  DiscordId TEXT NOT NULL,
  RiotName TEXT NOT NULL,
  RiotTag TEXT NOT NULL,
  Region TEXT NOT NULL,
  RegisteredAt INTEGER NOT NULL,
  PRIMARY KEY (GuildId, DiscordId)
);

CREATE TABLE IF NOT EXISTS GuildConfig (
  GuildId TEXT PRIMARY KEY,
  AnnouncementChannelId TEXT
);

CREATE TABLE IF NOT EXISTS AnnouncementLedger (
  GuildId TEXT NOT NULL,
  DiscordId TEXT NOT NULL,
  MatchId TEXT NOT NULL,
  AnnouncedAt INTEGER NOT NULL,
  PRIMARY KEY (GuildId, DiscordId)
);
`;
