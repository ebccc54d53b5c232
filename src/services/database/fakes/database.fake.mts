import Database from "better-sqlite3";
import { aFakeLogServiceWith } from "../../log/fakes/log.fake.mjs";
import type { DatabaseServiceOpts } from "../database.mjs";
import { DatabaseService } from "../database.mjs";
import type { RegistrationsRow } from "../types/registrations.mjs";
import type { GuildConfigRow } from "../types/guild_config.mjs";

export function aFakeRegistrationsRow(opts: Partial<RegistrationsRow> = {}): RegistrationsRow {
  const defaultOpts: RegistrationsRow = {
    GuildId: "guild-1",
    DiscordId: "discord_user_01",
    RiotName: "PlayerOne",
    RiotTag: "NA1",
    Region: "na",
    RegisteredAt: new Date("2025-01-01T00:00:00.000Z").getTime(),
  };

  return {
    ...defaultOpts,
    ...opts,
  };
}

export function aFakeGuildConfigRow(opts: Partial<GuildConfigRow> = {}): GuildConfigRow {
  const defaultOpts: GuildConfigRow = {
    GuildId: "guild-1",
    AnnouncementChannelId: "announcement-channel-1",
  };

  return {
    ...defaultOpts,
    ...opts,
  };
}

/**
 * A database service backed by a fresh in-memory SQLite database with the schema applied.
 */
export function aFakeDatabaseServiceWith(opts: Partial<DatabaseServiceOpts> = {}): DatabaseService {
  const databaseService = new DatabaseService({
    db: new Database(":memory:"),
    logService: aFakeLogServiceWith(),
    ...opts,
  });
  databaseService.migrate();

  return databaseService;
}
