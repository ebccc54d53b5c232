import type Database from "better-sqlite3";
import type { LogService } from "../log/types.mjs";
import type { RegistrationsRow } from "./types/registrations.mjs";
import type { GuildConfigRow } from "./types/guild_config.mjs";
import type { AnnouncementLedgerRow } from "./types/announcement_ledger.mjs";
import { SCHEMA } from "./schema.mjs";

export interface DatabaseServiceOpts {
  db: Database.Database;
  logService: LogService;
}

/**
 * Persistence for registrations, per-guild configuration and the announcement ledger.
 *
 * All statements run synchronously against SQLite, so reads made from the activity pipeline never
 * suspend.
 */
export class DatabaseService {
  private readonly db: Database.Database;
  private readonly logService: LogService;
  private readonly guildConfigCache = new Map<string, GuildConfigRow>();

  constructor({ db, logService }: DatabaseServiceOpts) {
    this.db = db;
    this.logService = logService;
  }

  migrate(): void {
    this.db.exec(SCHEMA);
    this.logService.debug("Database schema applied");
  }

  getRegistration(guildId: string, discordId: string): RegistrationsRow | undefined {
    return this.db
      .prepare<[string, string], RegistrationsRow>("SELECT * FROM Registrations WHERE GuildId = ? AND DiscordId = ?")
      .get(guildId, discordId);
  }

  isRegistered(guildId: string, discordId: string): boolean {
    return this.getRegistration(guildId, discordId) !== undefined;
  }

  upsertRegistration(registration: RegistrationsRow): void {
    this.db
      .prepare<[string, string, string, string, string, number]>(
        `INSERT INTO Registrations (GuildId, DiscordId, RiotName, RiotTag, Region, RegisteredAt) VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT(GuildId, DiscordId) DO UPDATE SET RiotName=excluded.RiotName, RiotTag=excluded.RiotTag, Region=excluded.Region, RegisteredAt=excluded.RegisteredAt`,
      )
      .run(
        registration.GuildId,
        registration.DiscordId,
        registration.RiotName,
        registration.RiotTag,
        registration.Region,
        registration.RegisteredAt,
      );
  }

  deleteRegistration(guildId: string, discordId: string): boolean {
    const result = this.db
      .prepare<[string, string]>("DELETE FROM Registrations WHERE GuildId = ? AND DiscordId = ?")
      .run(guildId, discordId);

    return result.changes > 0;
  }

  getGuildConfig(guildId: string): GuildConfigRow {
    const cached = this.guildConfigCache.get(guildId);
    if (cached) {
      return cached;
    }

    const result = this.db
      .prepare<[string], GuildConfigRow>("SELECT * FROM GuildConfig WHERE GuildId = ?")
      .get(guildId);

    const config: GuildConfigRow = result ?? { GuildId: guildId, AnnouncementChannelId: null };
    this.guildConfigCache.set(guildId, config);
    return config;
  }

  setAnnouncementChannel(guildId: string, channelId: string | null): void {
    this.db
      .prepare<[string, string | null]>(
        `INSERT INTO GuildConfig (GuildId, AnnouncementChannelId) VALUES (?, ?)
        ON CONFLICT(GuildId) DO UPDATE SET AnnouncementChannelId=excluded.AnnouncementChannelId`,
      )
      .run(guildId, channelId);

    this.guildConfigCache.set(guildId, { GuildId: guildId, AnnouncementChannelId: channelId });
  }

  getLastAnnouncedMatchId(guildId: string, discordId: string): string | undefined {
    const row = this.db
      .prepare<
        [string, string],
        Pick<AnnouncementLedgerRow, "MatchId">
      >("SELECT MatchId FROM AnnouncementLedger WHERE GuildId = ? AND DiscordId = ?")
      .get(guildId, discordId);

    return row?.MatchId;
  }

  recordAnnouncement(guildId: string, discordIds: readonly string[], matchId: string, announcedAt: Date): void {
    const statement = this.db.prepare<[string, string, string, number]>(
      `INSERT INTO AnnouncementLedger (GuildId, DiscordId, MatchId, AnnouncedAt) VALUES (?, ?, ?, ?)
      ON CONFLICT(GuildId, DiscordId) DO UPDATE SET MatchId=excluded.MatchId, AnnouncedAt=excluded.AnnouncedAt`,
    );

    const record = this.db.transaction((ids: readonly string[]) => {
      for (const discordId of ids) {
        statement.run(guildId, discordId, matchId, announcedAt.getTime());
      }
    });

    record(discordIds);
  }
}
