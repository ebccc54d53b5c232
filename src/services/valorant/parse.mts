import { readBoolean, readJsonArray, readJsonObject, readNumber, readString } from "../../base/json-readers.mjs";
import type { JsonObject } from "../../base/json-readers.mjs";
import type { MatchRecord, MatchResult, MatchScore, PlayerMatchStats, TeamColor, ValorantAccount } from "./types.mjs";
import { accountKey } from "./types.mjs";
import { ValorantPayloadError } from "./valorant-api-error.mjs";

interface TeamOutcome {
  hasWon: boolean;
  roundsWon: number;
}

function readTeamColor(value: unknown): TeamColor | null {
  switch (readString(value)?.toLowerCase()) {
    case "red": {
      return "red";
    }
    case "blue": {
      return "blue";
    }
    default: {
      return null;
    }
  }
}

function parseTeamOutcome(value: unknown): TeamOutcome | null {
  const team = readJsonObject(value);
  if (!team) {
    return null;
  }

  const hasWon = readBoolean(team["has_won"]);
  const roundsWon = readNumber(team["rounds_won"]);
  if (hasWon === null || roundsWon === null) {
    return null;
  }

  return { hasWon, roundsWon };
}

function resolveResult(team: TeamColor | null, red: TeamOutcome | null, blue: TeamOutcome | null): MatchResult {
  if (team === null || red === null || blue === null) {
    return "unknown";
  }

  const own = team === "red" ? red : blue;
  if (own.hasWon) {
    return "win";
  }

  if (!red.hasWon && !blue.hasWon && red.roundsWon === blue.roundsWon) {
    return "draw";
  }

  return "loss";
}

function parsePlayer(value: unknown, red: TeamOutcome | null, blue: TeamOutcome | null): PlayerMatchStats {
  const player = readJsonObject(value);
  const stats = readJsonObject(player?.["stats"]);
  if (!player || !stats) {
    throw new ValorantPayloadError("Invalid match player payload");
  }

  const puuid = readString(player["puuid"]);
  const name = readString(player["name"]);
  const tag = readString(player["tag"]);
  if (puuid === null || name === null || tag === null) {
    throw new ValorantPayloadError("Invalid match player payload");
  }

  const team = readTeamColor(player["team"]);

  return {
    puuid,
    name,
    tag,
    agent: readString(player["character"]) ?? "Unknown",
    team,
    kills: readNumber(stats["kills"]) ?? 0,
    deaths: readNumber(stats["deaths"]) ?? 0,
    assists: readNumber(stats["assists"]) ?? 0,
    score: readNumber(stats["score"]) ?? 0,
    result: resolveResult(team, red, blue),
  };
}

function readMetadata(match: JsonObject): { matchId: string; map: string; mode: string; startedAt: Date } {
  const metadata = readJsonObject(match["metadata"]);
  const matchId = readString(metadata?.["matchid"]);
  if (!metadata || matchId === null || matchId === "") {
    throw new ValorantPayloadError("Invalid match metadata payload");
  }

  const gameStart = readNumber(metadata["game_start"]);

  return {
    matchId,
    map: readString(metadata["map"]) ?? "Unknown",
    mode: readString(metadata["mode"]) ?? "Unknown",
    startedAt: new Date(gameStart !== null ? gameStart * 1000 : 0),
  };
}

export function parseMatch(value: unknown): MatchRecord {
  const match = readJsonObject(value);
  if (!match) {
    throw new ValorantPayloadError("Invalid match payload");
  }

  const metadata = readMetadata(match);
  const teams = readJsonObject(match["teams"]);
  const red = parseTeamOutcome(teams?.["red"]);
  const blue = parseTeamOutcome(teams?.["blue"]);
  const score: MatchScore | null = red && blue ? { red: red.roundsWon, blue: blue.roundsWon } : null;

  const allPlayers = readJsonArray(readJsonObject(match["players"])?.["all_players"]) ?? [];
  const players = new Map<string, PlayerMatchStats>();
  for (const playerValue of allPlayers) {
    const player = parsePlayer(playerValue, red, blue);
    players.set(accountKey(player), player);
  }

  return {
    ...metadata,
    score,
    players,
  };
}

/**
 * Reads the raw `data` array of a match-history response, newest match first. Entries are parsed with
 * `parseMatch` one at a time so a malformed older match does not hide the newer ones.
 */
export function readMatchHistory(body: unknown): readonly unknown[] {
  const data = readJsonArray(readJsonObject(body)?.["data"]);
  if (!data) {
    throw new ValorantPayloadError("Invalid match history payload");
  }

  return data;
}

export function parseAccount(body: unknown): ValorantAccount | null {
  const data = readJsonObject(readJsonObject(body)?.["data"]);
  if (!data) {
    return null;
  }

  const puuid = readString(data["puuid"]);
  const name = readString(data["name"]);
  const tag = readString(data["tag"]);
  if (puuid === null || name === null || tag === null) {
    return null;
  }

  return {
    puuid,
    name,
    tag,
    region: readString(data["region"]) ?? "",
    accountLevel: readNumber(data["account_level"]) ?? 0,
  };
}
