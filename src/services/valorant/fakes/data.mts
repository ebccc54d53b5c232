export interface ApiPlayerOpts {
  puuid?: string;
  name: string;
  tag: string;
  team?: "Red" | "Blue";
  character?: string;
  kills?: number;
  deaths?: number;
  assists?: number;
  score?: number;
}

export function anApiPlayer({
  puuid,
  name,
  tag,
  team = "Red",
  character = "Jett",
  kills = 20,
  deaths = 10,
  assists = 5,
  score = 5000,
}: ApiPlayerOpts): Record<string, unknown> {
  return {
    puuid: puuid ?? `puuid-${name.toLowerCase()}`,
    name,
    tag,
    team,
    character,
    stats: { score, kills, deaths, assists },
  };
}

export interface ApiMatchOpts {
  matchId?: string;
  map?: string;
  mode?: string;
  gameStart?: number;
  redRounds?: number;
  blueRounds?: number;
  redWon?: boolean;
  blueWon?: boolean;
  players?: Record<string, unknown>[];
  withoutTeams?: boolean;
}

export function anApiMatch({
  matchId = "match-1",
  map = "Ascent",
  mode = "Competitive",
  gameStart = 1735689600,
  redRounds = 13,
  blueRounds = 8,
  redWon,
  blueWon,
  players = [anApiPlayer({ name: "PlayerOne", tag: "NA1" })],
  withoutTeams = false,
}: ApiMatchOpts = {}): Record<string, unknown> {
  return {
    metadata: { matchid: matchId, map, mode, game_start: gameStart },
    teams: withoutTeams
      ? null
      : {
          red: { has_won: redWon ?? redRounds > blueRounds, rounds_won: redRounds, rounds_lost: blueRounds },
          blue: { has_won: blueWon ?? blueRounds > redRounds, rounds_won: blueRounds, rounds_lost: redRounds },
        },
    players: { all_players: players },
  };
}
