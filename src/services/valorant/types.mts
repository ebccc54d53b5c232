export const REGIONS = ["na", "eu", "ap", "kr", "latam", "br"] as const;

export type Region = (typeof REGIONS)[number];

export const REGION_NAMES: Record<Region, string> = {
  na: "North America",
  eu: "Europe",
  ap: "Asia Pacific",
  kr: "Korea",
  latam: "Latin America",
  br: "Brazil",
};

export function isRegion(value: string): value is Region {
  return REGIONS.some((region) => region === value);
}

export interface RiotAccount {
  name: string;
  tag: string;
  region: Region;
}

export interface ValorantAccount {
  puuid: string;
  name: string;
  tag: string;
  region: string;
  accountLevel: number;
}

export type TeamColor = "red" | "blue";

export type MatchResult = "win" | "loss" | "draw" | "unknown";

export interface PlayerMatchStats {
  puuid: string;
  name: string;
  tag: string;
  agent: string;
  team: TeamColor | null;
  kills: number;
  deaths: number;
  assists: number;
  score: number;
  result: MatchResult;
}

export interface MatchScore {
  red: number;
  blue: number;
}

export interface MatchRecord {
  matchId: string;
  map: string;
  mode: string;
  startedAt: Date;
  score: MatchScore | null;
  /** Keyed by {@link accountKey} of each player. */
  players: ReadonlyMap<string, PlayerMatchStats>;
}

/**
 * Case-insensitive identity of a Riot account within a match roster.
 */
export function accountKey({ name, tag }: { name: string; tag: string }): string {
  return `${name}#${tag}`.toLowerCase();
}

export function riotId({ name, tag }: { name: string; tag: string }): string {
  return `${name}#${tag}`;
}

export function isCompetitive(match: Pick<MatchRecord, "mode">): boolean {
  return match.mode.toLowerCase() === "competitive";
}
