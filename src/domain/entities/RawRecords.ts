/**
 * Raw Records — The Adapter's Intermediate Shapes
 * Layer: Domain
 *
 * A RawRecord is what a provider adapter hands back after picking fields out
 * of the upstream JSON. Field NAMES are fixed (they are the adapter's contract
 * with the normalization layer) but field VALUES are `unknown`: the adapter
 * substitutes defaults for absent fields and passes everything else through
 * untouched. Whether a value really is an integer or a string is decided by
 * the output schema, not here.
 *
 * The names deliberately differ from the canonical output (team_id → id,
 * current_season → season, final_score → score ...). The rename happens in
 * exactly one place: the alias rules next to the output schemas.
 *
 * These records never leave the process.
 */
export interface RawLeagueRecord {
  id: unknown;
  name: unknown;
  shortcut: unknown;
  country: unknown;
  current_season: unknown;
}

export interface RawTeamRecord {
  team_id: unknown;
  name: unknown;
  short_name: unknown;
  icon_url: unknown;
}

export interface RawScoreRecord {
  home: unknown;
  away: unknown;
  match_status: unknown;
}

export interface RawMatchRecord {
  match_id: unknown;
  league_name: unknown;
  match_date_time: unknown;
  team_home: RawTeamRecord;
  team_away: RawTeamRecord;
  final_score: RawScoreRecord;
  is_finished: unknown;
}

export interface RawLeagueList {
  leagues: RawLeagueRecord[];
}

export interface RawMatchList {
  matches: RawMatchRecord[];
}

export interface RawTeamEnvelope {
  team: RawTeamRecord;
}

export interface RawMatchEnvelope {
  match: RawMatchRecord;
}
