/**
 * OpenLigaDB JSON → RawRecord mapping
 * Layer: Infrastructure (Providers)
 *
 * Pure functions, no I/O. They pick the fields the proxy cares about out of
 * OpenLigaDB's camelCase payloads and fill in defaults for anything missing
 * or null (0, "", false, null icon). Values that are present are passed
 * through untouched; the output schema decides whether they are acceptable.
 *
 * Score convention: the LAST entry of `matchResults` is taken as the final
 * score. OpenLigaDB usually lists the half-time result first and the final
 * result last, but that ordering is not part of its documented contract.
 */
import type {
  RawLeagueList,
  RawLeagueRecord,
  RawMatchEnvelope,
  RawMatchList,
  RawMatchRecord,
  RawScoreRecord,
  RawTeamEnvelope,
  RawTeamRecord,
} from '@domain/entities/RawRecords';
import { UpstreamError } from '@shared/errors/AppError';
import { err, ok, type Result } from 'neverthrow';

type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function objects(data: unknown): JsonObject[] {
  return Array.isArray(data) ? data.filter(isJsonObject) : [];
}

export function mapLeague(league: JsonObject): RawLeagueRecord {
  return {
    id: league.leagueId ?? 0,
    name: league.leagueName ?? '',
    shortcut: league.leagueShortcut ?? '',
    country: league.country ?? '',
    current_season: league.leagueSeason ?? '',
  };
}

/** A non-object team becomes a team of defaults. */
export function mapTeam(team: unknown): RawTeamRecord {
  const source = isJsonObject(team) ? team : {};
  return {
    team_id: source.teamId ?? 0,
    name: source.teamName ?? '',
    short_name: source.shortName ?? '',
    icon_url: source.teamIconUrl ?? null,
  };
}

export function mapFinalScore(match: JsonObject): RawScoreRecord {
  const results = match.matchResults;
  const last = Array.isArray(results) && results.length > 0 ? results[results.length - 1] : undefined;

  if (!isJsonObject(last)) {
    return { home: 0, away: 0, match_status: 'scheduled' };
  }

  return {
    home: last.pointsTeam1 ?? 0,
    away: last.pointsTeam2 ?? 0,
    match_status: match.matchIsFinished === true ? 'finished' : 'in_progress',
  };
}

export function mapMatch(match: JsonObject, leagueName: unknown): RawMatchRecord {
  return {
    match_id: match.matchID ?? 0,
    league_name: leagueName ?? '',
    match_date_time: match.matchDateTime ?? '',
    team_home: mapTeam(match.team1),
    team_away: mapTeam(match.team2),
    final_score: mapFinalScore(match),
    is_finished: match.matchIsFinished ?? false,
  };
}

export function mapLeagueList(data: unknown): RawLeagueList {
  return { leagues: objects(data).map(mapLeague) };
}

/** Matches of a league listing carry the requested shortcut as their league name. */
export function mapMatchList(data: unknown, leagueShortcut: string): RawMatchList {
  return { matches: objects(data).map((match) => mapMatch(match, leagueShortcut)) };
}

export function mapTeamEnvelope(data: unknown): RawTeamEnvelope {
  return { team: mapTeam(data) };
}

/**
 * The single-match endpoint answers with either an object or an array of one.
 * Empty, non-object or empty-object answers mean the match does not exist.
 */
export function resolveMatch(data: unknown): Result<RawMatchEnvelope, UpstreamError> {
  const candidate = Array.isArray(data) ? data[0] : data;

  if (!isJsonObject(candidate) || Object.keys(candidate).length === 0) {
    return err(new UpstreamError('Match not found'));
  }

  return ok({ match: mapMatch(candidate, candidate.leagueName) });
}
