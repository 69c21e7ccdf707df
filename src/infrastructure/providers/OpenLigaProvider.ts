/**
 * OpenLigaDB Provider Adapter
 * Layer: Infrastructure (Providers)
 * Pattern: Adapter Pattern (implements ISportsProvider)
 *
 * Each domain operation is one outbound call through the RetryingCaller
 * (which already applies the rate limit and the retry policy), followed by
 * the pure mapping in openLigaMapping.ts.
 *
 *   listLeagues()               GET /getavailableleagues
 *   getLeagueMatches(s, y)      GET /getmatchdata/{s}/{y}
 *   getTeam(id)                 GET /getteam/{id}
 *   getMatch(id)                GET /getmatchdata/{id}
 *
 * /getteam is listed by third-party API catalogues but not by OpenLigaDB's own
 * docs, and in practice answers 404 — which surfaces as an UpstreamError.
 * A 200 with a non-object body maps to a team of defaults, so "not found" and
 * "found but empty" are indistinguishable at this layer.
 */
import type {
  RawLeagueList,
  RawMatchEnvelope,
  RawMatchList,
  RawTeamEnvelope,
} from '@domain/entities/RawRecords';
import type { ISportsProvider } from '@domain/interfaces/ISportsProvider';
import type { UpstreamError } from '@shared/errors/AppError';
import type { RequestContext } from '@shared/types';
import type { ResultAsync } from 'neverthrow';

import type { RetryingCaller } from '../http/RetryingCaller';
import { mapLeagueList, mapMatchList, mapTeamEnvelope, resolveMatch } from './openLigaMapping';

export class OpenLigaProvider implements ISportsProvider {
  constructor(private readonly caller: RetryingCaller) {}

  listLeagues(ctx: RequestContext): ResultAsync<RawLeagueList, UpstreamError> {
    return this.caller.call(ctx, '/getavailableleagues').map(mapLeagueList);
  }

  getLeagueMatches(
    ctx: RequestContext,
    leagueShortcut: string,
    leagueSeason: string,
  ): ResultAsync<RawMatchList, UpstreamError> {
    const path = `/getmatchdata/${encodeURIComponent(leagueShortcut)}/${encodeURIComponent(leagueSeason)}`;
    return this.caller.call(ctx, path).map((data) => mapMatchList(data, leagueShortcut));
  }

  getTeam(ctx: RequestContext, teamId: number): ResultAsync<RawTeamEnvelope, UpstreamError> {
    return this.caller.call(ctx, `/getteam/${teamId}`).map(mapTeamEnvelope);
  }

  getMatch(ctx: RequestContext, matchId: number): ResultAsync<RawMatchEnvelope, UpstreamError> {
    return this.caller.call(ctx, `/getmatchdata/${matchId}`).andThen(resolveMatch);
  }
}
