/**
 * Sports Provider Interface — The Adapter Contract
 * Layer: Domain
 * Pattern: Adapter Pattern
 *
 * Every upstream data source is wrapped in an adapter that exposes exactly
 * these four capabilities. The dispatcher is written against this interface
 * only, so swapping OpenLigaDB for another provider (or a test double) never
 * touches the pipeline.
 *
 * The interface is generated from two lookup tables — argument tuples and
 * raw result types, keyed by method name — so a registry entry that names a
 * method and supplies its arguments is checked by the compiler against the
 * exact signature of that method.
 *
 * Failures are values, not exceptions: each method returns a ResultAsync that
 * either holds the RawRecord envelope or an UpstreamError.
 */
import type {
  RawLeagueList,
  RawMatchEnvelope,
  RawMatchList,
  RawTeamEnvelope,
} from '@domain/entities/RawRecords';
import type { UpstreamError } from '@shared/errors/AppError';
import type { RequestContext } from '@shared/types';
import type { ResultAsync } from 'neverthrow';

export interface ProviderArgMap {
  listLeagues: [];
  getLeagueMatches: [leagueShortcut: string, leagueSeason: string];
  getTeam: [teamId: number];
  getMatch: [matchId: number];
}

export interface ProviderResultMap {
  listLeagues: RawLeagueList;
  getLeagueMatches: RawMatchList;
  getTeam: RawTeamEnvelope;
  getMatch: RawMatchEnvelope;
}

export type ProviderMethodName = keyof ProviderArgMap;

export type ISportsProvider = {
  [K in ProviderMethodName]: (
    ctx: RequestContext,
    ...args: ProviderArgMap[K]
  ) => ResultAsync<ProviderResultMap[K], UpstreamError>;
};
