/**
 * Operation Registry
 * Layer: Application
 *
 * The catalog of every operation the proxy accepts, keyed by name. Built once
 * at startup, read-only afterwards. Map insertion order is the order used for
 * `valid_operations` and for the /operations listing.
 */
import {
  GET_LEAGUE_MATCHES_ALIASES,
  GET_MATCH_ALIASES,
  GET_TEAM_ALIASES,
  GetLeagueMatchesOutputSchema,
  GetMatchOutputSchema,
  GetTeamOutputSchema,
  LIST_LEAGUES_ALIASES,
  ListLeaguesOutputSchema,
} from '@domain/entities/NormalizedRecords';

import { defineOperation, type Operation } from './Operation';
import {
  GetLeagueMatchesPayloadSchema,
  GetMatchPayloadSchema,
  GetTeamPayloadSchema,
  ListLeaguesPayloadSchema,
} from './payloadSchemas';

export type OperationRegistry = ReadonlyMap<string, Operation>;

export const OPERATION_NAMES = ['ListLeagues', 'GetLeagueMatches', 'GetTeam', 'GetMatch'] as const;

export type OperationName = (typeof OPERATION_NAMES)[number];

export function createOperationRegistry(): OperationRegistry {
  const operations: Operation[] = [
    defineOperation({
      name: 'ListLeagues',
      method: 'listLeagues',
      payloadSchema: ListLeaguesPayloadSchema,
      outputSchema: ListLeaguesOutputSchema,
      aliases: LIST_LEAGUES_ALIASES,
      extractArgs: () => [],
    }),
    defineOperation({
      name: 'GetLeagueMatches',
      method: 'getLeagueMatches',
      payloadSchema: GetLeagueMatchesPayloadSchema,
      outputSchema: GetLeagueMatchesOutputSchema,
      aliases: GET_LEAGUE_MATCHES_ALIASES,
      extractArgs: (payload) => [payload.league_shortcut, payload.league_season],
    }),
    defineOperation({
      name: 'GetTeam',
      method: 'getTeam',
      payloadSchema: GetTeamPayloadSchema,
      outputSchema: GetTeamOutputSchema,
      aliases: GET_TEAM_ALIASES,
      extractArgs: (payload) => [payload.team_id],
    }),
    defineOperation({
      name: 'GetMatch',
      method: 'getMatch',
      payloadSchema: GetMatchPayloadSchema,
      outputSchema: GetMatchOutputSchema,
      aliases: GET_MATCH_ALIASES,
      extractArgs: (payload) => [payload.match_id],
    }),
  ];

  return new Map(operations.map((operation) => [operation.name, operation]));
}
