/**
 * Normalized Records — The Canonical Output Shapes
 * Layer: Domain
 *
 * These Zod schemas are the contract the proxy promises its callers. Each one
 * states which fields are required, their types, and the defaults for the
 * optional ones. The TypeScript types are inferred from the schemas, so the
 * runtime check and the compile-time type can never disagree.
 *
 * Next to each schema sits its AliasSpec: the explicit rename table from the
 * adapter's intermediate field names (see RawRecords.ts) to the canonical
 * names below. Normalization is "rename, then validate" — nothing else.
 *
 * date_time is the one field with a parse step. An ISO-8601 string with an
 * offset (or Z) becomes a Date. One without an offset is a wall-clock time in
 * the league's own zone: it is written back as `yyyy-MM-ddTHH:mm:ss`, never
 * moved into the host's zone. Anything else that is still a string is kept.
 */
import { MATCH_STATUSES } from '@shared/constants';
import { format, isValid, parseISO } from 'date-fns';
import { z } from 'zod/v4';

/**
 * Rename rules for one record. `rename` maps intermediate → canonical keys;
 * `fields` holds the rules for nested records (or arrays of records), keyed by
 * the canonical name of the field that contains them.
 */
export interface AliasSpec {
  readonly rename?: Readonly<Record<string, string>>;
  readonly fields?: Readonly<Record<string, AliasSpec>>;
}

const ZONED_TIME = /T.*(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;
const WALL_CLOCK_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

function parseMatchDateTime(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const parsed = parseISO(value);
  if (!isValid(parsed)) return value;
  // parseISO reads a zoneless string as local time; format() reads it back the same way.
  return ZONED_TIME.test(value) ? parsed : format(parsed, WALL_CLOCK_FORMAT);
}

export const LeagueSummarySchema = z.object({
  id: z.number().int(),
  name: z.string(),
  shortcut: z.string(),
  country: z.string(),
  season: z.string(),
});

export const TeamDetailSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  short_name: z.string(),
  icon_url: z.string().nullable().default(null),
});

export const MatchScoreSchema = z.object({
  home: z.number().int(),
  away: z.number().int(),
  status: z.enum(MATCH_STATUSES),
});

export const MatchDetailSchema = z.object({
  id: z.number().int(),
  league_name: z.string(),
  date_time: z.preprocess(parseMatchDateTime, z.union([z.date(), z.string()])),
  team_home: TeamDetailSchema,
  team_away: TeamDetailSchema,
  score: MatchScoreSchema,
  is_finished: z.boolean(),
});

export const ListLeaguesOutputSchema = z.object({ leagues: z.array(LeagueSummarySchema) });
export const GetLeagueMatchesOutputSchema = z.object({ matches: z.array(MatchDetailSchema) });
export const GetTeamOutputSchema = z.object({ team: TeamDetailSchema });
export const GetMatchOutputSchema = z.object({ match: MatchDetailSchema });

export type LeagueSummary = z.infer<typeof LeagueSummarySchema>;
export type TeamDetail = z.infer<typeof TeamDetailSchema>;
export type MatchScore = z.infer<typeof MatchScoreSchema>;
export type MatchDetail = z.infer<typeof MatchDetailSchema>;

export type ListLeaguesOutput = z.infer<typeof ListLeaguesOutputSchema>;
export type GetLeagueMatchesOutput = z.infer<typeof GetLeagueMatchesOutputSchema>;
export type GetTeamOutput = z.infer<typeof GetTeamOutputSchema>;
export type GetMatchOutput = z.infer<typeof GetMatchOutputSchema>;

export type OperationOutput =
  | ListLeaguesOutput
  | GetLeagueMatchesOutput
  | GetTeamOutput
  | GetMatchOutput;

export const LEAGUE_SUMMARY_ALIASES: AliasSpec = {
  rename: { current_season: 'season' },
};

export const TEAM_DETAIL_ALIASES: AliasSpec = {
  rename: { team_id: 'id' },
};

export const MATCH_SCORE_ALIASES: AliasSpec = {
  rename: { match_status: 'status' },
};

export const MATCH_DETAIL_ALIASES: AliasSpec = {
  rename: { match_id: 'id', match_date_time: 'date_time', final_score: 'score' },
  fields: {
    team_home: TEAM_DETAIL_ALIASES,
    team_away: TEAM_DETAIL_ALIASES,
    score: MATCH_SCORE_ALIASES,
  },
};

export const LIST_LEAGUES_ALIASES: AliasSpec = { fields: { leagues: LEAGUE_SUMMARY_ALIASES } };
export const GET_LEAGUE_MATCHES_ALIASES: AliasSpec = { fields: { matches: MATCH_DETAIL_ALIASES } };
export const GET_TEAM_ALIASES: AliasSpec = { fields: { team: TEAM_DETAIL_ALIASES } };
export const GET_MATCH_ALIASES: AliasSpec = { fields: { match: MATCH_DETAIL_ALIASES } };
