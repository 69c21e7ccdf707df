/**
 * Operation Payload Schemas
 * Layer: Application
 *
 * One Zod schema per operation, stating the required input fields and their
 * types. Unknown keys are stripped, not rejected. An integer may arrive as a
 * JSON number or as a string of digits ("40"); anything else is rejected.
 */
import { z } from 'zod/v4';

const INTEGER_STRING = /^-?\d+$/;

const laxInt = z.preprocess(
  (value) => (typeof value === 'string' && INTEGER_STRING.test(value) ? Number(value) : value),
  z.number().int(),
);

export const ListLeaguesPayloadSchema = z.object({});

export const GetLeagueMatchesPayloadSchema = z.object({
  league_shortcut: z.string(),
  league_season: z.string(),
});

export const GetTeamPayloadSchema = z.object({
  team_id: laxInt,
});

export const GetMatchPayloadSchema = z.object({
  match_id: laxInt,
});

export type ListLeaguesPayload = z.infer<typeof ListLeaguesPayloadSchema>;
export type GetLeagueMatchesPayload = z.infer<typeof GetLeagueMatchesPayloadSchema>;
export type GetTeamPayload = z.infer<typeof GetTeamPayloadSchema>;
export type GetMatchPayload = z.infer<typeof GetMatchPayloadSchema>;
