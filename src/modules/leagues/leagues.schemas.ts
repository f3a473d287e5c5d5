import { z } from 'zod';

/**
 * Path params for /api/years/:year/leagues
 */
export const yearParamsSchema = z.object({
  year: z
    .string()
    .regex(/^\d{4}$/, 'Year must be a 4-digit number')
    .transform((val) => parseInt(val, 10)),
});

/**
 * Path params for /api/leagues/:leagueId and nested routes
 */
export const leagueParamsSchema = z.object({
  leagueId: z
    .string()
    .min(1, 'League ID is required')
    .max(64, 'League ID is too long')
    .regex(/^[A-Za-z0-9_-]+$/, 'Invalid league ID'),
});

/**
 * Cached league entries
 */
export const leagueSchema = z.object({
  leagueId: z.string(),
  year: z.number(),
  name: z.string(),
  draftDate: z.string().nullable(),
});
