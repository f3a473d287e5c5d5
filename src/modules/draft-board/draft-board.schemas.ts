import { z } from 'zod';

/**
 * Cached pick records (camelCase, as produced by pickRecordFromDatabase)
 */
export const pickRecordSchema = z.object({
  round: z.number(),
  pickInRound: z.number(),
  overallPick: z.number(),
  teamId: z.string(),
  draftOrder: z.number().nullable(),
  leagueRank: z.number().nullable(),
  leaguePoints: z.number().nullable(),
  firstName: z.string().nullable(),
  lastName: z.string().nullable(),
  position: z.string().nullable(),
  team: z.string().nullable(),
});

export const pickRecordListSchema = z.array(pickRecordSchema);
