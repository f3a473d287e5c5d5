import { Request } from 'express';
import { ValidationException } from './exceptions';
import { leagueParamsSchema, yearParamsSchema } from '../modules/leagues/leagues.schemas';

/**
 * Controller helper functions for common validation patterns.
 */

/**
 * Parse and validate the league ID from request params.
 * @throws ValidationException if the league ID is malformed
 */
export function requireLeagueId(req: Request): string {
  const parsed = leagueParamsSchema.safeParse({ leagueId: req.params.leagueId });
  if (!parsed.success) throw new ValidationException(parsed.error.issues[0].message);
  return parsed.data.leagueId;
}

/**
 * Parse and validate the draft year from request params.
 * @throws ValidationException if the year is not a 4-digit number
 */
export function requireYear(req: Request): number {
  const parsed = yearParamsSchema.safeParse({ year: req.params.year });
  if (!parsed.success) throw new ValidationException(parsed.error.issues[0].message);
  return parsed.data.year;
}
