import { Router } from 'express';
import { LeagueController } from './leagues.controller';
import { container, KEYS } from '../../container';
import { asyncHandler } from '../../shared/async-handler';
import { createDraftBoardRoutes } from '../draft-board/draft-board.routes';

function createLeagueController(): LeagueController {
  return new LeagueController(container.resolve(KEYS.LEAGUE_SERVICE));
}

/**
 * Routes mounted under /api/years
 */
export function createYearRoutes(): Router {
  const leagueController = createLeagueController();
  const router = Router();

  // GET /api/years - Draft years, newest first
  router.get('/', asyncHandler(leagueController.getYears));

  // GET /api/years/:year/leagues - Leagues drafted in a year
  router.get('/:year/leagues', asyncHandler(leagueController.getLeaguesForYear));

  return router;
}

/**
 * Routes mounted under /api/leagues
 */
export function createLeagueRoutes(): Router {
  const leagueController = createLeagueController();
  const router = Router();

  // GET /api/leagues/:leagueId - League details
  router.get('/:leagueId', asyncHandler(leagueController.getLeague));

  // /api/leagues/:leagueId/draft-board
  router.use('/:leagueId/draft-board', createDraftBoardRoutes());

  return router;
}
