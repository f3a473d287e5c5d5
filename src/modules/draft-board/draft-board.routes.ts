import { Router } from 'express';
import { DraftBoardController } from './draft-board.controller';
import { container, KEYS } from '../../container';
import { asyncHandler } from '../../shared/async-handler';

/**
 * Creates draft board routes mounted under /api/leagues/:leagueId/draft-board
 */
export function createDraftBoardRoutes(): Router {
  const draftBoardService = container.resolve(KEYS.DRAFT_BOARD_SERVICE);
  const draftBoardController = new DraftBoardController(draftBoardService);

  const router = Router({ mergeParams: true });

  // GET /api/leagues/:leagueId/draft-board
  router.get('/', asyncHandler(draftBoardController.getDraftBoard));

  return router;
}
