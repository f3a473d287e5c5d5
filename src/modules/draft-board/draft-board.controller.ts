import { Request, Response, NextFunction } from 'express';
import { DraftBoardService } from './draft-board.service';
import { renderDraftBoard } from './draft-board.renderer';
import { requireLeagueId } from '../../utils/controller-helpers';

export class DraftBoardController {
  constructor(private readonly draftBoardService: DraftBoardService) {}

  /**
   * GET /api/leagues/:leagueId/draft-board
   * Rounds x slots grid with position and rank colors
   */
  getDraftBoard = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const leagueId = requireLeagueId(req);
      const { league, board } = await this.draftBoardService.getDraftBoard(leagueId);
      res.status(200).json(renderDraftBoard(league, board));
    } catch (error) {
      next(error);
    }
  };
}
