import { Request, Response, NextFunction } from 'express';
import { LeagueService } from './leagues.service';
import { leagueSummaryToResponse, leagueToResponse } from './leagues.model';
import { requireLeagueId, requireYear } from '../../utils/controller-helpers';

export class LeagueController {
  constructor(private readonly leagueService: LeagueService) {}

  /**
   * GET /api/years
   */
  getYears = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const years = await this.leagueService.getYears();
      res.status(200).json({ years });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/years/:year/leagues
   */
  getLeaguesForYear = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const year = requireYear(req);
      const leagues = await this.leagueService.getLeaguesForYear(year);
      res.status(200).json(leagues.map(leagueSummaryToResponse));
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/leagues/:leagueId
   */
  getLeague = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const leagueId = requireLeagueId(req);
      const league = await this.leagueService.getLeague(leagueId);
      res.status(200).json(leagueToResponse(league));
    } catch (error) {
      next(error);
    }
  };
}
