import { Request, Response, NextFunction } from 'express';
import { LeagueController } from '../../../modules/leagues/leagues.controller';
import { LeagueService } from '../../../modules/leagues/leagues.service';
import { ValidationException, LeagueErrors } from '../../../utils/exceptions';

const mockLeagueService = {
  getYears: jest.fn(),
  getLeaguesForYear: jest.fn(),
  getLeague: jest.fn(),
} as unknown as jest.Mocked<LeagueService>;

const controller = new LeagueController(mockLeagueService);

function mockReq(params: Record<string, string> = {}): Request {
  return { params, query: {} } as unknown as Request;
}

function mockRes(): jest.Mocked<Response> {
  const res = {
    status: jest.fn(),
    json: jest.fn(),
  } as unknown as jest.Mocked<Response>;
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
}

describe('LeagueController', () => {
  let res: jest.Mocked<Response>;
  let next: jest.MockedFunction<NextFunction>;

  beforeEach(() => {
    res = mockRes();
    next = jest.fn();
  });

  describe('getYears', () => {
    it('responds with the years list', async () => {
      mockLeagueService.getYears.mockResolvedValue([2024, 2023]);

      await controller.getYears(mockReq(), res, next);

      expect(res.status).toHaveBeenCalledWith(200);
      expect(res.json).toHaveBeenCalledWith({ years: [2024, 2023] });
      expect(next).not.toHaveBeenCalled();
    });
  });

  describe('getLeaguesForYear', () => {
    it('responds with snake_case league summaries', async () => {
      mockLeagueService.getLeaguesForYear.mockResolvedValue([
        {
          leagueId: 'lg-1',
          year: 2024,
          name: 'Cup #1',
          draftDate: '2024-08-01',
          displayName: '#1 (August 1)',
        },
      ]);

      await controller.getLeaguesForYear(mockReq({ year: '2024' }), res, next);

      expect(mockLeagueService.getLeaguesForYear).toHaveBeenCalledWith(2024);
      expect(res.json).toHaveBeenCalledWith([
        {
          league_id: 'lg-1',
          year: 2024,
          name: 'Cup #1',
          draft_date: '2024-08-01',
          display_name: '#1 (August 1)',
        },
      ]);
    });

    it('rejects a year that is not four digits', async () => {
      await controller.getLeaguesForYear(mockReq({ year: '24' }), res, next);

      expect(next).toHaveBeenCalledWith(expect.any(ValidationException));
      expect(next.mock.calls[0][0]).toMatchObject({ message: 'Year must be a 4-digit number' });
      expect(mockLeagueService.getLeaguesForYear).not.toHaveBeenCalled();
    });
  });

  describe('getLeague', () => {
    it('responds with the league', async () => {
      mockLeagueService.getLeague.mockResolvedValue({
        leagueId: 'lg-1',
        year: 2024,
        name: 'Cup #1',
        draftDate: null,
      });

      await controller.getLeague(mockReq({ leagueId: 'lg-1' }), res, next);

      expect(res.json).toHaveBeenCalledWith({
        league_id: 'lg-1',
        year: 2024,
        name: 'Cup #1',
        draft_date: null,
      });
    });

    it('rejects a malformed league ID', async () => {
      await controller.getLeague(mockReq({ leagueId: 'lg 1; drop' }), res, next);

      expect(next).toHaveBeenCalledWith(expect.any(ValidationException));
      expect(mockLeagueService.getLeague).not.toHaveBeenCalled();
    });

    it('forwards not-found errors', async () => {
      const notFound = LeagueErrors.notFound('lg-9');
      mockLeagueService.getLeague.mockRejectedValue(notFound);

      await controller.getLeague(mockReq({ leagueId: 'lg-9' }), res, next);

      expect(next).toHaveBeenCalledWith(notFound);
      expect(res.json).not.toHaveBeenCalled();
    });
  });
});
