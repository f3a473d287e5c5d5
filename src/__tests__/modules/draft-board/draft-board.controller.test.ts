import { Request, Response, NextFunction } from 'express';
import { DraftBoardController } from '../../../modules/draft-board/draft-board.controller';
import { DraftBoardService } from '../../../modules/draft-board/draft-board.service';
import { buildDraftBoard } from '../../../domain/draft-board';
import { DraftBoardErrors, ValidationException } from '../../../utils/exceptions';
import { makeSnakeDraft } from '../../helpers/picks';

const mockDraftBoardService = {
  getDraftBoard: jest.fn(),
} as unknown as jest.Mocked<DraftBoardService>;

const controller = new DraftBoardController(mockDraftBoardService);

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

describe('DraftBoardController', () => {
  let res: jest.Mocked<Response>;
  let next: jest.MockedFunction<NextFunction>;

  beforeEach(() => {
    res = mockRes();
    next = jest.fn();
  });

  it('responds with the rendered board', async () => {
    const result = buildDraftBoard(makeSnakeDraft(2, 1));
    if (!result.ok) throw new Error('fixture should build');
    mockDraftBoardService.getDraftBoard.mockResolvedValue({
      league: { leagueId: 'lg-1', year: 2024, name: 'Cup #1', draftDate: null },
      board: result.board,
    });

    await controller.getDraftBoard(mockReq({ leagueId: 'lg-1' }), res, next);

    expect(mockDraftBoardService.getDraftBoard).toHaveBeenCalledWith('lg-1');
    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith(
      expect.objectContaining({
        league: { league_id: 'lg-1', name: 'Cup #1', year: 2024 },
        num_slots: 2,
        max_round: 1,
      })
    );
  });

  it('rejects a malformed league ID', async () => {
    await controller.getDraftBoard(mockReq({ leagueId: '../etc' }), res, next);

    expect(next).toHaveBeenCalledWith(expect.any(ValidationException));
    expect(mockDraftBoardService.getDraftBoard).not.toHaveBeenCalled();
  });

  it('forwards service errors', async () => {
    const noData = DraftBoardErrors.noData();
    mockDraftBoardService.getDraftBoard.mockRejectedValue(noData);

    await controller.getDraftBoard(mockReq({ leagueId: 'lg-2' }), res, next);

    expect(next).toHaveBeenCalledWith(noData);
    expect(res.json).not.toHaveBeenCalled();
  });
});
