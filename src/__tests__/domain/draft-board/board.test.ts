import { buildDraftBoard, DraftBoard, DraftBoardResult, getCell } from '../../../domain/draft-board';
import { makePick, makeSnakeDraft } from '../../helpers/picks';

function expectBoard(result: DraftBoardResult): DraftBoard {
  if (!result.ok) {
    throw new Error(`expected a board, got ${result.error.code}`);
  }
  return result.board;
}

describe('buildDraftBoard', () => {
  it('fails with NO_DRAFT_DATA for an empty pick list', () => {
    expect(buildDraftBoard([])).toEqual({
      ok: false,
      error: { code: 'NO_DRAFT_DATA', message: 'No draft data found for this league' },
    });
  });

  it('builds a snake draft with each team in its own column', () => {
    const board = expectBoard(buildDraftBoard(makeSnakeDraft(3, 2)));

    expect(board.numSlots).toBe(3);
    expect(board.maxRound).toBe(2);
    expect(board.orderFormat).toBe('explicit');
    expect(board.textGrid).toEqual([
      ['First1 Last1\nRB · AAA (1)', 'First2 Last2\nWR · AAA (2)', 'First3 Last3\nTE · AAA (3)'],
      ['First6 Last6\nQB · AAA (6)', 'First5 Last5\nTDSP · AAA (5)', 'First4 Last4\nK · AAA (4)'],
    ]);
    expect(board.positionGrid).toEqual([
      ['RB', 'WR', 'TE'],
      ['QB', 'TDSP', 'K'],
    ]);
    expect(board.headers).toEqual([
      { slot: 1, label: 'Slot 1\n#1 · 1990pts', rank: 1 },
      { slot: 2, label: 'Slot 2\n#2 · 1980pts', rank: 2 },
      { slot: 3, label: 'Slot 3\n#3 · 1970pts', rank: 3 },
    ]);
    expect(board.collisions).toEqual([]);
    expect(board.unplaced).toEqual([]);
  });

  it('produces the same grid for a legacy draft as for its explicit twin', () => {
    const explicit = expectBoard(buildDraftBoard(makeSnakeDraft(4, 3)));
    const legacy = expectBoard(buildDraftBoard(makeSnakeDraft(4, 3, { legacy: true })));

    expect(legacy.orderFormat).toBe('legacy');
    expect(legacy.textGrid).toEqual(explicit.textGrid);
    expect(legacy.positionGrid).toEqual(explicit.positionGrid);
    expect(legacy.headers).toEqual(explicit.headers);
  });

  it('places every pick of a full draft exactly once', () => {
    const picks = makeSnakeDraft(12, 15);
    const board = expectBoard(buildDraftBoard(picks));

    for (const pick of picks) {
      const slot = pick.draftOrder ?? 0;
      expect(getCell(board.textGrid, pick.round, slot)).toContain(`(${pick.overallPick})`);
    }
    expect(board.textGrid.flat().filter((cell) => cell !== '')).toHaveLength(picks.length);
  });

  it('passes a malformed legacy order through as an error', () => {
    const picks = [
      makePick({ round: 1, pickInRound: 1, teamId: 'A', draftOrder: null }),
      makePick({ round: 2, pickInRound: 1, overallPick: 2, teamId: 'B', draftOrder: null }),
    ];

    const result = buildDraftBoard(picks);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('MALFORMED_DRAFT_ORDER');
    }
  });

  it('keeps rows for rounds whose picks were all unplaced', () => {
    const picks = [
      makePick({ round: 1, overallPick: 1, draftOrder: 1 }),
      makePick({ round: 2, overallPick: 2, draftOrder: null }),
    ];

    const board = expectBoard(buildDraftBoard(picks));

    expect(board.maxRound).toBe(2);
    expect(board.textGrid[1]).toEqual(['']);
    expect(board.unplaced.map((pick) => pick.overallPick)).toEqual([2]);
  });

  it('reports collisions from duplicate coordinates', () => {
    const picks = [
      makePick({ overallPick: 1, draftOrder: 1 }),
      makePick({ overallPick: 2, pickInRound: 2, draftOrder: 1 }),
    ];

    const board = expectBoard(buildDraftBoard(picks));

    expect(board.numSlots).toBe(1);
    expect(board.collisions).toHaveLength(1);
    expect(getCell(board.textGrid, 1, 1)).toBe('Test Player\nRB · AAA (2)');
  });
});
