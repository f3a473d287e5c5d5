/**
 * Draft Board Builder
 *
 * Runs the full pipeline for one draft: slot resolution, grid pivot and
 * column headers. Returns a result union instead of throwing so callers
 * decide how each failure surfaces.
 * No async I/O, no database access.
 */

import { buildColumnHeaders } from './column-headers';
import { buildPickGrids, Grid } from './grid-pivot';
import { countRounds, countSlots, resolveSlotOrder } from './slot-order';
import {
  ColumnHeader,
  DraftBoardError,
  DraftOrderFormat,
  GridCollision,
  PickRecord,
} from './types';

export interface DraftBoard {
  textGrid: Grid;
  positionGrid: Grid;
  headers: ColumnHeader[];
  numSlots: number;
  maxRound: number;
  orderFormat: DraftOrderFormat;
  collisions: GridCollision[];
  /** Picks that could not be given a grid coordinate */
  unplaced: PickRecord[];
}

export type DraftBoardResult =
  | { ok: true; board: DraftBoard }
  | { ok: false; error: DraftBoardError };

/**
 * @param picks - Complete pick list for one draft, ordered by overall pick
 */
export function buildDraftBoard(picks: readonly PickRecord[]): DraftBoardResult {
  if (picks.length === 0) {
    return {
      ok: false,
      error: { code: 'NO_DRAFT_DATA', message: 'No draft data found for this league' },
    };
  }

  const resolved = resolveSlotOrder(picks);
  if (!resolved.ok) {
    return resolved;
  }

  const { order } = resolved;
  const numSlots = countSlots(order.picks);
  const maxRound = countRounds(picks);
  const grids = buildPickGrids(order.picks, maxRound, numSlots);

  return {
    ok: true,
    board: {
      textGrid: grids.textGrid,
      positionGrid: grids.positionGrid,
      headers: buildColumnHeaders(order.picks, numSlots),
      numSlots,
      maxRound,
      orderFormat: order.format,
      collisions: grids.collisions,
      unplaced: [...order.unplaced, ...grids.outOfBounds],
    },
  };
}
