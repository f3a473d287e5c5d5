/**
 * Grid Pivot Domain Logic
 *
 * Reshapes slotted picks into two aligned grids (display text and position)
 * with rounds as rows and slots as columns.
 * No async I/O, no database access.
 */

import { formatPickCell, toDisplayString } from './pick-normalizer';
import { GridCollision, SlottedPick } from './types';

/**
 * Zero-based storage of a 1-based [round][slot] grid: grid[round - 1][slot - 1].
 */
export type Grid = string[][];

export interface PickGrids {
  maxRound: number;
  numSlots: number;
  textGrid: Grid;
  positionGrid: Grid;
  collisions: GridCollision[];
  /** Picks whose round or slot falls outside the grid bounds */
  outOfBounds: SlottedPick[];
}

export function createGrid(rows: number, columns: number): Grid {
  return Array.from({ length: Math.max(rows, 0) }, () =>
    Array.from({ length: Math.max(columns, 0) }, () => '')
  );
}

/**
 * Read a cell by 1-based round and slot. Coordinates outside the grid read as ''.
 */
export function getCell(grid: Grid, round: number, slot: number): string {
  return grid[round - 1]?.[slot - 1] ?? '';
}

function inBounds(value: number, max: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= max;
}

/**
 * Place every pick at [round][slot].
 *
 * Empty coordinates stay ''. When two picks share a coordinate the later one
 * in input order wins and the overwrite is reported in `collisions`.
 */
export function buildPickGrids(
  picks: readonly SlottedPick[],
  maxRound: number,
  numSlots: number
): PickGrids {
  const textGrid = createGrid(maxRound, numSlots);
  const positionGrid = createGrid(maxRound, numSlots);
  const owners = new Map<string, number>();
  const collisions: GridCollision[] = [];
  const outOfBounds: SlottedPick[] = [];

  for (const pick of picks) {
    if (!inBounds(pick.round, maxRound) || !inBounds(pick.slot, numSlots)) {
      outOfBounds.push(pick);
      continue;
    }

    const key = `${pick.round}:${pick.slot}`;
    const previous = owners.get(key);
    if (previous !== undefined) {
      collisions.push({
        round: pick.round,
        slot: pick.slot,
        replacedOverallPick: previous,
        keptOverallPick: pick.overallPick,
      });
    }
    owners.set(key, pick.overallPick);

    textGrid[pick.round - 1][pick.slot - 1] = formatPickCell(pick);
    positionGrid[pick.round - 1][pick.slot - 1] = toDisplayString(pick.position);
  }

  return { maxRound, numSlots, textGrid, positionGrid, collisions, outOfBounds };
}
