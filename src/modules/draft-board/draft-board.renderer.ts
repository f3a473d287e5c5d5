/**
 * Draft Board Renderer
 *
 * Turns a built board into the JSON payload clients draw. Owns the
 * presentation choices: the fixed position color table, the cell text color
 * and the legend. The board itself only carries semantic values.
 */

import { DraftBoard, getCell, rankColor } from '../../domain/draft-board';
import { League } from '../leagues/leagues.model';

export const POSITION_COLORS: Readonly<Record<string, string>> = {
  QB: '#FFF0B3',
  RB: '#D1EAF5',
  WR: '#D4F0D4',
  TE: '#FFD9E2',
  K: '#E6E6FA',
  TK: '#E6E6FA',
  TDSP: '#E0E0E0',
  DEF: '#E0E0E0',
};

export const DEFAULT_POSITION_COLOR = '#FFFFFF';
export const CELL_FOREGROUND = '#333';

// DEF shares TDSP's swatch, so the legend shows it once
const LEGEND_EXCLUDED = new Set(['DEF']);

export interface RenderedColumn {
  slot: number;
  label: string;
  rank: number | null;
  background: string;
  foreground: string;
}

export interface RenderedCell {
  slot: number;
  text: string;
  position: string;
  background: string | null;
  foreground: string | null;
}

export interface RenderedRow {
  round: number;
  cells: RenderedCell[];
}

export interface RenderedDraftBoard {
  league: { league_id: string; name: string; year: number };
  num_slots: number;
  max_round: number;
  order_format: DraftBoard['orderFormat'];
  columns: RenderedColumn[];
  rows: RenderedRow[];
  legend: { position: string; background: string }[];
  warnings: { collisions: number; unplaced: number };
}

export function positionColor(position: string): string {
  return Object.prototype.hasOwnProperty.call(POSITION_COLORS, position)
    ? POSITION_COLORS[position]
    : DEFAULT_POSITION_COLOR;
}

export function buildLegend(): { position: string; background: string }[] {
  return Object.entries(POSITION_COLORS)
    .filter(([position]) => !LEGEND_EXCLUDED.has(position))
    .map(([position, background]) => ({ position, background }));
}

function renderCell(board: DraftBoard, round: number, slot: number): RenderedCell {
  const text = getCell(board.textGrid, round, slot);
  const position = getCell(board.positionGrid, round, slot);

  // Empty coordinates render as blank, unstyled cells
  if (!text) {
    return { slot, text: '', position: '', background: null, foreground: null };
  }

  return {
    slot,
    text,
    position,
    background: positionColor(position),
    foreground: CELL_FOREGROUND,
  };
}

export function renderDraftBoard(league: League, board: DraftBoard): RenderedDraftBoard {
  const columns = board.headers.map((header) => {
    const color = rankColor(header.rank, board.numSlots);
    return {
      slot: header.slot,
      label: header.label,
      rank: header.rank,
      background: color.background,
      foreground: color.foreground,
    };
  });

  const rows: RenderedRow[] = [];
  for (let round = 1; round <= board.maxRound; round++) {
    const cells: RenderedCell[] = [];
    for (let slot = 1; slot <= board.numSlots; slot++) {
      cells.push(renderCell(board, round, slot));
    }
    rows.push({ round, cells });
  }

  return {
    league: { league_id: league.leagueId, name: league.name, year: league.year },
    num_slots: board.numSlots,
    max_round: board.maxRound,
    order_format: board.orderFormat,
    columns,
    rows,
    legend: buildLegend(),
    warnings: {
      collisions: board.collisions.length,
      unplaced: board.unplaced.length,
    },
  };
}
