/**
 * Draft Board Domain Types
 *
 * Shapes shared by the grid construction functions.
 * Domain does not import from modules; callers map from their row types.
 */

/**
 * One drafted player selection, as the board builder consumes it.
 * Optional fields may be null when the source row has no value.
 */
export interface PickRecord {
  round: number;
  pickInRound: number;
  overallPick: number;
  teamId: string;
  draftOrder: number | null;
  leagueRank: number | null;
  leaguePoints: number | null;
  firstName: string | null;
  lastName: string | null;
  position: string | null;
  team: string | null;
}

/**
 * A pick with a usable column index.
 */
export interface SlottedPick extends PickRecord {
  slot: number;
}

export type DraftOrderFormat = 'explicit' | 'legacy';

export interface ColumnHeader {
  slot: number;
  label: string;
  rank: number | null;
}

/**
 * Records a (round, slot) coordinate that was written more than once.
 * The kept pick is the later one in input order.
 */
export interface GridCollision {
  round: number;
  slot: number;
  replacedOverallPick: number;
  keptOverallPick: number;
}

export type DraftBoardError =
  | { code: 'NO_DRAFT_DATA'; message: string }
  | { code: 'MALFORMED_DRAFT_ORDER'; message: string; missingTeamIds: string[] };
