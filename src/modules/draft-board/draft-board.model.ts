/**
 * Draft board row models
 */

import { PickRecord } from '../../domain/draft-board';

/**
 * Row shape of view_draft_board. league_points is NUMERIC and arrives from
 * pg as a string.
 */
export interface DraftPickRow {
  round: number;
  pick_in_round: number;
  overall_pick: number;
  team_id: string | number;
  draft_order: number | null;
  league_rank: number | null;
  league_points: string | number | null;
  first_name: string | null;
  last_name: string | null;
  position: string | null;
  team: string | null;
}

function toNullableNumber(value: string | number | null): number | null {
  if (value === null) return null;
  const parsed = typeof value === 'number' ? value : parseFloat(value);
  return Number.isNaN(parsed) ? null : parsed;
}

export function pickRecordFromDatabase(row: DraftPickRow): PickRecord {
  return {
    round: row.round,
    pickInRound: row.pick_in_round,
    overallPick: row.overall_pick,
    teamId: String(row.team_id),
    draftOrder: row.draft_order,
    leagueRank: toNullableNumber(row.league_rank),
    leaguePoints: toNullableNumber(row.league_points),
    firstName: row.first_name,
    lastName: row.last_name,
    position: row.position,
    team: row.team,
  };
}
