import { Pool } from 'pg';
import { PickRecord } from '../../domain/draft-board';
import { DraftPickRow, pickRecordFromDatabase } from './draft-board.model';
import { timedQuery } from '../../db/pool';
import { setQueryLabel } from '../../shared/query-context';

export class DraftBoardRepository {
  constructor(private readonly db: Pool) {}

  /**
   * One page of a league's picks in overall pick order
   */
  async findPicksPage(leagueId: string, offset: number, limit: number): Promise<PickRecord[]> {
    setQueryLabel('draftBoard.findPicksPage');
    const result = await timedQuery<DraftPickRow>(
      this.db,
      `SELECT round, pick_in_round, overall_pick, team_id, draft_order,
              league_rank, league_points, first_name, last_name, position, team
       FROM view_draft_board
       WHERE league_id = $1
       ORDER BY overall_pick
       LIMIT $2 OFFSET $3`,
      [leagueId, limit, offset]
    );
    return result.rows.map(pickRecordFromDatabase);
  }
}
