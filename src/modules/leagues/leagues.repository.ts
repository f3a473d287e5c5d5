import { Pool } from 'pg';
import { League, LeagueRow, leagueFromDatabase } from './leagues.model';
import { timedQuery } from '../../db/pool';
import { setQueryLabel } from '../../shared/query-context';

const LEAGUE_COLUMNS = 'league_id, year, name, draft_date::text AS draft_date';

export class LeagueRepository {
  constructor(private readonly db: Pool) {}

  /**
   * One page of distinct draft years, newest first
   */
  async findYearsPage(offset: number, limit: number): Promise<number[]> {
    setQueryLabel('leagues.findYearsPage');
    const result = await timedQuery<{ year: number }>(
      this.db,
      'SELECT DISTINCT year FROM leagues ORDER BY year DESC LIMIT $1 OFFSET $2',
      [limit, offset]
    );
    return result.rows.map((row) => row.year);
  }

  /**
   * One page of leagues drafted in a year, ordered by name
   */
  async findByYearPage(year: number, offset: number, limit: number): Promise<League[]> {
    setQueryLabel('leagues.findByYearPage');
    const result = await timedQuery<LeagueRow>(
      this.db,
      `SELECT ${LEAGUE_COLUMNS}
       FROM leagues
       WHERE year = $1
       ORDER BY name, league_id
       LIMIT $2 OFFSET $3`,
      [year, limit, offset]
    );
    return result.rows.map(leagueFromDatabase);
  }

  async findById(leagueId: string): Promise<League | null> {
    setQueryLabel('leagues.findById');
    const result = await timedQuery<LeagueRow>(
      this.db,
      `SELECT ${LEAGUE_COLUMNS} FROM leagues WHERE league_id = $1`,
      [leagueId]
    );

    if (result.rows.length === 0) return null;
    return leagueFromDatabase(result.rows[0]);
  }
}
