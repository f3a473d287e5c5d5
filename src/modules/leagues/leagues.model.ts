/**
 * League domain models
 */

export interface League {
  leagueId: string;
  year: number;
  name: string;
  /** YYYY-MM-DD, as stored */
  draftDate: string | null;
}

export interface LeagueSummary extends League {
  displayName: string;
}

/**
 * Row shape of the leagues table. draft_date is selected as text so the
 * calendar date is never shifted by the server timezone.
 */
export interface LeagueRow {
  league_id: string;
  year: number;
  name: string | null;
  draft_date: string | null;
}

export function leagueFromDatabase(row: LeagueRow): League {
  return {
    leagueId: row.league_id,
    year: row.year,
    name: row.name ?? '',
    draftDate: row.draft_date,
  };
}

export function leagueToResponse(league: League) {
  return {
    league_id: league.leagueId,
    year: league.year,
    name: league.name,
    draft_date: league.draftDate,
  };
}

export function leagueSummaryToResponse(league: LeagueSummary) {
  return {
    ...leagueToResponse(league),
    display_name: league.displayName,
  };
}
