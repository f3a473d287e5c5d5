import { z } from 'zod';
import { DateTime } from 'luxon';
import { LeagueRepository } from './leagues.repository';
import { League, LeagueSummary } from './leagues.model';
import { leagueSchema } from './leagues.schemas';
import { Cache, cached } from '../../services/cache.service';
import { paginatedFetch } from '../../shared/paginated-fetch';
import { LeagueErrors } from '../../utils/exceptions';

export interface LeagueServiceOptions {
  pageSize: number;
  cacheTtlSeconds: number;
}

/**
 * Short dropdown label for a league: "#1036 (July 23)" rather than the
 * full contest name. Falls back to the name when it has no "#<number>",
 * and drops the date part when the draft date is missing or unparsable.
 */
export function formatLeagueDisplayName(name: string, draftDate: string | null): string {
  const match = /#(\d+)/.exec(name);
  let label = match ? `#${match[1]}` : name;

  if (draftDate) {
    const date = DateTime.fromFormat(draftDate.slice(0, 10), 'yyyy-MM-dd', { locale: 'en-US' });
    if (date.isValid) {
      label += ` (${date.toFormat('MMMM d')})`;
    }
  }

  return label;
}

export class LeagueService {
  constructor(
    private readonly leagueRepo: LeagueRepository,
    private readonly cache: Cache,
    private readonly options: LeagueServiceOptions
  ) {}

  /**
   * Every year that has at least one league, newest first
   */
  async getYears(): Promise<number[]> {
    return cached(this.cache, 'years', this.options.cacheTtlSeconds, z.array(z.number()), () =>
      paginatedFetch(
        (offset, limit) => this.leagueRepo.findYearsPage(offset, limit),
        this.options.pageSize
      )
    );
  }

  /**
   * Leagues drafted in a year, ordered by name, with display labels
   */
  async getLeaguesForYear(year: number): Promise<LeagueSummary[]> {
    const leagues = await cached(
      this.cache,
      `leagues:${year}`,
      this.options.cacheTtlSeconds,
      z.array(leagueSchema),
      () =>
        paginatedFetch(
          (offset, limit) => this.leagueRepo.findByYearPage(year, offset, limit),
          this.options.pageSize
        )
    );

    return leagues.map((league) => ({
      ...league,
      displayName: formatLeagueDisplayName(league.name, league.draftDate),
    }));
  }

  async getLeague(leagueId: string): Promise<League> {
    const league = await this.leagueRepo.findById(leagueId);
    if (!league) {
      throw LeagueErrors.notFound(leagueId);
    }
    return league;
  }
}
