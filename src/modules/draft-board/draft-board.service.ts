import { DraftBoardRepository } from './draft-board.repository';
import { pickRecordListSchema } from './draft-board.schemas';
import { LeagueService } from '../leagues/leagues.service';
import { League } from '../leagues/leagues.model';
import { buildDraftBoard, DraftBoard, PickRecord } from '../../domain/draft-board';
import { Cache, cached } from '../../services/cache.service';
import { MetricsService } from '../../services/metrics.service';
import { paginatedFetch } from '../../shared/paginated-fetch';
import { logger } from '../../config/logger.config';
import { DraftBoardErrors } from '../../utils/exceptions';

export interface DraftBoardServiceOptions {
  pageSize: number;
  cacheTtlSeconds: number;
}

export interface LeagueDraftBoard {
  league: League;
  board: DraftBoard;
}

export class DraftBoardService {
  constructor(
    private readonly draftBoardRepo: DraftBoardRepository,
    private readonly leagueService: LeagueService,
    private readonly cache: Cache,
    private readonly metrics: MetricsService,
    private readonly options: DraftBoardServiceOptions
  ) {}

  /**
   * All picks of a league's draft, assembled across pages and cached.
   * The board is rebuilt from these rows on every request.
   */
  async getPicks(leagueId: string): Promise<PickRecord[]> {
    return cached(
      this.cache,
      `draft-picks:${leagueId}`,
      this.options.cacheTtlSeconds,
      pickRecordListSchema,
      () =>
        paginatedFetch(
          (offset, limit) => this.draftBoardRepo.findPicksPage(leagueId, offset, limit),
          this.options.pageSize
        )
    );
  }

  /**
   * Build the draft grid for a league.
   *
   * @throws NotFoundException when the league is unknown or has no picks
   * @throws UnprocessableEntityException when a legacy draft order cannot be derived
   */
  async getDraftBoard(leagueId: string): Promise<LeagueDraftBoard> {
    const league = await this.leagueService.getLeague(leagueId);
    const picks = await this.getPicks(leagueId);

    const start = Date.now();
    const result = buildDraftBoard(picks);
    this.metrics.recordDuration('draft_board_build_ms', Date.now() - start);

    if (!result.ok) {
      const { error } = result;
      if (error.code === 'NO_DRAFT_DATA') {
        throw DraftBoardErrors.noData();
      }
      logger.error('Draft order could not be derived', {
        leagueId,
        missingTeamIds: error.missingTeamIds,
      });
      this.metrics.increment('draft_board_malformed_order_total');
      throw DraftBoardErrors.malformedDraftOrder(leagueId, error.missingTeamIds);
    }

    const { board } = result;
    this.reportDataQuality(leagueId, board);
    this.metrics.increment('draft_boards_built_total');

    return { league, board };
  }

  private reportDataQuality(leagueId: string, board: DraftBoard): void {
    if (board.collisions.length > 0) {
      this.metrics.increment('draft_board_collisions_total', board.collisions.length);
      logger.warn('Draft board has picks sharing a grid cell; later picks were kept', {
        leagueId,
        count: board.collisions.length,
        collisions: board.collisions.slice(0, 10),
      });
    }

    if (board.unplaced.length > 0) {
      this.metrics.increment('draft_board_unplaced_total', board.unplaced.length);
      logger.warn('Draft board has picks without a grid position', {
        leagueId,
        count: board.unplaced.length,
        overallPicks: board.unplaced.slice(0, 10).map((pick) => pick.overallPick),
      });
    }
  }
}
