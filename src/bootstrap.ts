// Ensure env is loaded before accessing process.env
import { env } from './config/env.config';

import { container, KEYS } from './container';
import { pool } from './db/pool';
import { getRedisClient, isRedisAvailable } from './config/redis.config';

// Repositories
import { LeagueRepository } from './modules/leagues/leagues.repository';
import { DraftBoardRepository } from './modules/draft-board/draft-board.repository';

// Services
import { CacheService } from './services/cache.service';
import { metrics } from './services/metrics.service';
import { LeagueService } from './modules/leagues/leagues.service';
import { DraftBoardService } from './modules/draft-board/draft-board.service';

function bootstrap(): void {
  // Database
  container.register(KEYS.POOL, () => pool);

  // Repositories
  container.register(KEYS.LEAGUE_REPO, () => new LeagueRepository(container.resolve(KEYS.POOL)));
  container.register(
    KEYS.DRAFT_BOARD_REPO,
    () => new DraftBoardRepository(container.resolve(KEYS.POOL))
  );

  // Shared services
  container.register(
    KEYS.CACHE_SERVICE,
    () => new CacheService(() => (isRedisAvailable() ? getRedisClient() : null))
  );
  container.register(KEYS.METRICS_SERVICE, () => metrics);

  const fetchOptions = {
    pageSize: env.FETCH_PAGE_SIZE,
    cacheTtlSeconds: env.CACHE_TTL_SECONDS,
  };

  // Domain services
  container.register(
    KEYS.LEAGUE_SERVICE,
    () =>
      new LeagueService(
        container.resolve(KEYS.LEAGUE_REPO),
        container.resolve(KEYS.CACHE_SERVICE),
        fetchOptions
      )
  );

  container.register(
    KEYS.DRAFT_BOARD_SERVICE,
    () =>
      new DraftBoardService(
        container.resolve(KEYS.DRAFT_BOARD_REPO),
        container.resolve(KEYS.LEAGUE_SERVICE),
        container.resolve(KEYS.CACHE_SERVICE),
        container.resolve(KEYS.METRICS_SERVICE),
        fetchOptions
      )
  );
}

// Auto-run on import
bootstrap();
