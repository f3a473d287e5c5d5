import type { Pool } from 'pg';
import type { LeagueRepository } from './modules/leagues/leagues.repository';
import type { LeagueService } from './modules/leagues/leagues.service';
import type { DraftBoardRepository } from './modules/draft-board/draft-board.repository';
import type { DraftBoardService } from './modules/draft-board/draft-board.service';
import type { Cache } from './services/cache.service';
import type { MetricsService } from './services/metrics.service';

export const KEYS = {
  // Database
  POOL: 'pool',

  // Repositories
  LEAGUE_REPO: 'leagueRepo',
  DRAFT_BOARD_REPO: 'draftBoardRepo',

  // Services
  CACHE_SERVICE: 'cacheService',
  METRICS_SERVICE: 'metricsService',
  LEAGUE_SERVICE: 'leagueService',
  DRAFT_BOARD_SERVICE: 'draftBoardService',
} as const;

/**
 * What each key resolves to
 */
export interface Registry {
  pool: Pool;
  leagueRepo: LeagueRepository;
  draftBoardRepo: DraftBoardRepository;
  cacheService: Cache;
  metricsService: MetricsService;
  leagueService: LeagueService;
  draftBoardService: DraftBoardService;
}

type RegistryKey = keyof Registry;
type Factories = { [K in RegistryKey]?: () => Registry[K] };

class Container {
  private factories: Factories = {};
  private instances: Partial<Registry> = {};

  register<K extends RegistryKey>(key: K, factory: NonNullable<Factories[K]>): void {
    this.factories[key] = factory;
  }

  resolve<K extends RegistryKey>(key: K): Registry[K] {
    // Return cached instance if exists
    const existing = this.instances[key];
    if (existing !== undefined) {
      return existing;
    }

    const factory = this.factories[key];
    if (!factory) {
      throw new Error(`No factory registered for key: ${key}`);
    }

    const instance = factory();
    this.instances[key] = instance;
    return instance;
  }

  // For testing: clear all instances
  clearInstances(): void {
    this.instances = {};
  }

  // For testing: override with mock
  override<K extends RegistryKey>(key: K, instance: Registry[K]): void {
    this.instances[key] = instance;
  }
}

export const container = new Container();
