import { Router } from 'express';
import { createYearRoutes, createLeagueRoutes } from '../modules/leagues/leagues.routes';
import { checkDatabaseHealth, getPoolMetrics } from '../db/pool';
import { checkRedisHealth, isRedisAvailable } from '../config/redis.config';
import { metrics } from '../services/metrics.service';
import { apiReadLimiter } from '../middleware/rate-limit.middleware';
import { asyncHandler } from '../shared/async-handler';

const router = Router();

// Health check
router.get(
  '/health',
  asyncHandler(async (_req, res) => {
    const dbHealthy = await checkDatabaseHealth();
    const redisHealthy = isRedisAvailable() ? await checkRedisHealth() : true;
    const isHealthy = dbHealthy && redisHealthy;

    res.status(isHealthy ? 200 : 503).json({
      status: isHealthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      database: dbHealthy ? 'ok' : 'error',
      redis: isRedisAvailable() ? (redisHealthy ? 'ok' : 'error') : 'disabled',
      pool: getPoolMetrics(),
    });
  })
);

// Metrics endpoint
router.get('/metrics', (_req, res) => {
  res.json({
    timestamp: new Date().toISOString(),
    ...metrics.getMetrics(),
    pool: getPoolMetrics(),
  });
});

// Year and league listings
router.use('/years', apiReadLimiter, createYearRoutes());

// League details and draft boards
router.use('/leagues', apiReadLimiter, createLeagueRoutes());

export default router;
