import Redis from 'ioredis';
import { env } from './env.config';
import { logger } from './logger.config';

export const redisConfig = {
  host: env.REDIS_HOST || 'localhost',
  port: parseInt(env.REDIS_PORT || '6379', 10),
  password: env.REDIS_PASSWORD || undefined,
  db: parseInt(env.REDIS_DB || '0', 10),
  maxRetriesPerRequest: 3,
};

let redisClient: Redis | null = null;

export function getRedisClient(): Redis {
  if (!redisClient) {
    redisClient = new Redis(redisConfig);
    redisClient.on('error', (err: Error) => logger.error('Redis error', { error: err.message }));
    redisClient.on('connect', () => logger.info('Redis connected'));
  }
  return redisClient;
}

export async function closeRedis(): Promise<void> {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
}

export async function checkRedisHealth(): Promise<boolean> {
  try {
    const pong = await getRedisClient().ping();
    return pong === 'PONG';
  } catch {
    return false;
  }
}

/**
 * Redis is optional: without REDIS_HOST the cache is bypassed and rate
 * limits are kept in memory.
 */
export function isRedisAvailable(): boolean {
  return !!env.REDIS_HOST;
}
