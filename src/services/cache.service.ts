import type Redis from 'ioredis';
import { ZodType } from 'zod';
import { logger } from '../config/logger.config';

/**
 * Read-through cache for fetched rows. Entries are validated against a zod
 * schema on read, so a stale or foreign payload counts as a miss.
 */
export interface Cache {
  get<T>(key: string, schema: ZodType<T>): Promise<T | null>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
  del(key: string): Promise<void>;
}

export class CacheService implements Cache {
  private prefix = 'draftboard:';

  /**
   * @param getClient - Returns the Redis client, or null when Redis is not configured
   */
  constructor(private readonly getClient: () => Redis | null) {}

  async get<T>(key: string, schema: ZodType<T>): Promise<T | null> {
    const redis = this.getClient();
    if (!redis) return null;

    try {
      const data = await redis.get(this.prefix + key);
      if (data === null) return null;

      const parsed = schema.safeParse(JSON.parse(data));
      if (!parsed.success) {
        logger.warn('Cache entry failed validation', { key });
        return null;
      }
      return parsed.data;
    } catch (error) {
      logger.warn('Cache get failed', { key, error: String(error) });
      return null;
    }
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    const redis = this.getClient();
    if (!redis) return;

    try {
      await redis.setex(this.prefix + key, ttlSeconds, JSON.stringify(value));
    } catch (error) {
      logger.warn('Cache set failed', { key, error: String(error) });
    }
  }

  async del(key: string): Promise<void> {
    const redis = this.getClient();
    if (!redis) return;

    try {
      await redis.del(this.prefix + key);
    } catch (error) {
      logger.warn('Cache del failed', { key, error: String(error) });
    }
  }
}

/**
 * Cache lookup with a loader for misses. The loaded value is stored
 * before being returned.
 */
export async function cached<T>(
  cache: Cache,
  key: string,
  ttlSeconds: number,
  schema: ZodType<T>,
  load: () => Promise<T>
): Promise<T> {
  const hit = await cache.get(key, schema);
  if (hit !== null) return hit;

  const value = await load();
  await cache.set(key, value, ttlSeconds);
  return value;
}
