import rateLimit from 'express-rate-limit';
import { RedisStore } from 'rate-limit-redis';
import { Request } from 'express';
import { getRedisClient, isRedisAvailable } from '../config/redis.config';
import { ErrorCode } from '../utils/exceptions';

function getRedisStore(prefix: string): RedisStore | undefined {
  if (!isRedisAvailable()) {
    return undefined; // Falls back to in-memory
  }
  return new RedisStore({
    prefix,
    sendCommand: (command: string, ...args: string[]) =>
      getRedisClient().call(command, ...args) as Promise<number | string>,
  });
}

/**
 * Rate limiter for read endpoints (years, leagues, draft boards).
 * Limits to 120 requests per minute per client IP.
 */
export const apiReadLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  limit: 120,
  message: {
    error: { code: ErrorCode.RATE_LIMITED, message: 'Too many requests, please slow down' },
  },
  keyGenerator: (req: Request) => req.ip || 'unknown',
  standardHeaders: true,
  legacyHeaders: false,
  store: getRedisStore('rl:read:'),
});
