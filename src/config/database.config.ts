import { PoolConfig } from 'pg';
import { env } from './env.config';
import { logger } from './logger.config';

export function getDatabaseConfig(): PoolConfig {
  const config: PoolConfig = {
    connectionString: env.DATABASE_URL,
    max: env.DB_POOL_SIZE,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
    // Board queries are single-league reads; anything slower is a runaway
    statement_timeout: 15000,
  };

  if (env.NODE_ENV === 'production') {
    const rejectUnauthorized = process.env.DATABASE_SSL_REJECT_UNAUTHORIZED === 'true';
    config.ssl = { rejectUnauthorized };

    if (!rejectUnauthorized) {
      logger.warn(
        '[SECURITY] Database SSL certificate validation is disabled. ' +
          'Set DATABASE_SSL_REJECT_UNAUTHORIZED=true when the host provides trusted certificates.'
      );
    }
  }

  return config;
}
