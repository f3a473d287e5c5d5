import { Pool, QueryResult, QueryResultRow } from 'pg';
import { getDatabaseConfig } from '../config/database.config';
import { logger } from '../config/logger.config';
import { getQueryContext } from '../shared/query-context';

// Slow query thresholds in milliseconds (configurable via env)
const SLOW_QUERY_THRESHOLD_MS = parseInt(process.env.SLOW_QUERY_THRESHOLD_MS || '200', 10);
const VERY_SLOW_QUERY_THRESHOLD_MS = parseInt(process.env.VERY_SLOW_QUERY_THRESHOLD_MS || '1000', 10);

// Create database connection pool
export const pool = new Pool(getDatabaseConfig());

export function getPoolMetrics() {
  return {
    totalCount: pool.totalCount,
    idleCount: pool.idleCount,
    waitingCount: pool.waitingCount,
  };
}

function logSlowQuery(durationMs: number, queryText: string): void {
  if (durationMs <= SLOW_QUERY_THRESHOLD_MS) return;

  const context = getQueryContext();
  const logData = {
    durationMs,
    query: queryText.substring(0, 200),
    requestId: context.requestId,
    label: context.label,
  };

  if (durationMs > VERY_SLOW_QUERY_THRESHOLD_MS) {
    logger.error('Very slow query detected', logData);
  } else {
    logger.warn('Slow query detected', logData);
  }
}

/**
 * Run a parameterized query and log it when it is slow.
 * Repositories go through this instead of calling db.query directly.
 */
export async function timedQuery<R extends QueryResultRow>(
  db: Pool,
  text: string,
  values: unknown[] = []
): Promise<QueryResult<R>> {
  const start = Date.now();
  try {
    return await db.query<R>(text, values);
  } finally {
    logSlowQuery(Date.now() - start, text);
  }
}

pool.on('error', (err) => {
  logger.error('Unexpected database error', { error: err.message });
});

export async function checkDatabaseHealth(): Promise<boolean> {
  try {
    const result = await pool.query<{ health_check: number }>('SELECT 1 as health_check');
    return result.rows[0]?.health_check === 1;
  } catch (error) {
    logger.error('Database health check failed', { error: String(error) });
    return false;
  }
}

// Graceful shutdown
export async function closePool(): Promise<void> {
  pool.removeAllListeners();
  await pool.end();
  logger.info('Database pool closed');
}
