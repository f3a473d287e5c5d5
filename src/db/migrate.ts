import fs from 'fs';
import path from 'path';
import { Pool, PoolClient } from 'pg';
import { getDatabaseConfig } from '../config/database.config';
import { logger } from '../config/logger.config';

const MIGRATIONS_TABLE = 'migrations';
const MIGRATIONS_DIR = path.join(__dirname, '..', '..', 'migrations');

async function ensureMigrationsTable(client: PoolClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      id SERIAL PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      run_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

async function getAppliedMigrations(client: PoolClient): Promise<Set<string>> {
  const res = await client.query<{ name: string }>(`SELECT name FROM ${MIGRATIONS_TABLE};`);
  return new Set(res.rows.map((row) => row.name));
}

/**
 * Migration files are "NNN_description.sql", applied in filename order.
 */
export function listMigrationFiles(dir: string = MIGRATIONS_DIR): string[] {
  if (!fs.existsSync(dir)) {
    throw new Error(`Migrations directory not found: ${dir}`);
  }

  return fs
    .readdirSync(dir)
    .filter((file) => file.endsWith('.sql') && /^\d+_/.test(file))
    .sort();
}

async function runMigrationFile(client: PoolClient, fileName: string): Promise<void> {
  const sql = fs.readFileSync(path.join(MIGRATIONS_DIR, fileName), 'utf8');

  logger.info('Running migration', { migration: fileName });
  await client.query('BEGIN');
  try {
    await client.query(sql);
    await client.query(
      `INSERT INTO ${MIGRATIONS_TABLE} (name) VALUES ($1) ON CONFLICT (name) DO NOTHING;`,
      [fileName]
    );
    await client.query('COMMIT');
  } catch (err) {
    await client.query('ROLLBACK');
    logger.error('Migration failed', { migration: fileName, error: String(err) });
    throw err;
  }
}

async function runMigrations(): Promise<void> {
  const pool = new Pool(getDatabaseConfig());
  const client = await pool.connect();

  try {
    await ensureMigrationsTable(client);
    const applied = await getAppliedMigrations(client);
    const pending = listMigrationFiles().filter((file) => !applied.has(file));

    logger.info('Migrations found', { applied: applied.size, pending: pending.length });

    for (const file of pending) {
      await runMigrationFile(client, file);
    }

    logger.info('All migrations completed');
  } finally {
    client.release();
    await pool.end();
  }
}

// Run as a script
if (require.main === module) {
  runMigrations().catch((err: unknown) => {
    logger.error('Migration process failed', { error: String(err) });
    process.exit(1);
  });
}
