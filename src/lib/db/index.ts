import { readdir, readFile } from 'fs/promises';
import path from 'path';
import mysql from 'mysql2/promise';
import type { Pool } from 'mysql2/promise';
import { env } from '@/lib/env';
import { logger } from '@/lib/logger';

const globalForDb = globalThis as unknown as { analyticsPool: Pool | undefined };

export const MIGRATIONS_DIR = path.join(process.cwd(), 'db', 'migrations');

export interface DatabaseConnectionConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

/**
 * Parse a mysql:// or mariadb:// DATABASE_URL into connection parameters,
 * stripping any query string from the database name.
 */
export function parseDatabaseUrl(url?: string): DatabaseConnectionConfig | null {
  if (!url) return null;
  try {
    const parsed = new URL(url.replace(/^mariadb:\/\//, 'mysql://'));
    if (parsed.protocol !== 'mysql:') return null;

    const database = parsed.pathname.replace(/^\//, '');
    if (!database) return null;

    return {
      host: parsed.hostname,
      port: parsed.port ? Number(parsed.port) : 3306,
      user: decodeURIComponent(parsed.username),
      password: decodeURIComponent(parsed.password),
      database,
    };
  } catch {
    return null;
  }
}

export function createPool(config: DatabaseConnectionConfig, connectionLimit: number): Pool {
  return mysql.createPool({
    ...config,
    waitForConnections: true,
    connectionLimit,
    queueLimit: 0,
    enableKeepAlive: true,
    keepAliveInitialDelay: 0,
    // created_at is stored and compared in UTC
    timezone: 'Z',
    decimalNumbers: true,
  });
}

/**
 * Shared pool, cached on globalThis so module re-evaluation (HMR, build
 * workers) reuses the same connections.
 */
export function getPool(): Pool {
  if (globalForDb.analyticsPool) {
    return globalForDb.analyticsPool;
  }

  const config = parseDatabaseUrl(env.DATABASE_URL);
  if (!config) {
    throw new Error('DATABASE_URL must be a mysql:// or mariadb:// URL with a database name');
  }

  const pool = createPool(config, env.DB_CONNECTION_LIMIT);
  globalForDb.analyticsPool = pool;
  logger.info('Database pool created', {
    host: config.host,
    database: config.database,
    connectionLimit: env.DB_CONNECTION_LIMIT,
  });
  return pool;
}

export async function closePool(): Promise<void> {
  const pool = globalForDb.analyticsPool;
  if (!pool) return;
  globalForDb.analyticsPool = undefined;
  await pool.end();
  logger.info('Database pool closed');
}

/**
 * Apply every `.sql` file in the migrations directory in name order.
 * Each file holds a single idempotent statement.
 */
export async function runMigrations(
  pool: Pick<Pool, 'query'>,
  dir: string = MIGRATIONS_DIR
): Promise<string[]> {
  const files = (await readdir(dir)).filter((name) => name.endsWith('.sql')).sort();

  for (const file of files) {
    const statement = await readFile(path.join(dir, file), 'utf8');
    await pool.query(statement);
    logger.info('Migration applied', { file });
  }

  return files;
}
