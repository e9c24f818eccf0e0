import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { pathToFileURL } from 'url';
import dotenv from 'dotenv';
import type { Pool } from 'pg';
import { loadConfig } from '../../config/env.js';
import { createLogger, type Logger } from '../logger.js';
import { createPool } from './pool.js';

const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

export interface Migration {
  filename: string;
  version: number;
}

/**
 * Order migration files by their numeric prefix (`001_create_users.sql`).
 */
export function parseMigrations(files: string[]): Migration[] {
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return {
        filename,
        version: parseInt(match[1], 10),
      };
    })
    .sort((a, b) => a.version - b.version);
}

async function ensureMigrationsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(pool: Pool): Promise<number[]> {
  const result = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => row.version);
}

async function applyMigration(
  pool: Pool,
  logger: Logger,
  migration: Migration
): Promise<void> {
  const sql = await readFile(join(MIGRATIONS_DIR, migration.filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
      migration.version,
    ]);
    await client.query('COMMIT');
    logger.info('Applied migration', {
      version: migration.version,
      filename: migration.filename,
    });
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

export async function migrate(pool: Pool, logger: Logger): Promise<number> {
  await ensureMigrationsTable(pool);
  const migrations = parseMigrations(await readdir(MIGRATIONS_DIR));
  const applied = await getAppliedMigrations(pool);

  const pending = migrations.filter((m) => !applied.includes(m.version));
  if (pending.length === 0) {
    logger.info('No pending migrations');
    return 0;
  }

  logger.info('Found pending migrations', { count: pending.length });
  for (const migration of pending) {
    await applyMigration(pool, logger, migration);
  }
  return pending.length;
}

async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();
  const logger = createLogger({
    level: config.logLevel,
    pretty: config.nodeEnv === 'development',
  });
  const pool = createPool(config.db, logger);

  try {
    await migrate(pool, logger);
    logger.info('All migrations applied');
  } catch (error) {
    logger.error(error instanceof Error ? error : String(error), {
      component: 'migrate',
    });
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

if (process.argv[1] && pathToFileURL(process.argv[1]).href === import.meta.url) {
  main().catch((error: unknown) => {
    createLogger().error(error instanceof Error ? error : String(error), {
      component: 'migrate',
    });
    process.exitCode = 1;
  });
}
