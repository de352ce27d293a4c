import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import dotenv from 'dotenv';
import type { Pool } from 'pg';
import { createPool } from './pool.js';
import { createLogger, type SafeLogger } from '../logger.js';

const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

interface Migration {
  filename: string;
  version: number;
}

export function parseMigrationFilenames(files: string[]): Migration[] {
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = /^(\d+)_/.exec(filename);
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

async function applyMigration(pool: Pool, migration: Migration, logger: SafeLogger): Promise<void> {
  const sql = await readFile(join(MIGRATIONS_DIR, migration.filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [migration.version]);
    await client.query('COMMIT');
    logger.info({ version: migration.version, file: migration.filename }, 'Applied migration');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

async function migrate(): Promise<void> {
  dotenv.config();
  const logger = createLogger({ name: 'migrate', level: process.env.LOG_LEVEL });
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    logger.error({}, 'DATABASE_URL is required to run migrations');
    process.exitCode = 1;
    return;
  }

  const pool = createPool(databaseUrl, logger);
  try {
    await ensureMigrationsTable(pool);
    const migrations = parseMigrationFilenames(await readdir(MIGRATIONS_DIR));
    const applied = new Set(await getAppliedMigrations(pool));
    const pending = migrations.filter((m) => !applied.has(m.version));

    if (pending.length === 0) {
      logger.info({}, 'No pending migrations');
      return;
    }

    logger.info({ count: pending.length }, 'Applying pending migrations');
    for (const migration of pending) {
      await applyMigration(pool, migration, logger);
    }
    logger.info({}, 'All migrations applied');
  } catch (error) {
    logger.error({ err: error instanceof Error ? error.message : String(error) }, 'Migration failed');
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

// Run only when executed directly (`npm run migrate`), not when imported.
if (process.argv[1]?.endsWith('migrate.ts') || process.argv[1]?.endsWith('migrate.js')) {
  void migrate();
}
