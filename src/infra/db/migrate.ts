import 'dotenv/config';
import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import pg from 'pg';
import { createPool } from './pool.js';
import { loadDatabaseUrl } from '../../config.js';
import { dbLogger } from '../../lib/logger.js';

const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

interface Migration {
  filename: string;
  version: number;
}

export function parseMigrationFilenames(files: string[]): Migration[] {
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

async function ensureMigrationsTable(pool: pg.Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(pool: pg.Pool): Promise<number[]> {
  const result = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => row.version);
}

async function applyMigration(pool: pg.Pool, migration: Migration): Promise<void> {
  const sql = await readFile(join(MIGRATIONS_DIR, migration.filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
      migration.version,
    ]);
    await client.query('COMMIT');
    dbLogger.info({ version: migration.version, file: migration.filename }, 'Applied migration');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

export async function migrate(pool: pg.Pool): Promise<number> {
  await ensureMigrationsTable(pool);
  const migrations = parseMigrationFilenames(await readdir(MIGRATIONS_DIR));
  const applied = await getAppliedMigrations(pool);

  const pending = migrations.filter((m) => !applied.includes(m.version));
  if (pending.length === 0) {
    dbLogger.info('No pending migrations');
    return 0;
  }

  dbLogger.info({ count: pending.length }, 'Applying pending migrations');
  for (const migration of pending) {
    await applyMigration(pool, migration);
  }
  return pending.length;
}

// Run if called directly
if (process.argv[1]?.endsWith('migrate.ts') || process.argv[1]?.endsWith('migrate.js')) {
  const pool = createPool(loadDatabaseUrl());
  migrate(pool)
    .then(() => pool.end())
    .then(() => {
      process.exit(0);
    })
    .catch((error: unknown) => {
      dbLogger.fatal({ err: error }, 'Migration failed');
      process.exit(1);
    });
}
