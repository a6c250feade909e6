import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type { Pool } from 'pg';
import { logger } from '../logger.js';

/** SQL files live beside this module, whatever the working directory. */
export const MIGRATIONS_DIR = fileURLToPath(new URL('./migrations/', import.meta.url));

// Arbitrary key shared by every runner of this schema
const MIGRATION_LOCK_KEY = 74_201;

export interface Migration {
  filename: string;
  version: number;
}

/**
 * `001_users.sql` → `{ filename, version: 1 }`; null for anything that is not
 * a numbered SQL file.
 */
export function parseMigrationFilename(filename: string): Migration | null {
  const match = /^(\d+)_[\w-]+\.sql$/.exec(filename);
  if (!match) {
    return null;
  }
  return { filename, version: Number.parseInt(match[1], 10) };
}

export async function listMigrations(dir: string = MIGRATIONS_DIR): Promise<Migration[]> {
  const migrations: Migration[] = [];
  for (const filename of await readdir(dir)) {
    if (!filename.endsWith('.sql')) {
      continue;
    }
    const migration = parseMigrationFilename(filename);
    if (!migration) {
      throw new Error(`Invalid migration filename: ${filename}`);
    }
    migrations.push(migration);
  }

  migrations.sort((a, b) => a.version - b.version);
  for (let i = 1; i < migrations.length; i++) {
    if (migrations[i].version === migrations[i - 1].version) {
      throw new Error(`Duplicate migration version ${migrations[i].version}`);
    }
  }
  return migrations;
}

/**
 * Apply every pending migration, each in its own transaction.
 * Concurrent runners queue on an advisory lock, so a version is applied once.
 *
 * @returns the versions applied by this call
 */
export async function runMigrations(db: Pool, dir: string = MIGRATIONS_DIR): Promise<number[]> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const applied: number[] = [];
  for (const migration of await listMigrations(dir)) {
    const sql = await readFile(join(dir, migration.filename), 'utf-8');

    const client = await db.connect();
    try {
      await client.query('BEGIN');
      await client.query('SELECT pg_advisory_xact_lock($1)', [MIGRATION_LOCK_KEY]);

      const existing = await client.query('SELECT 1 FROM schema_migrations WHERE version = $1', [
        migration.version,
      ]);
      if (existing.rowCount) {
        await client.query('COMMIT');
        continue;
      }

      await client.query(sql);
      await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
        migration.version,
      ]);
      await client.query('COMMIT');

      logger.info('Applied migration', { ...migration });
      applied.push(migration.version);
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  if (applied.length === 0) {
    logger.info('No pending migrations');
  }
  return applied;
}

// Run if called directly
if (process.argv[1] === fileURLToPath(import.meta.url) || process.argv[1]?.endsWith('db/migrate.ts')) {
  const { pool } = await import('./pool.js');
  runMigrations(pool)
    .then(async (applied) => {
      logger.info('Migrations complete', { applied: applied.length });
      await pool.end();
    })
    .catch(async (error: unknown) => {
      logger.error('Migration failed', error instanceof Error ? error : { error: String(error) });
      process.exitCode = 1;
      await pool.end();
    });
}
