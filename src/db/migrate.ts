/**
 * Database Migration Runner
 * Applies SQL migrations in order, tracking applied migrations
 */

import 'dotenv/config';
import { readdir, readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath, pathToFileURL } from 'url';
import { getConnection, closeConnection } from './connection.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('migrate');

const MIGRATIONS_DIR = join(dirname(fileURLToPath(import.meta.url)), 'migrations');

interface Migration {
  name: string;
  sql: string;
}

export interface MigrationStatus {
  applied: string[];
  pending: string[];
}

async function ensureMigrationsTable(): Promise<void> {
  const sql = getConnection();
  await sql`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `;
}

async function getAppliedMigrations(): Promise<Set<string>> {
  const sql = getConnection();
  const results = await sql<Array<{ name: string }>>`
    SELECT name FROM schema_migrations ORDER BY id
  `;
  return new Set(results.map(r => r.name));
}

async function loadMigrations(): Promise<Migration[]> {
  const files = await readdir(MIGRATIONS_DIR);
  const migrations: Migration[] = [];
  for (const file of files.filter(f => f.endsWith('.sql')).sort()) {
    migrations.push({
      name: file,
      sql: await readFile(join(MIGRATIONS_DIR, file), 'utf-8'),
    });
  }
  return migrations;
}

/**
 * Apply pending migrations, each in its own transaction. Returns the names applied.
 */
export async function migrate(): Promise<string[]> {
  await ensureMigrationsTable();
  const applied = await getAppliedMigrations();
  const migrations = await loadMigrations();
  const sql = getConnection();

  const newlyApplied: string[] = [];
  for (const migration of migrations) {
    if (applied.has(migration.name)) continue;

    log.info({ migration: migration.name }, 'Applying migration');
    await sql.begin(async (tx) => {
      await tx.unsafe(migration.sql);
      await tx`INSERT INTO schema_migrations (name) VALUES (${migration.name})`;
    });
    newlyApplied.push(migration.name);
  }

  log.info({ applied: newlyApplied.length, total: migrations.length }, 'Migrations complete');
  return newlyApplied;
}

export async function migrationStatus(): Promise<MigrationStatus> {
  await ensureMigrationsTable();
  const applied = await getAppliedMigrations();
  const migrations = await loadMigrations();
  return {
    applied: [...applied],
    pending: migrations.filter(m => !applied.has(m.name)).map(m => m.name),
  };
}

async function runFromCLI(command: string): Promise<void> {
  try {
    switch (command) {
      case 'migrate':
      case 'up':
        await migrate();
        break;
      case 'status': {
        const { applied, pending } = await migrationStatus();
        log.info({ applied, pending }, 'Migration status');
        break;
      }
      default:
        log.error('Usage: tsx src/db/migrate.ts [migrate|status]');
        process.exitCode = 1;
    }
  } finally {
    await closeConnection();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  runFromCLI(process.argv[2] ?? 'migrate').catch((error: unknown) => {
    log.error({ error }, 'Migration failed');
    process.exitCode = 1;
  });
}
