/**
 * Querywise - Database Migration Runner
 * Applies the conversation store schema to PostgreSQL
 *
 * Usage:
 *   npm run db:migrate            apply pending migrations
 *   npm run db:migrate status     list applied migrations
 *   npm run db:migrate down       revert the latest migration
 */

import 'dotenv/config';

import pgPromise from 'pg-promise';

import { loadConfig } from '../../config/loader.js';
import logger from '../../utils/logger.js';

import * as initialSchema from './001-initial-schema.js';

// =============================================================================
// Migration List
// =============================================================================

interface MigrationModule {
  migrationName: string;
  up: string;
  down: string;
}

const MIGRATIONS: MigrationModule[] = [initialSchema];

interface AppliedMigration {
  name: string;
  applied_at: Date;
}

const MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    id SERIAL PRIMARY KEY,
    name VARCHAR(255) NOT NULL UNIQUE,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
`;

// =============================================================================
// Commands
// =============================================================================

type Database = pgPromise.IDatabase<object>;

async function applyPending(db: Database): Promise<void> {
  const applied = await db.any<AppliedMigration>('SELECT name, applied_at FROM schema_migrations ORDER BY id');
  const appliedNames = new Set(applied.map((m) => m.name));

  let count = 0;
  for (const migration of MIGRATIONS) {
    if (appliedNames.has(migration.migrationName)) {
      logger.debug('Skipping applied migration', { migration: migration.migrationName });
      continue;
    }

    await db.tx(async (t) => {
      await t.none(migration.up);
      await t.none('INSERT INTO schema_migrations (name) VALUES ($1)', [migration.migrationName]);
    });
    logger.info('Applied migration', { migration: migration.migrationName });
    count++;
  }

  logger.info(count === 0 ? 'Database is up to date' : 'Migrations applied', { count });
}

async function showStatus(db: Database): Promise<void> {
  const applied = await db.any<AppliedMigration>('SELECT name, applied_at FROM schema_migrations ORDER BY id');
  const appliedNames = new Set(applied.map((m) => m.name));

  for (const migration of applied) {
    logger.info('Applied', { migration: migration.name, appliedAt: migration.applied_at.toISOString() });
  }
  for (const migration of MIGRATIONS) {
    if (!appliedNames.has(migration.migrationName)) {
      logger.info('Pending', { migration: migration.migrationName });
    }
  }
}

async function revertLatest(db: Database): Promise<void> {
  const latest = await db.oneOrNone<AppliedMigration>(
    'SELECT name, applied_at FROM schema_migrations ORDER BY id DESC LIMIT 1'
  );
  if (latest === null) {
    logger.info('No migrations to revert');
    return;
  }

  const migration = MIGRATIONS.find((m) => m.migrationName === latest.name);
  if (migration === undefined) {
    throw new Error(`Applied migration ${latest.name} is not known to this build`);
  }

  await db.tx(async (t) => {
    await t.none(migration.down);
    await t.none('DELETE FROM schema_migrations WHERE name = $1', [migration.migrationName]);
  });
  logger.info('Reverted migration', { migration: migration.migrationName });
}

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  const command = process.argv[2] ?? 'up';
  const config = await loadConfig();
  const pgp = pgPromise();
  const db = pgp({
    host: config.postgres.host,
    port: config.postgres.port,
    database: config.postgres.database,
    user: config.postgres.user,
    password: config.postgres.password,
    ssl: config.postgres.ssl ? { rejectUnauthorized: false } : false,
  });

  logger.info('Running database migrations', {
    command,
    host: config.postgres.host,
    database: config.postgres.database,
  });

  try {
    await db.none(MIGRATIONS_TABLE);

    switch (command) {
      case 'up':
        await applyPending(db);
        break;
      case 'status':
        await showStatus(db);
        break;
      case 'down':
        await revertLatest(db);
        break;
      default:
        throw new Error(`Unknown command "${command}" (expected up, status or down)`);
    }
  } finally {
    pgp.end();
  }
}

main().catch((error: unknown) => {
  logger.error('Migration failed', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
