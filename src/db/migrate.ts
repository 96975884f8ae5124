import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export interface Migration {
  name: string;
  sql: string;
}

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

export function defaultMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

/**
 * SQL files of a directory, ordered by file name.
 */
export function loadMigrations(dir: string = defaultMigrationsDir()): Migration[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`);
  }
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort()
    .map((name) => ({ name, sql: fs.readFileSync(path.join(dir, name), 'utf-8') }));
}

export function listAppliedMigrations(db: Database.Database): Set<string> {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
  const rows = db.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>;
  return new Set(rows.map((r) => r.name));
}

/**
 * Apply pending migrations, each in its own transaction.
 */
export function runMigrations(
  db: Database.Database,
  migrations: Migration[] = loadMigrations(),
): MigrationResult {
  const alreadyApplied = listAppliedMigrations(db);
  const result: MigrationResult = { applied: [], skipped: [] };

  for (const migration of migrations) {
    if (alreadyApplied.has(migration.name)) {
      result.skipped.push(migration.name);
      continue;
    }

    const apply = db.transaction(() => {
      db.exec(migration.sql);
      db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
    });

    try {
      apply();
    } catch (err) {
      throw new DbError(`Migration failed: ${migration.name}`, {
        migration: migration.name,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    result.applied.push(migration.name);
    logger.info({ migration: migration.name }, 'Migration applied');
  }

  return result;
}
