/**
 * Migration Runner for the Local SQLite Database
 *
 * Reads numbered `.sql` files from the `migrations/` directory at the package
 * root, applies the ones not yet recorded in the `_migrations` table, and
 * records each as it succeeds. Files are applied in file-name order.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { DatabaseInterface } from './database';

export interface Migration {
  name: string;
  sql: string;
}

const DEFAULT_MIGRATIONS_DIR = fileURLToPath(new URL('../../migrations/', import.meta.url));

/**
 * Load migration files, sorted by name.
 */
export async function loadMigrations(dir: string = DEFAULT_MIGRATIONS_DIR): Promise<Migration[]> {
  const files = (await readdir(dir)).filter((file) => file.endsWith('.sql')).sort();

  return Promise.all(
    files.map(async (file) => ({
      name: file.replace(/\.sql$/, ''),
      sql: await readFile(join(dir, file), 'utf8'),
    }))
  );
}

async function ensureMigrationsTable(db: DatabaseInterface): Promise<void> {
  await db.execute(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL
    )
  `);
}

async function getAppliedMigrations(db: DatabaseInterface): Promise<Set<string>> {
  const result = await db.select<{ name: string }>('SELECT name FROM _migrations');
  return new Set(result.map((r) => r.name));
}

async function markMigrationApplied(db: DatabaseInterface, name: string): Promise<void> {
  await db.execute('INSERT INTO _migrations (name, applied_at) VALUES ($1, $2)', [
    name,
    new Date().toISOString(),
  ]);
}

/**
 * Split SQL into individual statements, handling semicolons inside strings.
 * Also strips leading comment lines from each statement.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];
  let current = '';
  let quote: string | null = null;

  for (const char of sql) {
    if (char === "'" || char === '"') {
      if (quote === null) {
        quote = char;
      } else if (char === quote) {
        quote = null;
      }
    }

    if (char === ';' && quote === null) {
      statements.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  statements.push(current);

  return statements
    .map((stmt) => {
      const lines = stmt.split('\n');
      const firstCode = lines.findIndex((line) => {
        const trimmed = line.trim();
        return trimmed !== '' && !trimmed.startsWith('--');
      });
      return firstCode === -1 ? '' : lines.slice(firstCode).join('\n').trim();
    })
    .filter((stmt) => stmt.length > 0);
}

/**
 * Run pending migrations. Stops at the first migration that fails.
 */
export async function runMigrations(
  db: DatabaseInterface,
  migrations?: Migration[]
): Promise<{ applied: string[]; errors: string[] }> {
  const result = { applied: [] as string[], errors: [] as string[] };

  try {
    await ensureMigrationsTable(db);
    const appliedMigrations = await getAppliedMigrations(db);

    for (const migration of migrations ?? (await loadMigrations())) {
      if (appliedMigrations.has(migration.name)) {
        continue;
      }

      console.log(`[Migrations] Applying: ${migration.name}`);

      try {
        for (const statement of splitStatements(migration.sql)) {
          await db.execute(statement);
        }
        await markMigrationApplied(db, migration.name);
        result.applied.push(migration.name);
      } catch (error) {
        const errorMsg = `Failed to apply ${migration.name}: ${error}`;
        console.error(`[Migrations] ${errorMsg}`);
        result.errors.push(errorMsg);
        break;
      }
    }
  } catch (error) {
    result.errors.push(`Migration system error: ${error}`);
  }

  return result;
}

/**
 * Report which migrations are pending and which are applied.
 */
export async function checkMigrations(
  db: DatabaseInterface,
  migrations?: Migration[]
): Promise<{ pending: string[]; applied: string[] }> {
  const all = migrations ?? (await loadMigrations());
  await ensureMigrationsTable(db);
  const appliedMigrations = await getAppliedMigrations(db);

  return {
    pending: all.filter((m) => !appliedMigrations.has(m.name)).map((m) => m.name),
    applied: all.filter((m) => appliedMigrations.has(m.name)).map((m) => m.name),
  };
}
