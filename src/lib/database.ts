/**
 * SQLite database for Node.js using sql.js (SQLite compiled to WASM).
 *
 * The whole database lives in memory. When a file path is configured the
 * exported image is written back to disk after writes (debounced) and on close.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import initSqlJs, { type Database as SqlJsDatabase, type QueryExecResult, type SqlJsStatic, type SqlValue } from 'sql.js';
import { loadConfig } from './config';

export type SqlParam = SqlValue;

// Shared by the migration runner, data sources and the sync queue
export interface DatabaseInterface {
  execute(query: string, params?: SqlParam[]): Promise<{ rowsAffected: number }>;
  select<T>(query: string, params?: SqlParam[]): Promise<T[]>;
}

export interface OpenDatabaseOptions {
  /** File to load from and persist to. Omit for a purely in-memory database. */
  path?: string | null;
  /** Debounce window for persisting after writes. */
  saveDelayMs?: number;
}

const DEFAULT_SAVE_DELAY_MS = 100;

let sqlJsPromise: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJsPromise) {
    sqlJsPromise = initSqlJs();
  }
  return sqlJsPromise;
}

/**
 * Convert PostgreSQL-style parameters ($1, $2) to SQLite-style (?)
 * and reorder params array accordingly.
 */
export function convertParams(query: string, params: SqlParam[]): { query: string; params: SqlParam[] } {
  const paramNumbers: number[] = [];
  const regex = /\$(\d+)/g;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(query)) !== null) {
    paramNumbers.push(parseInt(match[1], 10));
  }

  if (paramNumbers.length === 0) {
    return { query, params };
  }

  // A $N may appear more than once, so params are laid out in order of appearance
  const ordered = paramNumbers.map((paramNum) => {
    const value = params[paramNum - 1];
    if (value === undefined) {
      throw new Error(`Missing value for parameter $${paramNum}`);
    }
    return value;
  });

  return { query: query.replace(/\$\d+/g, '?'), params: ordered };
}

/**
 * sql.js returns: [{ columns: ['id', 'name'], values: [[1, 'foo'], [2, 'bar']] }]
 * We need: [{id: 1, name: 'foo'}, {id: 2, name: 'bar'}]
 */
function transformResults<T>(results: QueryExecResult[]): T[] {
  if (results.length === 0) return [];

  const { columns, values } = results[0];
  return values.map((row) => {
    const obj: Record<string, SqlValue> = {};
    columns.forEach((col, i) => {
      obj[col] = row[i];
    });
    return obj as T;
  });
}

export class SqliteDatabase implements DatabaseInterface {
  private saveTimeout: ReturnType<typeof setTimeout> | null = null;
  private pendingSave: Promise<void> | null = null;
  private closed = false;

  private constructor(
    private readonly db: SqlJsDatabase,
    private readonly path: string | null,
    private readonly saveDelayMs: number
  ) {}

  static async open(options: OpenDatabaseOptions = {}): Promise<SqliteDatabase> {
    const SQL = await loadSqlJs();
    const path = options.path ?? null;
    const existingData = path ? await readDatabaseFile(path) : null;
    const db = existingData ? new SQL.Database(existingData) : new SQL.Database();
    db.run('PRAGMA foreign_keys = ON');
    return new SqliteDatabase(db, path, options.saveDelayMs ?? DEFAULT_SAVE_DELAY_MS);
  }

  get isPersistent(): boolean {
    return this.path !== null;
  }

  /**
   * Execute a SQL statement (INSERT, UPDATE, DELETE, CREATE TABLE, etc.).
   */
  async execute(query: string, params: SqlParam[] = []): Promise<{ rowsAffected: number }> {
    this.assertOpen();
    const converted = convertParams(query, params);

    try {
      this.db.run(converted.query, converted.params);
      const rowsAffected = this.db.getRowsModified();
      this.scheduleSave();
      return { rowsAffected };
    } catch (error) {
      console.error('[Database] SQL execute error:', error, { query, params });
      throw error;
    }
  }

  /**
   * Select records from the database.
   */
  async select<T>(query: string, params: SqlParam[] = []): Promise<T[]> {
    this.assertOpen();
    const converted = convertParams(query, params);

    try {
      return transformResults<T>(this.db.exec(converted.query, converted.params));
    } catch (error) {
      console.error('[Database] SQL select error:', error, { query, params });
      throw error;
    }
  }

  /**
   * Write the current image to disk immediately. No-op for in-memory databases.
   */
  async flush(): Promise<void> {
    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
      this.saveTimeout = null;
    }
    if (this.pendingSave) {
      await this.pendingSave;
    }
    if (!this.path || this.closed) return;

    const data = this.db.export();
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, data);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    await this.flush();
    this.closed = true;
    this.db.close();
  }

  private scheduleSave(): void {
    if (!this.path) return;

    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
    }
    this.saveTimeout = setTimeout(() => {
      this.saveTimeout = null;
      this.pendingSave = this.flush()
        .catch((error: unknown) => {
          console.error('[Database] Failed to persist database:', error);
        })
        .finally(() => {
          this.pendingSave = null;
        });
    }, this.saveDelayMs);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Database is closed');
    }
  }
}

async function readDatabaseFile(path: string): Promise<Uint8Array | null> {
  try {
    return await readFile(path);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

let databaseInstance: Promise<SqliteDatabase> | null = null;

/**
 * Get the process-wide database, opened from FIELD_SYNC_DATABASE_PATH
 * (in-memory when unset).
 */
export function getDatabase(): Promise<SqliteDatabase> {
  if (!databaseInstance) {
    databaseInstance = SqliteDatabase.open({ path: loadConfig().databasePath });
  }
  return databaseInstance;
}

/**
 * Close and forget the process-wide database.
 */
export async function closeDatabase(): Promise<void> {
  if (!databaseInstance) return;
  const db = await databaseInstance;
  databaseInstance = null;
  await db.close();
}
