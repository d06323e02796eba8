/**
 * LocalDataSource
 *
 * Generic SQLite data source implementation.
 * Each entity repository creates an instance with the appropriate table configuration.
 */

import type { DatabaseInterface, SqlParam } from '@/lib/database';
import { toSqlBoolean } from '@/lib/types';
import type { SyncableRecord } from '../types';
import type { LocalDataSource as ILocalDataSource } from './types';

function toSqlParam(column: string, value: unknown): SqlParam {
  if (value === undefined || value === null) return null;
  if (typeof value === 'boolean') return toSqlBoolean(value);
  if (typeof value === 'string' || typeof value === 'number' || value instanceof Uint8Array) {
    return value;
  }
  throw new Error(`Unsupported value for column ${column}: ${typeof value}`);
}

export class LocalDataSource<T extends SyncableRecord> implements ILocalDataSource<T> {
  constructor(
    private readonly db: DatabaseInterface,
    private readonly tableName: string,
    private readonly columns: readonly string[]
  ) {}

  async getById(id: string): Promise<T | null> {
    const results = await this.db.select<T>(
      `SELECT * FROM ${this.tableName} WHERE id = $1`,
      [id]
    );
    return results[0] ?? null;
  }

  async getAll(): Promise<T[]> {
    return this.db.select<T>(`SELECT * FROM ${this.tableName} ORDER BY created_at DESC`);
  }

  async insert(item: T): Promise<void> {
    const entries = this.knownEntries(item);
    const placeholders = entries.map((_, i) => `$${i + 1}`).join(', ');

    await this.db.execute(
      `INSERT INTO ${this.tableName} (${entries.map(([key]) => key).join(', ')}) VALUES (${placeholders})`,
      entries.map(([, value]) => value)
    );
  }

  async update(id: string, changes: Partial<T>): Promise<void> {
    const entries = this.knownEntries(changes).filter(([key]) => key !== 'id');
    if (entries.length === 0) return;

    const setClause = entries.map(([key], i) => `${key} = $${i + 1}`).join(', ');
    const values = [...entries.map(([, value]) => value), id];

    await this.db.execute(
      `UPDATE ${this.tableName} SET ${setClause} WHERE id = $${values.length}`,
      values
    );
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db.execute(`DELETE FROM ${this.tableName} WHERE id = $1`, [id]);
    return result.rowsAffected > 0;
  }

  async query(filter: Partial<T>): Promise<T[]> {
    const entries = this.knownEntries(filter);
    if (entries.length === 0) {
      return this.getAll();
    }

    const whereClause = entries.map(([key], i) => `${key} = $${i + 1}`).join(' AND ');

    return this.db.select<T>(
      `SELECT * FROM ${this.tableName} WHERE ${whereClause} ORDER BY created_at DESC`,
      entries.map(([, value]) => value)
    );
  }

  // ============ Additional Utility Methods ============

  /**
   * Execute a custom query with optional custom return type.
   */
  async customQuery<R = T>(sql: string, params: SqlParam[] = []): Promise<R[]> {
    return this.db.select<R>(sql, params);
  }

  /**
   * Execute a custom statement, returning the number of affected rows.
   */
  async customExecute(sql: string, params: SqlParam[] = []): Promise<number> {
    const result = await this.db.execute(sql, params);
    return result.rowsAffected;
  }

  async count(whereClause: string = '', params: SqlParam[] = []): Promise<number> {
    const where = whereClause ? `WHERE ${whereClause}` : '';
    const result = await this.db.select<{ count: number }>(
      `SELECT COUNT(*) as count FROM ${this.tableName} ${where}`,
      params
    );
    return result[0]?.count ?? 0;
  }

  private knownEntries(values: Partial<T>): [string, SqlParam][] {
    return Object.entries(values)
      .filter(([key, value]) => this.columns.includes(key) && value !== undefined)
      .map(([key, value]): [string, SqlParam] => [key, toSqlParam(key, value)]);
  }
}
