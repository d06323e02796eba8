/**
 * BaseRepository
 *
 * Abstract base class for entity repositories implementing the offline-first pattern:
 * - All reads come from LocalDataSource (source of truth)
 * - Writes go to LocalDataSource first, then into the sync queue
 * - `is_synced` only ever flips to 1, in the same statement that stores `remote_id`
 */

import type { DatabaseInterface, SqlParam } from '@/lib/database';
import { generateId, type SyncableRecord } from '@/lib/types';
import { LocalDataSource } from '../datasources/LocalDataSource';
import type { SyncableRepository } from '../datasources/types';
import type { SyncQueue } from '../services/SyncQueue';
import { ENTITY_PRIORITIES, type EntityType } from '../types';

export interface RepositoryConfig {
  entityType: EntityType;
  tableName: string;
  columns: readonly string[];
}

// Columns shared by every synchronizable table
export const SYNCABLE_COLUMNS = ['id', 'user_id', 'is_synced', 'remote_id', 'created_at', 'updated_at'] as const;

export abstract class BaseRepository<T extends SyncableRecord, TInput extends { user_id: string }>
  implements SyncableRepository<T>
{
  readonly entityType: EntityType;
  protected readonly tableName: string;
  protected readonly localDataSource: LocalDataSource<T>;

  constructor(
    db: DatabaseInterface,
    protected readonly syncQueue: SyncQueue,
    config: RepositoryConfig
  ) {
    this.entityType = config.entityType;
    this.tableName = config.tableName;
    this.localDataSource = new LocalDataSource<T>(db, config.tableName, config.columns);
  }

  /**
   * Combine caller input with the generated sync columns into a full row.
   */
  protected abstract buildRow(input: TInput, base: SyncableRecord): T;

  // ============ Read Operations (Always from Local) ============

  async getAll(): Promise<T[]> {
    return this.localDataSource.getAll();
  }

  async getById(id: string): Promise<T | null> {
    return this.localDataSource.getById(id);
  }

  async query(filter: Partial<T>): Promise<T[]> {
    return this.localDataSource.query(filter);
  }

  // ============ Write Operations (Local + Queue) ============

  /**
   * Capture a new record and queue it for sync.
   */
  async create(input: TInput): Promise<T> {
    if (!input.user_id) {
      throw new Error('user_id is required');
    }

    const now = new Date().toISOString();
    const item = this.buildRow(input, {
      id: generateId(),
      user_id: input.user_id,
      is_synced: 0,
      remote_id: null,
      created_at: now,
      updated_at: now,
    });

    await this.localDataSource.insert(item);
    await this.syncQueue.addSyncItem(this.entityType, item.id, ENTITY_PRIORITIES[this.entityType]);

    return item;
  }

  /**
   * Delete a record locally and drop its queue entry. Returns the removed row.
   */
  async delete(id: string): Promise<T | null> {
    const existing = await this.localDataSource.getById(id);
    if (!existing) return null;

    await this.localDataSource.delete(id);
    await this.syncQueue.removeSyncItem(this.entityType, id);

    return existing;
  }

  // ============ Sync Bookkeeping (Called by the adapters) ============

  async getPendingSync(limit?: number): Promise<T[]> {
    return this.localDataSource.customQuery<T>(
      `SELECT * FROM ${this.tableName} WHERE is_synced = 0 ORDER BY ${this.pendingOrder()} LIMIT $1`,
      [limit ?? -1]
    );
  }

  async countPendingSync(): Promise<number> {
    return this.localDataSource.count('is_synced = 0');
  }

  async updateSyncStatus(ids: string | string[], isSynced: boolean): Promise<number> {
    const idList = Array.isArray(ids) ? ids : [ids];
    // A synced row never reverts, and an unsynced row is already 0
    if (!isSynced || idList.length === 0) return 0;

    const placeholders = idList.map((_, i) => `$${i + 2}`).join(', ');
    const params: SqlParam[] = [new Date().toISOString(), ...idList];

    return this.localDataSource.customExecute(
      `UPDATE ${this.tableName} SET is_synced = 1, updated_at = $1
       WHERE id IN (${placeholders}) AND is_synced = 0 AND remote_id IS NOT NULL`,
      params
    );
  }

  async updateRemoteId(id: string, remoteId: string): Promise<boolean> {
    const affected = await this.localDataSource.customExecute(
      `UPDATE ${this.tableName} SET remote_id = $1, updated_at = $2 WHERE id = $3 AND is_synced = 0`,
      [remoteId, new Date().toISOString(), id]
    );
    return affected > 0;
  }

  async markSynced(id: string, remoteId: string): Promise<boolean> {
    if (!remoteId) {
      throw new Error(`Cannot mark ${this.entityType} ${id} synced without a remote id`);
    }

    const affected = await this.localDataSource.customExecute(
      `UPDATE ${this.tableName} SET is_synced = 1, remote_id = $1, updated_at = $2 WHERE id = $3 AND is_synced = 0`,
      [remoteId, new Date().toISOString(), id]
    );
    return affected > 0;
  }

  protected pendingOrder(): string {
    return 'created_at ASC, id ASC';
  }
}
