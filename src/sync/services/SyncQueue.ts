/**
 * SyncQueue
 *
 * Persisted queue of pending sync work, one row per (entity_type, entity_id):
 * - Idempotent enqueue that only ever raises priority
 * - Ordering by priority, then by how often an item has already failed
 * - Retry tracking on failure, deletion on confirmed success
 * - Bounded in-memory history of attempts per entity
 * - Dead-letter sweep for items that keep failing
 */

import { subMilliseconds } from 'date-fns';
import type { DatabaseInterface } from '@/lib/database';
import {
    isEntityType,
    SYNC_CONFIG,
    type EntityType,
    type NewSyncItem,
    type SyncAttempt,
    type SyncQueueItem,
} from '../types';

export interface SyncQueueOptions {
  historySize?: number;
  deadLetterRetryThreshold?: number;
}

const ORDER_BY = 'ORDER BY priority DESC, retry_count ASC, created_at ASC';

export class SyncQueue {
  private readonly history: Map<string, SyncAttempt[]> = new Map();
  private readonly historySize: number;
  private readonly deadLetterRetryThreshold: number;

  constructor(
    private readonly db: DatabaseInterface,
    options: SyncQueueOptions = {}
  ) {
    this.historySize = options.historySize ?? SYNC_CONFIG.HISTORY_SIZE;
    this.deadLetterRetryThreshold = options.deadLetterRetryThreshold ?? SYNC_CONFIG.DEAD_LETTER_RETRY_THRESHOLD;
  }

  /**
   * Pending items of one entity type, highest priority first.
   */
  async getPendingSync(entityType: EntityType): Promise<SyncQueueItem[]> {
    const rows = await this.db.select<SyncQueueItem>(
      `SELECT * FROM sync_queue WHERE entity_type = $1 ${ORDER_BY}`,
      [entityType]
    );
    return rows;
  }

  /**
   * Every pending item, highest priority first.
   */
  async getAllPendingSync(): Promise<SyncQueueItem[]> {
    return this.db.select<SyncQueueItem>(`SELECT * FROM sync_queue ${ORDER_BY}`);
  }

  async getItem(entityType: EntityType, entityId: string): Promise<SyncQueueItem | null> {
    const rows = await this.db.select<SyncQueueItem>(
      `SELECT * FROM sync_queue WHERE entity_type = $1 AND entity_id = $2`,
      [entityType, entityId]
    );
    return rows[0] ?? null;
  }

  /**
   * Add an item to the queue. An existing item keeps its retry count and only
   * takes the new priority when it is strictly higher.
   */
  addSyncItem(entityType: EntityType, entityId: string, priority: number): Promise<void>;
  addSyncItem(item: NewSyncItem): Promise<void>;
  async addSyncItem(itemOrType: EntityType | NewSyncItem, entityId?: string, priority?: number): Promise<void> {
    const item: NewSyncItem =
      typeof itemOrType === 'string'
        ? { entityType: itemOrType, entityId: entityId ?? '', priority: priority ?? 0 }
        : itemOrType;

    this.assertKey(item.entityType, item.entityId);
    if (!Number.isInteger(item.priority)) {
      throw new Error(`priority must be an integer, got ${item.priority}`);
    }

    await this.db.execute(
      `INSERT INTO sync_queue (entity_type, entity_id, priority, retry_count, created_at)
       VALUES ($1, $2, $3, 0, $4)
       ON CONFLICT (entity_type, entity_id) DO UPDATE SET priority = excluded.priority
       WHERE excluded.priority > sync_queue.priority`,
      [item.entityType, item.entityId, item.priority, new Date().toISOString()]
    );
  }

  /**
   * Record the outcome of a sync attempt. Success removes the item; failure
   * keeps it with one more retry and the error message.
   */
  async updateSyncStatus(
    entityType: EntityType,
    entityId: string,
    success: boolean,
    errorMessage: string | null = null
  ): Promise<void> {
    this.assertKey(entityType, entityId);
    const now = new Date().toISOString();

    if (success) {
      await this.db.execute(
        `DELETE FROM sync_queue WHERE entity_type = $1 AND entity_id = $2`,
        [entityType, entityId]
      );
    } else {
      await this.db.execute(
        `UPDATE sync_queue
         SET retry_count = retry_count + 1, last_attempt = $1, error_message = $2
         WHERE entity_type = $3 AND entity_id = $4`,
        [now, errorMessage, entityType, entityId]
      );
    }

    this.recordAttempt({
      entityType,
      entityId,
      success,
      errorMessage: success ? null : errorMessage,
      timestamp: now,
    });
  }

  /**
   * Remove an item regardless of state (used when the entity is deleted locally).
   */
  async removeSyncItem(entityType: EntityType, entityId: string): Promise<boolean> {
    this.assertKey(entityType, entityId);
    const result = await this.db.execute(
      `DELETE FROM sync_queue WHERE entity_type = $1 AND entity_id = $2`,
      [entityType, entityId]
    );
    return result.rowsAffected > 0;
  }

  /**
   * Most recent attempts first.
   */
  getSyncHistory(entityType: EntityType, entityId: string, count: number = this.historySize): SyncAttempt[] {
    const attempts = this.history.get(historyKey(entityType, entityId)) ?? [];
    return attempts.slice(0, Math.max(0, count)).map((attempt) => ({ ...attempt }));
  }

  /**
   * Dead-letter sweep: purge items that failed more than the threshold and
   * were last attempted longer than `ageMs` ago. Successful items are never
   * here to begin with; updateSyncStatus already deleted them.
   */
  async clearSyncedItems(ageMs: number): Promise<number> {
    if (ageMs < 0) {
      throw new Error(`ageMs must not be negative, got ${ageMs}`);
    }

    const cutoff = subMilliseconds(new Date(), ageMs).toISOString();
    const result = await this.db.execute(
      `DELETE FROM sync_queue WHERE retry_count > $1 AND last_attempt IS NOT NULL AND last_attempt < $2`,
      [this.deadLetterRetryThreshold, cutoff]
    );

    if (result.rowsAffected > 0) {
      console.info(`[SyncQueue] Purged ${result.rowsAffected} dead-letter item(s)`);
    }
    return result.rowsAffected;
  }

  async getPendingCount(entityType?: EntityType): Promise<number> {
    const result = entityType
      ? await this.db.select<{ count: number }>(
          `SELECT COUNT(*) as count FROM sync_queue WHERE entity_type = $1`,
          [entityType]
        )
      : await this.db.select<{ count: number }>(`SELECT COUNT(*) as count FROM sync_queue`);

    return result[0]?.count ?? 0;
  }

  /**
   * Counters keyed `TotalItems`, `EntityType_<type>`, `Priority_<n>` and
   * `RetryCount_<bucket>`.
   */
  async getSyncStatistics(): Promise<Record<string, number>> {
    const statistics: Record<string, number> = {
      TotalItems: await this.getPendingCount(),
    };

    const byType = await this.db.select<{ entity_type: string; count: number }>(
      `SELECT entity_type, COUNT(*) as count FROM sync_queue GROUP BY entity_type`
    );
    for (const row of byType) {
      if (isEntityType(row.entity_type)) {
        statistics[`EntityType_${row.entity_type}`] = row.count;
      }
    }

    const byPriority = await this.db.select<{ priority: number; count: number }>(
      `SELECT priority, COUNT(*) as count FROM sync_queue GROUP BY priority`
    );
    for (const row of byPriority) {
      statistics[`Priority_${row.priority}`] = row.count;
    }

    const buckets = await this.db.select<{ zero: number; low: number; mid: number; high: number }>(
      `SELECT
         COALESCE(SUM(CASE WHEN retry_count = 0 THEN 1 ELSE 0 END), 0) as zero,
         COALESCE(SUM(CASE WHEN retry_count BETWEEN 1 AND 3 THEN 1 ELSE 0 END), 0) as low,
         COALESCE(SUM(CASE WHEN retry_count BETWEEN 4 AND 10 THEN 1 ELSE 0 END), 0) as mid,
         COALESCE(SUM(CASE WHEN retry_count > 10 THEN 1 ELSE 0 END), 0) as high
       FROM sync_queue`
    );
    const bucket = buckets[0];
    statistics.RetryCount_0 = bucket?.zero ?? 0;
    statistics.RetryCount_1_3 = bucket?.low ?? 0;
    statistics.RetryCount_4_10 = bucket?.mid ?? 0;
    statistics.RetryCount_10Plus = bucket?.high ?? 0;

    return statistics;
  }

  private recordAttempt(attempt: SyncAttempt): void {
    const key = historyKey(attempt.entityType, attempt.entityId);
    const attempts = this.history.get(key) ?? [];
    attempts.unshift(attempt);
    if (attempts.length > this.historySize) {
      attempts.length = this.historySize;
    }
    this.history.set(key, attempts);
  }

  private assertKey(entityType: EntityType, entityId: string): void {
    if (!isEntityType(entityType)) {
      throw new Error(`Unknown entity type: ${entityType}`);
    }
    if (!entityId) {
      throw new Error('entityId is required');
    }
  }
}

function historyKey(entityType: EntityType, entityId: string): string {
  return `${entityType}:${entityId}`;
}
