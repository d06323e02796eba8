/**
 * TimeRecordsRepository
 *
 * Clock-in/clock-out events captured on the device.
 */

import type { DatabaseInterface } from '@/lib/database';
import type { ClockEventType, SyncableRecord, TimeRecord } from '@/lib/types';
import type { SyncQueue } from '../services/SyncQueue';
import { ENTITY_TYPES } from '../types';
import { BaseRepository, SYNCABLE_COLUMNS } from './BaseRepository';

export interface NewTimeRecord {
  user_id: string;
  type: ClockEventType;
  timestamp: string;
  latitude: number;
  longitude: number;
}

export class TimeRecordsRepository extends BaseRepository<TimeRecord, NewTimeRecord> {
  constructor(db: DatabaseInterface, syncQueue: SyncQueue) {
    super(db, syncQueue, {
      entityType: ENTITY_TYPES.TIME_RECORD,
      tableName: 'time_records',
      columns: [...SYNCABLE_COLUMNS, 'type', 'timestamp', 'latitude', 'longitude'],
    });
  }

  protected buildRow(input: NewTimeRecord, base: SyncableRecord): TimeRecord {
    return {
      ...base,
      type: input.type,
      timestamp: input.timestamp,
      latitude: input.latitude,
      longitude: input.longitude,
    };
  }

  protected pendingOrder(): string {
    return 'timestamp ASC, created_at ASC';
  }

  /**
   * Most recent clock event for a user, synced or not.
   */
  async getLatest(userId: string): Promise<TimeRecord | null> {
    const rows = await this.localDataSource.customQuery(
      `SELECT * FROM time_records WHERE user_id = $1 ORDER BY timestamp DESC LIMIT 1`,
      [userId]
    );
    return rows[0] ?? null;
  }
}
