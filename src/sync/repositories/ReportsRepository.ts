/**
 * ReportsRepository
 *
 * Free-text activity reports.
 */

import type { DatabaseInterface } from '@/lib/database';
import type { Report, SyncableRecord } from '@/lib/types';
import type { SyncQueue } from '../services/SyncQueue';
import { ENTITY_TYPES } from '../types';
import { BaseRepository, SYNCABLE_COLUMNS } from './BaseRepository';

export interface NewReport {
  user_id: string;
  text: string;
  timestamp: string;
  latitude: number;
  longitude: number;
}

export class ReportsRepository extends BaseRepository<Report, NewReport> {
  constructor(db: DatabaseInterface, syncQueue: SyncQueue) {
    super(db, syncQueue, {
      entityType: ENTITY_TYPES.REPORT,
      tableName: 'reports',
      columns: [...SYNCABLE_COLUMNS, 'text', 'timestamp', 'latitude', 'longitude'],
    });
  }

  protected buildRow(input: NewReport, base: SyncableRecord): Report {
    return {
      ...base,
      text: input.text,
      timestamp: input.timestamp,
      latitude: input.latitude,
      longitude: input.longitude,
    };
  }
}
