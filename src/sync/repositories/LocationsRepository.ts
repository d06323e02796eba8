/**
 * LocationsRepository
 *
 * GPS trace points, uploaded in batches.
 */

import type { DatabaseInterface } from '@/lib/database';
import type { LocationRecord, SyncableRecord } from '@/lib/types';
import type { SyncQueue } from '../services/SyncQueue';
import { ENTITY_TYPES } from '../types';
import { BaseRepository, SYNCABLE_COLUMNS } from './BaseRepository';

export interface NewLocationRecord {
  user_id: string;
  latitude: number;
  longitude: number;
  accuracy: number;
  timestamp: string;
}

export class LocationsRepository extends BaseRepository<LocationRecord, NewLocationRecord> {
  constructor(db: DatabaseInterface, syncQueue: SyncQueue) {
    super(db, syncQueue, {
      entityType: ENTITY_TYPES.LOCATION,
      tableName: 'location_records',
      columns: [...SYNCABLE_COLUMNS, 'latitude', 'longitude', 'accuracy', 'timestamp'],
    });
  }

  protected buildRow(input: NewLocationRecord, base: SyncableRecord): LocationRecord {
    return {
      ...base,
      latitude: input.latitude,
      longitude: input.longitude,
      accuracy: input.accuracy,
      timestamp: input.timestamp,
    };
  }

  protected pendingOrder(): string {
    return 'timestamp ASC, created_at ASC';
  }
}
