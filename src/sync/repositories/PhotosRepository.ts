/**
 * PhotosRepository
 *
 * Photo metadata. The image itself stays on disk at `file_path`.
 */

import type { DatabaseInterface } from '@/lib/database';
import type { Photo, SyncableRecord } from '@/lib/types';
import type { SyncQueue } from '../services/SyncQueue';
import { ENTITY_TYPES } from '../types';
import { BaseRepository, SYNCABLE_COLUMNS } from './BaseRepository';

export interface NewPhoto {
  user_id: string;
  timestamp: string;
  latitude: number;
  longitude: number;
  file_path: string;
}

export class PhotosRepository extends BaseRepository<Photo, NewPhoto> {
  constructor(db: DatabaseInterface, syncQueue: SyncQueue) {
    super(db, syncQueue, {
      entityType: ENTITY_TYPES.PHOTO,
      tableName: 'photos',
      columns: [...SYNCABLE_COLUMNS, 'timestamp', 'latitude', 'longitude', 'file_path', 'sync_progress'],
    });
  }

  protected buildRow(input: NewPhoto, base: SyncableRecord): Photo {
    return {
      ...base,
      timestamp: input.timestamp,
      latitude: input.latitude,
      longitude: input.longitude,
      file_path: input.file_path,
      sync_progress: 0,
    };
  }

  protected pendingOrder(): string {
    return 'timestamp ASC, created_at ASC';
  }

  async updateSyncProgress(id: string, percent: number): Promise<void> {
    const clamped = Math.min(100, Math.max(0, Math.round(percent)));
    await this.localDataSource.update(id, { sync_progress: clamped, updated_at: new Date().toISOString() });
  }
}
