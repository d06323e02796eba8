// Database types matching SQLite schema

import { randomUUID } from 'node:crypto';

export type ClockEventType = 'ClockIn' | 'ClockOut';

// Columns every synchronizable table carries
export interface SyncableRecord {
  id: string;
  user_id: string;
  is_synced: number; // 0 | 1, flips to 1 together with remote_id
  remote_id: string | null;
  created_at: string;
  updated_at: string;
}

export interface TimeRecord extends SyncableRecord {
  type: ClockEventType;
  timestamp: string;
  latitude: number;
  longitude: number;
}

export interface LocationRecord extends SyncableRecord {
  latitude: number;
  longitude: number;
  accuracy: number;
  timestamp: string;
}

export interface Photo extends SyncableRecord {
  timestamp: string;
  latitude: number;
  longitude: number;
  file_path: string;
  sync_progress: number;
}

export interface Report extends SyncableRecord {
  text: string;
  timestamp: string;
  latitude: number;
  longitude: number;
}

export function generateId(): string {
  return randomUUID();
}

export function toSqlBoolean(value: boolean): number {
  return value ? 1 : 0;
}
