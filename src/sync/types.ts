/**
 * Sync Types
 *
 * Shared type definitions for the offline-first synchronization engine.
 */

export type {
    ClockEventType,
    LocationRecord,
    Photo,
    Report,
    SyncableRecord,
    TimeRecord
} from '@/lib/types';

export const ENTITY_TYPES = {
  TIME_RECORD: 'TimeRecord',
  LOCATION: 'Location',
  PHOTO: 'Photo',
  REPORT: 'Report',
  CHECKPOINT: 'Checkpoint',
} as const;

export type EntityType = typeof ENTITY_TYPES[keyof typeof ENTITY_TYPES];

// Checkpoint has a priority but no adapter; nothing syncs it
export const ENTITY_PRIORITIES: Record<EntityType, number> = {
  TimeRecord: 100,
  Checkpoint: 90,
  Location: 80,
  Report: 70,
  Photo: 60,
};

// Group order within one full sweep
export const SYNC_GROUP_ORDER = [
  ENTITY_TYPES.TIME_RECORD,
  ENTITY_TYPES.LOCATION,
  ENTITY_TYPES.REPORT,
  ENTITY_TYPES.PHOTO,
] as const;

export type SyncGroupType = typeof SYNC_GROUP_ORDER[number];

export function isEntityType(value: string): value is EntityType {
  return Object.values<string>(ENTITY_TYPES).includes(value);
}

// Queue row (matches DB schema)
export interface SyncQueueItem {
  entity_type: EntityType;
  entity_id: string;
  priority: number;
  retry_count: number;
  last_attempt: string | null;
  error_message: string | null;
  created_at: string;
}

export interface NewSyncItem {
  entityType: EntityType;
  entityId: string;
  priority: number;
}

// In-memory audit record, newest first per entity key
export interface SyncAttempt {
  entityType: EntityType;
  entityId: string;
  success: boolean;
  errorMessage: string | null;
  timestamp: string;
}

export interface SyncResult {
  successCount: number;
  failureCount: number;
  pendingCount: number;
  /** True when Location or Photo counts were inferred from pending-count deltas. */
  isEstimate: boolean;
}

export function emptySyncResult(): SyncResult {
  return { successCount: 0, failureCount: 0, pendingCount: 0, isEstimate: false };
}

export function mergeSyncResults(target: SyncResult, source: SyncResult): SyncResult {
  return {
    successCount: target.successCount + source.successCount,
    failureCount: target.failureCount + source.failureCount,
    pendingCount: target.pendingCount + source.pendingCount,
    isEstimate: target.isEstimate || source.isEstimate,
  };
}

export type SyncPhase =
  | 'Starting'
  | 'Syncing'
  | 'Completed'
  | 'CompletedWithErrors'
  | 'Partial'
  | 'Failed'
  | 'Canceled'
  | 'Error';

export interface SyncStatusEvent {
  entityType: EntityType | 'All';
  phase: SyncPhase;
  completedCount: number;
  totalCount: number;
  message?: string;
}

export type SyncStatusListener = (event: SyncStatusEvent) => void;

export type PhotoUploadState = 'Pending' | 'Uploading' | 'Completed' | 'Failed' | 'Cancelled';

export interface PhotoUploadProgress {
  id: string;
  percent: number;
  state: PhotoUploadState;
  errorMessage: string | null;
}

export type PhotoProgressListener = (progress: PhotoUploadProgress) => void;

// Network gate vocabulary
export type ConnectionType = 'WiFi' | 'Ethernet' | 'Cellular' | 'Bluetooth' | 'Unknown';

export type ConnectionQuality = 'None' | 'Poor' | 'Fair' | 'Good' | 'Excellent';

export type OperationClass =
  | 'Authentication'
  | 'ClockEvent'
  | 'PhotoUpload'
  | 'LocationSync'
  | 'ReportSync'
  | 'CheckpointSync'
  | 'DataDownload'
  | 'Default';

export type ConnectivityListener = (isConnected: boolean) => void;

export interface NetworkGate {
  readonly isConnected: boolean;
  onConnectivityChange(listener: ConnectivityListener): () => void;
  shouldAttemptOperation(operation: OperationClass): boolean;
}

export const SYNC_CONFIG = {
  HISTORY_SIZE: 20,                   // Attempts kept per entity key
  DEAD_LETTER_RETRY_THRESHOLD: 5,     // clearSyncedItems purges rows above this
  MAX_RETRY_ATTEMPTS: 3,              // Retries after the first try
  BASE_RETRY_DELAY_MS: 1000,          // Orchestrator single-entity backoff base
  MAX_RETRY_DELAY_MS: 30000,          // Max retry delay (30s)
  TIME_RECORD_INITIAL_DELAY_MS: 2000, // Clock event backoff base
  LOCATION_BATCH_SIZE: 50,
  LOCATION_TYPE_SYNC_BATCH_SIZE: 100, // Batch used by the orchestrator
  LOCATION_SYNC_INTERVAL_MS: 15 * 60 * 1000,
  REPORT_PAGE_SIZE: 100,
  MAX_CONCURRENT_UPLOADS: 3,
  PROGRESS_STEP_MS: 300,
  PROGRESS_STEP_PERCENT: 10,
  PROGRESS_CAP_PERCENT: 90,           // Simulated progress never passes this
  CONNECTIVITY_SETTLE_MS: 5000,       // Wait after reconnect before syncing
} as const;

// Utility to calculate retry delay with exponential backoff
export function getRetryDelay(
  attempt: number,
  baseDelayMs: number = SYNC_CONFIG.BASE_RETRY_DELAY_MS
): number {
  const delay = baseDelayMs * Math.pow(2, attempt);
  return Math.min(delay, SYNC_CONFIG.MAX_RETRY_DELAY_MS);
}
