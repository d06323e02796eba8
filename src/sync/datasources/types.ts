/**
 * DataSource Types
 *
 * Interfaces for the local store and the remote service.
 * Adapters depend on these, never on SQLite or Supabase directly.
 */

import type { SqlParam } from '@/lib/database';
import type { EntityType, SyncableRecord } from '../types';

/**
 * Interface for local data source operations (SQLite).
 */
export interface LocalDataSource<T extends SyncableRecord> {
  /**
   * Get a single row by ID.
   */
  getById(id: string): Promise<T | null>;

  getAll(): Promise<T[]>;

  insert(item: T): Promise<void>;

  /**
   * Update columns of an existing row. Unknown keys are ignored.
   */
  update(id: string, changes: Partial<T>): Promise<void>;

  delete(id: string): Promise<boolean>;

  /**
   * Rows matching every given column value.
   */
  query(filter: Partial<T>): Promise<T[]>;

  customQuery<R = T>(sql: string, params?: SqlParam[]): Promise<R[]>;

  customExecute(sql: string, params?: SqlParam[]): Promise<number>;
}

/**
 * Per-entity local repository consumed by the sync adapters.
 */
export interface SyncableRepository<T extends SyncableRecord> {
  readonly entityType: EntityType;

  getById(id: string): Promise<T | null>;

  /**
   * Unsynced rows, oldest first.
   */
  getPendingSync(limit?: number): Promise<T[]>;

  countPendingSync(): Promise<number>;

  /**
   * Set the synced flag for rows. Only rows that already carry a remote id can
   * become synced, and a synced row never reverts.
   */
  updateSyncStatus(ids: string | string[], isSynced: boolean): Promise<number>;

  /**
   * Record the remote id of a row that is not yet synced.
   */
  updateRemoteId(id: string, remoteId: string): Promise<boolean>;

  /**
   * Store the remote id and flip the synced flag in one statement.
   */
  markSynced(id: string, remoteId: string): Promise<boolean>;
}

export interface RequestOptions {
  /** Attach the session's access token. Defaults to true. */
  requiresAuth?: boolean;
  signal?: AbortSignal;
}

export type JsonBody = Record<string, unknown>;

export interface MultipartFile {
  fieldName: string;
  fileName: string;
  contentType: string;
  data: Uint8Array;
}

export interface MultipartPayload {
  fields: Record<string, string>;
  files: MultipartFile[];
}

/**
 * Interface for remote operations. Implementations retry transient HTTP
 * failures themselves and surface the error taxonomy from `../errors`.
 * Responses are returned unparsed; callers validate the shape they expect.
 */
export interface RemoteClient {
  get(endpoint: string, options?: RequestOptions): Promise<unknown>;
  post(endpoint: string, body: JsonBody, options?: RequestOptions): Promise<unknown>;
  postMultipart(endpoint: string, payload: MultipartPayload, options?: RequestOptions): Promise<unknown>;
  put(endpoint: string, body: JsonBody, options?: RequestOptions): Promise<unknown>;
  delete(endpoint: string, options?: RequestOptions): Promise<unknown>;
}

export interface Session {
  accessToken: string;
  refreshToken: string;
}

/**
 * Supplies the current session. Token refresh belongs to the host.
 */
export interface SessionProvider {
  getSession(): Promise<Session | null>;
}

export const REMOTE_ENDPOINTS = {
  CLOCK: 'time/clock',
  LOCATION_BATCH: 'location/batch',
  PHOTO_UPLOAD: 'photos/upload',
  REPORTS: 'reports',
} as const;

export function reportEndpoint(remoteId: string): string {
  return `${REMOTE_ENDPOINTS.REPORTS}/${encodeURIComponent(remoteId)}`;
}
