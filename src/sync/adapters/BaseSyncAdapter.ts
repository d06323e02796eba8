/**
 * BaseSyncAdapter
 *
 * Shared plumbing for the per-entity adapters: collaborators, status
 * listeners and queue bookkeeping.
 */

import type { SyncableRecord } from '@/lib/types';
import type { RemoteClient, SyncableRepository } from '../datasources/types';
import type { SyncQueue } from '../services/SyncQueue';
import type { EntityType, NetworkGate, SyncStatusEvent, SyncStatusListener } from '../types';

export interface SyncAdapterDependencies<TRepo> {
  repository: TRepo;
  syncQueue: SyncQueue;
  network: NetworkGate;
  remote: RemoteClient;
}

/**
 * What the orchestrator needs from every adapter.
 */
export interface EntitySyncAdapter {
  readonly entityType: EntityType;
  getPendingSyncCount(): Promise<number>;
  getPendingEntityIds(): Promise<string[]>;
  onStatusChange(listener: SyncStatusListener): () => void;
}

/**
 * Adapters that can push one record on demand. `pushEntity` makes a single
 * attempt and throws on failure so the caller can apply its own retry policy;
 * it does not touch the sync queue.
 */
export interface SingleEntitySyncAdapter extends EntitySyncAdapter {
  pushEntity(entityId: string, signal?: AbortSignal): Promise<boolean>;
}

export abstract class BaseSyncAdapter<T extends SyncableRecord, TRepo extends SyncableRepository<T>>
  implements EntitySyncAdapter
{
  abstract readonly entityType: EntityType;

  protected readonly repository: TRepo;
  protected readonly syncQueue: SyncQueue;
  protected readonly network: NetworkGate;
  protected readonly remote: RemoteClient;

  private statusListeners: Set<SyncStatusListener> = new Set();

  constructor(deps: SyncAdapterDependencies<TRepo>) {
    this.repository = deps.repository;
    this.syncQueue = deps.syncQueue;
    this.network = deps.network;
    this.remote = deps.remote;
  }

  async getPendingSyncCount(): Promise<number> {
    return this.repository.countPendingSync();
  }

  async getPendingEntityIds(): Promise<string[]> {
    const pending = await this.repository.getPendingSync();
    return pending.map((record) => record.id);
  }

  onStatusChange(listener: SyncStatusListener): () => void {
    this.statusListeners.add(listener);
    return () => this.statusListeners.delete(listener);
  }

  protected notifyStatusListeners(event: Omit<SyncStatusEvent, 'entityType'>): void {
    const fullEvent: SyncStatusEvent = { entityType: this.entityType, ...event };
    for (const listener of this.statusListeners) {
      try {
        listener(fullEvent);
      } catch (error) {
        console.error('Error in sync status listener:', error);
      }
    }
  }

  /**
   * Record a finished attempt in the sync queue.
   */
  protected async recordOutcome(entityId: string, success: boolean, errorMessage: string | null = null): Promise<void> {
    await this.syncQueue.updateSyncStatus(this.entityType, entityId, success, success ? null : errorMessage);
  }

  protected get logTag(): string {
    return `[${this.entityType}Sync]`;
  }
}
