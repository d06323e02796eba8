/**
 * SyncService
 *
 * Central orchestrator for all sync operations:
 * - Priority-ordered full sweeps (TimeRecord -> Location -> Report -> Photo)
 * - Single-entity sync with exponential backoff
 * - Periodic sync execution
 * - Connectivity-triggered sync after a settle delay
 * - Status events for observers
 */

import type { EntitySyncAdapter, SingleEntitySyncAdapter } from '../adapters/BaseSyncAdapter';
import type { LocationSyncAdapter } from '../adapters/LocationSyncAdapter';
import type { PhotoSyncAdapter } from '../adapters/PhotoSyncAdapter';
import type { ReportSyncAdapter } from '../adapters/ReportSyncAdapter';
import type { TimeRecordSyncAdapter } from '../adapters/TimeRecordSyncAdapter';
import {
    AuthenticationError,
    getErrorMessage,
    isCancellation,
    isNonRetryable,
    NetworkUnavailableError,
} from '../errors';
import {
    emptySyncResult,
    ENTITY_PRIORITIES,
    ENTITY_TYPES,
    getRetryDelay,
    mergeSyncResults,
    SYNC_CONFIG,
    SYNC_GROUP_ORDER,
    type EntityType,
    type NetworkGate,
    type SyncGroupType,
    type SyncResult,
    type SyncStatusEvent,
    type SyncStatusListener,
} from '../types';
import { delay, linkSignals, throwIfCancelled } from '../utils/async';
import type { SyncQueue } from './SyncQueue';

export interface SyncServiceDependencies {
  syncQueue: SyncQueue;
  network: NetworkGate;
  timeRecords: TimeRecordSyncAdapter;
  locations: LocationSyncAdapter;
  photos: PhotoSyncAdapter;
  reports: ReportSyncAdapter;
}

export interface SyncServiceOptions {
  retryBaseDelayMs?: number;
  maxRetries?: number;
  connectivitySettleMs?: number;
  locationBatchSize?: number;
}

function isSyncGroup(entityType: EntityType): entityType is SyncGroupType {
  return entityType !== ENTITY_TYPES.CHECKPOINT;
}

// Returned when a sweep is refused: nothing ran, one unit of work still pending
function refusedResult(): SyncResult {
  return { successCount: 0, failureCount: 0, pendingCount: 1, isEstimate: false };
}

export class SyncService {
  private isSyncingInner: boolean = false;
  private isInitialized: boolean = false;
  private reconnectPending: boolean = false;

  private scheduleTimer: ReturnType<typeof setInterval> | null = null;
  private readonly lifetime = new AbortController();

  private statusListeners: Set<SyncStatusListener> = new Set();
  private backgroundTasks: Set<Promise<void>> = new Set();
  private unsubscribers: (() => void)[] = [];

  private readonly syncQueue: SyncQueue;
  private readonly network: NetworkGate;
  private readonly timeRecords: TimeRecordSyncAdapter;
  private readonly locations: LocationSyncAdapter;
  private readonly photos: PhotoSyncAdapter;
  private readonly reports: ReportSyncAdapter;

  private readonly retryBaseDelayMs: number;
  private readonly maxRetries: number;
  private readonly connectivitySettleMs: number;
  private readonly locationBatchSize: number;

  constructor(deps: SyncServiceDependencies, options: SyncServiceOptions = {}) {
    this.syncQueue = deps.syncQueue;
    this.network = deps.network;
    this.timeRecords = deps.timeRecords;
    this.locations = deps.locations;
    this.photos = deps.photos;
    this.reports = deps.reports;

    this.retryBaseDelayMs = options.retryBaseDelayMs ?? SYNC_CONFIG.BASE_RETRY_DELAY_MS;
    this.maxRetries = options.maxRetries ?? SYNC_CONFIG.MAX_RETRY_ATTEMPTS;
    this.connectivitySettleMs = options.connectivitySettleMs ?? SYNC_CONFIG.CONNECTIVITY_SETTLE_MS;
    this.locationBatchSize = options.locationBatchSize ?? SYNC_CONFIG.LOCATION_TYPE_SYNC_BATCH_SIZE;
  }

  /**
   * Initialize the sync service.
   * Call this once when the app starts.
   */
  async initialize(): Promise<void> {
    if (this.isInitialized) return;
    this.isInitialized = true;

    this.unsubscribers.push(this.network.onConnectivityChange(this.handleConnectivityChange));

    // Per-record progress from the adapters is forwarded as-is
    for (const adapter of this.adapters()) {
      this.unsubscribers.push(
        adapter.onStatusChange((event) => {
          if (event.phase === 'Syncing') {
            this.notifyStatusListeners(event);
          }
        })
      );
    }

    await this.reconcileQueue();
  }

  /**
   * Cleanup the sync service.
   * Stops timers and aborts whatever is still running.
   */
  destroy(): void {
    this.cancelScheduledSync();

    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];

    this.lifetime.abort();
    this.statusListeners.clear();
    this.isInitialized = false;
  }

  // ============ Status Getters ============

  get isSyncing(): boolean {
    return this.isSyncingInner;
  }

  // ============ Sync Triggers ============

  /**
   * Sync every entity type in priority order.
   */
  async syncAll(signal?: AbortSignal): Promise<SyncResult> {
    if (this.isSyncingInner) {
      console.warn('[SyncService] Sync already in progress, skipping');
      return refusedResult();
    }
    if (!this.network.isConnected) {
      return refusedResult();
    }

    this.isSyncingInner = true;
    const linked = linkSignals(signal, this.lifetime.signal);
    const totalGroups = SYNC_GROUP_ORDER.length;
    let result = emptySyncResult();

    try {
      this.notifyStatusListeners({ entityType: 'All', phase: 'Starting', completedCount: 0, totalCount: totalGroups });

      for (const [index, entityType] of SYNC_GROUP_ORDER.entries()) {
        try {
          throwIfCancelled(linked.signal);
          result = mergeSyncResults(result, await this.syncGroup(entityType, linked.signal));
        } catch (error) {
          if (!isCancellation(error)) throw error;

          console.info(`[SyncService] Sync cancelled before ${entityType} finished`);
          result.pendingCount++;
          this.notifyStatusListeners({ entityType: 'All', phase: 'Canceled', completedCount: index, totalCount: totalGroups });
          return result;
        }
      }

      this.notifyStatusListeners({ entityType: 'All', phase: 'Completed', completedCount: totalGroups, totalCount: totalGroups });
      return result;
    } finally {
      linked.dispose();
      this.isSyncingInner = false;
    }
  }

  /**
   * Sync a single record (with retry) or a whole entity type.
   */
  syncEntity(entityType: EntityType, entityId: string, signal?: AbortSignal): Promise<boolean>;
  syncEntity(entityType: EntityType, signal?: AbortSignal): Promise<SyncResult>;
  async syncEntity(
    entityType: EntityType,
    idOrSignal?: string | AbortSignal,
    signal?: AbortSignal
  ): Promise<boolean | SyncResult> {
    if (typeof idOrSignal === 'string') {
      return this.syncSingleEntity(entityType, idOrSignal, signal);
    }
    return this.syncEntityType(entityType, idOrSignal);
  }

  /**
   * Run `syncAll` now and then every `intervalMs`. Failures are logged.
   */
  scheduleSync(intervalMs: number): void {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error(`intervalMs must be positive, got ${intervalMs}`);
    }

    this.cancelScheduledSync();
    this.scheduleTimer = setInterval(() => this.runScheduledSync(), intervalMs);
    this.runScheduledSync();
  }

  cancelScheduledSync(): void {
    if (this.scheduleTimer) {
      clearInterval(this.scheduleTimer);
      this.scheduleTimer = null;
    }
  }

  // ============ Status Subscriptions ============

  /**
   * Subscribe to sync status changes.
   */
  onStatusChange(listener: SyncStatusListener): () => void {
    this.statusListeners.add(listener);
    return () => this.statusListeners.delete(listener);
  }

  // ============ Utility Methods ============

  async getSyncStatus(): Promise<Record<string, number>> {
    return this.syncQueue.getSyncStatistics();
  }

  /**
   * Resolves once no scheduled or connectivity-triggered work is running.
   */
  async whenIdle(): Promise<void> {
    while (this.backgroundTasks.size > 0) {
      await Promise.all([...this.backgroundTasks]);
    }
  }

  // ============ Private Methods ============

  private handleConnectivityChange = (isConnected: boolean): void => {
    if (!isConnected || this.reconnectPending) return;

    this.reconnectPending = true;
    this.runInBackground('Reconnect sync', async () => {
      try {
        await this.syncAfterReconnect();
      } finally {
        this.reconnectPending = false;
      }
    });
  };

  private async syncAfterReconnect(): Promise<void> {
    if (this.isSyncingInner || !(await this.hasPendingWork())) return;

    // Let the link settle before loading it
    await delay(this.connectivitySettleMs, this.lifetime.signal);
    if (this.isSyncingInner || !this.network.isConnected) return;

    const result = await this.syncAll();
    console.info(
      `[SyncService] Reconnect sync finished: ${result.successCount} synced, ${result.failureCount} failed, ${result.pendingCount} pending`
    );
  }

  private runScheduledSync(): void {
    this.runInBackground('Scheduled sync', async () => {
      await this.syncAll();
    });
  }

  private runInBackground(label: string, task: () => Promise<void>): void {
    const run: Promise<void> = task()
      .catch((error: unknown) => {
        if (isCancellation(error)) {
          console.info(`[SyncService] ${label} cancelled`);
          return;
        }
        console.error(`[SyncService] ${label} failed:`, error);
      })
      .finally(() => {
        this.backgroundTasks.delete(run);
      });
    this.backgroundTasks.add(run);
  }

  private async syncSingleEntity(entityType: EntityType, entityId: string, signal?: AbortSignal): Promise<boolean> {
    if (!entityId) {
      throw new Error('entityId is required');
    }

    const adapter = this.singleEntityAdapter(entityType);
    if (!adapter || !this.network.isConnected) {
      return false;
    }

    const linked = linkSignals(signal, this.lifetime.signal);
    try {
      const success = await this.withRetry(() => adapter.pushEntity(entityId, linked.signal), linked.signal);
      await this.syncQueue.updateSyncStatus(entityType, entityId, success, success ? null : 'Sync operation failed');
      this.notifyStatusListeners({
        entityType,
        phase: success ? 'Completed' : 'Failed',
        completedCount: success ? 1 : 0,
        totalCount: 1,
      });
      return success;
    } catch (error) {
      if (isCancellation(error)) {
        this.notifyStatusListeners({ entityType, phase: 'Canceled', completedCount: 0, totalCount: 1 });
        return false;
      }

      const message = getErrorMessage(error);
      if (error instanceof AuthenticationError) {
        this.notifyStatusListeners({ entityType, phase: 'Error', completedCount: 0, totalCount: 1, message });
        throw error;
      }
      if (error instanceof NetworkUnavailableError) {
        console.warn(`[SyncService] ${entityType} ${entityId} not synced: ${message}`);
        return false;
      }

      console.error(`[SyncService] Failed to sync ${entityType} ${entityId}:`, error);
      await this.syncQueue.updateSyncStatus(entityType, entityId, false, message);
      this.notifyStatusListeners({ entityType, phase: 'Error', completedCount: 0, totalCount: 1, message });
      return false;
    } finally {
      linked.dispose();
    }
  }

  private async syncEntityType(entityType: EntityType, signal?: AbortSignal): Promise<SyncResult> {
    if (!isSyncGroup(entityType)) {
      return emptySyncResult();
    }
    if (this.isSyncingInner || !this.network.isConnected) {
      return refusedResult();
    }

    this.isSyncingInner = true;
    const linked = linkSignals(signal, this.lifetime.signal);
    try {
      throwIfCancelled(linked.signal);
      return await this.syncGroup(entityType, linked.signal);
    } catch (error) {
      if (!isCancellation(error)) throw error;

      this.notifyStatusListeners({ entityType, phase: 'Canceled', completedCount: 0, totalCount: 0 });
      return refusedResult();
    } finally {
      linked.dispose();
      this.isSyncingInner = false;
    }
  }

  /**
   * One group of a sweep. Cancellation propagates; any other failure is
   * logged and counted against the group.
   */
  private async syncGroup(entityType: SyncGroupType, signal: AbortSignal): Promise<SyncResult> {
    let pendingBefore = 0;

    try {
      pendingBefore = await this.adapterFor(entityType).getPendingSyncCount();
      if (pendingBefore === 0) {
        return emptySyncResult();
      }

      this.notifyStatusListeners({ entityType, phase: 'Starting', completedCount: 0, totalCount: pendingBefore });

      const { result, finished } = await this.runGroup(entityType, pendingBefore, signal);
      const phase = finished ? 'Completed' : entityType === ENTITY_TYPES.PHOTO ? 'Failed' : 'Partial';
      this.notifyStatusListeners({
        entityType,
        phase,
        completedCount: result.successCount,
        totalCount: pendingBefore,
      });
      return result;
    } catch (error) {
      if (isCancellation(error)) throw error;

      const message = getErrorMessage(error);
      console.error(`[SyncService] ${entityType} sync failed:`, error);
      this.notifyStatusListeners({ entityType, phase: 'Error', completedCount: 0, totalCount: pendingBefore, message });
      return { successCount: 0, failureCount: 1, pendingCount: 0, isEstimate: false };
    }
  }

  private async runGroup(
    entityType: SyncGroupType,
    pendingBefore: number,
    signal: AbortSignal
  ): Promise<{ result: SyncResult; finished: boolean }> {
    switch (entityType) {
      case ENTITY_TYPES.TIME_RECORD: {
        const result = await this.timeRecords.syncTimeRecords(signal);
        return { result, finished: result.failureCount === 0 && result.pendingCount === 0 };
      }
      case ENTITY_TYPES.REPORT: {
        const result = await this.reports.syncPending(signal);
        return { result, finished: result.failureCount === 0 && result.pendingCount === 0 };
      }
      case ENTITY_TYPES.LOCATION: {
        const ok = await this.locations.syncLocations(this.locationBatchSize, signal);
        const pendingAfter = await this.locations.getPendingSyncCount();
        return { result: estimatedResult(pendingBefore, pendingAfter), finished: ok && pendingAfter === 0 };
      }
      case ENTITY_TYPES.PHOTO: {
        // syncPhotos refuses while another photo sweep runs; report it as pending
        if (this.photos.isSyncInProgress()) {
          return { result: estimatedResult(pendingBefore, pendingBefore), finished: false };
        }
        const ok = await this.photos.syncPhotos(signal);
        const pendingAfter = await this.photos.getPendingSyncCount();
        return { result: estimatedResult(pendingBefore, pendingAfter), finished: ok };
      }
    }
  }

  private async withRetry<T>(operation: () => Promise<T>, signal: AbortSignal): Promise<T> {
    let attempt = 0;

    while (true) {
      try {
        return await operation();
      } catch (error) {
        if (isNonRetryable(error) || attempt >= this.maxRetries) {
          throw error;
        }

        const waitMs = getRetryDelay(attempt, this.retryBaseDelayMs);
        console.warn(`[SyncService] Attempt ${attempt + 1} failed (${getErrorMessage(error)}), retrying in ${waitMs}ms`);
        attempt++;
        await delay(waitMs, signal);
      }
    }
  }

  /**
   * Queue every unsynced local record, e.g. rows captured before the queue existed.
   */
  private async reconcileQueue(): Promise<void> {
    let queued = 0;
    for (const adapter of this.adapters()) {
      const ids = await adapter.getPendingEntityIds();
      for (const id of ids) {
        await this.syncQueue.addSyncItem(adapter.entityType, id, ENTITY_PRIORITIES[adapter.entityType]);
      }
      queued += ids.length;
    }

    if (queued > 0) {
      console.info(`[SyncService] Reconciled ${queued} unsynced record(s) with the sync queue`);
    }
  }

  private async hasPendingWork(): Promise<boolean> {
    for (const adapter of this.adapters()) {
      if ((await adapter.getPendingSyncCount()) > 0) return true;
    }
    return false;
  }

  private adapters(): EntitySyncAdapter[] {
    return SYNC_GROUP_ORDER.map((entityType) => this.adapterFor(entityType));
  }

  private adapterFor(entityType: SyncGroupType): EntitySyncAdapter {
    switch (entityType) {
      case ENTITY_TYPES.TIME_RECORD:
        return this.timeRecords;
      case ENTITY_TYPES.LOCATION:
        return this.locations;
      case ENTITY_TYPES.REPORT:
        return this.reports;
      case ENTITY_TYPES.PHOTO:
        return this.photos;
    }
  }

  private singleEntityAdapter(entityType: EntityType): SingleEntitySyncAdapter | null {
    switch (entityType) {
      case ENTITY_TYPES.TIME_RECORD:
        return this.timeRecords;
      case ENTITY_TYPES.PHOTO:
        return this.photos;
      case ENTITY_TYPES.REPORT:
        return this.reports;
      default:
        return null;
    }
  }

  private notifyStatusListeners(event: SyncStatusEvent): void {
    for (const listener of this.statusListeners) {
      try {
        listener(event);
      } catch (e) {
        console.error('Error in sync status listener:', e);
      }
    }
  }
}

// Location and Photo adapters report no per-record counts
function estimatedResult(pendingBefore: number, pendingAfter: number): SyncResult {
  return {
    successCount: Math.max(0, pendingBefore - pendingAfter),
    failureCount: 0,
    pendingCount: pendingAfter,
    isEstimate: true,
  };
}
