/**
 * LocationSyncAdapter
 *
 * Uploads GPS points in batches. Only one batch is in flight at a time: a
 * call made while another is running is rejected rather than queued. Can
 * also run on its own timer and on reconnect while that timer is active.
 */

import type { LocationRecord } from '@/lib/types';
import { REMOTE_ENDPOINTS } from '../datasources/types';
import { AuthenticationError, getErrorMessage, isCancellation, NetworkUnavailableError } from '../errors';
import type { LocationsRepository } from '../repositories/LocationsRepository';
import { ENTITY_TYPES, SYNC_CONFIG } from '../types';
import { BaseSyncAdapter } from './BaseSyncAdapter';
import { locationBatchResponseSchema, parseResponse } from './schemas';

export class LocationSyncAdapter extends BaseSyncAdapter<LocationRecord, LocationsRepository> {
  readonly entityType = ENTITY_TYPES.LOCATION;

  private isSyncingInner = false;
  private isScheduledSyncRunning = false;
  private scheduledRun: Promise<void> | null = null;
  private scheduleTimer: ReturnType<typeof setInterval> | null = null;
  private unsubscribeConnectivity: (() => void) | null = null;

  get isSyncing(): boolean {
    return this.isSyncingInner;
  }

  get isScheduled(): boolean {
    return this.scheduleTimer !== null;
  }

  /**
   * Upload the oldest `batchSize` pending points in one request.
   * Returns true when every point in the batch was accepted (or there was nothing to send).
   */
  async syncLocations(batchSize: number = SYNC_CONFIG.LOCATION_BATCH_SIZE, signal?: AbortSignal): Promise<boolean> {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error(`batchSize must be a positive integer, got ${batchSize}`);
    }
    if (this.isSyncingInner) {
      console.warn(`${this.logTag} Batch upload already in progress, skipping`);
      return false;
    }

    this.isSyncingInner = true;
    try {
      if (!this.network.isConnected || !this.network.shouldAttemptOperation('LocationSync')) {
        return false;
      }

      const batch = await this.repository.getPendingSync(batchSize);
      if (batch.length === 0) {
        return true;
      }

      return await this.uploadBatch(batch, signal);
    } finally {
      this.isSyncingInner = false;
    }
  }

  /**
   * Run `syncLocations` now and then every `intervalMs`, and again whenever
   * connectivity returns. Ticks that land while a run is active are dropped.
   */
  startScheduledSync(intervalMs: number = SYNC_CONFIG.LOCATION_SYNC_INTERVAL_MS): void {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error(`intervalMs must be positive, got ${intervalMs}`);
    }

    this.stopScheduledSync();

    this.unsubscribeConnectivity = this.network.onConnectivityChange((isConnected) => {
      if (isConnected && this.network.shouldAttemptOperation('LocationSync')) {
        this.runScheduledSync();
      }
    });
    this.scheduleTimer = setInterval(() => this.runScheduledSync(), intervalMs);
    this.runScheduledSync();
  }

  stopScheduledSync(): void {
    if (this.scheduleTimer) {
      clearInterval(this.scheduleTimer);
      this.scheduleTimer = null;
    }
    if (this.unsubscribeConnectivity) {
      this.unsubscribeConnectivity();
      this.unsubscribeConnectivity = null;
    }
  }

  /**
   * Resolves once the scheduled run in flight (if any) has finished.
   */
  async waitForScheduledSync(): Promise<void> {
    if (this.scheduledRun) {
      await this.scheduledRun;
    }
  }

  private runScheduledSync(): void {
    if (this.isScheduledSyncRunning) return;
    this.isScheduledSyncRunning = true;

    this.scheduledRun = this.syncLocations()
      .then(
        (ok) => {
          if (!ok) console.warn(`${this.logTag} Scheduled location sync did not complete cleanly`);
        },
        (error: unknown) => {
          console.error(`${this.logTag} Scheduled location sync failed:`, error);
        }
      )
      .finally(() => {
        this.isScheduledSyncRunning = false;
        this.scheduledRun = null;
      });
  }

  private async uploadBatch(batch: LocationRecord[], signal?: AbortSignal): Promise<boolean> {
    this.notifyStatusListeners({ phase: 'Starting', completedCount: 0, totalCount: batch.length });

    try {
      const data = await this.remote.post(
        REMOTE_ENDPOINTS.LOCATION_BATCH,
        {
          locations: batch.map((location) => ({
            id: location.id,
            latitude: location.latitude,
            longitude: location.longitude,
            accuracy: location.accuracy,
            timestamp: location.timestamp,
          })),
        },
        { signal }
      );
      const response = parseResponse(locationBatchResponseSchema, data, 'location batch');

      const accepted = new Set(response.syncedIds);
      let syncedCount = 0;
      for (const location of batch) {
        if (accepted.has(location.id)) {
          await this.repository.markSynced(location.id, response.remoteIds?.[location.id] ?? location.id);
          await this.recordOutcome(location.id, true);
          syncedCount++;
        } else {
          await this.recordOutcome(location.id, false, 'Location rejected by server');
        }
      }

      const failedCount = batch.length - syncedCount;
      this.notifyStatusListeners({
        phase: failedCount === 0 ? 'Completed' : 'CompletedWithErrors',
        completedCount: syncedCount,
        totalCount: batch.length,
      });
      return failedCount === 0;
    } catch (error) {
      if (isCancellation(error) || error instanceof AuthenticationError) {
        throw error;
      }

      const message = getErrorMessage(error);
      if (!(error instanceof NetworkUnavailableError)) {
        for (const location of batch) {
          await this.recordOutcome(location.id, false, message);
        }
      }
      console.error(`${this.logTag} Batch upload of ${batch.length} location(s) failed:`, error);
      this.notifyStatusListeners({ phase: 'Error', completedCount: 0, totalCount: batch.length, message });
      return false;
    }
  }
}
