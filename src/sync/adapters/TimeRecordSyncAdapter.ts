/**
 * TimeRecordSyncAdapter
 *
 * Pushes clock events one at a time. Each record gets up to `maxRetries`
 * further tries with exponential backoff; bulk runs are serialized so an
 * overlapping call waits for the current one instead of interleaving.
 */

import type { TimeRecord } from '@/lib/types';
import { REMOTE_ENDPOINTS } from '../datasources/types';
import { AuthenticationError, getErrorMessage, isCancellation, isNonRetryable, NetworkUnavailableError } from '../errors';
import type { TimeRecordsRepository } from '../repositories/TimeRecordsRepository';
import { emptySyncResult, ENTITY_TYPES, SYNC_CONFIG, type SyncResult } from '../types';
import { delay, Mutex } from '../utils/async';
import { BaseSyncAdapter, type SingleEntitySyncAdapter, type SyncAdapterDependencies } from './BaseSyncAdapter';
import { requireAcceptedId } from './schemas';

export interface TimeRecordSyncOptions {
  maxRetries?: number;
  initialDelayMs?: number;
}

interface RecordOutcome {
  success: boolean;
  errorMessage: string | null;
}

export class TimeRecordSyncAdapter
  extends BaseSyncAdapter<TimeRecord, TimeRecordsRepository>
  implements SingleEntitySyncAdapter
{
  readonly entityType = ENTITY_TYPES.TIME_RECORD;

  private readonly lock = new Mutex();
  private readonly maxRetries: number;
  private readonly initialDelayMs: number;

  constructor(deps: SyncAdapterDependencies<TimeRecordsRepository>, options: TimeRecordSyncOptions = {}) {
    super(deps);
    this.maxRetries = options.maxRetries ?? SYNC_CONFIG.MAX_RETRY_ATTEMPTS;
    this.initialDelayMs = options.initialDelayMs ?? SYNC_CONFIG.TIME_RECORD_INITIAL_DELAY_MS;
  }

  get isSyncing(): boolean {
    return this.lock.isLocked;
  }

  /**
   * Push every pending clock event, oldest first. Stops early on cancellation
   * or when the link drops; whatever was not attempted is reported as pending.
   */
  async syncTimeRecords(signal?: AbortSignal): Promise<SyncResult> {
    return this.lock.runExclusive(async () => {
      const pending = await this.repository.getPendingSync();
      const result = emptySyncResult();

      if (!this.canSync()) {
        result.pendingCount = pending.length;
        return result;
      }

      for (const [index, record] of pending.entries()) {
        if (signal?.aborted) {
          result.pendingCount += pending.length - index;
          break;
        }

        this.notifyStatusListeners({ phase: 'Syncing', completedCount: index, totalCount: pending.length });

        try {
          const outcome = await this.syncWithRetry(record, signal);
          await this.recordOutcome(record.id, outcome.success, outcome.errorMessage);
          if (outcome.success) {
            result.successCount++;
          } else {
            result.failureCount++;
          }
        } catch (error) {
          if (isCancellation(error) || error instanceof NetworkUnavailableError) {
            result.pendingCount += pending.length - index;
            break;
          }
          throw error;
        }
      }

      return result;
    });
  }

  /**
   * Push one clock event with the adapter's own retry loop.
   * Returns true without a remote call when it is already synced.
   */
  async syncTimeRecord(id: string, signal?: AbortSignal): Promise<boolean> {
    const record = await this.repository.getById(id);
    if (!record) return false;
    if (record.is_synced) return true;
    if (!this.canSync()) return false;

    try {
      const outcome = await this.syncWithRetry(record, signal);
      await this.recordOutcome(record.id, outcome.success, outcome.errorMessage);
      return outcome.success;
    } catch (error) {
      if (error instanceof AuthenticationError) throw error;
      if (!isCancellation(error)) {
        console.error(`${this.logTag} Failed to sync time record ${id}:`, error);
      }
      return false;
    }
  }

  async pushEntity(entityId: string, signal?: AbortSignal): Promise<boolean> {
    const record = await this.repository.getById(entityId);
    if (!record) return false;
    if (record.is_synced) return true;
    if (!this.canSync()) {
      throw new NetworkUnavailableError('Connection too weak for clock events');
    }

    await this.submit(record, signal);
    return true;
  }

  private canSync(): boolean {
    return this.network.isConnected && this.network.shouldAttemptOperation('ClockEvent');
  }

  private async syncWithRetry(record: TimeRecord, signal?: AbortSignal): Promise<RecordOutcome> {
    let lastError: string | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (attempt > 0) {
        await delay(this.initialDelayMs * Math.pow(2, attempt - 1), signal);
      }

      try {
        await this.submit(record, signal);
        return { success: true, errorMessage: null };
      } catch (error) {
        if (isNonRetryable(error)) throw error;
        lastError = getErrorMessage(error);
        console.warn(`${this.logTag} Attempt ${attempt + 1} for ${record.id} failed: ${lastError}`);
      }
    }

    return { success: false, errorMessage: lastError };
  }

  private async submit(record: TimeRecord, signal?: AbortSignal): Promise<void> {
    const response = await this.remote.post(
      REMOTE_ENDPOINTS.CLOCK,
      {
        type: record.type,
        timestamp: record.timestamp,
        location: { latitude: record.latitude, longitude: record.longitude },
      },
      { signal }
    );

    const remoteId = requireAcceptedId(response, 'Clock event');
    await this.repository.markSynced(record.id, remoteId);
  }
}
