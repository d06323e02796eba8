/**
 * ReportSyncAdapter
 *
 * Activity reports are pushed one at a time in pages. A report the remote
 * accepts without an id is treated as a failure, since a later retry would
 * otherwise create a duplicate.
 */

import type { Report } from '@/lib/types';
import { REMOTE_ENDPOINTS, reportEndpoint } from '../datasources/types';
import {
    AuthenticationError,
    getErrorMessage,
    isCancellation,
    MalformedResponseError,
    NetworkUnavailableError,
    NotFoundError,
} from '../errors';
import type { ReportsRepository } from '../repositories/ReportsRepository';
import { emptySyncResult, ENTITY_TYPES, SYNC_CONFIG, type SyncResult } from '../types';
import { BaseSyncAdapter, type SingleEntitySyncAdapter, type SyncAdapterDependencies } from './BaseSyncAdapter';
import { parseResponse, reportResponseSchema } from './schemas';

export interface ReportSyncOptions {
  pageSize?: number;
}

export class ReportSyncAdapter
  extends BaseSyncAdapter<Report, ReportsRepository>
  implements SingleEntitySyncAdapter
{
  readonly entityType = ENTITY_TYPES.REPORT;

  private readonly pageSize: number;
  private isSyncingInner = false;

  constructor(deps: SyncAdapterDependencies<ReportsRepository>, options: ReportSyncOptions = {}) {
    super(deps);
    this.pageSize = options.pageSize ?? SYNC_CONFIG.REPORT_PAGE_SIZE;
  }

  isSyncInProgress(): boolean {
    return this.isSyncingInner;
  }

  /**
   * Push one report and record the outcome. Returns true without a remote
   * call when it is already synced.
   */
  async syncReport(id: string, signal?: AbortSignal): Promise<boolean> {
    if (!id) {
      throw new Error('Report id is required');
    }

    try {
      const success = await this.pushEntity(id, signal);
      if (success) {
        await this.recordOutcome(id, true);
      }
      return success;
    } catch (error) {
      if (error instanceof AuthenticationError) throw error;
      if (isCancellation(error) || error instanceof NetworkUnavailableError) {
        return false;
      }

      console.error(`${this.logTag} Failed to sync report ${id}:`, error);
      await this.recordOutcome(id, false, getErrorMessage(error));
      return false;
    }
  }

  async pushEntity(entityId: string, signal?: AbortSignal): Promise<boolean> {
    const report = await this.repository.getById(entityId);
    if (!report) return false;
    if (report.is_synced) return true;
    if (!this.network.isConnected) {
      throw new NetworkUnavailableError();
    }

    const data = await this.remote.post(
      REMOTE_ENDPOINTS.REPORTS,
      {
        text: report.text,
        timestamp: report.timestamp,
        location: { latitude: report.latitude, longitude: report.longitude },
      },
      { signal }
    );

    const response = parseResponse(reportResponseSchema, data, 'report');
    if (!response.id) {
      throw new MalformedResponseError('Report response is missing an id');
    }

    await this.repository.markSynced(report.id, response.id);
    return true;
  }

  /**
   * Sweep all pending reports page by page. Losing the link or a cancelled
   * signal ends the sweep; reports not yet confirmed are counted as pending.
   */
  async syncPending(signal?: AbortSignal): Promise<SyncResult> {
    const result = emptySyncResult();
    if (this.isSyncingInner) {
      console.warn(`${this.logTag} Report sync already in progress, skipping`);
      result.pendingCount = await this.repository.countPendingSync();
      return result;
    }

    this.isSyncingInner = true;
    try {
      const total = await this.repository.countPendingSync();
      if (!this.network.isConnected || !this.network.shouldAttemptOperation('ReportSync')) {
        result.pendingCount = total;
        return result;
      }

      // Failed reports stay pending, so page past them by offset
      const attempted = new Set<string>();
      let processed = 0;

      while (true) {
        const page = (await this.repository.getPendingSync(this.pageSize + attempted.size)).filter(
          (report) => !attempted.has(report.id)
        );
        if (page.length === 0) break;

        for (const report of page) {
          if (signal?.aborted) {
            result.pendingCount = total - processed;
            return result;
          }
          attempted.add(report.id);
          this.notifyStatusListeners({ phase: 'Syncing', completedCount: processed, totalCount: total });

          try {
            await this.pushEntity(report.id, signal);
            await this.recordOutcome(report.id, true);
            result.successCount++;
          } catch (error) {
            if (error instanceof AuthenticationError) throw error;
            if (isCancellation(error)) {
              result.pendingCount = total - processed;
              return result;
            }
            if (error instanceof NetworkUnavailableError) {
              result.pendingCount = await this.repository.countPendingSync();
              return result;
            }

            console.error(`${this.logTag} Failed to sync report ${report.id}:`, error);
            await this.recordOutcome(report.id, false, getErrorMessage(error));
            result.failureCount++;
          }
          processed++;
        }
      }

      return result;
    } finally {
      this.isSyncingInner = false;
    }
  }

  /**
   * Returns the number of reports synced by this sweep.
   */
  async syncReports(signal?: AbortSignal): Promise<number> {
    const result = await this.syncPending(signal);
    return result.successCount;
  }

  /**
   * Sweep again; reports that failed before are still pending.
   */
  async retryFailedSyncs(signal?: AbortSignal): Promise<number> {
    return this.syncReports(signal);
  }

  /**
   * Propagate a local deletion. A report that never reached the remote, or
   * that the remote no longer has, counts as deleted.
   */
  async syncDeletedReport(id: string, remoteId: string | null, signal?: AbortSignal): Promise<boolean> {
    if (!remoteId) {
      await this.syncQueue.removeSyncItem(this.entityType, id);
      return true;
    }
    if (!this.network.isConnected) {
      return false;
    }

    try {
      await this.remote.delete(reportEndpoint(remoteId), { signal });
    } catch (error) {
      if (error instanceof AuthenticationError) throw error;
      if (!(error instanceof NotFoundError)) {
        if (!isCancellation(error)) {
          console.error(`${this.logTag} Failed to delete report ${id} remotely:`, error);
        }
        return false;
      }
    }

    await this.syncQueue.removeSyncItem(this.entityType, id);
    return true;
  }
}
