/**
 * PhotoSyncAdapter
 *
 * Multipart photo uploads behind a concurrency gate (3 at a time by default).
 * The transport reports no byte progress, so progress is simulated in fixed
 * steps up to 90% while a request is in flight and only reaches 100% once the
 * remote confirms the upload.
 *
 * A caller's signal only stops uploads from starting. An upload already sent
 * runs to completion unless `cancelUpload` aborts it.
 *
 * Per-photo state machine:
 *   Pending -> Uploading -> Completed | Failed | Cancelled
 *   Failed  -> Pending (retryFailedUploads) -> Uploading
 */

import { readFile } from 'node:fs/promises';
import type { Photo } from '@/lib/types';
import { REMOTE_ENDPOINTS, type MultipartPayload } from '../datasources/types';
import {
    AuthenticationError,
    getErrorMessage,
    isCancellation,
    NetworkUnavailableError,
} from '../errors';
import type { PhotosRepository } from '../repositories/PhotosRepository';
import {
    ENTITY_TYPES,
    SYNC_CONFIG,
    type PhotoProgressListener,
    type PhotoUploadProgress,
    type PhotoUploadState,
} from '../types';
import { abortable, delay, Semaphore } from '../utils/async';
import { BaseSyncAdapter, type SingleEntitySyncAdapter, type SyncAdapterDependencies } from './BaseSyncAdapter';
import { requireAcceptedId } from './schemas';

export type ImageReader = (photo: Photo) => Promise<Uint8Array>;

export interface PhotoSyncOptions {
  maxConcurrentUploads?: number;
  progressStepMs?: number;
  /** Loads the image bytes for a photo. Defaults to reading `file_path`. */
  readImage?: ImageReader;
}

const readImageFromDisk: ImageReader = (photo) => readFile(photo.file_path);

export class PhotoSyncAdapter
  extends BaseSyncAdapter<Photo, PhotosRepository>
  implements SingleEntitySyncAdapter
{
  readonly entityType = ENTITY_TYPES.PHOTO;

  private readonly progress: Map<string, PhotoUploadProgress> = new Map();
  private readonly controllers: Map<string, AbortController> = new Map();
  private readonly progressListeners: Set<PhotoProgressListener> = new Set();
  private readonly uploadSlots: Semaphore;
  private readonly progressStepMs: number;
  private readonly readImage: ImageReader;
  private isSyncingInner = false;
  private unsubscribeConnectivity: (() => void) | null = null;
  private reconnectRun: Promise<void> | null = null;

  constructor(deps: SyncAdapterDependencies<PhotosRepository>, options: PhotoSyncOptions = {}) {
    super(deps);
    this.uploadSlots = new Semaphore(options.maxConcurrentUploads ?? SYNC_CONFIG.MAX_CONCURRENT_UPLOADS);
    this.progressStepMs = options.progressStepMs ?? SYNC_CONFIG.PROGRESS_STEP_MS;
    this.readImage = options.readImage ?? readImageFromDisk;
  }

  /**
   * Upload every pending photo. Each upload starts only once it holds a slot.
   * Returns true only if all of them succeeded.
   */
  async syncPhotos(signal?: AbortSignal): Promise<boolean> {
    if (this.isSyncingInner) {
      console.warn(`${this.logTag} Photo sync already in progress, skipping`);
      return false;
    }
    if (!this.network.isConnected) {
      return false;
    }

    this.isSyncingInner = true;
    const uploads: Promise<boolean>[] = [];
    const authErrors: AuthenticationError[] = [];

    try {
      const pending = await this.repository.getPendingSync();
      this.notifyStatusListeners({ phase: 'Starting', completedCount: 0, totalCount: pending.length });

      for (const photo of pending) {
        this.setProgress(photo.id, 'Pending', 0);
      }

      let notStarted = 0;
      for (const [index, photo] of pending.entries()) {
        try {
          await this.uploadSlots.acquire(signal);
        } catch (error) {
          if (!isCancellation(error)) throw error;
          notStarted = pending.length - index;
          break;
        }

        uploads.push(
          this.uploadHoldingSlot(photo.id).catch((error: unknown) => {
            if (error instanceof AuthenticationError) {
              authErrors.push(error);
            }
            return false;
          })
        );
      }

      const results = await Promise.all(uploads);
      const [authError] = authErrors;
      if (authError) throw authError;

      const completed = results.filter(Boolean).length;
      const allSucceeded = notStarted === 0 && completed === pending.length;
      this.notifyStatusListeners({
        phase: allSucceeded ? 'Completed' : 'Failed',
        completedCount: completed,
        totalCount: pending.length,
      });

      if (notStarted > 0) {
        console.info(`${this.logTag} Photo sync cancelled, ${notStarted} upload(s) not started`);
      }
      return allSucceeded;
    } finally {
      this.isSyncingInner = false;
    }
  }

  /**
   * Upload one photo and record the outcome in the sync queue.
   * Returns false when offline, unknown, failed or cancelled.
   */
  async uploadPhoto(id: string, signal?: AbortSignal): Promise<boolean> {
    if (!this.network.isConnected) return false;

    try {
      await this.uploadSlots.acquire(signal);
    } catch (error) {
      if (isCancellation(error)) return false;
      throw error;
    }

    try {
      return await this.uploadHoldingSlot(id);
    } catch (error) {
      if (error instanceof AuthenticationError) throw error;
      return false;
    }
  }

  async pushEntity(entityId: string, signal?: AbortSignal): Promise<boolean> {
    if (!this.network.isConnected) {
      throw new NetworkUnavailableError();
    }

    await this.uploadSlots.acquire(signal);
    try {
      return await this.performUpload(entityId);
    } finally {
      this.uploadSlots.release();
    }
  }

  /**
   * Abort an in-flight upload. Returns false when the photo is not uploading.
   */
  cancelUpload(id: string): boolean {
    const controller = this.controllers.get(id);
    if (!controller) {
      return false;
    }

    controller.abort();
    this.setProgress(id, 'Cancelled', 0);
    return true;
  }

  /**
   * Reset every failed upload to Pending and upload it again.
   */
  async retryFailedUploads(signal?: AbortSignal): Promise<boolean> {
    const failedIds = [...this.progress.values()]
      .filter((entry) => entry.state === 'Failed')
      .map((entry) => entry.id);

    for (const id of failedIds) {
      this.setProgress(id, 'Pending', 0);
    }

    const results = await Promise.all(failedIds.map((id) => this.uploadPhoto(id, signal)));
    return results.every(Boolean);
  }

  /**
   * Sweep pending photos whenever connectivity returns on a link good enough
   * for uploads. Overlapping triggers are dropped.
   */
  startReconnectSync(): void {
    this.stopReconnectSync();
    this.unsubscribeConnectivity = this.network.onConnectivityChange((isConnected) => {
      if (isConnected && this.network.shouldAttemptOperation('PhotoUpload')) {
        this.runReconnectSync();
      }
    });
  }

  stopReconnectSync(): void {
    if (this.unsubscribeConnectivity) {
      this.unsubscribeConnectivity();
      this.unsubscribeConnectivity = null;
    }
  }

  async waitForReconnectSync(): Promise<void> {
    if (this.reconnectRun) {
      await this.reconnectRun;
    }
  }

  getUploadProgress(id: string): PhotoUploadProgress | null {
    const entry = this.progress.get(id);
    return entry ? { ...entry } : null;
  }

  getAllUploadProgress(): PhotoUploadProgress[] {
    return [...this.progress.values()].map((entry) => ({ ...entry }));
  }

  onUploadProgress(listener: PhotoProgressListener): () => void {
    this.progressListeners.add(listener);
    return () => this.progressListeners.delete(listener);
  }

  isSyncInProgress(): boolean {
    return this.isSyncingInner || this.controllers.size > 0;
  }

  get activeUploads(): number {
    return this.uploadSlots.inUse;
  }

  /**
   * Runs with a slot already acquired and always gives it back.
   */
  private runReconnectSync(): void {
    if (this.reconnectRun) return;

    this.reconnectRun = this.syncPhotos()
      .then(
        (ok) => {
          if (!ok) console.warn(`${this.logTag} Reconnect photo sync did not complete cleanly`);
        },
        (error: unknown) => {
          console.error(`${this.logTag} Reconnect photo sync failed:`, error);
        }
      )
      .finally(() => {
        this.reconnectRun = null;
      });
  }

  private async uploadHoldingSlot(id: string): Promise<boolean> {
    try {
      const success = await this.performUpload(id);
      await this.recordOutcome(id, success, success ? null : 'Photo not found');
      return success;
    } catch (error) {
      if (!isCancellation(error) && !(error instanceof NetworkUnavailableError) && !(error instanceof AuthenticationError)) {
        await this.recordOutcome(id, false, getErrorMessage(error));
      }
      throw error;
    } finally {
      this.uploadSlots.release();
    }
  }

  private async performUpload(id: string): Promise<boolean> {
    const photo = await this.repository.getById(id);
    if (!photo) {
      this.progress.delete(id);
      return false;
    }
    if (photo.is_synced) {
      this.setProgress(id, 'Completed', 100);
      return true;
    }

    const controller = new AbortController();
    this.controllers.get(id)?.abort();
    this.controllers.set(id, controller);

    this.setProgress(id, 'Uploading', 0);

    try {
      const payload = await this.buildPayload(photo);
      const data = await this.withSimulatedProgress(
        id,
        abortable(
          this.remote.postMultipart(REMOTE_ENDPOINTS.PHOTO_UPLOAD, payload, { signal: controller.signal }),
          controller.signal
        )
      );

      const remoteId = requireAcceptedId(data, 'Photo upload');
      await this.repository.markSynced(id, remoteId);
      await this.repository.updateSyncProgress(id, 100);
      this.setProgress(id, 'Completed', 100);
      return true;
    } catch (error) {
      if (isCancellation(error)) {
        this.setProgress(id, 'Cancelled', 0);
      } else {
        const message = `Upload failed: ${getErrorMessage(error)}`;
        console.error(`${this.logTag} ${message} (${id})`);
        this.setProgress(id, 'Failed', this.progress.get(id)?.percent ?? 0, message);
      }
      await this.repository.updateSyncProgress(id, this.progress.get(id)?.percent ?? 0);
      throw error;
    } finally {
      if (this.controllers.get(id) === controller) {
        this.controllers.delete(id);
      }
    }
  }

  private async buildPayload(photo: Photo): Promise<MultipartPayload> {
    const image = await this.readImage(photo);
    return {
      fields: {
        timestamp: photo.timestamp,
        latitude: String(photo.latitude),
        longitude: String(photo.longitude),
        userId: photo.user_id,
      },
      files: [
        {
          fieldName: 'image',
          fileName: `${photo.id}.jpg`,
          contentType: 'image/jpeg',
          data: image,
        },
      ],
    };
  }

  /**
   * Advance progress by fixed steps while `request` is pending.
   */
  private async withSimulatedProgress<T>(id: string, request: Promise<T>): Promise<T> {
    const ticker = new AbortController();

    const tick = async (): Promise<void> => {
      let percent = 0;
      while (percent < SYNC_CONFIG.PROGRESS_CAP_PERCENT) {
        try {
          await delay(this.progressStepMs, ticker.signal);
        } catch (error) {
          if (isCancellation(error)) return;
          throw error;
        }
        percent = Math.min(SYNC_CONFIG.PROGRESS_CAP_PERCENT, percent + SYNC_CONFIG.PROGRESS_STEP_PERCENT);
        if (this.progress.get(id)?.state !== 'Uploading') return;
        this.setProgress(id, 'Uploading', percent);
      }
    };

    const ticking = tick();
    try {
      return await request;
    } finally {
      ticker.abort();
      await ticking;
    }
  }

  private setProgress(id: string, state: PhotoUploadState, percent: number, errorMessage: string | null = null): void {
    const entry: PhotoUploadProgress = {
      id,
      state,
      percent: Math.min(100, Math.max(0, percent)),
      errorMessage,
    };
    this.progress.set(id, entry);

    for (const listener of this.progressListeners) {
      try {
        listener({ ...entry });
      } catch (error) {
        console.error('Error in photo progress listener:', error);
      }
    }
  }
}
