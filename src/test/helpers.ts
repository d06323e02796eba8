import { SqliteDatabase } from '@/lib/database';
import { runMigrations } from '@/lib/migrations';
import { LocationSyncAdapter } from '@/sync/adapters/LocationSyncAdapter';
import { PhotoSyncAdapter, type PhotoSyncOptions } from '@/sync/adapters/PhotoSyncAdapter';
import { ReportSyncAdapter, type ReportSyncOptions } from '@/sync/adapters/ReportSyncAdapter';
import { TimeRecordSyncAdapter, type TimeRecordSyncOptions } from '@/sync/adapters/TimeRecordSyncAdapter';
import type { JsonBody, MultipartPayload, RemoteClient, RequestOptions } from '@/sync/datasources/types';
import { NotFoundError } from '@/sync/errors';
import { LocationsRepository } from '@/sync/repositories/LocationsRepository';
import { PhotosRepository } from '@/sync/repositories/PhotosRepository';
import { ReportsRepository } from '@/sync/repositories/ReportsRepository';
import { TimeRecordsRepository } from '@/sync/repositories/TimeRecordsRepository';
import { NetworkMonitor } from '@/sync/services/NetworkMonitor';
import { SyncQueue } from '@/sync/services/SyncQueue';
import { SyncService, type SyncServiceOptions } from '@/sync/services/SyncService';
import type { ConnectionType } from '@/sync/types';
import { throwIfCancelled } from '@/sync/utils/async';

export const TEST_USER_ID = 'user-1';

export type FakeMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface RecordedCall {
  method: FakeMethod;
  endpoint: string;
  body: JsonBody | null;
  payload: MultipartPayload | null;
  signal: AbortSignal | undefined;
}

export type FakeHandler = (call: RecordedCall) => unknown;

/**
 * In-process RemoteClient. Every call is recorded; unhandled routes fail
 * with NotFoundError.
 */
export class FakeRemoteClient implements RemoteClient {
  readonly calls: RecordedCall[] = [];
  private readonly handlers: Map<string, FakeHandler> = new Map();

  on(method: FakeMethod, endpoint: string, handler: FakeHandler): this {
    this.handlers.set(`${method} ${endpoint}`, handler);
    return this;
  }

  callsTo(method: FakeMethod, endpoint: string): RecordedCall[] {
    return this.calls.filter((call) => call.method === method && call.endpoint === endpoint);
  }

  get(endpoint: string, options: RequestOptions = {}): Promise<unknown> {
    return this.handle({ method: 'GET', endpoint, body: null, payload: null, signal: options.signal });
  }

  post(endpoint: string, body: JsonBody, options: RequestOptions = {}): Promise<unknown> {
    return this.handle({ method: 'POST', endpoint, body, payload: null, signal: options.signal });
  }

  postMultipart(endpoint: string, payload: MultipartPayload, options: RequestOptions = {}): Promise<unknown> {
    return this.handle({ method: 'POST', endpoint, body: null, payload, signal: options.signal });
  }

  put(endpoint: string, body: JsonBody, options: RequestOptions = {}): Promise<unknown> {
    return this.handle({ method: 'PUT', endpoint, body, payload: null, signal: options.signal });
  }

  delete(endpoint: string, options: RequestOptions = {}): Promise<unknown> {
    return this.handle({ method: 'DELETE', endpoint, body: null, payload: null, signal: options.signal });
  }

  private async handle(call: RecordedCall): Promise<unknown> {
    throwIfCancelled(call.signal);
    this.calls.push(call);

    const handler = this.handlers.get(`${call.method} ${call.endpoint}`);
    if (!handler) {
      throw new NotFoundError(`No handler for ${call.method} ${call.endpoint}`, 404);
    }
    return handler(call);
  }
}

/**
 * A promise whose settlement the test controls.
 */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: unknown) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export interface TestContextOptions {
  connected?: boolean;
  connectionTypes?: ConnectionType[];
  timeRecordOptions?: TimeRecordSyncOptions;
  photoOptions?: PhotoSyncOptions;
  reportOptions?: ReportSyncOptions;
  serviceOptions?: SyncServiceOptions;
}

/**
 * A fully wired engine over an in-memory database and a fake remote.
 * Delays are shrunk so retry paths finish quickly on real timers.
 */
export async function createTestContext(options: TestContextOptions = {}) {
  const database = await SqliteDatabase.open();
  const migrationResult = await runMigrations(database);
  if (migrationResult.errors.length > 0) {
    throw new Error(migrationResult.errors.join('; '));
  }

  const remote = new FakeRemoteClient();
  const network = new NetworkMonitor({
    isConnected: options.connected ?? true,
    connectionTypes: options.connectionTypes ?? ['WiFi'],
  });
  const syncQueue = new SyncQueue(database);

  const repositories = {
    timeRecords: new TimeRecordsRepository(database, syncQueue),
    locations: new LocationsRepository(database, syncQueue),
    photos: new PhotosRepository(database, syncQueue),
    reports: new ReportsRepository(database, syncQueue),
  };

  const shared = { syncQueue, network, remote };
  const adapters = {
    timeRecords: new TimeRecordSyncAdapter(
      { ...shared, repository: repositories.timeRecords },
      { initialDelayMs: 1, ...options.timeRecordOptions }
    ),
    locations: new LocationSyncAdapter({ ...shared, repository: repositories.locations }),
    photos: new PhotoSyncAdapter(
      { ...shared, repository: repositories.photos },
      { progressStepMs: 5, readImage: async () => new Uint8Array([1, 2, 3]), ...options.photoOptions }
    ),
    reports: new ReportSyncAdapter({ ...shared, repository: repositories.reports }, options.reportOptions),
  };

  const service = new SyncService(
    { syncQueue, network, ...adapters },
    { retryBaseDelayMs: 1, connectivitySettleMs: 5, ...options.serviceOptions }
  );

  return { database, remote, network, syncQueue, repositories, adapters, service };
}

export type TestContext = Awaited<ReturnType<typeof createTestContext>>;

export function newTimeRecord(timestamp: string, type: 'ClockIn' | 'ClockOut' = 'ClockIn') {
  return { user_id: TEST_USER_ID, type, timestamp, latitude: 52.52, longitude: 13.405 };
}

export function newLocation(timestamp: string) {
  return { user_id: TEST_USER_ID, latitude: 48.85, longitude: 2.35, accuracy: 5, timestamp };
}

export function newPhoto(timestamp: string) {
  return { user_id: TEST_USER_ID, timestamp, latitude: 40.71, longitude: -74.0, file_path: `/photos/${timestamp}.jpg` };
}

export function newReport(text: string, timestamp: string = '2024-05-01T08:00:00.000Z') {
  return { user_id: TEST_USER_ID, text, timestamp, latitude: 51.5, longitude: -0.12 };
}

// Remote replies
export const accepted = (id: string) => ({ id, status: 'success' });
