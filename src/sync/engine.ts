/**
 * Wires the database, queue, repositories, adapters and orchestrator into
 * one engine. Every collaborator can be overridden; by default the database
 * comes from FIELD_SYNC_DATABASE_PATH and the remote from Supabase.
 */

import type { AppConfig } from '@/lib/config';
import { getDatabase, type DatabaseInterface } from '@/lib/database';
import { runMigrations, type Migration } from '@/lib/migrations';
import { getSupabase } from '@/lib/supabase';
import { LocationSyncAdapter } from './adapters/LocationSyncAdapter';
import { PhotoSyncAdapter, type PhotoSyncOptions } from './adapters/PhotoSyncAdapter';
import { ReportSyncAdapter, type ReportSyncOptions } from './adapters/ReportSyncAdapter';
import { TimeRecordSyncAdapter, type TimeRecordSyncOptions } from './adapters/TimeRecordSyncAdapter';
import { RemoteDataSource, type RemoteDataSourceOptions } from './datasources/RemoteDataSource';
import type { RemoteClient, SessionProvider } from './datasources/types';
import { LocationsRepository } from './repositories/LocationsRepository';
import { PhotosRepository } from './repositories/PhotosRepository';
import { ReportsRepository } from './repositories/ReportsRepository';
import { TimeRecordsRepository } from './repositories/TimeRecordsRepository';
import { NetworkMonitor } from './services/NetworkMonitor';
import { SyncQueue, type SyncQueueOptions } from './services/SyncQueue';
import { SyncService, type SyncServiceOptions } from './services/SyncService';

export interface SyncEngineOptions {
  database?: DatabaseInterface;
  migrations?: Migration[];
  /** Used when no `remote` is given. */
  config?: AppConfig;
  sessionProvider?: SessionProvider | null;
  remote?: RemoteClient;
  network?: NetworkMonitor;
  remoteOptions?: RemoteDataSourceOptions;
  queueOptions?: SyncQueueOptions;
  timeRecordOptions?: TimeRecordSyncOptions;
  photoOptions?: PhotoSyncOptions;
  reportOptions?: ReportSyncOptions;
  serviceOptions?: SyncServiceOptions;
}

export interface SyncEngine {
  database: DatabaseInterface;
  syncQueue: SyncQueue;
  network: NetworkMonitor;
  remote: RemoteClient;
  repositories: {
    timeRecords: TimeRecordsRepository;
    locations: LocationsRepository;
    photos: PhotosRepository;
    reports: ReportsRepository;
  };
  adapters: {
    timeRecords: TimeRecordSyncAdapter;
    locations: LocationSyncAdapter;
    photos: PhotoSyncAdapter;
    reports: ReportSyncAdapter;
  };
  syncService: SyncService;
}

/**
 * Build and initialize an engine. Migrations run before anything reads the database.
 */
export async function createSyncEngine(options: SyncEngineOptions = {}): Promise<SyncEngine> {
  const database = options.database ?? (await getDatabase());

  const migrationResult = await runMigrations(database, options.migrations);
  if (migrationResult.errors.length > 0) {
    throw new Error(`Database migration failed: ${migrationResult.errors.join('; ')}`);
  }

  const remote =
    options.remote ?? createRemoteClient(options.sessionProvider ?? null, options.config, options.remoteOptions);
  const network = options.network ?? new NetworkMonitor();
  const syncQueue = new SyncQueue(database, options.queueOptions);

  const repositories = {
    timeRecords: new TimeRecordsRepository(database, syncQueue),
    locations: new LocationsRepository(database, syncQueue),
    photos: new PhotosRepository(database, syncQueue),
    reports: new ReportsRepository(database, syncQueue),
  };

  const shared = { syncQueue, network, remote };
  const adapters = {
    timeRecords: new TimeRecordSyncAdapter({ ...shared, repository: repositories.timeRecords }, options.timeRecordOptions),
    locations: new LocationSyncAdapter({ ...shared, repository: repositories.locations }),
    photos: new PhotoSyncAdapter({ ...shared, repository: repositories.photos }, options.photoOptions),
    reports: new ReportSyncAdapter({ ...shared, repository: repositories.reports }, options.reportOptions),
  };

  const syncService = new SyncService({ syncQueue, network, ...adapters }, options.serviceOptions);
  await syncService.initialize();

  return { database, syncQueue, network, remote, repositories, adapters, syncService };
}

function createRemoteClient(
  sessionProvider: SessionProvider | null,
  config: AppConfig | undefined,
  remoteOptions: RemoteDataSourceOptions | undefined
): RemoteClient {
  const supabase = getSupabase(config);
  if (!supabase) {
    throw new Error(
      'Remote sync is not configured: set FIELD_SYNC_SUPABASE_URL and FIELD_SYNC_SUPABASE_ANON_KEY or pass a remote client'
    );
  }
  return new RemoteDataSource(supabase, sessionProvider, remoteOptions);
}
