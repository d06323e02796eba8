/**
 * Sync Module Public API
 *
 * Offline-first synchronization for field records.
 *
 * Architecture:
 * - Local SQLite database is the source of truth for all reads
 * - Writes go to local first, then into the priority-ordered sync queue
 * - One adapter per entity type pushes records to the remote service
 * - SyncService orders, schedules and gates the adapters
 *
 * Usage:
 * 1. `createSyncEngine()` to open the database and wire everything up
 * 2. Capture records through the repositories
 * 3. Feed connectivity into the NetworkMonitor; call `syncAll()` or `scheduleSync()`
 */

// Types
export type {
    ClockEventType,
    ConnectionQuality,
    ConnectionType,
    ConnectivityListener,
    EntityType,
    LocationRecord,
    NetworkGate,
    NewSyncItem,
    OperationClass,
    Photo,
    PhotoProgressListener,
    PhotoUploadProgress,
    PhotoUploadState,
    Report,
    SyncableRecord,
    SyncAttempt,
    SyncGroupType,
    SyncPhase,
    SyncQueueItem,
    SyncResult,
    SyncStatusEvent,
    SyncStatusListener,
    TimeRecord
} from './types';

export {
    emptySyncResult,
    ENTITY_PRIORITIES,
    ENTITY_TYPES,
    getRetryDelay,
    isEntityType,
    mergeSyncResults,
    SYNC_CONFIG,
    SYNC_GROUP_ORDER
} from './types';

// Errors
export {
    AuthenticationError,
    CancelledError,
    errorForStatus,
    getErrorMessage,
    isCancellation,
    isNonRetryable,
    MalformedResponseError,
    NetworkUnavailableError,
    NotFoundError,
    RemoteRequestError,
    ServerError,
    SyncError
} from './errors';

// Services
export { classifyConnection, NetworkMonitor, type NetworkState } from './services/NetworkMonitor';
export { SyncQueue, type SyncQueueOptions } from './services/SyncQueue';
export { SyncService, type SyncServiceDependencies, type SyncServiceOptions } from './services/SyncService';

// Data Sources
export { LocalDataSource } from './datasources/LocalDataSource';
export { RemoteDataSource, type RemoteDataSourceOptions, type SupabaseTransport } from './datasources/RemoteDataSource';
export {
    REMOTE_ENDPOINTS,
    reportEndpoint,
    type JsonBody,
    type LocalDataSource as ILocalDataSource,
    type MultipartFile,
    type MultipartPayload,
    type RemoteClient,
    type RequestOptions,
    type Session,
    type SessionProvider,
    type SyncableRepository
} from './datasources/types';

// Repositories
export * from './repositories';

// Adapters
export * from './adapters';

// Engine
export { createSyncEngine, type SyncEngine, type SyncEngineOptions } from './engine';
