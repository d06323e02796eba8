export {
    BaseSyncAdapter,
    type EntitySyncAdapter,
    type SingleEntitySyncAdapter,
    type SyncAdapterDependencies
} from './BaseSyncAdapter';
export { LocationSyncAdapter } from './LocationSyncAdapter';
export { PhotoSyncAdapter, type ImageReader, type PhotoSyncOptions } from './PhotoSyncAdapter';
export { ReportSyncAdapter, type ReportSyncOptions } from './ReportSyncAdapter';
export { TimeRecordSyncAdapter, type TimeRecordSyncOptions } from './TimeRecordSyncAdapter';
