export { BaseRepository, SYNCABLE_COLUMNS, type RepositoryConfig } from './BaseRepository';
export { LocationsRepository, type NewLocationRecord } from './LocationsRepository';
export { PhotosRepository, type NewPhoto } from './PhotosRepository';
export { ReportsRepository, type NewReport } from './ReportsRepository';
export { TimeRecordsRepository, type NewTimeRecord } from './TimeRecordsRepository';
