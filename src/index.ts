export * from './sync';
export { loadConfig, validateSupabaseConfig, type AppConfig } from './lib/config';
export { closeDatabase, getDatabase, SqliteDatabase, type DatabaseInterface, type SqlParam } from './lib/database';
export { checkMigrations, loadMigrations, runMigrations, type Migration } from './lib/migrations';
export { getSupabase, isSupabaseConfigured } from './lib/supabase';
