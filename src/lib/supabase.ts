import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { loadConfig, validateSupabaseConfig, type AppConfig } from './config';

let supabaseClient: SupabaseClient | null = null;

/**
 * Get the Supabase client instance.
 * Returns null if Supabase is not configured (offline-only mode).
 */
export function getSupabase(config: AppConfig = loadConfig()): SupabaseClient | null {
  if (!validateSupabaseConfig(config)) {
    return null;
  }

  if (!supabaseClient && config.supabaseUrl && config.supabaseAnonKey) {
    supabaseClient = createClient(config.supabaseUrl, config.supabaseAnonKey, {
      auth: {
        // Sessions come from the host's SessionProvider, never from storage
        persistSession: false,
        autoRefreshToken: false,
      },
    });
  }

  return supabaseClient;
}

/**
 * Check if Supabase is available (configured).
 */
export function isSupabaseConfigured(config: AppConfig = loadConfig()): boolean {
  return validateSupabaseConfig(config);
}
