import { z } from 'zod';

// Environment variables read by the engine. Empty strings count as unset.
const envSchema = z.object({
  FIELD_SYNC_SUPABASE_URL: z.string().url().optional(),
  FIELD_SYNC_SUPABASE_ANON_KEY: z.string().min(1).optional(),
  FIELD_SYNC_DATABASE_PATH: z.string().min(1).optional(),
});

export interface AppConfig {
  supabaseUrl: string | null;
  supabaseAnonKey: string | null;
  databasePath: string | null;
}

const PLACEHOLDER_URL = 'https://your-project.supabase.co';
const PLACEHOLDER_ANON_KEY = 'your-anon-key';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('FIELD_SYNC_') && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  return {
    supabaseUrl: parsed.data.FIELD_SYNC_SUPABASE_URL ?? null,
    supabaseAnonKey: parsed.data.FIELD_SYNC_SUPABASE_ANON_KEY ?? null,
    databasePath: parsed.data.FIELD_SYNC_DATABASE_PATH ?? null,
  };
}

// Validate remote configuration
export function validateSupabaseConfig(config: AppConfig): boolean {
  if (!config.supabaseUrl || config.supabaseUrl === PLACEHOLDER_URL) {
    console.warn('Supabase URL not configured. Remote sync will be disabled.');
    return false;
  }
  if (!config.supabaseAnonKey || config.supabaseAnonKey === PLACEHOLDER_ANON_KEY) {
    console.warn('Supabase anon key not configured. Remote sync will be disabled.');
    return false;
  }
  return true;
}
