/**
 * Supabase client factory.
 * Uses the service-role key: the engine runs server-side only.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from './config.js';
import { ConfigError } from './errors.js';

let client: SupabaseClient | null = null;

export function getSupabaseClient(config: AppConfig): SupabaseClient {
  if (client) return client;

  if (!config.supabase) {
    throw new ConfigError('SUPABASE_URL', 'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required');
  }

  client = createClient(config.supabase.url, config.supabase.serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return client;
}
