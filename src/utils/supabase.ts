import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { config } from '../config';
import { ConfigurationError } from './errors';

let client: SupabaseClient | null = null;

/**
 * Service-role client for the case store, created on first use so that commands
 * which never touch the store do not need credentials.
 */
export function getSupabaseClient(): SupabaseClient {
  if (client) return client;

  if (!config.supabase.url || !config.supabase.serviceKey) {
    throw new ConfigurationError('SUPABASE_URL and SUPABASE_SERVICE_KEY are required to write case records');
  }

  client = createClient(config.supabase.url, config.supabase.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
  return client;
}
