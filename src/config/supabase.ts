import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { EnvironmentError, getEnvironmentConfig } from './env';
import { getLogger } from './logger';

let supabaseClient: SupabaseClient | null = null;

/**
 * Shared service-role client for ledger persistence
 */
export function getSupabaseClient(): SupabaseClient {
  if (supabaseClient) {
    return supabaseClient;
  }

  const config = getEnvironmentConfig();
  const logger = getLogger();

  if (!config.SUPABASE_URL || !config.SUPABASE_SERVICE_ROLE_KEY) {
    throw new EnvironmentError('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for ledger persistence');
  }

  // Service role key for server-side operations; no browser session
  supabaseClient = createClient(config.SUPABASE_URL, config.SUPABASE_SERVICE_ROLE_KEY, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });

  logger.info(
    { url: config.SUPABASE_URL, hasServiceKey: true },
    'Supabase client initialized successfully'
  );

  return supabaseClient;
}

export { SupabaseClient };
