import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { EnvConfig } from './env';

// Service-role client for server-side ledger operations (bypasses RLS)
export function createSupabaseAdmin(config: Pick<EnvConfig, 'SUPABASE_URL' | 'SUPABASE_SERVICE_ROLE_KEY'>): SupabaseClient {
  return createClient(config.SUPABASE_URL, config.SUPABASE_SERVICE_ROLE_KEY, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}
