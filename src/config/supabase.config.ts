import { SupabaseClient, createClient } from '@supabase/supabase-js';
import { Settings } from './settings';

export const createSupabaseClient = (
  settings: Pick<Settings, 'supabaseUrl' | 'supabaseServiceKey'>,
  fetchImpl?: typeof fetch
): SupabaseClient => {
  const { supabaseUrl, supabaseServiceKey } = settings;
  if (!supabaseUrl || !supabaseServiceKey) {
    throw new Error('Supabase URL and service key must be configured');
  }

  return createClient(supabaseUrl, supabaseServiceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
    ...(fetchImpl && { global: { fetch: fetchImpl } }),
  });
};
