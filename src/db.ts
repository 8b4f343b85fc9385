/**
 * Supabase client factory for the optional hosted result store.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseSettings {
  url: string;
  serviceRoleKey: string;
}

export function getSupabaseClient(settings: SupabaseSettings): SupabaseClient {
  return createClient(settings.url, settings.serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
