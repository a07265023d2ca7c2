/**
 * Supabase client construction.
 * Server-side only: uses the service role key and never persists a session.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from './config.js';

export function createSupabaseClient(config: AppConfig['supabase']): SupabaseClient {
  return createClient(config.url, config.serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
