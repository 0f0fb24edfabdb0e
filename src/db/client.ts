/**
 * Pricewise — Supabase Client
 *
 * The service-role client used by the Supabase product store. Created on
 * demand from config, so importing this module never requires credentials.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from '../lib/config';
import { ConfigError, StoreError } from '../lib/errors';

/**
 * Create the admin client. Bypasses Row Level Security; server-side only.
 */
export function createSupabaseClient(config: AppConfig): SupabaseClient {
  if (!config.supabase) {
    throw new ConfigError('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the database store');
  }

  return createClient(config.supabase.url, config.supabase.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}

/**
 * Handle Supabase errors consistently
 */
export function handleSupabaseError(error: { message: string; code?: string }): StoreError {
  return new StoreError(
    `Supabase error: ${error.message}${error.code ? ` (code: ${error.code})` : ''}`
  );
}

/** PostgREST code for `.single()` matching no rows. */
export const NO_ROWS = 'PGRST116';
