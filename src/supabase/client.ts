/**
 * Supabase Client Factory
 *
 * Server-side and CLI hosts have no localStorage, so sessions are not
 * persisted; callers that need an authenticated client create and sign in
 * their own and pass it to the engine.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { debugLog } from '../debug';

export interface SupabaseConnectionConfig {
  url: string;
  anonKey: string;
  /** Application prefix used in the `x-client-info` header. */
  prefix?: string;
  /** Custom fetch implementation (proxies, tests). */
  fetch?: typeof fetch;
}

export function createSupabaseClient(config: SupabaseConnectionConfig): SupabaseClient {
  const prefix = config.prefix ?? 'tidewater';

  const client = createClient(config.url, config.anonKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
      detectSessionInUrl: false,
      storageKey: `${prefix}-auth`
    },
    global: {
      headers: {
        'x-client-info': `${prefix}-node`
      },
      fetch: config.fetch
    }
  });

  debugLog(`[Supabase] Client created for ${config.url}`);
  return client;
}
