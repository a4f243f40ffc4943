/**
 * Service-role Supabase client shared by server components, API routes and
 * the CLI scripts. One instance per process; it bypasses RLS, so it never
 * reaches a client bundle.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { getSupabaseServerConfig } from '@/lib/config/env';

let serverClient: SupabaseClient | null = null;

/**
 * Throws ConfigError when SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY is unset.
 */
export function createServerSupabase(): SupabaseClient {
    if (serverClient) return serverClient;

    const { url, serviceRoleKey } = getSupabaseServerConfig();
    serverClient = createClient(url, serviceRoleKey, {
        auth: { persistSession: false, autoRefreshToken: false },
    });

    return serverClient;
}
