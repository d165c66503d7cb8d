import { createClient } from '@supabase/supabase-js';
import type { SupabaseClient } from '@supabase/supabase-js';

// ====================================================================================
// CONFIGURATION
// ====================================================================================

export interface SupabaseSettings {
    url: string;
    serviceRoleKey: string;
    /** Injected transport; tests route requests to an in-process stand-in */
    fetch?: typeof fetch;
}

/**
 * Server-side client: service role key, no session persistence
 */
export function createSupabaseClient(settings: SupabaseSettings): SupabaseClient {
    return createClient(settings.url, settings.serviceRoleKey, {
        auth: {
            persistSession: false,
            autoRefreshToken: false,
        },
        ...(settings.fetch ? { global: { fetch: settings.fetch } } : {}),
    });
}
