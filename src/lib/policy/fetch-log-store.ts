/**
 * Fetch Log — fetch_log
 *
 * One row per source recording the last collection attempt. A source is
 * skipped while its last success, or last error with a message, is more
 * recent than the minimum interval.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { isRecord, readString } from '@/lib/shared/type-guards';
import type { PolicySourceName } from './types';

export type FetchStatus = 'success' | 'error';

export interface FetchLogEntry {
    source_name: string;
    last_fetch_time: string | null;
    fetch_status: string | null;
    error_message: string | null;
}

export async function getLastFetch(supabase: SupabaseClient, source: PolicySourceName): Promise<FetchLogEntry | null> {
    const { data, error } = await supabase
        .from('fetch_log')
        .select('source_name, last_fetch_time, fetch_status, error_message')
        .eq('source_name', source)
        .maybeSingle();

    if (error) {
        console.error('[FetchLog] getLastFetch error:', error);
        throw new Error(`Failed to read fetch log for ${source}: ${error.message}`);
    }
    if (!isRecord(data)) return null;

    return {
        source_name: source,
        last_fetch_time: readString(data, 'last_fetch_time'),
        fetch_status: readString(data, 'fetch_status'),
        error_message: readString(data, 'error_message'),
    };
}

/**
 * Pure skip decision for a fetch-log entry
 */
export function isWithinFetchInterval(entry: FetchLogEntry | null, minIntervalMs: number, now: Date = new Date()): boolean {
    if (!entry || !entry.last_fetch_time) return false;

    const last = Date.parse(entry.last_fetch_time);
    if (Number.isNaN(last)) {
        console.warn(`[FetchLog] Unparseable last_fetch_time for ${entry.source_name}: ${entry.last_fetch_time}`);
        return false;
    }

    if (now.getTime() - last >= minIntervalMs) return false;
    if (entry.fetch_status === 'success') return true;
    return entry.fetch_status === 'error' && Boolean(entry.error_message);
}

export async function shouldSkipFetch(
    supabase: SupabaseClient,
    source: PolicySourceName,
    minIntervalMs: number,
    now: Date = new Date(),
): Promise<boolean> {
    const entry = await getLastFetch(supabase, source);
    const skip = isWithinFetchInterval(entry, minIntervalMs, now);
    if (skip) {
        console.log(`[FetchLog] Skipping ${source}: last ${entry?.fetch_status} at ${entry?.last_fetch_time}`);
    }
    return skip;
}

export async function recordFetchStatus(
    supabase: SupabaseClient,
    source: PolicySourceName,
    status: FetchStatus,
    recordsFetched: number = 0,
    errorMessage: string | null = null,
): Promise<void> {
    const now = new Date().toISOString();
    const { error } = await supabase
        .from('fetch_log')
        .upsert(
            {
                source_name: source,
                last_fetch_time: now,
                fetch_status: status,
                error_message: errorMessage,
                records_fetched: recordsFetched,
                updated_at: now,
            },
            { onConflict: 'source_name' },
        );

    if (error) {
        console.error('[FetchLog] recordFetchStatus error:', error);
        throw new Error(`Failed to record fetch status for ${source}: ${error.message}`);
    }
}
