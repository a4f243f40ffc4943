/**
 * Event Store — policy_events and the policy_event_details view
 *
 * CONTRACT:
 *   - All reads are ordered newest first (date DESC, id DESC)
 *   - Writes fill content_type with 政策 when not given
 *   - Errors are logged and rethrown as Error('Failed to ...')
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { selectAllPages } from '@/lib/supabase/paginate';
import { isRecord, readNumber, readString } from '@/lib/shared/type-guards';
import {
    DEFAULT_CONTENT_TYPE,
    EVENT_DETAIL_COLUMNS,
    toPolicyEventDetails,
    type NewPolicyEvent,
    type PolicyEventDetails,
} from './types';

const KEY_LOOKUP_CHUNK = 100;

// =============================================================================
// Reads
// =============================================================================

export async function listEventDetails(supabase: SupabaseClient): Promise<PolicyEventDetails[]> {
    return selectAllPages(
        'list policy events',
        (from, to) => supabase
            .from('policy_event_details')
            .select(EVENT_DETAIL_COLUMNS)
            .order('date', { ascending: false })
            .order('id', { ascending: false })
            .range(from, to),
        toPolicyEventDetails,
    );
}

export async function getEventDetails(
    supabase: SupabaseClient,
    id: number,
): Promise<PolicyEventDetails | null> {
    const { data, error } = await supabase
        .from('policy_event_details')
        .select(EVENT_DETAIL_COLUMNS)
        .eq('id', id)
        .maybeSingle();

    if (error) {
        console.error('[EventStore] getEventDetails error:', error);
        throw new Error(`Failed to load policy event ${id}: ${error.message}`);
    }

    return data ? toPolicyEventDetails(data) : null;
}

/**
 * Events with no analysis row, newest first
 */
export async function listUnanalyzedEvents(
    supabase: SupabaseClient,
    limit: number,
): Promise<PolicyEventDetails[]> {
    const { data, error } = await supabase
        .from('policy_event_details')
        .select(EVENT_DETAIL_COLUMNS)
        .is('analysis_id', null)
        .order('date', { ascending: false })
        .order('id', { ascending: false })
        .limit(limit);

    if (error) {
        console.error('[EventStore] listUnanalyzedEvents error:', error);
        throw new Error(`Failed to list unanalyzed events: ${error.message}`);
    }

    const rows: unknown[] = data ?? [];
    return rows.map(toPolicyEventDetails).filter((e): e is PolicyEventDetails => e !== null);
}

/**
 * Escape a value for use inside a PostgREST or-filter ilike pattern
 */
export function toIlikePattern(keyword: string): string {
    return `"%${keyword.replace(/["\\]/g, '').replace(/[%_]/g, '')}%"`;
}

/**
 * Events whose title or AI industries contain any keyword, newest first
 */
export async function searchEventsByKeywords(
    supabase: SupabaseClient,
    keywords: readonly string[],
    limit: number,
): Promise<PolicyEventDetails[]> {
    const terms = keywords.map(k => k.trim()).filter(k => k.length > 0);
    if (terms.length === 0) return [];

    const filter = terms
        .flatMap(term => {
            const pattern = toIlikePattern(term);
            return [`title.ilike.${pattern}`, `ai_industries_text.ilike.${pattern}`];
        })
        .join(',');

    const { data, error } = await supabase
        .from('policy_event_details')
        .select(EVENT_DETAIL_COLUMNS)
        .or(filter)
        .order('date', { ascending: false })
        .order('id', { ascending: false })
        .limit(limit);

    if (error) {
        console.error('[EventStore] searchEventsByKeywords error:', error);
        throw new Error(`Failed to search policy events: ${error.message}`);
    }

    const rows: unknown[] = data ?? [];
    return rows.map(toPolicyEventDetails).filter((e): e is PolicyEventDetails => e !== null);
}

export interface EventKey {
    title: string;
    date: string;
    source_url: string | null;
}

/**
 * Stored (title, date, source_url) triples for the given titles
 */
export async function findEventKeysByTitles(
    supabase: SupabaseClient,
    titles: readonly string[],
): Promise<EventKey[]> {
    const unique = [...new Set(titles)];
    const keys: EventKey[] = [];

    for (let i = 0; i < unique.length; i += KEY_LOOKUP_CHUNK) {
        const chunk = unique.slice(i, i + KEY_LOOKUP_CHUNK);
        const { data, error } = await supabase
            .from('policy_events')
            .select('title, date, source_url')
            .in('title', chunk);

        if (error) {
            console.error('[EventStore] findEventKeysByTitles error:', error);
            throw new Error(`Failed to look up existing events: ${error.message}`);
        }

        const rows: unknown[] = data ?? [];
        for (const row of rows) {
            if (!isRecord(row)) continue;
            const title = readString(row, 'title');
            const date = readString(row, 'date');
            if (title === null || date === null) continue;
            keys.push({ title, date, source_url: readString(row, 'source_url') });
        }
    }

    return keys;
}

// =============================================================================
// Writes
// =============================================================================

function toInsertRow(input: NewPolicyEvent): Record<string, string | null> {
    return {
        date: input.date,
        title: input.title,
        event_type: input.event_type ?? null,
        content: input.content ?? null,
        source_url: input.source_url ?? null,
        department: input.department ?? null,
        policy_level: input.policy_level ?? null,
        impact_level: input.impact_level ?? null,
        content_type: input.content_type || DEFAULT_CONTENT_TYPE,
        industries: input.industries ?? null,
        ai_analysis: input.ai_analysis ?? null,
    };
}

/**
 * Insert one event and return its id
 */
export async function insertEvent(supabase: SupabaseClient, input: NewPolicyEvent): Promise<number> {
    const { data, error } = await supabase
        .from('policy_events')
        .insert(toInsertRow(input))
        .select('id')
        .single();

    if (error) {
        console.error('[EventStore] insertEvent error:', error);
        throw new Error(`Failed to insert policy event: ${error.message}`);
    }

    const id = isRecord(data) ? readNumber(data, 'id') : null;
    if (id === null) {
        throw new Error('Failed to insert policy event: no id returned');
    }
    return id;
}

/**
 * Bulk insert; returns the number of rows written
 */
export async function insertEvents(supabase: SupabaseClient, inputs: readonly NewPolicyEvent[]): Promise<number> {
    if (inputs.length === 0) return 0;

    const { data, error } = await supabase
        .from('policy_events')
        .insert(inputs.map(toInsertRow))
        .select('id');

    if (error) {
        console.error('[EventStore] insertEvents error:', error);
        throw new Error(`Failed to insert policy events: ${error.message}`);
    }

    return Array.isArray(data) ? data.length : 0;
}

export async function deleteEventById(supabase: SupabaseClient, id: number): Promise<boolean> {
    const { data, error } = await supabase
        .from('policy_events')
        .delete()
        .eq('id', id)
        .select('id');

    if (error) {
        console.error('[EventStore] deleteEventById error:', error);
        throw new Error(`Failed to delete policy event ${id}: ${error.message}`);
    }

    return Array.isArray(data) && data.length > 0;
}

/**
 * Delete every event with exactly this title; returns the number deleted
 */
export async function deleteEventsByTitle(supabase: SupabaseClient, title: string): Promise<number> {
    const { data, error } = await supabase
        .from('policy_events')
        .delete()
        .eq('title', title)
        .select('id');

    if (error) {
        console.error('[EventStore] deleteEventsByTitle error:', error);
        throw new Error(`Failed to delete policy events: ${error.message}`);
    }

    return Array.isArray(data) ? data.length : 0;
}
