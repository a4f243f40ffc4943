/**
 * Policy Event Types
 *
 * Field names follow the policy_events table and the policy_event_details
 * view; the same shapes are returned by the JSON API.
 */

import type { ChartEvent } from '@/lib/chart/types';
import { isRecord, readNumber, readString, readStringArray } from '@/lib/shared/type-guards';

// =============================================================================
// Types
// =============================================================================

export interface PolicyEvent {
    id: number;
    /** YYYY-MM-DD */
    date: string;
    title: string;
    event_type: string | null;
    content: string | null;
    source_url: string | null;
    department: string | null;
    policy_level: string | null;
    impact_level: string | null;
    content_type: string;
    created_at: string | null;
}

/** policy_events LEFT JOIN policy_analysis */
export interface PolicyEventDetails extends PolicyEvent {
    analysis_id: number | null;
    ai_industries: string[];
    ai_summary: string | null;
    ai_confidence: number | null;
    content_quality: string | null;
}

export interface NewPolicyEvent {
    date: string;
    title: string;
    event_type?: string | null;
    content?: string | null;
    source_url?: string | null;
    department?: string | null;
    policy_level?: string | null;
    impact_level?: string | null;
    content_type?: string | null;
    industries?: string | null;
    ai_analysis?: string | null;
}

export const DEFAULT_CONTENT_TYPE = '政策';

export const EVENT_DETAIL_COLUMNS =
    'id, date, title, event_type, content, source_url, department, policy_level, impact_level, content_type, created_at, analysis_id, ai_industries, ai_summary, ai_confidence, content_quality';

// =============================================================================
// Row mapping
// =============================================================================

export function toPolicyEvent(row: unknown): PolicyEvent | null {
    if (!isRecord(row)) return null;
    const id = readNumber(row, 'id');
    const date = readString(row, 'date');
    const title = readString(row, 'title');
    if (id === null || !date || title === null) return null;

    return {
        id,
        date,
        title,
        event_type: readString(row, 'event_type'),
        content: readString(row, 'content'),
        source_url: readString(row, 'source_url'),
        department: readString(row, 'department'),
        policy_level: readString(row, 'policy_level'),
        impact_level: readString(row, 'impact_level'),
        content_type: readString(row, 'content_type') ?? DEFAULT_CONTENT_TYPE,
        created_at: readString(row, 'created_at'),
    };
}

export function toPolicyEventDetails(row: unknown): PolicyEventDetails | null {
    const base = toPolicyEvent(row);
    if (!base || !isRecord(row)) return null;

    return {
        ...base,
        analysis_id: readNumber(row, 'analysis_id'),
        ai_industries: readStringArray(row, 'ai_industries'),
        ai_summary: readString(row, 'ai_summary'),
        ai_confidence: readNumber(row, 'ai_confidence'),
        content_quality: readString(row, 'content_quality'),
    };
}

export function toChartEvent(event: PolicyEvent): ChartEvent {
    return {
        id: String(event.id),
        date: event.date,
        title: event.title,
        sourceUrl: event.source_url,
    };
}
