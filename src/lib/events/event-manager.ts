/**
 * Event Manager — manual event maintenance
 *
 * Single-event creation, CSV bulk import, deletion and the CSV template.
 *
 * CONTRACT:
 *   - date (YYYY-MM-DD) and title are required for every event
 *   - CSV row numbers count the header as row 1, so data starts at row 2
 *   - Valid rows are inserted in one batch; invalid rows are reported and skipped
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { NewPolicyEvent } from './types';
import { parseCsvRecords, formatCsv } from './csv';
import { insertEvent, insertEvents, deleteEventById, deleteEventsByTitle } from './event-store';

// =============================================================================
// Types
// =============================================================================

export interface ManagerResult {
    success: boolean;
    message: string;
}

export interface CreateEventResult extends ManagerResult {
    id?: number;
}

export interface ImportResult extends ManagerResult {
    successCount: number;
    errorCount: number;
    errors: string[];
}

export interface DeleteByTitleResult extends ManagerResult {
    deletedCount: number;
}

export const TEMPLATE_HEADERS = [
    'date',
    'title',
    'source_url',
    'content_type',
    'event_type',
    'department',
    'policy_level',
    'impact_level',
    'industries',
    'content',
    'ai_analysis',
] as const;

export const TEMPLATE_FILENAME = 'event_import_template.csv';

const TEMPLATE_EXAMPLE: Record<string, string> = {
    date: '2024-01-15',
    title: '示例政策事件',
    source_url: 'https://example.com/policy-document',
    content_type: '政策文件',
    event_type: '货币政策',
    department: '央行',
    policy_level: '国家级',
    impact_level: '重大',
    industries: '银行,保险',
    content: '这是一个示例政策内容',
    ai_analysis: '这是AI分析结果',
};

// =============================================================================
// Validation
// =============================================================================

export function isIsoDate(value: string): boolean {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
    const parsed = new Date(`${value}T00:00:00Z`);
    return !isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

function optional(value: unknown): string | null {
    if (typeof value !== 'string') return null;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}

/**
 * Validate loose input into a NewPolicyEvent, or return an error message
 */
export function toNewEvent(input: Record<string, unknown>): { event: NewPolicyEvent } | { error: string } {
    const date = optional(input.date);
    const title = optional(input.title);

    if (!date || !title) {
        return { error: 'date and title are required' };
    }
    if (!isIsoDate(date)) {
        return { error: `invalid date "${date}" (expected YYYY-MM-DD)` };
    }

    return {
        event: {
            date,
            title,
            source_url: optional(input.source_url),
            content_type: optional(input.content_type),
            event_type: optional(input.event_type),
            department: optional(input.department),
            policy_level: optional(input.policy_level),
            impact_level: optional(input.impact_level),
            industries: optional(input.industries),
            content: optional(input.content),
            ai_analysis: optional(input.ai_analysis),
        },
    };
}

// =============================================================================
// Operations
// =============================================================================

export async function createSingleEvent(
    supabase: SupabaseClient,
    input: Record<string, unknown>,
): Promise<CreateEventResult> {
    const validated = toNewEvent(input);
    if ('error' in validated) {
        return { success: false, message: validated.error };
    }

    const id = await insertEvent(supabase, validated.event);
    console.log(`[EventManager] Created event ${id}: ${validated.event.title}`);
    return { success: true, message: 'Event created', id };
}

export async function importEventsFromCsv(
    supabase: SupabaseClient,
    csvText: string,
): Promise<ImportResult> {
    const records = parseCsvRecords(csvText);
    const valid: NewPolicyEvent[] = [];
    const errors: string[] = [];

    for (const record of records) {
        const validated = toNewEvent(record.values);
        if ('error' in validated) {
            errors.push(`Row ${record.line}: ${validated.error}`);
        } else {
            valid.push(validated.event);
        }
    }

    const successCount = await insertEvents(supabase, valid);
    const errorCount = errors.length;
    console.log(`[EventManager] CSV import: ${successCount} imported, ${errorCount} rejected`);

    return {
        success: true,
        message: `Import finished: ${successCount} succeeded, ${errorCount} failed`,
        successCount,
        errorCount,
        errors,
    };
}

export async function deleteEvent(supabase: SupabaseClient, id: number): Promise<ManagerResult> {
    const deleted = await deleteEventById(supabase, id);
    return deleted
        ? { success: true, message: 'Event deleted' }
        : { success: false, message: `Event ${id} not found` };
}

export async function deleteEventByTitle(supabase: SupabaseClient, title: string): Promise<DeleteByTitleResult> {
    const trimmed = title.trim();
    if (!trimmed) {
        return { success: false, message: 'Event title is required', deletedCount: 0 };
    }

    const deletedCount = await deleteEventsByTitle(supabase, trimmed);
    if (deletedCount === 0) {
        return { success: false, message: `No event titled "${trimmed}" found`, deletedCount };
    }

    console.log(`[EventManager] Deleted ${deletedCount} event(s) titled "${trimmed}"`);
    return { success: true, message: `Deleted ${deletedCount} event(s) titled "${trimmed}"`, deletedCount };
}

export function getCsvTemplate(): string {
    return formatCsv(TEMPLATE_HEADERS, [TEMPLATE_EXAMPLE]);
}
