/**
 * Data Statistics for the data viewer
 *
 * Aggregates are computed in process from the event detail rows.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { PolicyEventDetails } from './types';
import { listEventDetails } from './event-store';
import { isoDayToUtcMs } from '@/lib/kline/candles';
import { DAY_MS } from '@/lib/chart/kline-dates';

// =============================================================================
// Types
// =============================================================================

export interface EventTypeStat {
    type: string;
    type_display: string;
    count: number;
    percentage: number;
    latest_date: string;
}

export interface DataQuality {
    completeness: number;
    avg_events_per_month: number;
    unique_dates: number;
    max_events_per_day: number;
    empty_industries_count: number;
}

export interface DataStatistics {
    total_events: number;
    event_types_count: number;
    date_range_days: number;
    latest_event_date: string;
    event_type_stats: EventTypeStat[];
    data_quality: DataQuality;
}

export type StatisticsRow = Pick<PolicyEventDetails, 'date' | 'event_type' | 'ai_industries'>;

const TYPE_DISPLAY: Record<string, string> = {
    custom: '自定义',
    policy: '政策',
    economic: '经济',
    regulation: '法规',
    notice: '通知',
    announcement: '公告',
};

export const NO_DATA = 'No data';
const UNTYPED = '(none)';

// =============================================================================
// Aggregation
// =============================================================================

function round1(value: number): number {
    return Math.round(value * 10) / 10;
}

export function computeDataStatistics(rows: readonly StatisticsRow[]): DataStatistics {
    const total = rows.length;

    const byType = new Map<string, { count: number; latest: string }>();
    const byDate = new Map<string, number>();
    let minDate: string | null = null;
    let maxDate: string | null = null;
    let emptyIndustries = 0;

    for (const row of rows) {
        const type = row.event_type ?? UNTYPED;
        const entry = byType.get(type);
        if (entry) {
            entry.count++;
            if (row.date > entry.latest) entry.latest = row.date;
        } else {
            byType.set(type, { count: 1, latest: row.date });
        }

        byDate.set(row.date, (byDate.get(row.date) ?? 0) + 1);
        if (minDate === null || row.date < minDate) minDate = row.date;
        if (maxDate === null || row.date > maxDate) maxDate = row.date;
        if (row.ai_industries.length === 0) emptyIndustries++;
    }

    const dateRangeDays = minDate !== null && maxDate !== null
        ? Math.round((isoDayToUtcMs(maxDate) - isoDayToUtcMs(minDate)) / DAY_MS)
        : 0;

    const eventTypeStats: EventTypeStat[] = [...byType.entries()]
        .sort((a, b) => b[1].count - a[1].count)
        .map(([type, { count, latest }]) => ({
            type,
            type_display: TYPE_DISPLAY[type] ?? type,
            count,
            percentage: total > 0 ? (count / total) * 100 : 0,
            latest_date: latest,
        }));

    const avgPerMonth = minDate !== null ? round1(total / Math.max(1, dateRangeDays / 30)) : 0;

    return {
        total_events: total,
        event_types_count: byType.size,
        date_range_days: dateRangeDays,
        latest_event_date: maxDate ?? NO_DATA,
        event_type_stats: eventTypeStats,
        data_quality: {
            completeness: total > 0 ? 100 : 0,
            avg_events_per_month: avgPerMonth,
            unique_dates: byDate.size,
            max_events_per_day: byDate.size > 0 ? Math.max(...byDate.values()) : 0,
            empty_industries_count: emptyIndustries,
        },
    };
}

export async function getDataStatistics(supabase: SupabaseClient): Promise<DataStatistics> {
    const rows = await listEventDetails(supabase);
    return computeDataStatistics(rows);
}
