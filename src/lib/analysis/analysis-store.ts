/**
 * Analysis Store — policy_analysis
 *
 * One row per policy (unique policy_id); saving replaces the previous result.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { isRecord, readNumber, readString, readStringArray } from '@/lib/shared/type-guards';
import {
    EVENT_DETAIL_COLUMNS,
    toPolicyEventDetails,
    type PolicyEventDetails,
} from '@/lib/events/types';
import {
    FAILED_MARKER,
    NO_INDUSTRY_MARKER,
    REANALYSIS_MARKERS,
    type AnalysisRecord,
    type AnalysisStatistics,
    type StoredAnalysis,
} from './types';

export function toStoredAnalysis(row: unknown): StoredAnalysis | null {
    if (!isRecord(row)) return null;
    const id = readNumber(row, 'id');
    const policyId = readNumber(row, 'policy_id');
    if (id === null || policyId === null) return null;

    return {
        id,
        policy_id: policyId,
        industries: readStringArray(row, 'industries'),
        analysis_summary: readString(row, 'analysis_summary'),
        confidence_score: readNumber(row, 'confidence_score'),
        content_quality: readString(row, 'content_quality') ?? 'title_only',
        full_content: readString(row, 'full_content'),
        created_at: readString(row, 'created_at'),
    };
}

export async function saveAnalysis(
    supabase: SupabaseClient,
    policyId: number,
    analysis: AnalysisRecord,
): Promise<void> {
    const { error } = await supabase
        .from('policy_analysis')
        .upsert(
            {
                policy_id: policyId,
                industries: analysis.industries,
                analysis_summary: analysis.analysis_summary,
                confidence_score: analysis.confidence_score,
                content_quality: analysis.content_quality,
                full_content: analysis.full_content,
                created_at: new Date().toISOString(),
            },
            { onConflict: 'policy_id' },
        );

    if (error) {
        console.error('[AnalysisStore] saveAnalysis error:', error);
        throw new Error(`Failed to save analysis for policy ${policyId}: ${error.message}`);
    }
}

export async function getAnalysis(supabase: SupabaseClient, policyId: number): Promise<StoredAnalysis | null> {
    const { data, error } = await supabase
        .from('policy_analysis')
        .select('id, policy_id, industries, analysis_summary, confidence_score, content_quality, full_content, created_at')
        .eq('policy_id', policyId)
        .maybeSingle();

    if (error) {
        console.error('[AnalysisStore] getAnalysis error:', error);
        throw new Error(`Failed to load analysis for policy ${policyId}: ${error.message}`);
    }

    return data ? toStoredAnalysis(data) : null;
}

/**
 * Events whose stored industries carry the failed or no-industry marker
 */
export async function listEventsNeedingReanalysis(
    supabase: SupabaseClient,
    limit: number,
): Promise<PolicyEventDetails[]> {
    const { data, error } = await supabase
        .from('policy_event_details')
        .select(EVENT_DETAIL_COLUMNS)
        .overlaps('ai_industries', [...REANALYSIS_MARKERS])
        .order('date', { ascending: false })
        .limit(limit);

    if (error) {
        console.error('[AnalysisStore] listEventsNeedingReanalysis error:', error);
        throw new Error(`Failed to list events needing reanalysis: ${error.message}`);
    }

    const rows: unknown[] = data ?? [];
    return rows.map(toPolicyEventDetails).filter((e): e is PolicyEventDetails => e !== null);
}

export interface EventWithStoredContent {
    event: PolicyEventDetails;
    fullContent: string;
}

/**
 * Analysed events that kept their fetched source text
 */
export async function listEventsWithStoredContent(
    supabase: SupabaseClient,
    limit: number,
): Promise<EventWithStoredContent[]> {
    const { data, error } = await supabase
        .from('policy_event_details')
        .select(`${EVENT_DETAIL_COLUMNS}, full_content`)
        .not('full_content', 'is', null)
        .neq('full_content', '')
        .order('date', { ascending: false })
        .limit(limit);

    if (error) {
        console.error('[AnalysisStore] listEventsWithStoredContent error:', error);
        throw new Error(`Failed to list events with stored content: ${error.message}`);
    }

    const rows: unknown[] = data ?? [];
    const results: EventWithStoredContent[] = [];
    for (const row of rows) {
        const event = toPolicyEventDetails(row);
        const fullContent = isRecord(row) ? readString(row, 'full_content') : null;
        if (event && fullContent) {
            results.push({ event, fullContent });
        }
    }
    return results;
}

// =============================================================================
// Statistics
// =============================================================================

export interface AnalysisCounts {
    totalPolicies: number;
    analyzed: number;
    failed: number;
    noIndustry: number;
    /** Rows carrying either marker */
    flagged: number;
    /** Rows with an empty industries array */
    empty: number;
}

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

export function computeAnalysisStatistics(counts: AnalysisCounts): AnalysisStatistics {
    const successful = Math.max(0, counts.analyzed - counts.flagged - counts.empty);

    return {
        total_policies: counts.totalPolicies,
        analyzed_policies: counts.analyzed,
        unanalyzed_policies: Math.max(0, counts.totalPolicies - counts.analyzed),
        successful_analysis: successful,
        failed_analysis: counts.failed,
        no_industry_analysis: counts.noIndustry,
        need_reanalysis: counts.failed + counts.noIndustry,
        analysis_rate: counts.totalPolicies > 0 ? round2((counts.analyzed / counts.totalPolicies) * 100) : 0,
        success_rate: counts.analyzed > 0 ? round2((successful / counts.analyzed) * 100) : 0,
    };
}

interface CountResult {
    count: number | null;
    error: { message: string } | null;
}

async function readCount(label: string, query: PromiseLike<CountResult>): Promise<number> {
    const { count, error } = await query;
    if (error) {
        console.error(`[AnalysisStore] count ${label} error:`, error);
        throw new Error(`Failed to count ${label}: ${error.message}`);
    }
    return count ?? 0;
}

export async function loadAnalysisCounts(supabase: SupabaseClient): Promise<AnalysisCounts> {
    const analysisCount = () => supabase.from('policy_analysis').select('id', { count: 'exact', head: true });

    const [totalPolicies, analyzed, failed, noIndustry, flagged, empty] = await Promise.all([
        readCount('policies', supabase.from('policy_events').select('id', { count: 'exact', head: true })),
        readCount('analyses', analysisCount()),
        readCount('failed analyses', analysisCount().contains('industries', [FAILED_MARKER])),
        readCount('no-industry analyses', analysisCount().contains('industries', [NO_INDUSTRY_MARKER])),
        readCount('flagged analyses', analysisCount().overlaps('industries', [...REANALYSIS_MARKERS])),
        readCount('empty analyses', analysisCount().eq('industries', '{}')),
    ]);

    return { totalPolicies, analyzed, failed, noIndustry, flagged, empty };
}

export async function getAnalysisStatistics(supabase: SupabaseClient): Promise<AnalysisStatistics> {
    return computeAnalysisStatistics(await loadAnalysisCounts(supabase));
}
