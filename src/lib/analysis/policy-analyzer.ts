/**
 * Policy Analyzer
 *
 * Classifies policy events into affected industries with the chat model.
 *
 * CONTRACT:
 *   - Every model call waits on the shared rate limiter
 *   - A batch never has more than maxConcurrent analyses in flight
 *   - Results are saved as each analysis completes, not at the end
 *   - Provider errors and timeouts leave the event unprocessed
 *   - Unparseable replies are stored with the failed marker
 *
 * No retries: the next run picks unprocessed and failed events up again.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { chatCompletion } from '@/lib/ai/chat-client';
import { getGlobalRateLimiter } from '@/lib/ai/rate-limiter';
import { getSiliconFlowConfig } from '@/lib/config/env';
import { mapWithConcurrency } from '@/lib/shared/concurrency';
import { errorMessage } from '@/lib/shared/type-guards';
import { listUnanalyzedEvents } from '@/lib/events/event-store';
import type { PolicyEventDetails } from '@/lib/events/types';
import {
    getAnalysis,
    getAnalysisStatistics as loadAnalysisStatistics,
    listEventsNeedingReanalysis,
    listEventsWithStoredContent,
    saveAnalysis,
} from './analysis-store';
import { fetchPolicyContent } from './content-fetcher';
import { POLICY_SYSTEM_PROMPT, buildAnalysisPrompt, classifyContentQuality } from './prompts';
import { parseAnalysisResponse } from './response-parser';
import {
    FAILED_MARKER,
    REANALYSIS_MARKERS,
    type AnalysisRecord,
    type AnalysisStatistics,
    type AnalyzeOutcome,
    type BatchSummary,
    type PolicyInput,
    type StoredAnalysis,
} from './types';

export const BATCH_DEFAULTS = {
    limit: 20,
    maxConcurrent: 5,
    reanalyzeLimit: 50,
} as const;

const FAILED_SUMMARY = '分析失败: 无法解析AI响应';

export interface AnalyzePolicyOptions {
    /** Use this text instead of fetching source_url */
    storedContent?: string;
}

export function toPolicyInput(event: PolicyEventDetails): PolicyInput {
    return {
        id: event.id,
        title: event.title,
        content: event.content,
        event_type: event.event_type,
        source_url: event.source_url,
    };
}

async function resolveContent(policy: PolicyInput, opts: AnalyzePolicyOptions): Promise<string> {
    if (opts.storedContent !== undefined) return opts.storedContent;

    const fetched = policy.source_url ? await fetchPolicyContent(policy.source_url) : '';
    return fetched || policy.content || '';
}

/**
 * Analyze one policy. Throws only ConfigError when the model is not configured.
 */
export async function analyzePolicy(policy: PolicyInput, opts: AnalyzePolicyOptions = {}): Promise<AnalyzeOutcome> {
    const content = await resolveContent(policy, opts);
    const contentQuality = classifyContentQuality(content);
    const prompt = buildAnalysisPrompt({
        title: policy.title,
        content,
        eventType: policy.event_type,
        sourceUrl: policy.source_url,
    });

    await getGlobalRateLimiter().acquire();

    const result = await chatCompletion([
        { role: 'system', content: POLICY_SYSTEM_PROMPT },
        { role: 'user', content: prompt },
    ]);

    if (!result.success || !result.text) {
        const error = `${result.errorCode ?? 'UNKNOWN'}: ${result.error ?? 'no response'}`;
        console.warn(`[PolicyAnalyzer] Policy ${policy.id} left unprocessed (${error})`);
        return { ok: false, reason: 'api_error', error };
    }

    const parsed = parseAnalysisResponse(result.text);
    if (!parsed) {
        const analysis: AnalysisRecord = {
            industries: [FAILED_MARKER],
            analysis_summary: FAILED_SUMMARY,
            confidence_score: 0,
            impact_type: null,
            content_quality: contentQuality,
            full_content: content,
            analysis_status: 'failed',
        };
        return { ok: false, reason: 'parse_error', analysis };
    }

    return {
        ok: true,
        analysis: {
            ...parsed,
            content_quality: contentQuality,
            full_content: content,
            analysis_status: 'success',
        },
    };
}

// =============================================================================
// Batches
// =============================================================================

export interface BatchOptions {
    limit?: number;
    maxConcurrent?: number;
}

type ItemResult = 'analyzed' | 'failed' | 'skipped';

async function analyzeAndSave(
    supabase: SupabaseClient,
    policy: PolicyInput,
    opts: AnalyzePolicyOptions = {},
): Promise<{ result: ItemResult; analysis: AnalysisRecord | null }> {
    try {
        const outcome = await analyzePolicy(policy, opts);
        if (outcome.ok) {
            await saveAnalysis(supabase, policy.id, outcome.analysis);
            return { result: 'analyzed', analysis: outcome.analysis };
        }
        if (outcome.reason === 'parse_error') {
            await saveAnalysis(supabase, policy.id, outcome.analysis);
            return { result: 'failed', analysis: outcome.analysis };
        }
        return { result: 'skipped', analysis: null };
    } catch (error) {
        console.error(`[PolicyAnalyzer] Policy ${policy.id} error:`, errorMessage(error));
        return { result: 'skipped', analysis: null };
    }
}

function summarize(selected: number, results: readonly ItemResult[]): BatchSummary {
    return {
        selected,
        analyzed: results.filter(r => r === 'analyzed').length,
        failed: results.filter(r => r === 'failed').length,
        skipped: results.filter(r => r === 'skipped').length,
    };
}

/**
 * Analyze events that have no analysis row, newest first.
 */
export async function analyzeUnprocessedPolicies(
    supabase: SupabaseClient,
    opts: BatchOptions = {},
): Promise<BatchSummary> {
    const limit = opts.limit ?? BATCH_DEFAULTS.limit;
    const maxConcurrent = opts.maxConcurrent ?? BATCH_DEFAULTS.maxConcurrent;

    // Fail before selecting anything when the model is not configured
    getSiliconFlowConfig();

    const events = await listUnanalyzedEvents(supabase, limit);
    if (events.length === 0) {
        console.log('[PolicyAnalyzer] No unanalyzed policies');
        return { selected: 0, analyzed: 0, failed: 0, skipped: 0 };
    }

    console.log(`[PolicyAnalyzer] Analyzing ${events.length} policies (concurrency ${maxConcurrent})`);

    const results = await mapWithConcurrency(events, maxConcurrent, async event => {
        const { result } = await analyzeAndSave(supabase, toPolicyInput(event));
        return result;
    });

    const summary = summarize(events.length, results);
    console.log(
        `[PolicyAnalyzer] Batch done: ${summary.analyzed} analyzed, ${summary.failed} failed, ${summary.skipped} skipped`,
    );
    return summary;
}

function isImproved(analysis: AnalysisRecord | null): boolean {
    if (!analysis || analysis.industries.length === 0) return false;
    return !analysis.industries.some(industry => REANALYSIS_MARKERS.includes(industry));
}

/**
 * Re-run events whose stored industries carry a failed or no-industry marker.
 * Returns how many now have real industries.
 */
export async function analyzeFailedAndEmptyPolicies(
    supabase: SupabaseClient,
    opts: BatchOptions = {},
): Promise<number> {
    const limit = opts.limit ?? BATCH_DEFAULTS.reanalyzeLimit;
    const maxConcurrent = opts.maxConcurrent ?? 1;

    getSiliconFlowConfig();

    const events = await listEventsNeedingReanalysis(supabase, limit);
    console.log(`[PolicyAnalyzer] Reanalyzing ${events.length} failed or empty policies`);

    const improved = await mapWithConcurrency(events, maxConcurrent, async event => {
        const { analysis } = await analyzeAndSave(supabase, toPolicyInput(event));
        return isImproved(analysis);
    });

    const count = improved.filter(Boolean).length;
    console.log(`[PolicyAnalyzer] Reanalysis improved ${count}/${events.length}`);
    return count;
}

/**
 * Re-run analyses from their stored full_content without refetching.
 */
export async function reanalyzeStoredContent(
    supabase: SupabaseClient,
    opts: BatchOptions = {},
): Promise<BatchSummary> {
    const limit = opts.limit ?? BATCH_DEFAULTS.reanalyzeLimit;
    const maxConcurrent = opts.maxConcurrent ?? 1;

    getSiliconFlowConfig();

    const rows = await listEventsWithStoredContent(supabase, limit);
    console.log(`[PolicyAnalyzer] Reanalyzing ${rows.length} policies from stored content`);

    const results = await mapWithConcurrency(rows, maxConcurrent, async row => {
        const { result } = await analyzeAndSave(supabase, toPolicyInput(row.event), {
            storedContent: row.fullContent,
        });
        return result;
    });

    return summarize(rows.length, results);
}

export async function getAnalysisResult(supabase: SupabaseClient, policyId: number): Promise<StoredAnalysis | null> {
    return getAnalysis(supabase, policyId);
}

export async function getAnalysisStatistics(supabase: SupabaseClient): Promise<AnalysisStatistics> {
    return loadAnalysisStatistics(supabase);
}
