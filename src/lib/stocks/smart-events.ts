/**
 * Smart event selection for the chart page
 *
 * Broad-market indices see every event. Other securities see events related
 * to their industries, falling back to every event when there is nothing
 * to match on.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { listEventDetails, searchEventsByKeywords } from '@/lib/events/event-store';
import type { PolicyEventDetails } from '@/lib/events/types';
import { errorMessage } from '@/lib/shared/type-guards';
import { getOrAnalyzeStockIndustry } from './industry-analyzer';
import { getStockName } from './stock-names';
import { isMajorIndex, toTsCode } from './stock-type';

export const RELATED_POLICY_LIMIT = 100;

export async function getRelatedPolicies(
    supabase: SupabaseClient,
    industries: readonly string[],
    limit: number = RELATED_POLICY_LIMIT,
): Promise<PolicyEventDetails[]> {
    if (industries.length === 0) return [];

    const events = await searchEventsByKeywords(supabase, industries, limit);
    console.log(`[SmartEvents] ${events.length} policies related to ${industries.join(', ')}`);
    return events;
}

export async function getSmartEventsForStock(
    supabase: SupabaseClient,
    stockCode: string,
): Promise<PolicyEventDetails[]> {
    const tsCode = toTsCode(stockCode);

    if (isMajorIndex(tsCode)) {
        return listEventDetails(supabase);
    }

    try {
        const stockName = (await getStockName(supabase, tsCode)) ?? '';
        const industry = await getOrAnalyzeStockIndustry(supabase, tsCode, stockName);

        if (!industry || industry.industries.length === 0) {
            console.log(`[SmartEvents] No industries for ${tsCode}, showing all events`);
            return listEventDetails(supabase);
        }

        const related = await getRelatedPolicies(supabase, industry.industries);
        if (related.length === 0) {
            console.log(`[SmartEvents] No related events for ${tsCode}, showing all events`);
            return listEventDetails(supabase);
        }

        return related;
    } catch (error) {
        console.error(`[SmartEvents] ${tsCode} falling back to all events:`, errorMessage(error));
        return listEventDetails(supabase);
    }
}

/**
 * Policies related to the security's cached or analysed industries
 */
export async function getPoliciesByStock(
    supabase: SupabaseClient,
    stockCode: string,
): Promise<PolicyEventDetails[]> {
    const tsCode = toTsCode(stockCode);
    const stockName = (await getStockName(supabase, tsCode)) ?? '';
    const industry = await getOrAnalyzeStockIndustry(supabase, tsCode, stockName);
    if (!industry) return [];
    return getRelatedPolicies(supabase, industry.industries);
}
