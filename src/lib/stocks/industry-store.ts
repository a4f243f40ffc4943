/**
 * Industry Store — stock_industry_mapping
 *
 * Keyed by normalized ts_code. Saving replaces the cached row.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { isRecord, readNumber, readString, readStringArray } from '@/lib/shared/type-guards';
import type { IndustryAnalysis, StockIndustry } from './types';

const COLUMNS = 'stock_code, stock_name, industries, analysis_summary, confidence_score, updated_at';

export function toStockIndustry(row: unknown): StockIndustry | null {
    if (!isRecord(row)) return null;
    const stockCode = readString(row, 'stock_code');
    if (!stockCode) return null;

    return {
        stock_code: stockCode,
        stock_name: readString(row, 'stock_name'),
        industries: readStringArray(row, 'industries'),
        analysis_summary: readString(row, 'analysis_summary'),
        confidence_score: readNumber(row, 'confidence_score'),
        updated_at: readString(row, 'updated_at'),
    };
}

export async function getStockIndustry(supabase: SupabaseClient, stockCode: string): Promise<StockIndustry | null> {
    const { data, error } = await supabase
        .from('stock_industry_mapping')
        .select(COLUMNS)
        .eq('stock_code', stockCode)
        .maybeSingle();

    if (error) {
        console.error('[IndustryStore] getStockIndustry error:', error);
        throw new Error(`Failed to load industry for ${stockCode}: ${error.message}`);
    }

    return data ? toStockIndustry(data) : null;
}

export async function saveStockIndustry(
    supabase: SupabaseClient,
    stockCode: string,
    stockName: string,
    analysis: IndustryAnalysis,
): Promise<StockIndustry> {
    const row = {
        stock_code: stockCode,
        stock_name: stockName || null,
        industries: analysis.industries,
        analysis_summary: analysis.analysis_summary,
        confidence_score: analysis.confidence_score,
        updated_at: new Date().toISOString(),
    };

    const { error } = await supabase
        .from('stock_industry_mapping')
        .upsert(row, { onConflict: 'stock_code' });

    if (error) {
        console.error('[IndustryStore] saveStockIndustry error:', error);
        throw new Error(`Failed to save industry for ${stockCode}: ${error.message}`);
    }

    return row;
}

export async function deleteStockIndustry(supabase: SupabaseClient, stockCode: string): Promise<void> {
    const { error } = await supabase
        .from('stock_industry_mapping')
        .delete()
        .eq('stock_code', stockCode);

    if (error) {
        console.error('[IndustryStore] deleteStockIndustry error:', error);
        throw new Error(`Failed to delete industry for ${stockCode}: ${error.message}`);
    }
}
