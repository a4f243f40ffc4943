/**
 * Security display names
 *
 * Lookup order: bundled name table → cached industry row → TuShare basic info.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { isTushareConfigured } from '@/lib/config/env';
import { fetchSecurityName } from '@/lib/kline/tushare-client';
import { errorMessage } from '@/lib/shared/type-guards';
import stockNames from './data/stock-names.json';
import { getStockIndustry } from './industry-store';
import { bareCode, getStockType, toTsCode } from './stock-type';

const STOCK_NAMES: Record<string, string> = stockNames;

export function lookupKnownName(stockCode: string): string | null {
    const tsCode = toTsCode(stockCode);
    return STOCK_NAMES[tsCode] ?? STOCK_NAMES[bareCode(tsCode)] ?? null;
}

export async function getStockName(supabase: SupabaseClient, stockCode: string): Promise<string | null> {
    const known = lookupKnownName(stockCode);
    if (known) return known;

    const tsCode = toTsCode(stockCode);

    try {
        const cached = await getStockIndustry(supabase, tsCode);
        if (cached?.stock_name) return cached.stock_name;
    } catch (error) {
        console.warn(`[StockNames] Industry cache lookup failed for ${tsCode}:`, errorMessage(error));
    }

    if (!isTushareConfigured()) return null;

    try {
        return await fetchSecurityName(tsCode, getStockType(tsCode));
    } catch (error) {
        console.warn(`[StockNames] TuShare lookup failed for ${tsCode}:`, errorMessage(error));
        return null;
    }
}
