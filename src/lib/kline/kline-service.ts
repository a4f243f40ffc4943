/**
 * K-line Service
 *
 * Database-first candle loading with incremental TuShare refresh:
 *
 *   1. Load cached rows from KLINE_START_DATE
 *   2. Empty cache → fetch everything; stale cache → fetch from the day after
 *      the latest cached date
 *   3. Persist fetched rows (with non-trading-day placeholders)
 *   4. Backfill placeholders for any calendar gaps left in the cache
 *   5. Return the cache, gap-filled, ascending
 *
 * API failures fall back to whatever is cached; an empty cache plus a
 * failed fetch yields an empty result. A missing token is a ConfigError and
 * propagates.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { KLINE_START_DATE, type KlineCandle } from './types';
import { addDays, fillNonTradingDays, findMissingDays } from './candles';
import { loadKline, getLatestKlineDate, saveKline } from './kline-store';
import { fetchDailyCandles } from './tushare-client';
import { getStockType, toTsCode } from '@/lib/stocks/stock-type';
import { todayIso } from '@/lib/shared/dates';
import { ConfigError } from '@/lib/config/env';

export type KlineSource = 'cache' | 'api' | 'cache_fallback' | 'none';

export interface KlineFetchResult {
    tsCode: string;
    candles: KlineCandle[];
    source: KlineSource;
    /** Rows received from the API in this call */
    fetched: number;
    error?: string;
}

/**
 * Insert placeholder rows for calendar gaps already in the cache.
 * Returns the number of placeholder rows written.
 */
export async function backfillMissingDays(
    supabase: SupabaseClient,
    tsCode: string,
    cached: readonly KlineCandle[],
): Promise<number> {
    const missing = new Set(findMissingDays(cached));
    if (missing.size === 0) return 0;

    const placeholders = fillNonTradingDays(cached).filter(c => missing.has(c.date));
    console.log(`[KlineService] ${tsCode}: backfilling ${placeholders.length} non-trading days`);
    return saveKline(supabase, tsCode, placeholders);
}

export async function fetchStockKline(
    supabase: SupabaseClient,
    stockCode: string,
    stockName: string = '',
    now: Date = new Date(),
): Promise<KlineFetchResult> {
    const tsCode = toTsCode(stockCode);
    const stockType = getStockType(tsCode, stockName);
    const today = todayIso(now);

    const cached = await loadKline(supabase, tsCode, KLINE_START_DATE);

    let apiStart: string | null = KLINE_START_DATE;
    if (cached.length > 0) {
        const latest = await getLatestKlineDate(supabase, tsCode);
        apiStart = latest && latest >= today ? null : latest ? addDays(latest, 1) : KLINE_START_DATE;
    }

    let source: KlineSource = cached.length > 0 ? 'cache' : 'none';
    let fetched = 0;
    let fetchError: string | undefined;

    if (apiStart) {
        const startDate = apiStart;
        console.log(`[KlineService] ${tsCode}: fetching ${stockType} candles from ${startDate}`);
        try {
            const fresh = await fetchDailyCandles(tsCode, startDate, stockType);
            fetched = fresh.length;

            if (fresh.length > 0) {
                // Bridge the gap between the cached tail and the first fresh candle
                const tail = cached.length > 0 ? [cached[cached.length - 1]] : [];
                const filled = fillNonTradingDays([...tail, ...fresh]).filter(c => c.date >= startDate);
                await saveKline(supabase, tsCode, filled);
                source = 'api';
            } else {
                console.log(`[KlineService] ${tsCode}: API returned no rows`);
            }
        } catch (error) {
            if (error instanceof ConfigError) throw error;
            fetchError = error instanceof Error ? error.message : 'Unknown error';
            console.error(`[KlineService] ${tsCode}: API fetch failed:`, fetchError);
            source = cached.length > 0 ? 'cache_fallback' : 'none';
        }
    }

    if (source === 'none') {
        return { tsCode, candles: [], source, fetched, ...(fetchError ? { error: fetchError } : {}) };
    }

    const stored = source === 'api' ? await loadKline(supabase, tsCode, KLINE_START_DATE) : cached;
    await backfillMissingDays(supabase, tsCode, stored);

    return {
        tsCode,
        candles: fillNonTradingDays(stored),
        source,
        fetched,
        ...(fetchError ? { error: fetchError } : {}),
    };
}
