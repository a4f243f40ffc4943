/**
 * K-line Store — cached daily candles in stock_kline
 *
 * Rows are keyed by (stock_code, date).
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { isRecord, readNumber, readString } from '@/lib/shared/type-guards';
import { selectAllPages } from '@/lib/supabase/paginate';
import { KLINE_START_DATE, type KlineCandle } from './types';

const UPSERT_CHUNK = 500;

function rowToCandle(row: unknown): KlineCandle | null {
    if (!isRecord(row)) return null;
    const date = readString(row, 'date');
    const open = readNumber(row, 'open');
    const close = readNumber(row, 'close');
    const high = readNumber(row, 'high');
    const low = readNumber(row, 'low');
    if (!date || open === null || close === null || high === null || low === null) return null;
    return { date, open, close, high, low, volume: readNumber(row, 'volume') ?? 0 };
}

export async function loadKline(
    supabase: SupabaseClient,
    stockCode: string,
    startDate: string = KLINE_START_DATE,
): Promise<KlineCandle[]> {
    return selectAllPages(
        `load K-line for ${stockCode}`,
        (from, to) => supabase
            .from('stock_kline')
            .select('date, open, close, high, low, volume')
            .eq('stock_code', stockCode)
            .gte('date', startDate)
            .order('date', { ascending: true })
            .range(from, to),
        rowToCandle,
    );
}

export async function getLatestKlineDate(
    supabase: SupabaseClient,
    stockCode: string,
): Promise<string | null> {
    const { data, error } = await supabase
        .from('stock_kline')
        .select('date')
        .eq('stock_code', stockCode)
        .order('date', { ascending: false })
        .limit(1)
        .maybeSingle();

    if (error) {
        console.error('[KlineStore] getLatestKlineDate error:', error);
        throw new Error(`Failed to read latest K-line date for ${stockCode}: ${error.message}`);
    }

    return isRecord(data) ? readString(data, 'date') : null;
}

/**
 * Upsert candles on (stock_code, date). Returns the number of rows written.
 */
export async function saveKline(
    supabase: SupabaseClient,
    stockCode: string,
    candles: readonly KlineCandle[],
): Promise<number> {
    if (candles.length === 0) return 0;

    const updatedAt = new Date().toISOString();
    let written = 0;

    for (let i = 0; i < candles.length; i += UPSERT_CHUNK) {
        const chunk = candles.slice(i, i + UPSERT_CHUNK).map(c => ({
            stock_code: stockCode,
            date: c.date,
            open: c.open,
            close: c.close,
            high: c.high,
            low: c.low,
            volume: c.volume,
            updated_at: updatedAt,
        }));

        const { error } = await supabase
            .from('stock_kline')
            .upsert(chunk, { onConflict: 'stock_code,date' });

        if (error) {
            console.error('[KlineStore] saveKline error:', error);
            throw new Error(`Failed to save K-line for ${stockCode}: ${error.message}`);
        }

        written += chunk.length;
    }

    return written;
}
