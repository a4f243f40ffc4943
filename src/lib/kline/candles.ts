/**
 * Candle shaping: calendar gap filling and conversion to chart tuples.
 */

import type { KlineCandle } from './types';
import type { CandleTuple } from '@/lib/chart/types';
import { DAY_MS } from '@/lib/chart/kline-dates';

export function isoDayToUtcMs(date: string): number {
    return Date.parse(`${date}T00:00:00Z`);
}

export function utcMsToIsoDay(ms: number): string {
    return new Date(ms).toISOString().slice(0, 10);
}

/** YYYYMMDD → YYYY-MM-DD (TuShare trade_date) */
export function compactToIsoDay(compact: string): string {
    return `${compact.slice(0, 4)}-${compact.slice(4, 6)}-${compact.slice(6, 8)}`;
}

/** YYYY-MM-DD → YYYYMMDD */
export function isoDayToCompact(date: string): string {
    return date.replace(/-/g, '');
}

export function addDays(date: string, days: number): string {
    return utcMsToIsoDay(isoDayToUtcMs(date) + days * DAY_MS);
}

/**
 * Insert a flat placeholder candle for every calendar day without data,
 * priced at the previous close with zero volume. Output is one candle per
 * day from the first to the last input date, in ascending order.
 */
export function fillNonTradingDays(candles: readonly KlineCandle[]): KlineCandle[] {
    if (candles.length === 0) return [];

    const byDate = new Map<string, KlineCandle>();
    for (const candle of candles) {
        byDate.set(candle.date, candle);
    }

    const dates = [...byDate.keys()].sort();
    const first = isoDayToUtcMs(dates[0]);
    const last = isoDayToUtcMs(dates[dates.length - 1]);

    const filled: KlineCandle[] = [];
    let lastClose: number | null = null;

    for (let day = first; day <= last; day += DAY_MS) {
        const date = utcMsToIsoDay(day);
        const candle = byDate.get(date);

        if (candle) {
            filled.push(candle);
            lastClose = candle.close;
        } else if (lastClose !== null) {
            filled.push({
                date,
                open: lastClose,
                close: lastClose,
                high: lastClose,
                low: lastClose,
                volume: 0,
            });
        }
    }

    return filled;
}

/**
 * Calendar days between first and last candle with no row
 */
export function findMissingDays(candles: readonly KlineCandle[]): string[] {
    if (candles.length === 0) return [];

    const present = new Set(candles.map(c => c.date));
    const dates = [...present].sort();
    const missing: string[] = [];

    for (let day = isoDayToUtcMs(dates[0]); day <= isoDayToUtcMs(dates[dates.length - 1]); day += DAY_MS) {
        const date = utcMsToIsoDay(day);
        if (!present.has(date)) missing.push(date);
    }

    return missing;
}

export function toCandleTuples(candles: readonly KlineCandle[]): CandleTuple[] {
    return candles.map((c): CandleTuple => [c.date, c.open, c.close, c.low, c.high]);
}
