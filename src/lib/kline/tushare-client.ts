/**
 * TuShare Pro HTTP client
 *
 * POST {api_name, token, params, fields} → {code, msg, data: {fields, items}}.
 * Rows are returned as records keyed by field name.
 *
 * SAFETY:
 *   - The token is sent in the body only and never logged
 *   - Every request has a timeout
 */

import { getTushareToken, getTushareBaseUrl } from '@/lib/config/env';
import { isRecord, readNumber, readString } from '@/lib/shared/type-guards';
import type { KlineCandle, StockType } from './types';
import { compactToIsoDay, isoDayToCompact } from './candles';

// =============================================================================
// Types
// =============================================================================

export type TushareRow = Record<string, unknown>;

export class TushareError extends Error {
    readonly code: number | null;

    constructor(message: string, code: number | null = null) {
        super(message);
        this.name = 'TushareError';
        this.code = code;
    }
}

const REQUEST_TIMEOUT_MS = 15_000;

const DAILY_API: Record<StockType, string> = {
    stock: 'daily',
    etf: 'fund_daily',
    index: 'index_daily',
};

const BASIC_APIS: Record<StockType, string[]> = {
    stock: ['stock_basic', 'fund_basic'],
    etf: ['fund_basic', 'stock_basic'],
    index: ['index_basic'],
};

// =============================================================================
// Transport
// =============================================================================

export async function callTushare(
    apiName: string,
    params: Record<string, string>,
    fields: string,
): Promise<TushareRow[]> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

    try {
        const response = await fetch(getTushareBaseUrl(), {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({ api_name: apiName, token: getTushareToken(), params, fields }),
            signal: controller.signal,
        });

        if (!response.ok) {
            throw new TushareError(`TuShare ${apiName} HTTP ${response.status}`);
        }

        const body: unknown = await response.json();
        if (!isRecord(body)) {
            throw new TushareError(`TuShare ${apiName} returned a non-object body`);
        }

        const code = readNumber(body, 'code');
        if (code !== 0) {
            throw new TushareError(`TuShare ${apiName} failed: ${readString(body, 'msg') ?? 'unknown error'}`, code);
        }

        const data = body.data;
        if (!isRecord(data) || !Array.isArray(data.fields) || !Array.isArray(data.items)) {
            return [];
        }

        const names: string[] = data.fields.filter((f: unknown): f is string => typeof f === 'string');
        const rows: TushareRow[] = [];
        for (const item of data.items) {
            if (!Array.isArray(item)) continue;
            const row: TushareRow = {};
            names.forEach((name, i) => {
                row[name] = item[i];
            });
            rows.push(row);
        }
        return rows;
    } finally {
        clearTimeout(timeoutId);
    }
}

// =============================================================================
// Endpoints
// =============================================================================

export function rowToCandle(row: TushareRow): KlineCandle | null {
    const tradeDate = readString(row, 'trade_date');
    const open = readNumber(row, 'open');
    const close = readNumber(row, 'close');
    const high = readNumber(row, 'high');
    const low = readNumber(row, 'low');

    if (!tradeDate || open === null || close === null || high === null || low === null) {
        return null;
    }

    return {
        date: compactToIsoDay(tradeDate),
        open,
        close,
        high,
        low,
        volume: readNumber(row, 'vol') ?? 0,
    };
}

/**
 * Daily candles from `startDate` (YYYY-MM-DD) to the latest trading day, ascending
 */
export async function fetchDailyCandles(
    tsCode: string,
    startDate: string,
    stockType: StockType,
): Promise<KlineCandle[]> {
    const rows = await callTushare(
        DAILY_API[stockType],
        { ts_code: tsCode, start_date: isoDayToCompact(startDate) },
        'trade_date,open,high,low,close,vol',
    );

    const candles: KlineCandle[] = [];
    for (const row of rows) {
        const candle = rowToCandle(row);
        if (candle) candles.push(candle);
    }

    return candles.sort((a, b) => a.date.localeCompare(b.date));
}

/**
 * Security name from the basic-info endpoints, or null when unknown
 */
export async function fetchSecurityName(tsCode: string, stockType: StockType): Promise<string | null> {
    for (const apiName of BASIC_APIS[stockType]) {
        const rows = await callTushare(apiName, { ts_code: tsCode }, 'ts_code,name');
        const name = rows.length > 0 ? readString(rows[0], 'name') : null;
        if (name) return name;
    }
    return null;
}
