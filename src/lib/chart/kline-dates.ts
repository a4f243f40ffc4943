/**
 * Candle date normalization
 *
 * Candle dates arrive in four encodings; everything is reduced to epoch
 * milliseconds before comparison with event dates.
 *
 *   number > 1e12  → epoch milliseconds
 *   number > 1e9   → epoch seconds
 *   other number   → spreadsheet serial day (day 1 = 1900-01-01, local time)
 *   string         → Date.parse
 */

export const DAY_MS = 86_400_000;

const SERIAL_EPOCH_MS = new Date(1900, 0, 1).getTime();

export function normalizeKlineDate(value: unknown): number | null {
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) return null;
        if (value > 1e12) return value;
        if (value > 1e9) return value * 1000;
        return SERIAL_EPOCH_MS + (value - 1) * DAY_MS;
    }

    if (typeof value === 'string') {
        const ts = new Date(value).getTime();
        return isNaN(ts) ? null : ts;
    }

    return null;
}

export function parseEventDate(date: string): number | null {
    const ts = new Date(date).getTime();
    return isNaN(ts) ? null : ts;
}

export function isWithinOneDay(a: number, b: number): boolean {
    return Math.abs(a - b) < DAY_MS;
}

function pad2(n: number): string {
    return n < 10 ? `0${n}` : String(n);
}

/**
 * Render a candle date as YYYY-MM-DD for the chart's time axis.
 * ISO date strings pass through untouched; numeric encodings use local time.
 */
export function toChartTime(value: unknown): string | null {
    if (typeof value === 'string' && /^\d{4}-\d{2}-\d{2}$/.test(value)) {
        return value;
    }

    const ts = normalizeKlineDate(value);
    if (ts === null) return null;

    const d = new Date(ts);
    return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
}
