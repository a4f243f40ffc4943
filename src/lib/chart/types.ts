/**
 * Chart Types
 *
 * Shared between the server-side option builder and the client chart
 * component. Everything here must stay JSON-serialisable: the option is
 * embedded in the server-rendered page and hydrated on the client.
 */

// =============================================================================
// Candles
// =============================================================================

/**
 * Candle date as delivered by a data source: ISO date string, Unix seconds,
 * Unix milliseconds, or a spreadsheet serial day number.
 */
export type CandleDate = string | number;

/** [date, open, close, low, high] */
export type CandleTuple = [date: CandleDate, open: number, close: number, low: number, high: number];

// =============================================================================
// Events & markers
// =============================================================================

export interface ChartEvent {
    id: string;
    /** ISO date (YYYY-MM-DD) */
    date: string;
    title: string;
    sourceUrl?: string | null;
}

export interface EventMarker {
    /** Event identifier, used for hover/highlight lookups */
    id: string;
    /** Date of the matched candle, as it appears in the series */
    time: CandleDate;
    /** Normalized epoch milliseconds of the matched candle */
    timestamp: number;
    /** Vertical position in price units */
    price: number;
    color: string;
    size: number;
    title: string;
}

// =============================================================================
// Chart option
// =============================================================================

export interface KlineChartOption {
    stockCode: string;
    title: string;
    subtitle: string;
    series: CandleTuple[];
    volumes: number[];
    markers: EventMarker[];
    /** Initial visible window, percent of the series */
    initialRange: { from: number; to: number };
}
