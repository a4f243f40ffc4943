/**
 * K-line data types
 */

export interface KlineCandle {
    /** YYYY-MM-DD */
    date: string;
    open: number;
    close: number;
    high: number;
    low: number;
    volume: number;
}

export type StockType = 'index' | 'etf' | 'stock';

/** Earliest date requested from the market data API */
export const KLINE_START_DATE = '2019-08-18';
