/**
 * Security classification and code normalization for A-share codes.
 */

import type { StockType } from '@/lib/kline/types';

/** Indices recognised by full TuShare code */
export const INDEX_CODES: readonly string[] = [
    '000001.SH', // 上证指数
    '000300.SH', // 沪深300
    '399001.SZ', // 深证成指
    '399006.SZ', // 创业板指
    '000016.SH', // 上证50
    '000905.SH', // 中证500
    '000852.SH', // 中证1000
];

/** Broad-market indices: every event is relevant to them */
export const MAJOR_INDEX_CODES: readonly string[] = ['000001.SH', '399001.SZ', '399006.SZ'];

const ETF_NAME_KEYWORDS = ['ETF', 'etf', '基金', '指数基金'];

export function bareCode(code: string): string {
    return code.trim().split('.')[0];
}

export function getStockType(stockCode: string, stockName: string = ''): StockType {
    const code = stockCode.trim().toUpperCase();
    if (INDEX_CODES.includes(code)) return 'index';

    const num = bareCode(code);
    if (num.startsWith('5') || num.startsWith('1')) {
        if (stockName && ETF_NAME_KEYWORDS.some(keyword => stockName.includes(keyword))) {
            return 'etf';
        }
        if (num.startsWith('51') || num.startsWith('15')) {
            return 'etf';
        }
    }

    return 'stock';
}

/**
 * Normalize user input to a TuShare ts_code (e.g. 600519 → 600519.SH).
 * Codes that already carry an exchange suffix are upper-cased and kept.
 */
export function toTsCode(stockCode: string): string {
    const code = stockCode.trim().toUpperCase();
    if (code.includes('.')) return code;

    if (/^(60|68|90|51|56|58|50)/.test(code)) return `${code}.SH`;
    if (/^(00|30|20|15|16|18)/.test(code)) return `${code}.SZ`;
    return `${code}.SH`;
}

export function isMajorIndex(stockCode: string): boolean {
    return MAJOR_INDEX_CODES.includes(stockCode.trim().toUpperCase());
}
