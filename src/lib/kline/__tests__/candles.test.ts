import {
    addDays,
    compactToIsoDay,
    isoDayToCompact,
    fillNonTradingDays,
    findMissingDays,
    toCandleTuples,
} from '../candles';
import type { KlineCandle } from '../types';

function candle(date: string, close: number, volume: number = 1000): KlineCandle {
    return { date, open: close - 1, close, high: close + 1, low: close - 2, volume };
}

describe('date helpers', () => {
    it('converts between compact and ISO days', () => {
        expect(compactToIsoDay('20240105')).toBe('2024-01-05');
        expect(isoDayToCompact('2024-01-05')).toBe('20240105');
    });

    it('adds days across month and year ends', () => {
        expect(addDays('2024-01-31', 1)).toBe('2024-02-01');
        expect(addDays('2023-12-31', 1)).toBe('2024-01-01');
        expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
    });
});

describe('fillNonTradingDays', () => {
    it('fills a weekend with flat zero-volume candles at the previous close', () => {
        const filled = fillNonTradingDays([candle('2024-01-05', 10), candle('2024-01-08', 12)]);

        expect(filled.map(c => c.date)).toEqual(['2024-01-05', '2024-01-06', '2024-01-07', '2024-01-08']);
        expect(filled[1]).toEqual({ date: '2024-01-06', open: 10, close: 10, high: 10, low: 10, volume: 0 });
        expect(filled[3].close).toBe(12);
    });

    it('sorts input and drops duplicate dates', () => {
        const filled = fillNonTradingDays([candle('2024-01-02', 5), candle('2024-01-01', 4), candle('2024-01-02', 6)]);

        expect(filled.map(c => [c.date, c.close])).toEqual([['2024-01-01', 4], ['2024-01-02', 6]]);
    });

    it('returns [] for no candles', () => {
        expect(fillNonTradingDays([])).toEqual([]);
    });
});

describe('findMissingDays', () => {
    it('lists calendar gaps between the first and last candle', () => {
        expect(findMissingDays([candle('2024-01-05', 10), candle('2024-01-08', 12)])).toEqual(['2024-01-06', '2024-01-07']);
        expect(findMissingDays([candle('2024-01-05', 10)])).toEqual([]);
    });
});

describe('toCandleTuples', () => {
    it('orders fields as date, open, close, low, high', () => {
        expect(toCandleTuples([{ date: '2024-01-05', open: 1, close: 2, high: 4, low: 0.5, volume: 9 }]))
            .toEqual([['2024-01-05', 1, 2, 0.5, 4]]);
    });
});
