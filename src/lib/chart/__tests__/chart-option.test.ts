import { buildKlineChartOption, formatStockDisplayName, INITIAL_RANGE } from '../chart-option';
import type { KlineCandle } from '@/lib/kline/types';

const CANDLES: KlineCandle[] = [
    { date: '2024-01-15', open: 10, close: 11, high: 12, low: 9, volume: 100 },
    { date: '2024-01-16', open: 11, close: 12, high: 13, low: 10, volume: 200 },
];

describe('buildKlineChartOption', () => {
    it('builds series, volumes and markers', () => {
        const option = buildKlineChartOption({
            stockCode: '600519.SH',
            stockName: '贵州茅台',
            candles: CANDLES,
            events: [{ id: '7', date: '2024-01-16', title: '政策' }],
        });

        expect(option.title).toBe('贵州茅台 (600519.SH) Daily K-line');
        expect(option.subtitle).toBe('Data until 2024-01-16');
        expect(option.series).toEqual([
            ['2024-01-15', 10, 11, 9, 12],
            ['2024-01-16', 11, 12, 10, 13],
        ]);
        expect(option.volumes).toEqual([100, 200]);
        expect(option.markers.map(m => m.id)).toEqual(['7']);
        expect(option.initialRange).toEqual({ from: 80, to: 100 });
    });

    it('handles an empty series', () => {
        const option = buildKlineChartOption({
            stockCode: '600519.SH',
            stockName: null,
            candles: [],
            events: [{ id: '7', date: '2024-01-16', title: '政策' }],
        });

        expect(option.title).toBe('600519.SH Daily K-line');
        expect(option.subtitle).toBe('No data');
        expect(option.markers).toEqual([]);
    });

    it('returns a fresh initial range each time', () => {
        const option = buildKlineChartOption({ stockCode: 'X', stockName: null, candles: [], events: [] });
        option.initialRange.from = 0;

        expect(INITIAL_RANGE.from).toBe(80);
    });
});

describe('formatStockDisplayName', () => {
    it('omits a missing name', () => {
        expect(formatStockDisplayName('000001.SH', null)).toBe('000001.SH');
        expect(formatStockDisplayName('000001.SH', '上证指数')).toBe('上证指数 (000001.SH)');
    });
});
