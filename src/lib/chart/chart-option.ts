/**
 * Server-side chart option builder
 *
 * Produces the JSON embedded in the K-line page: candle tuples, volumes,
 * event markers and the initial viewport (last 20% of the series).
 */

import type { ChartEvent, KlineChartOption } from './types';
import type { KlineCandle } from '@/lib/kline/types';
import { toCandleTuples } from '@/lib/kline/candles';
import { generateEventMarkers } from './markers';

export interface BuildChartOptionInput {
    stockCode: string;
    stockName: string | null;
    candles: readonly KlineCandle[];
    events: readonly ChartEvent[];
}

export const INITIAL_RANGE = { from: 80, to: 100 } as const;

export function formatStockDisplayName(stockCode: string, stockName: string | null): string {
    return stockName ? `${stockName} (${stockCode})` : stockCode;
}

export function buildKlineChartOption(input: BuildChartOptionInput): KlineChartOption {
    const series = toCandleTuples(input.candles);
    const lastDate = input.candles.length > 0 ? input.candles[input.candles.length - 1].date : null;

    return {
        stockCode: input.stockCode,
        title: `${formatStockDisplayName(input.stockCode, input.stockName)} Daily K-line`,
        subtitle: lastDate ? `Data until ${lastDate}` : 'No data',
        series,
        volumes: input.candles.map(c => c.volume),
        markers: generateEventMarkers(input.events, series),
        initialRange: { ...INITIAL_RANGE },
    };
}
