"use client";

/**
 * Daily K-line chart with policy event markers (lightweight-charts v5)
 *
 * Candles and volume share one chart; volume sits on its own price scale in
 * the bottom fifth. Event markers are pinned above the candle high using
 * price-positioned markers.
 *
 * The un-highlighted marker set lives in a MarkerCache for the lifetime of
 * the chart so highlight/restore never drifts from the server option.
 */

import { useEffect, useRef, useState } from 'react';
import {
    createChart,
    createSeriesMarkers,
    ColorType,
    CandlestickSeries,
    HistogramSeries,
} from 'lightweight-charts';
import type {
    CandlestickData,
    HistogramData,
    IChartApi,
    ISeriesMarkersPluginApi,
    SeriesMarker,
    Time,
} from 'lightweight-charts';
import type { EventMarker, KlineChartOption } from '@/lib/chart/types';
import {
    MarkerCache,
    computeZoomWindow,
    zoomWindowToLogicalRange,
} from '@/lib/chart/markers';
import { toChartTime } from '@/lib/chart/kline-dates';
import type { ChartFocus } from '@/lib/chart/hover-sync';

// A-share convention: red rises, green falls
const UP_COLOR = '#ef4444';
const DOWN_COLOR = '#10b981';
const VOLUME_UP = 'rgba(239, 68, 68, 0.5)';
const VOLUME_DOWN = 'rgba(16, 185, 129, 0.5)';

interface KlineChartProps {
    option: KlineChartOption;
    highlightedId?: string | null;
    focus?: ChartFocus | null;
    height?: number;
    onMarkerHover?: (id: string | null) => void;
}

function toSeriesMarkers(markers: readonly EventMarker[]): SeriesMarker<Time>[] {
    const result: SeriesMarker<Time>[] = [];
    for (const marker of markers) {
        const time = toChartTime(marker.time);
        if (!time) continue;
        result.push({
            id: marker.id,
            time,
            position: 'atPriceTop',
            price: marker.price,
            shape: 'circle',
            color: marker.color,
            // Chart sizes are multiples of the bar width; 15 → 1, 20 → 1.33
            size: marker.size / 15,
        });
    }
    return result;
}

function indexOfTime(option: KlineChartOption, time: string): number {
    return option.series.findIndex(candle => toChartTime(candle[0]) === time);
}

export function KlineChart({
    option,
    highlightedId = null,
    focus = null,
    height = 520,
    onMarkerHover,
}: KlineChartProps) {
    const chartContainerRef = useRef<HTMLDivElement>(null);
    const chartRef = useRef<IChartApi | null>(null);
    const markersApiRef = useRef<ISeriesMarkersPluginApi<Time> | null>(null);
    const markerCacheRef = useRef(new MarkerCache());
    const hoverCallbackRef = useRef(onMarkerHover);

    const [hoveredTitle, setHoveredTitle] = useState<string | null>(null);

    useEffect(() => {
        hoverCallbackRef.current = onMarkerHover;
    }, [onMarkerHover]);

    // 1. Build chart, series and markers
    useEffect(() => {
        if (option.series.length === 0) return;
        const container = chartContainerRef.current;
        if (!container) {
            console.warn('[KlineChart] Chart container not mounted, skipping render');
            return;
        }

        const chart = createChart(container, {
            width: container.clientWidth,
            height,
            layout: {
                background: { type: ColorType.Solid, color: 'transparent' },
                textColor: '#9ca3af',
            },
            grid: {
                vertLines: { color: 'rgba(255, 255, 255, 0.05)' },
                horzLines: { color: 'rgba(255, 255, 255, 0.05)' },
            },
            crosshair: {
                mode: 1,
                vertLine: { color: 'rgba(255, 255, 255, 0.2)' },
                horzLine: { color: 'rgba(255, 255, 255, 0.2)' },
            },
            timeScale: {
                borderColor: 'rgba(255, 255, 255, 0.1)',
            },
            rightPriceScale: {
                borderColor: 'rgba(255, 255, 255, 0.1)',
            },
        });
        chartRef.current = chart;

        const candleSeries = chart.addSeries(CandlestickSeries, {
            upColor: UP_COLOR,
            downColor: DOWN_COLOR,
            borderUpColor: UP_COLOR,
            borderDownColor: DOWN_COLOR,
            wickUpColor: UP_COLOR,
            wickDownColor: DOWN_COLOR,
        });

        const volumeSeries = chart.addSeries(HistogramSeries, {
            priceFormat: { type: 'volume' },
            priceScaleId: 'volume',
        });
        chart.priceScale('volume').applyOptions({
            scaleMargins: { top: 0.8, bottom: 0 },
        });

        const candleData: CandlestickData<Time>[] = [];
        const volumeData: HistogramData<Time>[] = [];
        for (let i = 0; i < option.series.length; i++) {
            const [date, open, close, low, high] = option.series[i];
            const time = toChartTime(date);
            if (!time) continue;
            candleData.push({ time, open, high, low, close });
            volumeData.push({
                time,
                value: option.volumes[i] ?? 0,
                color: close >= open ? VOLUME_UP : VOLUME_DOWN,
            });
        }
        candleSeries.setData(candleData);
        volumeSeries.setData(volumeData);

        const cache = markerCacheRef.current;
        cache.store(option.markers);
        markersApiRef.current = createSeriesMarkers(candleSeries, toSeriesMarkers(cache.restore()));

        const total = option.series.length;
        if (total > 0) {
            chart.timeScale().setVisibleLogicalRange(
                zoomWindowToLogicalRange({ start: option.initialRange.from, end: option.initialRange.to }, total),
            );
        }

        chart.subscribeCrosshairMove(param => {
            const id = typeof param.hoveredObjectId === 'string' ? param.hoveredObjectId : null;
            const marker = id ? cache.find(id) : undefined;
            setHoveredTitle(marker ? marker.title : null);
            hoverCallbackRef.current?.(marker ? marker.id : null);
        });

        const handleResize = () => {
            chart.applyOptions({ width: container.clientWidth });
        };
        window.addEventListener('resize', handleResize);

        return () => {
            window.removeEventListener('resize', handleResize);
            markersApiRef.current = null;
            chartRef.current = null;
            chart.remove();
        };
    }, [option, height]);

    // 2. Highlight / restore
    useEffect(() => {
        if (option.series.length === 0) return;
        const markersApi = markersApiRef.current;
        if (!markersApi) {
            console.warn('[KlineChart] No marker layer, cannot highlight', highlightedId);
            return;
        }

        const cache = markerCacheRef.current;
        const next = highlightedId && cache.has(highlightedId)
            ? cache.highlight(highlightedId)
            : cache.restore();
        markersApi.setMarkers(toSeriesMarkers(next));
    }, [highlightedId, option]);

    // 3. Scroll to the focused event
    useEffect(() => {
        if (!focus) return;
        const chart = chartRef.current;
        if (!chart) {
            console.warn('[KlineChart] No chart instance, cannot scroll to', focus.id);
            return;
        }

        const marker = markerCacheRef.current.find(focus.id);
        const time = marker ? toChartTime(marker.time) : null;
        if (!time) {
            console.warn('[KlineChart] No marker for event', focus.id);
            return;
        }

        const index = indexOfTime(option, time);
        if (index < 0) return;

        const total = option.series.length;
        chart.timeScale().setVisibleLogicalRange(
            zoomWindowToLogicalRange(computeZoomWindow(index, total), total),
        );
    }, [focus, option]);

    return (
        <div className="card p-4">
            <div className="flex items-start justify-between mb-4">
                <div>
                    <h2 className="text-lg font-bold text-foreground">{option.title}</h2>
                    <p className="text-xs text-foreground-muted">{option.subtitle}</p>
                </div>
                <div className="text-right text-xs text-foreground-muted">
                    <div>{option.markers.length} events on chart</div>
                    {hoveredTitle && (
                        <div className="mt-1 max-w-md truncate text-caution-light">{hoveredTitle}</div>
                    )}
                </div>
            </div>

            {option.series.length === 0 ? (
                <div className="flex items-center justify-center text-foreground-muted" style={{ height }}>
                    No K-line data available
                </div>
            ) : (
                <div ref={chartContainerRef} className="w-full" style={{ height }} />
            )}
        </div>
    );
}
