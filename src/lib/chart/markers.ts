/**
 * Event Marker Generation
 *
 * Places one glyph per policy event above the candle whose date matches the
 * event date (within 24h). Events sharing a date stack upward, one offset
 * increment apart, starting one increment above the candle high.
 *
 * CONTRACT:
 *   - Empty, non-array or malformed series → []
 *   - Events with no matching candle are skipped silently
 *   - The first candle within tolerance wins
 *   - Output is ascending by candle time; same-day markers keep input order
 *   - Unexpected errors are logged and yield []
 */

import type { CandleDate, CandleTuple, ChartEvent, EventMarker } from './types';
import { normalizeKlineDate, parseEventDate, isWithinOneDay } from './kline-dates';

// =============================================================================
// Styles
// =============================================================================

export const MARKER_STYLE = { color: '#FFD700', size: 15 } as const;
export const HIGHLIGHT_STYLE = { color: '#FF0000', size: 20 } as const;

/** Fraction of the series price range used as the stacking increment */
const OFFSET_RATIO = 0.01;
const MIN_OFFSET = 0.1;

// =============================================================================
// Validation
// =============================================================================

export function isCandleTuple(value: unknown): value is CandleTuple {
    if (!Array.isArray(value) || value.length < 5) return false;
    const date: unknown = value[0];
    if (typeof date !== 'string' && typeof date !== 'number') return false;
    for (let i = 1; i <= 4; i++) {
        const n: unknown = value[i];
        if (typeof n !== 'number' || !Number.isFinite(n)) return false;
    }
    return true;
}

// =============================================================================
// Building blocks
// =============================================================================

/**
 * Group events by their date string, keeping first-seen date order and
 * input order within each date
 */
export function groupEventsByDate(events: readonly ChartEvent[]): Map<string, ChartEvent[]> {
    const groups = new Map<string, ChartEvent[]>();
    for (const event of events) {
        const bucket = groups.get(event.date);
        if (bucket) {
            bucket.push(event);
        } else {
            groups.set(event.date, [event]);
        }
    }
    return groups;
}

export interface CandleMatch {
    index: number;
    matchedDate: CandleDate;
    timestamp: number;
    candleHigh: number;
}

/**
 * First candle whose normalized date lies within one day of the event date
 */
export function findMatchingCandle(eventDate: string, series: readonly CandleTuple[]): CandleMatch | null {
    const eventTs = parseEventDate(eventDate);
    if (eventTs === null) return null;

    for (let index = 0; index < series.length; index++) {
        const candle = series[index];
        const candleTs = normalizeKlineDate(candle[0]);
        if (candleTs === null) continue;

        if (isWithinOneDay(candleTs, eventTs)) {
            return { index, matchedDate: candle[0], timestamp: candleTs, candleHigh: candle[4] };
        }
    }

    return null;
}

/**
 * 1% of the series high-low range; falls back to 1% of the candle high
 * (or 0.1) when the range is zero
 */
export function calculateOffsetIncrement(series: readonly CandleTuple[], candleHigh: number): number {
    let maxHigh = -Infinity;
    let minLow = Infinity;

    for (const candle of series) {
        if (candle[4] > maxHigh) maxHigh = candle[4];
        if (candle[3] < minLow) minLow = candle[3];
    }

    const increment = series.length > 0 ? (maxHigh - minLow) * OFFSET_RATIO : 0;
    if (increment !== 0) return increment;

    return candleHigh > 0 ? candleHigh * OFFSET_RATIO : MIN_OFFSET;
}

function markerId(event: ChartEvent, stackIndex: number): string {
    return event.id ? event.id : `${event.date}_${stackIndex}_${event.title}`;
}

// =============================================================================
// Public API
// =============================================================================

export function generateEventMarkers(
    events: readonly ChartEvent[] | null | undefined,
    series: readonly unknown[] | null | undefined,
): EventMarker[] {
    if (!events || events.length === 0) return [];
    if (!series || series.length === 0) return [];

    try {
        const candles: CandleTuple[] = [];
        for (const item of series) {
            if (!isCandleTuple(item)) {
                console.warn('[EventMarkers] Malformed candle in series, skipping markers');
                return [];
            }
            candles.push(item);
        }

        const markers: EventMarker[] = [];

        for (const [date, dailyEvents] of groupEventsByDate(events)) {
            const match = findMatchingCandle(date, candles);
            if (!match) continue;

            const increment = calculateOffsetIncrement(candles, match.candleHigh);

            dailyEvents.forEach((event, i) => {
                markers.push({
                    id: markerId(event, i),
                    time: match.matchedDate,
                    timestamp: match.timestamp,
                    price: match.candleHigh + increment * (i + 1),
                    color: MARKER_STYLE.color,
                    size: MARKER_STYLE.size,
                    title: event.title,
                });
            });
        }

        // Chart libraries binary-search markers by time
        return markers.sort((a, b) => a.timestamp - b.timestamp);
    } catch (error) {
        console.error('[EventMarkers] Failed to generate markers:', error);
        return [];
    }
}

/**
 * Copy of `markers` with the marker `id` restyled as highlighted
 */
export function highlightMarker(markers: readonly EventMarker[], id: string): EventMarker[] {
    return markers.map(marker =>
        marker.id === id
            ? { ...marker, color: HIGHLIGHT_STYLE.color, size: HIGHLIGHT_STYLE.size }
            : { ...marker },
    );
}

/**
 * Holds the un-highlighted marker set for one chart instance so hover-exit
 * can restore it.
 */
export class MarkerCache {
    private original: EventMarker[] = [];

    store(markers: readonly EventMarker[]): void {
        this.original = markers.map(marker => ({ ...marker }));
    }

    has(id: string): boolean {
        return this.original.some(marker => marker.id === id);
    }

    find(id: string): EventMarker | undefined {
        return this.original.find(marker => marker.id === id);
    }

    highlight(id: string): EventMarker[] {
        return highlightMarker(this.original, id);
    }

    restore(): EventMarker[] {
        return this.original.map(marker => ({ ...marker }));
    }

    get size(): number {
        return this.original.length;
    }
}

// =============================================================================
// Viewport
// =============================================================================

export interface ZoomWindow {
    /** Percent of the series, 0-100 */
    start: number;
    end: number;
}

/**
 * Percentage window of width `spanPercent` centred on candle `index`
 */
export function computeZoomWindow(index: number, total: number, spanPercent: number = 20): ZoomWindow {
    if (total <= 1) return { start: 0, end: 100 };

    const position = (index / (total - 1)) * 100;
    return {
        start: Math.max(0, position - spanPercent / 2),
        end: Math.min(100, position + spanPercent / 2),
    };
}

/**
 * Convert a percentage window to logical bar indices
 */
export function zoomWindowToLogicalRange(zoom: ZoomWindow, total: number): { from: number; to: number } {
    const last = Math.max(0, total - 1);
    return {
        from: (zoom.start / 100) * last,
        to: (zoom.end / 100) * last,
    };
}
