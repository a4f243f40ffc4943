"use client";

import { useCallback, useMemo, useState } from 'react';
import type { KlineChartOption } from '@/lib/chart/types';
import type { PolicyEventDetails } from '@/lib/events/types';
import {
    INITIAL_HOVER_STATE,
    focusEvent,
    hoverFromChart,
    hoverFromList,
} from '@/lib/chart/hover-sync';
import { KlineChart } from '@/components/charts/KlineChart';
import { EventList } from './EventList';

interface KlineWorkspaceProps {
    option: KlineChartOption;
    events: PolicyEventDetails[];
}

export function KlineWorkspace({ option, events }: KlineWorkspaceProps) {
    const [hover, setHover] = useState(INITIAL_HOVER_STATE);

    const markedIds = useMemo(
        () => new Set(option.markers.map(marker => marker.id)),
        [option.markers],
    );

    const handleListHover = useCallback((id: string | null) => {
        setHover(prev => hoverFromList(prev, id, markedIds));
    }, [markedIds]);

    const handleMarkerHover = useCallback((id: string | null) => {
        setHover(prev => hoverFromChart(prev, id));
    }, []);

    const handleSelect = useCallback((event: PolicyEventDetails) => {
        setHover(prev => focusEvent(prev, String(event.id), markedIds));
        if (event.source_url) {
            window.open(event.source_url, '_blank', 'noopener');
        }
    }, [markedIds]);

    return (
        <div className="grid grid-cols-1 xl:grid-cols-3 gap-4">
            <div className="xl:col-span-2">
                <KlineChart
                    option={option}
                    highlightedId={hover.highlightedId}
                    focus={hover.focus}
                    onMarkerHover={handleMarkerHover}
                />
            </div>
            <EventList
                events={events}
                markedIds={markedIds}
                highlightedId={hover.highlightedId}
                scrollToId={hover.listScrollId}
                onHover={handleListHover}
                onSelect={handleSelect}
            />
        </div>
    );
}
