"use client";

import { useEffect, useRef } from 'react';
import type { PolicyEventDetails } from '@/lib/events/types';

interface EventListProps {
    events: PolicyEventDetails[];
    /** Event ids that have a marker on the chart */
    markedIds: ReadonlySet<string>;
    highlightedId: string | null;
    /** Item to bring into view, set when its chart marker is hovered */
    scrollToId: string | null;
    onHover: (id: string | null) => void;
    onSelect: (event: PolicyEventDetails) => void;
}

export function EventList({ events, markedIds, highlightedId, scrollToId, onHover, onSelect }: EventListProps) {
    const itemRefs = useRef(new Map<string, HTMLLIElement>());

    useEffect(() => {
        if (!scrollToId) return;
        itemRefs.current.get(scrollToId)?.scrollIntoView({ block: 'nearest', behavior: 'smooth' });
    }, [scrollToId]);

    if (events.length === 0) {
        return (
            <div className="card p-4 text-sm text-foreground-muted">
                No policy events found for this security.
            </div>
        );
    }

    return (
        <div className="card p-4">
            <div className="flex items-center justify-between mb-3">
                <h3 className="text-sm font-semibold text-foreground">Policy Events</h3>
                <span className="text-2xs text-foreground-muted">
                    {markedIds.size} / {events.length} on chart
                </span>
            </div>

            <ul className="space-y-1 max-h-[32rem] overflow-y-auto">
                {events.map(event => {
                    const id = String(event.id);
                    const onChart = markedIds.has(id);
                    const isHighlighted = highlightedId === id;

                    return (
                        <li
                            key={id}
                            ref={el => {
                                if (el) {
                                    itemRefs.current.set(id, el);
                                } else {
                                    itemRefs.current.delete(id);
                                }
                            }}
                            onMouseEnter={() => onHover(onChart ? id : null)}
                            onMouseLeave={() => onHover(null)}
                            onClick={() => onSelect(event)}
                            className={`px-3 py-2 rounded cursor-pointer transition-colors ${
                                isHighlighted ? 'bg-card-hover border-l-2 border-caution' : 'hover:bg-card-hover'
                            }`}
                        >
                            <div className="flex items-center gap-2 text-2xs text-foreground-muted">
                                <span className="font-mono">{event.date}</span>
                                {event.department && <span>{event.department}</span>}
                                {!onChart && <span className="text-caution">outside range</span>}
                            </div>
                            <div className="text-sm text-foreground line-clamp-2">{event.title}</div>
                            {event.ai_industries.length > 0 && (
                                <div className="mt-1 flex flex-wrap gap-1">
                                    {event.ai_industries.slice(0, 5).map(industry => (
                                        <span
                                            key={industry}
                                            className="px-1.5 py-0.5 rounded bg-background-tertiary text-2xs text-foreground-muted"
                                        >
                                            {industry}
                                        </span>
                                    ))}
                                </div>
                            )}
                        </li>
                    );
                })}
            </ul>
        </div>
    );
}
