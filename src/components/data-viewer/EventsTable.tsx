"use client";

import { useMemo, useState } from 'react';
import Link from 'next/link';
import { useRouter } from 'next/navigation';
import { TrashIcon } from '@heroicons/react/24/outline';
import type { PolicyEventDetails } from '@/lib/events/types';
import { readApiOutcome } from './api-client';

interface EventsTableProps {
    events: PolicyEventDetails[];
}

const PAGE_SIZE = 50;

export function EventsTable({ events }: EventsTableProps) {
    const router = useRouter();
    const [query, setQuery] = useState('');
    const [page, setPage] = useState(0);
    const [deletingId, setDeletingId] = useState<number | null>(null);
    const [error, setError] = useState<string | null>(null);

    const filtered = useMemo(() => {
        const q = query.trim().toLowerCase();
        if (!q) return events;
        return events.filter(event =>
            event.title.toLowerCase().includes(q)
            || (event.department ?? '').toLowerCase().includes(q)
            || event.ai_industries.some(industry => industry.toLowerCase().includes(q)),
        );
    }, [events, query]);

    const pageCount = Math.max(1, Math.ceil(filtered.length / PAGE_SIZE));
    const current = Math.min(page, pageCount - 1);
    const rows = filtered.slice(current * PAGE_SIZE, (current + 1) * PAGE_SIZE);

    const handleDelete = async (event: PolicyEventDetails) => {
        if (!window.confirm(`Delete "${event.title}"?`)) return;
        setDeletingId(event.id);
        setError(null);
        try {
            const res = await fetch(`/api/delete-event/${event.id}`, { method: 'DELETE' });
            const outcome = await readApiOutcome(res, 'Deleted');
            if (outcome.ok) {
                router.refresh();
            } else {
                setError(outcome.message);
            }
        } catch (err) {
            setError(err instanceof Error ? err.message : 'Network error');
        } finally {
            setDeletingId(null);
        }
    };

    return (
        <div className="card p-4">
            <div className="flex items-center justify-between mb-3 gap-4">
                <h2 className="text-sm font-semibold text-foreground">
                    Events <span className="text-foreground-muted font-normal">({filtered.length})</span>
                </h2>
                <input
                    value={query}
                    onChange={(e) => { setQuery(e.target.value); setPage(0); }}
                    placeholder="Filter by title, department or industry"
                    className="input max-w-sm"
                />
            </div>

            {error && <p className="mb-2 text-xs text-bullish-light">{error}</p>}

            <div className="overflow-x-auto">
                <table className="w-full text-sm">
                    <thead>
                        <tr className="text-left text-2xs text-foreground-muted uppercase tracking-wider border-b border-card-border">
                            <th className="py-2 pr-3">Date</th>
                            <th className="py-2 pr-3">Title</th>
                            <th className="py-2 pr-3">Department</th>
                            <th className="py-2 pr-3">Industries</th>
                            <th className="py-2 pr-3">Confidence</th>
                            <th className="py-2" />
                        </tr>
                    </thead>
                    <tbody>
                        {rows.map(event => (
                            <tr key={event.id} className="border-b border-card-border/50 hover:bg-card-hover">
                                <td className="py-2 pr-3 font-mono text-xs whitespace-nowrap">{event.date}</td>
                                <td className="py-2 pr-3 max-w-md">
                                    {event.source_url ? (
                                        <Link href={event.source_url} target="_blank" rel="noopener" className="hover:text-accent-light">
                                            {event.title}
                                        </Link>
                                    ) : event.title}
                                </td>
                                <td className="py-2 pr-3 text-xs text-foreground-muted">{event.department ?? '-'}</td>
                                <td className="py-2 pr-3 text-xs">
                                    {event.analysis_id === null
                                        ? <span className="text-foreground-muted">not analyzed</span>
                                        : event.ai_industries.join(', ')}
                                </td>
                                <td className="py-2 pr-3 text-xs font-mono">
                                    {event.ai_confidence === null ? '-' : event.ai_confidence.toFixed(2)}
                                </td>
                                <td className="py-2 text-right">
                                    <button
                                        onClick={() => void handleDelete(event)}
                                        disabled={deletingId === event.id}
                                        className="p-1 rounded text-foreground-muted hover:text-bullish-light disabled:opacity-50"
                                        title="Delete"
                                    >
                                        <TrashIcon className="w-4 h-4" />
                                    </button>
                                </td>
                            </tr>
                        ))}
                    </tbody>
                </table>
            </div>

            {pageCount > 1 && (
                <div className="flex items-center justify-end gap-2 mt-3 text-xs">
                    <button className="btn-secondary" disabled={current === 0} onClick={() => setPage(current - 1)}>Prev</button>
                    <span className="text-foreground-muted">{current + 1} / {pageCount}</span>
                    <button className="btn-secondary" disabled={current >= pageCount - 1} onClick={() => setPage(current + 1)}>Next</button>
                </div>
            )}
        </div>
    );
}
