"use client";

import { useRef, useState } from 'react';
import { useRouter } from 'next/navigation';
import {
    ArrowDownTrayIcon,
    ArrowPathIcon,
    ArrowUpTrayIcon,
    CloudArrowDownIcon,
    CpuChipIcon,
} from '@heroicons/react/24/outline';
import { postJson, readApiOutcome, type ApiOutcome } from './api-client';
import { CreateEventForm } from './CreateEventForm';

type ActionName = 'fetch' | 'analyze' | 'reanalyze' | 'import';

export function DataViewerActions() {
    const router = useRouter();
    const fileInputRef = useRef<HTMLInputElement>(null);

    const [running, setRunning] = useState<ActionName | null>(null);
    const [result, setResult] = useState<ApiOutcome | null>(null);
    const [targetMonth, setTargetMonth] = useState('');
    const [maxPages, setMaxPages] = useState(10);
    const [analyzeLimit, setAnalyzeLimit] = useState(10);

    const run = async (name: ActionName, action: () => Promise<ApiOutcome>) => {
        setRunning(name);
        setResult(null);
        try {
            const outcome = await action();
            setResult(outcome);
            if (outcome.ok) router.refresh();
        } catch (err) {
            setResult({ ok: false, message: err instanceof Error ? err.message : 'Network error', body: {} });
        } finally {
            setRunning(null);
        }
    };

    const handleImport = async (file: File) => {
        const form = new FormData();
        form.append('file', file);
        await run('import', async () => {
            const res = await fetch('/api/import-events', { method: 'POST', body: form });
            return readApiOutcome(res, 'Import finished');
        });
        if (fileInputRef.current) fileInputRef.current.value = '';
    };

    const errorLines: string[] = result && Array.isArray(result.body.errors)
        ? result.body.errors.map(String)
        : [];

    return (
        <div className="card p-4 space-y-4">
            <h2 className="text-sm font-semibold text-foreground">Actions</h2>

            <div className="grid grid-cols-1 lg:grid-cols-3 gap-4">
                <div className="space-y-2">
                    <div className="text-xs text-foreground-muted">Collect policies</div>
                    <div className="flex gap-2">
                        <input
                            value={targetMonth}
                            onChange={(e) => setTargetMonth(e.target.value)}
                            placeholder="YYYY-MM (optional)"
                            className="input font-mono"
                        />
                        <input
                            type="number"
                            min={1}
                            value={maxPages}
                            onChange={(e) => setMaxPages(Number(e.target.value) || 1)}
                            className="input w-20"
                            title="Max pages"
                        />
                    </div>
                    <button
                        className="btn-primary w-full flex items-center justify-center gap-2"
                        disabled={running !== null}
                        onClick={() => void run('fetch', () => postJson(
                            '/api/fetch-policy-data',
                            { max_pages: maxPages, ...(targetMonth.trim() ? { target_month: targetMonth.trim() } : {}) },
                            'Collection finished',
                        ))}
                    >
                        <CloudArrowDownIcon className="w-4 h-4" />
                        {running === 'fetch' ? 'Fetching...' : 'Fetch policies'}
                    </button>
                </div>

                <div className="space-y-2">
                    <div className="text-xs text-foreground-muted">AI analysis</div>
                    <input
                        type="number"
                        min={1}
                        value={analyzeLimit}
                        onChange={(e) => setAnalyzeLimit(Number(e.target.value) || 1)}
                        className="input"
                        title="Policies per run"
                    />
                    <div className="flex gap-2">
                        <button
                            className="btn-primary flex-1 flex items-center justify-center gap-2"
                            disabled={running !== null}
                            onClick={() => void run('analyze', () => postJson(
                                '/api/ai-analysis',
                                { limit: analyzeLimit, async: true },
                                'Analysis finished',
                            ))}
                        >
                            <CpuChipIcon className="w-4 h-4" />
                            {running === 'analyze' ? 'Analyzing...' : 'Analyze new'}
                        </button>
                        <button
                            className="btn-secondary flex-1 flex items-center justify-center gap-2"
                            disabled={running !== null}
                            onClick={() => void run('reanalyze', () => postJson(
                                '/api/ai-analysis/reanalyze',
                                { limit: analyzeLimit },
                                'Re-analysis finished',
                            ))}
                        >
                            <ArrowPathIcon className="w-4 h-4" />
                            {running === 'reanalyze' ? 'Working...' : 'Retry failed'}
                        </button>
                    </div>
                </div>

                <div className="space-y-2">
                    <div className="text-xs text-foreground-muted">CSV import</div>
                    <a
                        href="/api/download-template"
                        className="btn-secondary w-full flex items-center justify-center gap-2"
                    >
                        <ArrowDownTrayIcon className="w-4 h-4" />
                        Download template
                    </a>
                    <label className={`btn-secondary w-full flex items-center justify-center gap-2 cursor-pointer ${running !== null ? 'opacity-50 pointer-events-none' : ''}`}>
                        <ArrowUpTrayIcon className="w-4 h-4" />
                        {running === 'import' ? 'Importing...' : 'Import CSV'}
                        <input
                            ref={fileInputRef}
                            type="file"
                            accept=".csv"
                            className="hidden"
                            onChange={(e) => {
                                const file = e.target.files?.[0];
                                if (file) void handleImport(file);
                            }}
                        />
                    </label>
                </div>
            </div>

            {result && (
                <div className={`text-sm px-3 py-2 rounded ${result.ok ? 'bg-accent/10 text-accent-light' : 'bg-bullish/10 text-bullish-light'}`}>
                    {result.message}
                    {errorLines.length > 0 && (
                        <ul className="mt-1 text-xs list-disc list-inside">
                            {errorLines.slice(0, 10).map((line, i) => (
                                <li key={i}>{line}</li>
                            ))}
                        </ul>
                    )}
                </div>
            )}

            <CreateEventForm onCreated={() => router.refresh()} />
        </div>
    );
}
