"use client";

import { useState } from 'react';
import { useRouter } from 'next/navigation';
import { MagnifyingGlassIcon } from '@heroicons/react/24/outline';

const CODE_PATTERN = /^\d{6}(\.(SH|SZ|BJ))?$/i;

export function StockSearchForm() {
    const router = useRouter();
    const [code, setCode] = useState('');
    const [error, setError] = useState<string | null>(null);

    const handleSubmit = (e: React.FormEvent) => {
        e.preventDefault();
        const trimmed = code.trim().toUpperCase();
        if (!CODE_PATTERN.test(trimmed)) {
            setError('Enter a 6-digit code, optionally with .SH / .SZ / .BJ');
            return;
        }
        setError(null);
        router.push(`/kline/${trimmed}`);
    };

    return (
        <form onSubmit={handleSubmit} className="card p-6">
            <label className="block text-sm font-medium text-foreground mb-2" htmlFor="stock-code">
                Stock, ETF or index code
            </label>
            <div className="flex gap-2">
                <input
                    id="stock-code"
                    value={code}
                    onChange={(e) => setCode(e.target.value)}
                    placeholder="600519, 510300 or 000001.SH"
                    className="input font-mono"
                />
                <button type="submit" className="btn-primary flex items-center gap-2">
                    <MagnifyingGlassIcon className="w-4 h-4" />
                    Chart
                </button>
            </div>
            {error && <p className="mt-2 text-xs text-bullish-light">{error}</p>}
        </form>
    );
}
