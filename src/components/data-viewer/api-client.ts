/**
 * Browser-side helpers for the data viewer's JSON API calls
 */

import { isRecord, readString } from '@/lib/shared/type-guards';

export interface ApiOutcome {
    ok: boolean;
    message: string;
    body: Record<string, unknown>;
}

export async function readApiOutcome(res: Response, fallback: string): Promise<ApiOutcome> {
    let body: Record<string, unknown> = {};
    try {
        const json: unknown = await res.json();
        if (isRecord(json)) body = json;
    } catch (error) {
        console.warn('[DataViewer] Non-JSON response:', error instanceof Error ? error.message : error);
    }

    const succeeded = res.ok && body.success !== false;
    const message = readString(body, succeeded ? 'message' : 'error')
        ?? readString(body, 'message')
        ?? (succeeded ? fallback : `Request failed (${res.status})`);

    return { ok: succeeded, message, body };
}

export async function postJson(url: string, payload: Record<string, unknown>, fallback: string): Promise<ApiOutcome> {
    const res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
    });
    return readApiOutcome(res, fallback);
}
