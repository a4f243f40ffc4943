/**
 * Pull the first JSON object out of free-form model output.
 *
 * Models wrap JSON in prose or code fences; this scans from the first `{`
 * to its matching `}` (ignoring braces inside string literals) and parses
 * that slice.
 */

import { isRecord } from '@/lib/shared/type-guards';

export function findJsonObjectSlice(text: string): string | null {
    const start = text.indexOf('{');
    if (start === -1) return null;

    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
        const ch = text[i];

        if (inString) {
            if (escaped) {
                escaped = false;
            } else if (ch === '\\') {
                escaped = true;
            } else if (ch === '"') {
                inString = false;
            }
            continue;
        }

        if (ch === '"') {
            inString = true;
        } else if (ch === '{') {
            depth++;
        } else if (ch === '}') {
            depth--;
            if (depth === 0) {
                return text.slice(start, i + 1);
            }
        }
    }

    return null;
}

export function extractJsonObject(text: string): Record<string, unknown> | null {
    const slice = findJsonObjectSlice(text);
    if (!slice) return null;

    try {
        const parsed: unknown = JSON.parse(slice);
        return isRecord(parsed) ? parsed : null;
    } catch (error) {
        console.warn('[JsonExtract] Invalid JSON in model output:', error instanceof Error ? error.message : error);
        return null;
    }
}
