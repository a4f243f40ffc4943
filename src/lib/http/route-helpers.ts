/**
 * Shared pieces of the JSON API routes
 *
 * Missing configuration answers 503 with the ConfigError message; any other
 * failure answers 500.
 */

import { NextResponse } from 'next/server';
import { ConfigError } from '@/lib/config/env';
import { errorMessage, isRecord } from '@/lib/shared/type-guards';

export function errorStatus(error: unknown): number {
    return error instanceof ConfigError ? 503 : 500;
}

export function routeErrorResponse(tag: string, error: unknown): NextResponse {
    const message = errorMessage(error);
    console.error(`[${tag}] error:`, message);
    return NextResponse.json({ success: false, error: message }, { status: errorStatus(error) });
}

export function badRequest(error: string): NextResponse {
    return NextResponse.json({ success: false, error }, { status: 400 });
}

/**
 * JSON object body, `{}` for an empty body, null when the body is not an object
 */
export async function readJsonBody(request: Request): Promise<Record<string, unknown> | null> {
    const text = await request.text();
    if (!text.trim()) return {};
    try {
        const parsed: unknown = JSON.parse(text);
        return isRecord(parsed) ? parsed : null;
    } catch (error) {
        console.warn('[Api] Invalid JSON body:', errorMessage(error));
        return null;
    }
}

export function readPositiveInt(body: Record<string, unknown>, key: string, fallback: number): number {
    const value = body[key];
    const parsed = typeof value === 'number' ? value : typeof value === 'string' ? parseInt(value, 10) : NaN;
    return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function readBoolean(body: Record<string, unknown>, key: string): boolean {
    const value = body[key];
    return value === true || value === 'true' || value === 1;
}
