import { BROWSER_HEADERS } from '@/lib/analysis/content-fetcher';

export const PAGE_TIMEOUT_MS = 10_000;

/**
 * GET with browser headers and a timeout. Network errors propagate.
 */
export async function fetchPage(url: string, timeoutMs: number = PAGE_TIMEOUT_MS): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    try {
        return await fetch(url, { headers: BROWSER_HEADERS, signal: controller.signal });
    } finally {
        clearTimeout(timeoutId);
    }
}
