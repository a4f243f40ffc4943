/**
 * NDRC (发改委) order list pages
 *
 * Page 1 is index.html, page n is index_{n-1}.html. Collection stops at the
 * first empty page, a 404, or the tenth page.
 */

import { todayIso } from '@/lib/shared/dates';
import { sleep } from '@/lib/shared/concurrency';
import { errorMessage } from '@/lib/shared/type-guards';
import { assessImpactLevel } from '../classifier';
import type { FetchedPolicy, SourceFetchOptions } from '../types';
import { fetchPage } from './http';
import { extractListLinks, findInlineDate } from './list-links';

export const NDRC_BASE_URL = 'https://www.ndrc.gov.cn';
export const NDRC_LIST_URL = `${NDRC_BASE_URL}/xxgk/zcfb/fzggwl/index`;
export const NDRC_MAX_PAGES = 10;

const PAGE_DELAY_MS = 1000;

export function ndrcListUrl(page: number): string {
    return page === 0 ? `${NDRC_LIST_URL}.html` : `${NDRC_LIST_URL}_${page}.html`;
}

/**
 * NDRC list links carry no listing date; anything not dated in its href or
 * title is stamped with today.
 */
export function parseNdrcListPage(html: string, opts: Pick<SourceFetchOptions, 'targetMonth' | 'now'> = {}): FetchedPolicy[] {
    const today = todayIso(opts.now ?? new Date());
    const policies: FetchedPolicy[] = [];

    for (const link of extractListLinks(html, NDRC_BASE_URL)) {
        const date = findInlineDate(link) ?? today;
        if (opts.targetMonth && !date.startsWith(opts.targetMonth)) continue;

        policies.push({
            date,
            title: link.title,
            event_type: '发改委政策',
            source_url: link.url,
            department: '国家发改委',
            policy_level: '国家级',
            impact_level: assessImpactLevel(link.title),
            content_type: '政策',
        });
    }

    return policies;
}

export interface NdrcFetchOptions extends SourceFetchOptions {
    pageDelayMs?: number;
}

export async function fetchNdrcPolicies(opts: NdrcFetchOptions = {}): Promise<FetchedPolicy[]> {
    const maxPages = Math.min(opts.maxPages ?? NDRC_MAX_PAGES, NDRC_MAX_PAGES);
    const pageDelayMs = opts.pageDelayMs ?? PAGE_DELAY_MS;
    const policies: FetchedPolicy[] = [];

    for (let page = 0; page < maxPages; page++) {
        const url = ndrcListUrl(page);
        console.log(`[Ndrc] Fetching page ${page + 1}: ${url}`);

        try {
            const response = await fetchPage(url);
            if (response.status === 404) {
                console.log(`[Ndrc] Page ${page + 1} not found, stopping`);
                break;
            }
            if (!response.ok) {
                console.warn(`[Ndrc] Page ${page + 1} returned ${response.status}`);
            } else {
                const pagePolicies = parseNdrcListPage(await response.text(), opts);
                console.log(`[Ndrc] Page ${page + 1}: ${pagePolicies.length} policies`);
                if (pagePolicies.length === 0) break;
                policies.push(...pagePolicies);
            }
        } catch (error) {
            console.error(`[Ndrc] Page ${page + 1} failed:`, errorMessage(error));
        }

        if (pageDelayMs > 0) await sleep(pageDelayMs);
    }

    console.log(`[Ndrc] Collected ${policies.length} policies`);
    return policies;
}
