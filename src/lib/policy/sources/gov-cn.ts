/**
 * gov.cn latest-policy list pages
 *
 * Pages are paginated as home_0.htm, home_1.htm, ... Collection stops at the
 * first page that yields no policy, or at maxPages.
 */

import { todayIso } from '@/lib/shared/dates';
import { sleep } from '@/lib/shared/concurrency';
import { errorMessage } from '@/lib/shared/type-guards';
import {
    assessImpactLevel,
    classifyPolicyType,
    determinePolicyLevel,
    extractDepartment,
} from '../classifier';
import type { FetchedPolicy, SourceFetchOptions } from '../types';
import { fetchPage } from './http';
import { extractListLinks, findFollowingDate, findInlineDate } from './list-links';

export const GOV_CN_BASE_URL = 'http://www.gov.cn';
export const GOV_CN_LIST_URL = 'https://www.gov.cn/zhengce/zuixin/home_{page}.htm';
export const GOV_CN_CONTENT_TYPE = '政策';

const PAGE_DELAY_MS = 1000;

export function govCnListUrl(page: number): string {
    return GOV_CN_LIST_URL.replace('{page}', String(page));
}

/**
 * Policies listed on one gov.cn list page
 */
export function parseGovCnListPage(html: string, opts: Pick<SourceFetchOptions, 'targetMonth' | 'now'> = {}): FetchedPolicy[] {
    const now = opts.now ?? new Date();
    const policies: FetchedPolicy[] = [];

    for (const link of extractListLinks(html, GOV_CN_BASE_URL)) {
        let date = findInlineDate(link) ?? findFollowingDate(link.following);
        if (!date) {
            console.warn(`[GovCn] No date found, using today: ${link.title.slice(0, 50)}`);
            date = todayIso(now);
        }
        if (opts.targetMonth && !date.startsWith(opts.targetMonth)) continue;

        policies.push({
            date,
            title: link.title,
            event_type: classifyPolicyType(link.title),
            source_url: link.url,
            department: extractDepartment(link.title, link.url),
            policy_level: determinePolicyLevel(link.title),
            impact_level: assessImpactLevel(link.title),
            content_type: GOV_CN_CONTENT_TYPE,
        });
    }

    return policies;
}

export interface GovCnFetchOptions extends SourceFetchOptions {
    pageDelayMs?: number;
}

export async function fetchGovCnPolicies(opts: GovCnFetchOptions = {}): Promise<FetchedPolicy[]> {
    const maxPages = opts.maxPages ?? 10;
    const pageDelayMs = opts.pageDelayMs ?? PAGE_DELAY_MS;
    const policies: FetchedPolicy[] = [];

    for (let page = 0; page < maxPages; page++) {
        const url = govCnListUrl(page);
        console.log(`[GovCn] Fetching page ${page + 1}: ${url}`);

        try {
            const response = await fetchPage(url);
            if (!response.ok) {
                console.warn(`[GovCn] Page ${page + 1} returned ${response.status}`);
            } else {
                const pagePolicies = parseGovCnListPage(await response.text(), opts);
                console.log(`[GovCn] Page ${page + 1}: ${pagePolicies.length} policies`);
                if (pagePolicies.length === 0) break;
                policies.push(...pagePolicies);
            }
        } catch (error) {
            console.error(`[GovCn] Page ${page + 1} failed:`, errorMessage(error));
        }

        if (pageDelayMs > 0) await sleep(pageDelayMs);
    }

    console.log(`[GovCn] Collected ${policies.length} policies`);
    return policies;
}
