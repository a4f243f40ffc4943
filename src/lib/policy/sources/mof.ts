/**
 * Ministry of Finance (财政部) policy-release list pages
 *
 * Page 0 is index.htm, page n is index_{n}.htm. A link's date is taken from
 * its href or title, then its list item, then the text after it, then the
 * detail page itself; today is the last resort.
 */

import { stripTags } from '@/lib/shared/html-text';
import { todayIso } from '@/lib/shared/dates';
import { sleep } from '@/lib/shared/concurrency';
import { errorMessage } from '@/lib/shared/type-guards';
import { assessImpactLevel, isFiscalPolicyContent } from '../classifier';
import type { FetchedPolicy, SourceFetchOptions } from '../types';
import { fetchPage } from './http';
import { extractListLinks, findFollowingDate, findInlineDate, findListItemDate } from './list-links';

export const MOF_BASE_URL = 'https://www.mof.gov.cn';
export const MOF_LIST_URL = `${MOF_BASE_URL}/zhengwuxinxi/zhengcefabu/index`;

const PAGE_DELAY_MS = 1000;

/** Tried in order; the first match wins */
const DETAIL_DATE_PATTERNS = [
    /发布时间[：:]\s*(\d{4}-\d{2}-\d{2})/,
    /发文日期[：:]\s*(\d{4}-\d{2}-\d{2})/,
    /时间[：:]\s*(\d{4}-\d{2}-\d{2})/,
    /日期[：:]\s*(\d{4}-\d{2}-\d{2})/,
    /(\d{4})年(\d{1,2})月(\d{1,2})日/,
    /(\d{4}-\d{2}-\d{2})/,
];

export type DetailDateLookup = (url: string) => Promise<string | null>;

export function mofListUrl(page: number): string {
    return page === 0 ? `${MOF_LIST_URL}.htm` : `${MOF_LIST_URL}_${page}.htm`;
}

/**
 * Publication date from the text of a policy detail page
 */
export function parseDetailPageDate(text: string): string | null {
    for (const pattern of DETAIL_DATE_PATTERNS) {
        const match = pattern.exec(text);
        if (!match) continue;
        if (match.length === 4) {
            return `${match[1]}-${match[2].padStart(2, '0')}-${match[3].padStart(2, '0')}`;
        }
        return match[1];
    }
    return null;
}

export async function fetchDetailPageDate(url: string): Promise<string | null> {
    try {
        const response = await fetchPage(url);
        if (!response.ok) return null;
        return parseDetailPageDate(stripTags(await response.text()));
    } catch (error) {
        console.warn(`[Mof] Detail page date lookup failed for ${url}:`, errorMessage(error));
        return null;
    }
}

export async function parseMofListPage(
    html: string,
    opts: Pick<SourceFetchOptions, 'targetMonth' | 'now'> = {},
    lookupDetailDate: DetailDateLookup = fetchDetailPageDate,
): Promise<FetchedPolicy[]> {
    const now = opts.now ?? new Date();
    const policies: FetchedPolicy[] = [];

    for (const link of extractListLinks(html, MOF_BASE_URL)) {
        if (!isFiscalPolicyContent(link.title, link.url)) continue;

        let date = findInlineDate(link)
            ?? findListItemDate(link.listItem)
            ?? findFollowingDate(link.following)
            ?? await lookupDetailDate(link.url);
        if (!date) {
            console.warn(`[Mof] No date found, using today: ${link.title.slice(0, 50)}`);
            date = todayIso(now);
        }
        if (opts.targetMonth && !date.startsWith(opts.targetMonth)) continue;

        policies.push({
            date,
            title: link.title,
            event_type: '财政政策',
            source_url: link.url,
            department: '财政部',
            policy_level: '国家级',
            impact_level: assessImpactLevel(link.title),
            content_type: '政策',
        });
    }

    return policies;
}

export interface MofFetchOptions extends SourceFetchOptions {
    pageDelayMs?: number;
    lookupDetailDate?: DetailDateLookup;
}

export async function fetchMofPolicies(opts: MofFetchOptions = {}): Promise<FetchedPolicy[]> {
    const maxPages = opts.maxPages ?? 10;
    const pageDelayMs = opts.pageDelayMs ?? PAGE_DELAY_MS;
    const policies: FetchedPolicy[] = [];

    for (let page = 0; page < maxPages; page++) {
        const url = mofListUrl(page);
        console.log(`[Mof] Fetching page ${page + 1}: ${url}`);

        try {
            const response = await fetchPage(url);
            if (response.status === 404) {
                console.log(`[Mof] Page ${page + 1} not found, stopping`);
                break;
            }
            if (!response.ok) {
                console.warn(`[Mof] Page ${page + 1} returned ${response.status}`);
            } else {
                const pagePolicies = await parseMofListPage(await response.text(), opts, opts.lookupDetailDate);
                console.log(`[Mof] Page ${page + 1}: ${pagePolicies.length} policies`);
                if (pagePolicies.length === 0) break;
                policies.push(...pagePolicies);
            }
        } catch (error) {
            console.error(`[Mof] Page ${page + 1} failed:`, errorMessage(error));
        }

        if (pageDelayMs > 0) await sleep(pageDelayMs);
    }

    console.log(`[Mof] Collected ${policies.length} policies`);
    return policies;
}
