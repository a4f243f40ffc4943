/**
 * CSRC (证监会) search-list JSON API
 *
 * Response shape: { data: { results: [{ title, content, memo, url,
 * publishedTimeStr, publishTime, createTime, updateTime, domainMetaList }] } }
 */

import { todayIso, normalizeDayString } from '@/lib/shared/dates';
import { sleep } from '@/lib/shared/concurrency';
import { errorMessage, isRecord, readString } from '@/lib/shared/type-guards';
import { assessImpactLevel, classifyCsrcPolicyType, shouldSkipContent } from '../classifier';
import type { FetchedPolicy, SourceFetchOptions } from '../types';
import { fetchPage } from './http';

export const CSRC_BASE_URL = 'http://www.csrc.gov.cn';
export const CSRC_LIST_URL = `${CSRC_BASE_URL}/searchList/a1a078ee0bc54721ab6b148884c784a8`;
export const CSRC_MAX_PAGES = 50;

const MIN_TITLE_LENGTH = 5;
const PAGE_DELAY_MS = 500;
const DEFAULT_DEPARTMENT = '证监会';
const FALLBACK_DATE_FIELDS = ['publishTime', 'createTime', 'updateTime'] as const;

export function csrcListUrl(page: number): string {
    return `${CSRC_LIST_URL}?_isAgg=true&_isJson=true&_pageSize=18&_template=index&page=${page}`;
}

function readText(item: Record<string, unknown>, key: string): string {
    const value = item[key];
    if (value === null || value === undefined) return '';
    return String(value).trim();
}

export function extractCsrcDate(item: Record<string, unknown>, now: Date = new Date()): string {
    const published = /(\d{4}-\d{2}-\d{2})/.exec(readText(item, 'publishedTimeStr'));
    if (published) return published[1];

    for (const field of FALLBACK_DATE_FIELDS) {
        const match = /(\d{4}[-/]\d{1,2}[-/]\d{1,2})/.exec(readText(item, field));
        const normalized = match ? normalizeDayString(match[1]) : null;
        if (normalized) return normalized;
    }

    return todayIso(now);
}

export function extractCsrcDepartment(item: Record<string, unknown>): string {
    const domains = item.domainMetaList;
    if (!Array.isArray(domains)) return DEFAULT_DEPARTMENT;

    for (const domain of domains) {
        if (!isRecord(domain) || !Array.isArray(domain.resultList)) continue;
        for (const result of domain.resultList) {
            if (!isRecord(result)) continue;
            if (readString(result, 'key') === 'section' || readString(result, 'name') === '部门') {
                const department = readText(result, 'value');
                if (department) return department;
            }
        }
    }

    return DEFAULT_DEPARTMENT;
}

export function extractCsrcUrl(item: Record<string, unknown>): string {
    const url = readText(item, 'url');
    if (url.startsWith('/')) return `${CSRC_BASE_URL}${url}`;
    if (url.startsWith('http')) return url;
    return CSRC_BASE_URL;
}

export function parseCsrcItem(item: unknown, now: Date = new Date()): FetchedPolicy | null {
    if (!isRecord(item)) return null;

    const title = readText(item, 'title');
    if (title.length < MIN_TITLE_LENGTH || shouldSkipContent(title)) return null;

    const content = readText(item, 'content') || readText(item, 'memo');

    return {
        date: extractCsrcDate(item, now),
        title,
        event_type: classifyCsrcPolicyType(title),
        content: content || null,
        source_url: extractCsrcUrl(item),
        department: extractCsrcDepartment(item),
        policy_level: '国家级',
        impact_level: assessImpactLevel(title),
        content_type: '政策',
    };
}

/**
 * Items of one API page, or null when the payload has no data.results
 */
export function parseCsrcPage(payload: unknown, now: Date = new Date()): FetchedPolicy[] | null {
    if (!isRecord(payload) || !isRecord(payload.data) || !Array.isArray(payload.data.results)) {
        return null;
    }
    const results: unknown[] = payload.data.results;
    return results
        .map(item => parseCsrcItem(item, now))
        .filter((p): p is FetchedPolicy => p !== null);
}

export interface CsrcFetchOptions extends Pick<SourceFetchOptions, 'maxPages' | 'now'> {
    pageDelayMs?: number;
}

export async function fetchCsrcPolicies(opts: CsrcFetchOptions = {}): Promise<FetchedPolicy[]> {
    const maxPages = opts.maxPages ?? CSRC_MAX_PAGES;
    const pageDelayMs = opts.pageDelayMs ?? PAGE_DELAY_MS;
    const policies: FetchedPolicy[] = [];

    for (let page = 1; page <= maxPages; page++) {
        const url = csrcListUrl(page);

        try {
            const response = await fetchPage(url);
            if (response.status === 404) {
                console.log(`[Csrc] Page ${page} not found, stopping`);
                break;
            }
            if (!response.ok) {
                console.warn(`[Csrc] Page ${page} returned ${response.status}`);
            } else {
                const pagePolicies = parseCsrcPage(await response.json(), opts.now);
                if (pagePolicies === null) {
                    console.warn(`[Csrc] Page ${page} has an unexpected shape`);
                } else {
                    console.log(`[Csrc] Page ${page}: ${pagePolicies.length} policies`);
                    if (pagePolicies.length === 0) break;
                    policies.push(...pagePolicies);
                }
            }
        } catch (error) {
            console.error(`[Csrc] Page ${page} failed:`, errorMessage(error));
        }

        if (pageDelayMs > 0) await sleep(pageDelayMs);
    }

    console.log(`[Csrc] Collected ${policies.length} policies`);
    return policies;
}
