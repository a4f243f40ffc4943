/**
 * Policy Data Collection
 *
 * Pipeline:
 *   1. Fetch every source (gov.cn, NDRC, MOF, CSRC) not inside its
 *      fetch-log interval
 *   2. Dedupe by (trimmed title, source_url)
 *   3. Drop policies already stored with the same title and source_url
 *   4. Insert, skipping any title already stored for the same date
 *   5. Kick off AI analysis for the new rows
 *
 * Analysis failures are logged and never fail the collection.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { getPolicyFetchMinIntervalMs, isSiliconFlowConfigured } from '@/lib/config/env';
import { findEventKeysByTitles, insertEvents, type EventKey } from '@/lib/events/event-store';
import { analyzeUnprocessedPolicies } from '@/lib/analysis/policy-analyzer';
import { errorMessage } from '@/lib/shared/type-guards';
import { recordFetchStatus, shouldSkipFetch } from './fetch-log-store';
import { fetchCsrcPolicies } from './sources/csrc';
import { fetchGovCnPolicies } from './sources/gov-cn';
import { fetchMofPolicies } from './sources/mof';
import { fetchNdrcPolicies } from './sources/ndrc';
import type { CollectionResult, FetchedPolicy, PolicySourceName, SourceFetchOptions } from './types';

/** Saved-row count at which analysis switches to the concurrent batch */
const CONCURRENT_ANALYSIS_THRESHOLD = 5;
const CONCURRENT_ANALYSIS_EXTRA = 5;
const COLLECTION_ANALYSIS_CONCURRENCY = 3;

async function collectSource(
    supabase: SupabaseClient,
    source: PolicySourceName,
    fetcher: () => Promise<FetchedPolicy[]>,
): Promise<FetchedPolicy[]> {
    if (await shouldSkipFetch(supabase, source, getPolicyFetchMinIntervalMs())) {
        return [];
    }

    try {
        const policies = await fetcher();
        await recordFetchStatus(supabase, source, 'success', policies.length);
        return policies;
    } catch (error) {
        const message = errorMessage(error);
        console.error(`[PolicyFetcher] ${source} failed:`, message);
        await recordFetchStatus(supabase, source, 'error', 0, message);
        return [];
    }
}

export async function fetchAllPolicies(
    supabase: SupabaseClient,
    opts: SourceFetchOptions = {},
): Promise<FetchedPolicy[]> {
    const listOpts: SourceFetchOptions = { targetMonth: opts.targetMonth, maxPages: opts.maxPages, now: opts.now };

    const govCn = await collectSource(supabase, 'gov_cn', () => fetchGovCnPolicies(listOpts));
    const ndrc = await collectSource(supabase, 'ndrc', () => fetchNdrcPolicies(listOpts));
    const mof = await collectSource(supabase, 'mof', () => fetchMofPolicies(listOpts));
    const csrc = await collectSource(supabase, 'csrc', () => fetchCsrcPolicies({ now: opts.now }));

    const all = [...govCn, ...ndrc, ...mof, ...csrc];
    const unique = dedupePolicies(all);
    console.log(`[PolicyFetcher] ${all.length} fetched, ${unique.length} unique`);
    return unique;
}

export function dedupePolicies(policies: readonly FetchedPolicy[]): FetchedPolicy[] {
    const seen = new Set<string>();
    const unique: FetchedPolicy[] = [];
    for (const policy of policies) {
        const key = `${policy.title.trim()}\u0000${policy.source_url}`;
        if (seen.has(key)) continue;
        seen.add(key);
        unique.push(policy);
    }
    return unique;
}

/**
 * Policies not already stored under the same title and source_url
 */
export function filterNewPolicies(policies: readonly FetchedPolicy[], existing: readonly EventKey[]): FetchedPolicy[] {
    const stored = new Set(existing.map(k => `${k.title}\u0000${k.source_url ?? ''}`));
    return policies.filter(p => !stored.has(`${p.title}\u0000${p.source_url}`));
}

/**
 * Drop policies whose title is already stored (or queued) for the same date
 */
export function selectInsertable(policies: readonly FetchedPolicy[], existing: readonly EventKey[]): FetchedPolicy[] {
    const taken = new Set(existing.map(k => `${k.title}\u0000${k.date}`));
    const insertable: FetchedPolicy[] = [];
    for (const policy of policies) {
        const key = `${policy.title}\u0000${policy.date}`;
        if (taken.has(key)) continue;
        taken.add(key);
        insertable.push(policy);
    }
    return insertable;
}

export async function analyzeNewPolicies(supabase: SupabaseClient, saved: number): Promise<number> {
    if (saved === 0) return 0;
    if (!isSiliconFlowConfigured()) {
        console.warn('[PolicyFetcher] AI not configured, skipping automatic analysis');
        return 0;
    }

    const concurrent = saved >= CONCURRENT_ANALYSIS_THRESHOLD;

    try {
        const summary = await analyzeUnprocessedPolicies(supabase, {
            limit: concurrent ? saved + CONCURRENT_ANALYSIS_EXTRA : saved,
            maxConcurrent: concurrent ? COLLECTION_ANALYSIS_CONCURRENCY : 1,
        });
        console.log(`[PolicyFetcher] Automatic analysis done: ${summary.analyzed} analyzed`);
        return summary.analyzed;
    } catch (error) {
        console.error('[PolicyFetcher] Automatic analysis failed:', errorMessage(error));
        return 0;
    }
}

export async function runDataCollection(
    supabase: SupabaseClient,
    opts: SourceFetchOptions = {},
): Promise<CollectionResult> {
    console.log(
        `[PolicyFetcher] Collecting policies${opts.targetMonth ? ` for ${opts.targetMonth}` : ''}, up to ${opts.maxPages ?? 10} pages`,
    );

    const policies = await fetchAllPolicies(supabase, opts);
    const existing = await findEventKeysByTitles(supabase, policies.map(p => p.title));
    const fresh = filterNewPolicies(policies, existing);
    const insertable = selectInsertable(fresh, existing);
    const saved = insertable.length > 0 ? await insertEvents(supabase, insertable) : 0;

    console.log(`[PolicyFetcher] ${policies.length} fetched, ${fresh.length} new, ${saved} saved`);

    const analyzed = await analyzeNewPolicies(supabase, saved);

    return { fetched: policies.length, fresh: fresh.length, saved, analyzed };
}
