/**
 * Policy collection types
 */

import type { NewPolicyEvent } from '@/lib/events/types';

export type PolicySourceName = 'gov_cn' | 'ndrc' | 'mof' | 'csrc';

/** A policy scraped from a source, before it is stored */
export interface FetchedPolicy extends NewPolicyEvent {
    date: string;
    title: string;
    event_type: string;
    source_url: string;
    department: string;
    policy_level: string;
    impact_level: string;
    content_type: string;
}

export interface SourceFetchOptions {
    /** YYYY-MM; keep only policies dated in this month */
    targetMonth?: string;
    maxPages?: number;
    now?: Date;
}

export interface CollectionResult {
    fetched: number;
    fresh: number;
    saved: number;
    analyzed: number;
}
