/**
 * Policy classification heuristics
 *
 * Keyword tables live in data/policy-keywords.json. The first matching
 * rule wins, in table order.
 */

import policyKeywords from './data/policy-keywords.json';

interface KeywordRule {
    keywords: string[];
}

interface PolicyKeywords {
    policyTypes: (KeywordRule & { type: string })[];
    defaultPolicyType: string;
    departments: (KeywordRule & { name: string })[];
    defaultDepartment: string;
    policyLevels: {
        national: KeywordRule & { level: string };
        local: KeywordRule & { level: string };
        defaultLevel: string;
    };
    impactLevels: { high: string[]; medium: string[] };
    csrcTypes: (KeywordRule & { type: string })[];
    defaultCsrcType: string;
    recordNumberPatterns: string[];
    skipKeywords: string[];
    fiscalPolicy: { include: string[]; exclude: string[]; urlPatterns: string[] };
}

const KEYWORDS: PolicyKeywords = policyKeywords;

const RECORD_NUMBER_PATTERNS = KEYWORDS.recordNumberPatterns.map(source => new RegExp(source));
const BARE_DATE = /^\d{4}[-/]\d{1,2}[-/]\d{1,2}$/;
const MIN_TITLE_LENGTH = 8;

export type ImpactLevel = '高' | '中' | '低';

function containsAny(text: string, keywords: readonly string[]): boolean {
    return keywords.some(keyword => text.includes(keyword));
}

export function classifyPolicyType(title: string): string {
    const rule = KEYWORDS.policyTypes.find(r => containsAny(title, r.keywords));
    return rule ? rule.type : KEYWORDS.defaultPolicyType;
}

export function extractDepartment(title: string, url: string): string {
    const lowerUrl = url.toLowerCase();
    const rule = KEYWORDS.departments.find(r =>
        r.keywords.some(keyword => title.includes(keyword) || lowerUrl.includes(keyword)),
    );
    return rule ? rule.name : KEYWORDS.defaultDepartment;
}

export function determinePolicyLevel(title: string): string {
    const { national, local, defaultLevel } = KEYWORDS.policyLevels;
    if (containsAny(title, national.keywords)) return national.level;
    if (containsAny(title, local.keywords)) return local.level;
    return defaultLevel;
}

export function assessImpactLevel(title: string): ImpactLevel {
    if (containsAny(title, KEYWORDS.impactLevels.high)) return '高';
    if (containsAny(title, KEYWORDS.impactLevels.medium)) return '中';
    return '低';
}

export function classifyCsrcPolicyType(title: string): string {
    const lower = title.toLowerCase();
    const rule = KEYWORDS.csrcTypes.find(r => containsAny(lower, r.keywords));
    return rule ? rule.type : KEYWORDS.defaultCsrcType;
}

/**
 * Whether a Ministry of Finance link is a policy rather than a notice about
 * procurement, hiring, meetings or the ministry itself
 */
export function isFiscalPolicyContent(title: string, url: string): boolean {
    const { include, exclude, urlPatterns } = KEYWORDS.fiscalPolicy;
    if (containsAny(title, exclude)) return false;
    if (containsAny(title, include)) return true;
    return containsAny(url.toLowerCase(), urlPatterns);
}

/**
 * Link texts that are site furniture rather than policy titles:
 * record numbers, navigation, short labels and bare dates.
 */
export function shouldSkipContent(title: string): boolean {
    const trimmed = title.trim();
    if (!trimmed) return true;

    const lower = trimmed.toLowerCase();
    if (RECORD_NUMBER_PATTERNS.some(pattern => pattern.test(lower))) return true;
    if (containsAny(lower, KEYWORDS.skipKeywords)) return true;
    if (trimmed.length < MIN_TITLE_LENGTH) return true;
    return BARE_DATE.test(trimmed);
}
