/**
 * Parse and normalise the model's JSON analysis reply.
 *
 *   - industries, analysis_summary and confidence_score must all be present
 *   - a scalar industries value is wrapped in a one-element list
 *   - a non-numeric confidence is parsed, defaulting to 0.5
 *   - confidence is clamped to [0, 1]
 *   - an empty industry list becomes the no-industry marker
 */

import { extractJsonObject } from '@/lib/ai/json-extract';
import { NO_INDUSTRY_MARKER, type ParsedAnalysis } from './types';

const REQUIRED_FIELDS = ['industries', 'analysis_summary', 'confidence_score'] as const;
const DEFAULT_CONFIDENCE = 0.5;

function toText(value: unknown): string {
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return '';
}

export function normalizeIndustries(value: unknown): string[] {
    const items: unknown[] = Array.isArray(value) ? value : [value];
    return items.map(toText).filter(item => item.length > 0);
}

export function normalizeConfidence(value: unknown): number {
    let score = DEFAULT_CONFIDENCE;
    if (typeof value === 'number' && Number.isFinite(value)) {
        score = value;
    } else if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value.trim());
        if (Number.isFinite(parsed)) score = parsed;
    }
    return Math.max(0, Math.min(1, score));
}

export function parseAnalysisResponse(text: string): ParsedAnalysis | null {
    const json = extractJsonObject(text);
    if (!json) {
        console.warn('[PolicyAnalyzer] No JSON object in model reply');
        return null;
    }

    for (const field of REQUIRED_FIELDS) {
        if (!(field in json)) {
            console.warn(`[PolicyAnalyzer] Model reply missing field: ${field}`);
            return null;
        }
    }

    const impact = toText(json.impact_type);
    const industries = normalizeIndustries(json.industries);

    return {
        industries: industries.length > 0 ? industries : [NO_INDUSTRY_MARKER],
        analysis_summary: toText(json.analysis_summary),
        confidence_score: normalizeConfidence(json.confidence_score),
        impact_type: impact || null,
    };
}
