/**
 * Policy Analysis Types
 */

/** Industry marker stored when the model reply could not be parsed */
export const FAILED_MARKER = '分析失败';
/** Industry marker stored when the model found no affected industry */
export const NO_INDUSTRY_MARKER = '分析后无相关行业';

export const REANALYSIS_MARKERS: readonly string[] = [FAILED_MARKER, NO_INDUSTRY_MARKER];

export type ContentQuality = 'full' | 'partial' | 'title_only';

export interface ParsedAnalysis {
    industries: string[];
    analysis_summary: string;
    confidence_score: number;
    impact_type: string | null;
}

export interface AnalysisRecord extends ParsedAnalysis {
    content_quality: ContentQuality;
    full_content: string;
    analysis_status: 'success' | 'failed';
}

export interface StoredAnalysis {
    id: number;
    policy_id: number;
    industries: string[];
    analysis_summary: string | null;
    confidence_score: number | null;
    content_quality: string;
    full_content: string | null;
    created_at: string | null;
}

export type AnalyzeOutcome =
    | { ok: true; analysis: AnalysisRecord }
    | { ok: false; reason: 'parse_error'; analysis: AnalysisRecord }
    | { ok: false; reason: 'api_error'; error: string };

export interface PolicyInput {
    id: number;
    title: string;
    content: string | null;
    event_type: string | null;
    source_url: string | null;
}

export interface BatchSummary {
    selected: number;
    /** Parsed and stored */
    analyzed: number;
    /** Stored with the failed marker */
    failed: number;
    /** Left unprocessed (provider error, timeout, storage error) */
    skipped: number;
}

export interface AnalysisStatistics {
    total_policies: number;
    analyzed_policies: number;
    unanalyzed_policies: number;
    successful_analysis: number;
    failed_analysis: number;
    no_industry_analysis: number;
    need_reanalysis: number;
    analysis_rate: number;
    success_rate: number;
}
