/**
 * Stock Industry Analyzer
 *
 * Classifies a stock, ETF or index into industries with the chat model and
 * caches the result in stock_industry_mapping.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { chatCompletion } from '@/lib/ai/chat-client';
import { extractJsonObject } from '@/lib/ai/json-extract';
import { getGlobalRateLimiter } from '@/lib/ai/rate-limiter';
import { getStockIndustryModel } from '@/lib/config/env';
import { normalizeConfidence, normalizeIndustries } from '@/lib/analysis/response-parser';
import {
    INDUSTRY_MAX_TOKENS,
    INDUSTRY_TIMEOUT_MS,
    buildIndustryPrompt,
    buildStockProfile,
    getIndustrySystemPrompt,
} from './industry-prompts';
import { getStockIndustry, saveStockIndustry } from './industry-store';
import { getStockType, toTsCode } from './stock-type';
import type { IndustryAnalysis, StockIndustry } from './types';

export function parseIndustryResponse(text: string): IndustryAnalysis | null {
    const json = extractJsonObject(text);
    if (!json) {
        console.warn('[IndustryAnalyzer] No JSON object in model reply');
        return null;
    }
    if (!('industries' in json) || !('analysis_summary' in json)) {
        console.warn('[IndustryAnalyzer] Model reply missing industries or analysis_summary');
        return null;
    }

    const summary = json.analysis_summary;
    return {
        industries: normalizeIndustries(json.industries),
        analysis_summary: typeof summary === 'string' ? summary.trim() : '',
        confidence_score: 'confidence_score' in json ? normalizeConfidence(json.confidence_score) : 0,
    };
}

/**
 * Ask the model for the security's industries. Returns null on any
 * provider or parse failure; throws only ConfigError.
 */
export async function analyzeStockIndustry(stockCode: string, stockName: string = ''): Promise<IndustryAnalysis | null> {
    const tsCode = toTsCode(stockCode);
    const stockType = getStockType(tsCode, stockName);
    const profile = buildStockProfile(tsCode, stockName, stockType);

    await getGlobalRateLimiter().acquire();

    const result = await chatCompletion(
        [
            { role: 'system', content: getIndustrySystemPrompt(stockType) },
            { role: 'user', content: buildIndustryPrompt(profile, stockType) },
        ],
        {
            model: getStockIndustryModel(),
            maxTokens: INDUSTRY_MAX_TOKENS,
            timeoutMs: INDUSTRY_TIMEOUT_MS,
        },
    );

    if (!result.success || !result.text) {
        console.error(`[IndustryAnalyzer] ${tsCode} request failed: ${result.errorCode} ${result.error ?? ''}`);
        return null;
    }

    const analysis = parseIndustryResponse(result.text);
    if (analysis) {
        console.log(`[IndustryAnalyzer] ${tsCode} (${stockType}) → ${analysis.industries.join(', ')}`);
    }
    return analysis;
}

export interface GetIndustryOptions {
    forceRefresh?: boolean;
}

/**
 * Cached industries for a security, analysing and caching on a miss
 */
export async function getOrAnalyzeStockIndustry(
    supabase: SupabaseClient,
    stockCode: string,
    stockName: string = '',
    opts: GetIndustryOptions = {},
): Promise<StockIndustry | null> {
    const tsCode = toTsCode(stockCode);

    if (!opts.forceRefresh) {
        const cached = await getStockIndustry(supabase, tsCode);
        if (cached) return cached;
    }

    console.log(`[IndustryAnalyzer] Analyzing ${tsCode}${opts.forceRefresh ? ' (forced)' : ''}`);
    const analysis = await analyzeStockIndustry(tsCode, stockName);
    if (!analysis) return null;

    return saveStockIndustry(supabase, tsCode, stockName, analysis);
}
