#!/usr/bin/env npx tsx
/**
 * Policy Analysis CLI
 *
 * Usage:
 *   npm run analyze:policies -- [--limit N] [--concurrency N]   analyze new policies
 *   npm run analyze:policies -- --reanalyze [--limit N]          retry failed / no-industry results
 *   npm run analyze:policies -- --stored [--limit N]             re-run from stored full content
 *
 * Requires: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY, SILICONFLOW_API_KEY
 */

import 'dotenv/config';
import { parseArgs } from 'node:util';
import { createServerSupabase } from '../src/lib/supabase/server';
import {
    analyzeUnprocessedPolicies,
    analyzeFailedAndEmptyPolicies,
    reanalyzeStoredContent,
    getAnalysisStatistics,
} from '../src/lib/analysis/policy-analyzer';

function readPositive(raw: string | undefined, flag: string): number | undefined {
    if (raw === undefined) return undefined;
    const value = Number.parseInt(raw, 10);
    if (!Number.isInteger(value) || value < 1) {
        console.error(`ERROR: --${flag} must be a positive integer, got "${raw}"`);
        process.exit(1);
    }
    return value;
}

async function main() {
    const { values } = parseArgs({
        options: {
            limit: { type: 'string' },
            concurrency: { type: 'string' },
            reanalyze: { type: 'boolean', default: false },
            stored: { type: 'boolean', default: false },
        },
    });

    const limit = readPositive(values.limit, 'limit');
    const maxConcurrent = readPositive(values.concurrency, 'concurrency');
    const mode = values.reanalyze ? 'reanalyze' : values.stored ? 'stored' : 'new';

    console.log('═══════════════════════════════════════════════════════════════');
    console.log(`  Policy Analysis (${mode})`);
    console.log('═══════════════════════════════════════════════════════════════');
    console.log();

    try {
        const supabase = createServerSupabase();

        if (mode === 'reanalyze') {
            const improved = await analyzeFailedAndEmptyPolicies(supabase, { limit, maxConcurrent });
            console.log(`Improved: ${improved}`);
        } else {
            const summary = mode === 'stored'
                ? await reanalyzeStoredContent(supabase, { limit, maxConcurrent })
                : await analyzeUnprocessedPolicies(supabase, { limit, maxConcurrent });
            console.log(`Selected: ${summary.selected}`);
            console.log(`Analyzed: ${summary.analyzed}`);
            console.log(`Failed:   ${summary.failed}`);
            console.log(`Skipped:  ${summary.skipped}`);
        }

        const stats = await getAnalysisStatistics(supabase);
        console.log();
        console.log(`Coverage: ${stats.analyzed_policies}/${stats.total_policies} (${stats.analysis_rate}%)`);
        console.log(`Success:  ${stats.successful_analysis} (${stats.success_rate}%)`);
        console.log(`Pending re-analysis: ${stats.need_reanalysis}`);
    } catch (error) {
        console.error('Analysis failed:', error);
        process.exit(1);
    }
}

void main();
