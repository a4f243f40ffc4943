export const dynamic = 'force-dynamic';

/**
 * AI Analysis API
 *
 * POST /api/ai-analysis
 * Body: { limit?: number = 10, async?: boolean = false, max_concurrent?: number = 5 }
 *
 * Analyzes events that have no analysis yet. `async: true` runs up to
 * max_concurrent analyses at once; otherwise one at a time.
 */

import { NextResponse } from 'next/server';
import { createServerSupabase } from '@/lib/supabase/server';
import { analyzeUnprocessedPolicies } from '@/lib/analysis/policy-analyzer';
import { badRequest, readBoolean, readJsonBody, readPositiveInt, routeErrorResponse } from '@/lib/http/route-helpers';

const DEFAULT_LIMIT = 10;
const DEFAULT_MAX_CONCURRENT = 5;

export async function POST(request: Request) {
    try {
        const body = await readJsonBody(request);
        if (!body) return badRequest('Request body must be a JSON object');

        const limit = readPositiveInt(body, 'limit', DEFAULT_LIMIT);
        const useAsync = readBoolean(body, 'async');
        const maxConcurrent = useAsync ? readPositiveInt(body, 'max_concurrent', DEFAULT_MAX_CONCURRENT) : 1;
        const mode = useAsync ? 'async' : 'sync';

        const summary = await analyzeUnprocessedPolicies(createServerSupabase(), { limit, maxConcurrent });

        return NextResponse.json({
            success: true,
            message: `Analyzed ${summary.analyzed} policies (${mode} mode)`,
            processed_count: summary.analyzed,
            mode,
            summary,
        });
    } catch (error) {
        return routeErrorResponse('AiAnalysisApi', error);
    }
}
