export const dynamic = 'force-dynamic';

/**
 * POST /api/ai-analysis/reanalyze
 * Body: { limit?: number = 50 }
 *
 * Re-runs analyses stored with the failed or no-industry marker.
 */

import { NextResponse } from 'next/server';
import { createServerSupabase } from '@/lib/supabase/server';
import { BATCH_DEFAULTS, analyzeFailedAndEmptyPolicies } from '@/lib/analysis/policy-analyzer';
import { badRequest, readJsonBody, readPositiveInt, routeErrorResponse } from '@/lib/http/route-helpers';

export async function POST(request: Request) {
    try {
        const body = await readJsonBody(request);
        if (!body) return badRequest('Request body must be a JSON object');

        const limit = readPositiveInt(body, 'limit', BATCH_DEFAULTS.reanalyzeLimit);
        const improved = await analyzeFailedAndEmptyPolicies(createServerSupabase(), { limit });

        return NextResponse.json({
            success: true,
            message: `Reanalysis improved ${improved} policies`,
            improved_count: improved,
        });
    } catch (error) {
        return routeErrorResponse('ReanalyzeApi', error);
    }
}
