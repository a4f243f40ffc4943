export const dynamic = 'force-dynamic';

/**
 * GET /api/ai-analysis/stats — analysis coverage and success rates
 */

import { NextResponse } from 'next/server';
import { createServerSupabase } from '@/lib/supabase/server';
import { getAnalysisStatistics } from '@/lib/analysis/policy-analyzer';
import { routeErrorResponse } from '@/lib/http/route-helpers';

export async function GET() {
    try {
        const stats = await getAnalysisStatistics(createServerSupabase());
        return NextResponse.json({ success: true, data: stats });
    } catch (error) {
        return routeErrorResponse('AnalysisStatsApi', error);
    }
}
