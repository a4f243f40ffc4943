export const dynamic = 'force-dynamic';

/**
 * GET /api/policy-stats — event table statistics for the data viewer
 */

import { NextResponse } from 'next/server';
import { createServerSupabase } from '@/lib/supabase/server';
import { getDataStatistics } from '@/lib/events/data-statistics';
import { routeErrorResponse } from '@/lib/http/route-helpers';

export async function GET() {
    try {
        const stats = await getDataStatistics(createServerSupabase());
        return NextResponse.json({ success: true, data: stats });
    } catch (error) {
        return routeErrorResponse('PolicyStatsApi', error);
    }
}
