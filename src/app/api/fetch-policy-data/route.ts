export const dynamic = 'force-dynamic';

/**
 * POST /api/fetch-policy-data
 * Body: { target_month?: "YYYY-MM", max_pages?: number = 10 }
 *
 * Runs policy collection now, then analyzes what was saved.
 */

import { NextResponse } from 'next/server';
import { createServerSupabase } from '@/lib/supabase/server';
import { runDataCollection } from '@/lib/policy/policy-fetcher';
import { readString } from '@/lib/shared/type-guards';
import { badRequest, readJsonBody, readPositiveInt, routeErrorResponse } from '@/lib/http/route-helpers';

const DEFAULT_MAX_PAGES = 10;

export async function POST(request: Request) {
    try {
        const body = await readJsonBody(request);
        if (!body) return badRequest('Request body must be a JSON object');

        const targetMonth = readString(body, 'target_month')?.trim() || undefined;
        if (targetMonth && !/^\d{4}-\d{2}$/.test(targetMonth)) {
            return badRequest(`Invalid target_month "${targetMonth}" (expected YYYY-MM)`);
        }
        const maxPages = readPositiveInt(body, 'max_pages', DEFAULT_MAX_PAGES);

        const result = await runDataCollection(createServerSupabase(), { targetMonth, maxPages });

        return NextResponse.json({
            success: true,
            message: `Fetched and saved ${result.saved} policies`,
            saved_count: result.saved,
            ...result,
        });
    } catch (error) {
        return routeErrorResponse('FetchPolicyDataApi', error);
    }
}
