export const dynamic = 'force-dynamic';

/**
 * POST /api/create-event
 * Body: { date: "YYYY-MM-DD", title, source_url?, content_type?, event_type?,
 *         department?, policy_level?, impact_level?, industries?, content?, ai_analysis? }
 */

import { NextResponse } from 'next/server';
import { createServerSupabase } from '@/lib/supabase/server';
import { createSingleEvent } from '@/lib/events/event-manager';
import { badRequest, readJsonBody, routeErrorResponse } from '@/lib/http/route-helpers';

export async function POST(request: Request) {
    try {
        const body = await readJsonBody(request);
        if (!body) return badRequest('Request body must be a JSON object');

        const result = await createSingleEvent(createServerSupabase(), body);
        return NextResponse.json(result, { status: result.success ? 201 : 400 });
    } catch (error) {
        return routeErrorResponse('CreateEventApi', error);
    }
}
