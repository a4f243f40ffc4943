export const dynamic = 'force-dynamic';

/**
 * POST /api/delete-event
 * Body: { title: string }
 *
 * Deletes every event with exactly this title.
 */

import { NextResponse } from 'next/server';
import { createServerSupabase } from '@/lib/supabase/server';
import { deleteEventByTitle } from '@/lib/events/event-manager';
import { readString } from '@/lib/shared/type-guards';
import { badRequest, readJsonBody, routeErrorResponse } from '@/lib/http/route-helpers';

export async function POST(request: Request) {
    try {
        const body = await readJsonBody(request);
        if (!body) return badRequest('Request body must be a JSON object');

        const title = readString(body, 'title')?.trim();
        if (!title) return badRequest('title is required');

        const result = await deleteEventByTitle(createServerSupabase(), title);
        return NextResponse.json(result, { status: result.success ? 200 : 404 });
    } catch (error) {
        return routeErrorResponse('DeleteEventApi', error);
    }
}
