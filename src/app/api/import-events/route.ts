export const dynamic = 'force-dynamic';

/**
 * POST /api/import-events
 *
 * multipart/form-data with a `file` field holding a .csv in the template
 * layout. Valid rows are inserted; invalid rows are reported by line.
 */

import { NextResponse } from 'next/server';
import { createServerSupabase } from '@/lib/supabase/server';
import { importEventsFromCsv } from '@/lib/events/event-manager';
import { badRequest, routeErrorResponse } from '@/lib/http/route-helpers';

export async function POST(request: Request) {
    try {
        let form: FormData;
        try {
            form = await request.formData();
        } catch (error) {
            console.warn('[ImportEventsApi] Unreadable form data:', error instanceof Error ? error.message : error);
            return badRequest('Expected multipart/form-data with a file field');
        }

        const file = form.get('file');
        if (!file || typeof file === 'string') {
            return badRequest('No file uploaded');
        }
        if (!file.name.toLowerCase().endsWith('.csv')) {
            return badRequest('Only .csv files are supported');
        }

        const result = await importEventsFromCsv(createServerSupabase(), await file.text());
        return NextResponse.json(result);
    } catch (error) {
        return routeErrorResponse('ImportEventsApi', error);
    }
}
