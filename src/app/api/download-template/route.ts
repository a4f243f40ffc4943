/**
 * GET /api/download-template — CSV import template as an attachment
 */

import { getCsvTemplate, TEMPLATE_FILENAME } from '@/lib/events/event-manager';

export async function GET() {
    // BOM so spreadsheet apps open the Chinese example row as UTF-8
    return new Response(`\uFEFF${getCsvTemplate()}`, {
        headers: {
            'Content-Type': 'text/csv; charset=utf-8',
            'Content-Disposition': `attachment; filename="${TEMPLATE_FILENAME}"`,
        },
    });
}
