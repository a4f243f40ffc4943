export const dynamic = 'force-dynamic';

/**
 * Stock Industry Analysis API
 *
 * POST /api/stock-industry-analysis
 * Body: { stock_code: string, stock_name?: string, force_refresh?: boolean }
 *
 * Returns the cached industry classification, analysing on a miss or when
 * force_refresh is set, plus the number of related policies.
 */

import { NextResponse } from 'next/server';
import { createServerSupabase } from '@/lib/supabase/server';
import { getOrAnalyzeStockIndustry } from '@/lib/stocks/industry-analyzer';
import { getRelatedPolicies } from '@/lib/stocks/smart-events';
import { toTsCode } from '@/lib/stocks/stock-type';
import { readString } from '@/lib/shared/type-guards';
import { badRequest, readBoolean, readJsonBody, routeErrorResponse } from '@/lib/http/route-helpers';

const RELATED_COUNT_LIMIT = 1000;

export async function POST(request: Request) {
    try {
        const body = await readJsonBody(request);
        if (!body) return badRequest('Request body must be a JSON object');

        const stockCode = readString(body, 'stock_code')?.trim();
        if (!stockCode) return badRequest('stock_code is required');

        const tsCode = toTsCode(stockCode);
        const stockName = readString(body, 'stock_name')?.trim() ?? '';
        const forceRefresh = readBoolean(body, 'force_refresh');

        const supabase = createServerSupabase();
        const industry = await getOrAnalyzeStockIndustry(supabase, tsCode, stockName, { forceRefresh });
        if (!industry) {
            return NextResponse.json(
                { success: false, error: `Industry analysis failed for ${tsCode}` },
                { status: 502 },
            );
        }

        const related = await getRelatedPolicies(supabase, industry.industries, RELATED_COUNT_LIMIT);

        return NextResponse.json({
            success: true,
            message: `Industry analysis ready for ${tsCode}`,
            data: { ...industry, related_policies_count: related.length },
        });
    } catch (error) {
        return routeErrorResponse('StockIndustryAnalysisApi', error);
    }
}
