export const dynamic = 'force-dynamic';

/**
 * Daily Policy Update
 *
 * GET /api/cron/policy-update
 *
 * Scheduled policy collection followed by analysis of the new rows.
 *
 * Security:
 *   - Requires Authorization: Bearer <CRON_SECRET>
 *   - Feature-flagged: CRON_POLICY_UPDATE_ENABLED must be "true"
 *   - Answers 404 when unauthorized or disabled
 *
 * SAFETY:
 *   - A job lock keeps overlapping invocations from running twice
 *   - The lock is released with the run's error, if any
 */

import { NextResponse } from 'next/server';
import { createServerSupabase } from '@/lib/supabase/server';
import { validateCronRequest, POLICY_UPDATE_FLAG } from '@/lib/ops/cron-auth';
import { acquireLock, releaseLock } from '@/lib/ops/job-lock';
import { runDataCollection } from '@/lib/policy/policy-fetcher';
import { errorMessage } from '@/lib/shared/type-guards';
import { routeErrorResponse } from '@/lib/http/route-helpers';

const JOB_NAME = 'policy-update';

export async function GET(request: Request) {
    const auth = validateCronRequest(request, POLICY_UPDATE_FLAG);
    if (!auth.authorized) {
        console.warn(`[CronPolicyUpdate] Rejected: ${auth.code}`);
        return new NextResponse(null, { status: 404 });
    }

    const startedAt = new Date().toISOString();

    try {
        const supabase = createServerSupabase();
        const lock = await acquireLock(supabase, JOB_NAME);
        if (!lock.acquired) {
            console.log(`[CronPolicyUpdate] Skipped: ${lock.reason}`);
            return NextResponse.json({ success: true, skipped: true, reason: lock.reason, startedAt });
        }

        let runError: string | undefined;
        try {
            const result = await runDataCollection(supabase);
            console.log(
                `[CronPolicyUpdate] fetched=${result.fetched} fresh=${result.fresh} saved=${result.saved} analyzed=${result.analyzed}`,
            );
            return NextResponse.json({
                success: true,
                runId: lock.runId,
                ...result,
                startedAt,
                finishedAt: new Date().toISOString(),
            });
        } catch (error) {
            runError = errorMessage(error);
            throw error;
        } finally {
            await releaseLock(supabase, JOB_NAME, lock.runId, runError);
        }
    } catch (error) {
        return routeErrorResponse('CronPolicyUpdate', error);
    }
}
