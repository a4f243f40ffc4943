/**
 * Job Lock — DB-backed Advisory Locks for Cron Jobs
 *
 * Uses the ops_job_locks table so only one collection run is active at a
 * time. Stale locks auto-expire based on TTL.
 *
 * SAFETY:
 * - acquireLock never throws on contention: it returns acquired=false
 * - releaseLock only touches the caller's own run_id
 * - expireStaleLocks cleans up crashed jobs
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { v4 as uuidv4 } from 'uuid';
import { isRecord, readString } from '@/lib/shared/type-guards';

// =============================================================================
// Types
// =============================================================================

export interface LockResult {
    acquired: boolean;
    runId: string;
    reason?: string;
}

export const DEFAULT_LOCK_TTL_SECONDS = 600;

// =============================================================================
// Core Functions
// =============================================================================

/**
 * Attempt to acquire a named job lock.
 *
 * 1. Read the existing row for this job
 * 2. Active (not expired, not released) → skip
 * 3. Stale or released → delete, then insert a fresh row
 */
export async function acquireLock(
    supabase: SupabaseClient,
    jobName: string,
    ttlSeconds: number = DEFAULT_LOCK_TTL_SECONDS,
): Promise<LockResult> {
    const runId = `${jobName}-${uuidv4()}`;
    const now = new Date();
    const expiresAt = new Date(now.getTime() + ttlSeconds * 1000);

    const { data: existing, error: readError } = await supabase
        .from('ops_job_locks')
        .select('job_name, run_id, expires_at, released_at')
        .eq('job_name', jobName)
        .limit(1)
        .maybeSingle();

    if (readError) {
        console.error('[JobLock] read error:', readError);
        throw new Error(`Failed to read job lock ${jobName}: ${readError.message}`);
    }

    if (isRecord(existing)) {
        const heldBy = readString(existing, 'run_id') ?? 'unknown';
        const expiresText = readString(existing, 'expires_at');
        const isReleased = Boolean(readString(existing, 'released_at'));
        const isExpired = !expiresText || new Date(expiresText) <= now;

        if (!isReleased && !isExpired) {
            return {
                acquired: false,
                runId: heldBy,
                reason: `Lock held by ${heldBy}, expires at ${expiresText}`,
            };
        }

        const { error: deleteError } = await supabase
            .from('ops_job_locks')
            .delete()
            .eq('job_name', jobName);

        if (deleteError) {
            console.error('[JobLock] stale lock delete error:', deleteError);
            throw new Error(`Failed to clear stale lock ${jobName}: ${deleteError.message}`);
        }
    }

    const { error } = await supabase
        .from('ops_job_locks')
        .insert({
            job_name: jobName,
            run_id: runId,
            acquired_at: now.toISOString(),
            expires_at: expiresAt.toISOString(),
            released_at: null,
            last_error: null,
        });

    if (error) {
        // Another run inserted first
        return {
            acquired: false,
            runId,
            reason: `Insert failed (race): ${error.message.slice(0, 100)}`,
        };
    }

    return { acquired: true, runId };
}

/**
 * Mark a lock released, recording the run's error if it had one
 */
export async function releaseLock(
    supabase: SupabaseClient,
    jobName: string,
    runId: string,
    errorMessage?: string,
): Promise<void> {
    const { error } = await supabase
        .from('ops_job_locks')
        .update({
            released_at: new Date().toISOString(),
            last_error: errorMessage?.slice(0, 500) ?? null,
        })
        .eq('job_name', jobName)
        .eq('run_id', runId);

    if (error) {
        console.error('[JobLock] release error:', error);
        throw new Error(`Failed to release job lock ${jobName}: ${error.message}`);
    }
}

/**
 * Delete unreleased locks past their expires_at; returns how many
 */
export async function expireStaleLocks(supabase: SupabaseClient): Promise<{ expired: number }> {
    const { data, error } = await supabase
        .from('ops_job_locks')
        .delete()
        .lt('expires_at', new Date().toISOString())
        .is('released_at', null)
        .select('job_name');

    if (error) {
        console.error('[JobLock] expire error:', error);
        throw new Error(`Failed to expire stale locks: ${error.message}`);
    }

    return { expired: Array.isArray(data) ? data.length : 0 };
}
