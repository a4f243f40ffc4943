/**
 * Job Lock Tests
 *
 * Acquisition, contention, stale takeover and release against the
 * in-process Supabase stand-in.
 */

import { createMockSupabase } from '@/lib/test-utils/mock-supabase';
import { acquireLock, releaseLock, expireStaleLocks } from '../job-lock';

const TABLE = 'ops_job_locks';

describe('Job Lock', () => {
    describe('acquireLock', () => {
        it('acquires when no lock row exists', async () => {
            const db = createMockSupabase();

            const result = await acquireLock(db.client, 'policy-update', 60);

            expect(result.acquired).toBe(true);
            expect(result.runId.startsWith('policy-update-')).toBe(true);
            expect(db.callsFor(TABLE, 'delete')).toHaveLength(0);

            const inserted = db.argsOf(TABLE, 'insert')?.[0];
            expect(inserted).toEqual(expect.objectContaining({
                job_name: 'policy-update',
                run_id: result.runId,
                released_at: null,
            }));
        });

        it('skips while another run holds an active lock', async () => {
            const db = createMockSupabase().queue(TABLE, {
                data: {
                    job_name: 'policy-update',
                    run_id: 'policy-update-existing',
                    expires_at: new Date(Date.now() + 60_000).toISOString(),
                    released_at: null,
                },
            });

            const result = await acquireLock(db.client, 'policy-update', 60);

            expect(result.acquired).toBe(false);
            expect(result.runId).toBe('policy-update-existing');
            expect(result.reason).toContain('Lock held by policy-update-existing');
            expect(db.callsFor(TABLE, 'insert')).toHaveLength(0);
        });

        it('takes over an expired lock', async () => {
            const db = createMockSupabase().queue(TABLE, {
                data: {
                    job_name: 'policy-update',
                    run_id: 'policy-update-old',
                    expires_at: new Date(Date.now() - 60_000).toISOString(),
                    released_at: null,
                },
            });

            const result = await acquireLock(db.client, 'policy-update', 60);

            expect(result.acquired).toBe(true);
            expect(db.callsFor(TABLE, 'delete')).toHaveLength(1);
            expect(db.callsFor(TABLE, 'insert')).toHaveLength(1);
        });

        it('takes over a released lock', async () => {
            const db = createMockSupabase().queue(TABLE, {
                data: {
                    job_name: 'policy-update',
                    run_id: 'policy-update-done',
                    expires_at: new Date(Date.now() + 60_000).toISOString(),
                    released_at: new Date().toISOString(),
                },
            });

            const result = await acquireLock(db.client, 'policy-update', 60);

            expect(result.acquired).toBe(true);
        });

        it('reports a lost insert race as not acquired', async () => {
            const db = createMockSupabase().queue(
                TABLE,
                { data: null },
                { error: { message: 'duplicate key value violates unique constraint' } },
            );

            const result = await acquireLock(db.client, 'policy-update', 60);

            expect(result.acquired).toBe(false);
            expect(result.reason).toBe('Insert failed (race): duplicate key value violates unique constraint');
        });

        it('throws when the lock row cannot be read', async () => {
            const db = createMockSupabase().queue(TABLE, { error: { message: 'connection refused' } });

            await expect(acquireLock(db.client, 'policy-update')).rejects.toThrow(
                'Failed to read job lock policy-update: connection refused',
            );
        });
    });

    describe('releaseLock', () => {
        it('marks only the caller run as released', async () => {
            const db = createMockSupabase();

            await releaseLock(db.client, 'policy-update', 'run-123');

            const update = db.argsOf(TABLE, 'update')?.[0];
            expect(update).toEqual(expect.objectContaining({ last_error: null }));
            expect(db.callsFor(TABLE, 'eq').map(c => c.args)).toEqual([
                ['job_name', 'policy-update'],
                ['run_id', 'run-123'],
            ]);
        });

        it('truncates the recorded error to 500 chars', async () => {
            const db = createMockSupabase();

            await releaseLock(db.client, 'policy-update', 'run-123', 'x'.repeat(1000));

            const update = db.argsOf(TABLE, 'update')?.[0];
            expect(update).toEqual(expect.objectContaining({ last_error: 'x'.repeat(500) }));
        });
    });

    describe('expireStaleLocks', () => {
        it('returns the number of deleted rows', async () => {
            const db = createMockSupabase().queue(TABLE, {
                data: [{ job_name: 'stale-1' }, { job_name: 'stale-2' }],
            });

            await expect(expireStaleLocks(db.client)).resolves.toEqual({ expired: 2 });
        });

        it('returns 0 when nothing is stale', async () => {
            const db = createMockSupabase().queue(TABLE, { data: [] });

            await expect(expireStaleLocks(db.client)).resolves.toEqual({ expired: 0 });
        });
    });
});
