/**
 * Policy Update Cron Route Tests
 *
 * - Unauthorized or disabled requests answer 404 without work
 * - A held lock skips the run
 * - The lock is released with the run's error
 */

import { GET } from '../route';
import { createMockSupabase } from '@/lib/test-utils/mock-supabase';
import { createServerSupabase } from '@/lib/supabase/server';
import { acquireLock, releaseLock } from '@/lib/ops/job-lock';
import { runDataCollection } from '@/lib/policy/policy-fetcher';

jest.mock('@/lib/supabase/server', () => ({
    createServerSupabase: jest.fn(),
}));

jest.mock('@/lib/ops/job-lock', () => ({
    acquireLock: jest.fn(),
    releaseLock: jest.fn(),
}));

jest.mock('@/lib/policy/policy-fetcher', () => ({
    runDataCollection: jest.fn(),
}));

const mockAcquire = jest.mocked(acquireLock);
const mockRelease = jest.mocked(releaseLock);
const mockCollect = jest.mocked(runDataCollection);

function cronRequest(token?: string): Request {
    const headers: Record<string, string> = token ? { Authorization: `Bearer ${token}` } : {};
    return new Request('http://localhost/api/cron/policy-update', { headers });
}

describe('GET /api/cron/policy-update', () => {
    const db = createMockSupabase();
    let spies: jest.SpyInstance[];

    beforeEach(() => {
        jest.clearAllMocks();
        process.env.CRON_POLICY_UPDATE_ENABLED = 'true';
        process.env.CRON_SECRET = 'test-secret';
        jest.mocked(createServerSupabase).mockReturnValue(db.client);
        mockAcquire.mockResolvedValue({ acquired: true, runId: 'run-1' });
        mockRelease.mockResolvedValue(undefined);
        spies = [
            jest.spyOn(console, 'log').mockImplementation(() => undefined),
            jest.spyOn(console, 'warn').mockImplementation(() => undefined),
            jest.spyOn(console, 'error').mockImplementation(() => undefined),
        ];
    });

    afterEach(() => {
        spies.forEach(spy => spy.mockRestore());
        delete process.env.CRON_POLICY_UPDATE_ENABLED;
        delete process.env.CRON_SECRET;
    });

    it('returns 404 when the flag is off', async () => {
        process.env.CRON_POLICY_UPDATE_ENABLED = 'false';

        const response = await GET(cronRequest('test-secret'));

        expect(response.status).toBe(404);
        expect(mockAcquire).not.toHaveBeenCalled();
    });

    it('returns 404 for a wrong token', async () => {
        const response = await GET(cronRequest('wrong-secret'));

        expect(response.status).toBe(404);
        expect(mockCollect).not.toHaveBeenCalled();
    });

    it('skips when another run holds the lock', async () => {
        mockAcquire.mockResolvedValue({ acquired: false, runId: 'run-2', reason: 'Lock held until 2024-01-15T12:10:00Z' });

        const response = await GET(cronRequest('test-secret'));
        const data = await response.json();

        expect(response.status).toBe(200);
        expect(data.skipped).toBe(true);
        expect(data.reason).toBe('Lock held until 2024-01-15T12:10:00Z');
        expect(mockCollect).not.toHaveBeenCalled();
        expect(mockRelease).not.toHaveBeenCalled();
    });

    it('runs the collection and releases the lock', async () => {
        mockCollect.mockResolvedValue({ fetched: 12, fresh: 4, saved: 4, analyzed: 3 });

        const response = await GET(cronRequest('test-secret'));
        const data = await response.json();

        expect(response.status).toBe(200);
        expect(data).toEqual(expect.objectContaining({
            success: true,
            runId: 'run-1',
            fetched: 12,
            fresh: 4,
            saved: 4,
            analyzed: 3,
        }));
        expect(mockRelease).toHaveBeenCalledWith(db.client, 'policy-update', 'run-1', undefined);
    });

    it('releases the lock with the error when the run fails', async () => {
        mockCollect.mockRejectedValue(new Error('Failed to look up existing events: timeout'));

        const response = await GET(cronRequest('test-secret'));
        const data = await response.json();

        expect(response.status).toBe(500);
        expect(data).toEqual({ success: false, error: 'Failed to look up existing events: timeout' });
        expect(mockRelease).toHaveBeenCalledWith(
            db.client,
            'policy-update',
            'run-1',
            'Failed to look up existing events: timeout',
        );
    });
});
