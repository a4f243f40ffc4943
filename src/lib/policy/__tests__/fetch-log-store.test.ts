import { createMockSupabase } from '@/lib/test-utils/mock-supabase';
import { isWithinFetchInterval, recordFetchStatus, shouldSkipFetch, type FetchLogEntry } from '../fetch-log-store';

const NOW = new Date('2024-01-15T12:00:00Z');
const HOUR_MS = 60 * 60 * 1000;

function entry(overrides: Partial<FetchLogEntry>): FetchLogEntry {
    return {
        source_name: 'gov_cn',
        last_fetch_time: '2024-01-15T11:30:00Z',
        fetch_status: 'success',
        error_message: null,
        ...overrides,
    };
}

describe('Fetch log', () => {
    let spies: jest.SpyInstance[];

    beforeEach(() => {
        spies = [
            jest.spyOn(console, 'log').mockImplementation(() => undefined),
            jest.spyOn(console, 'warn').mockImplementation(() => undefined),
            jest.spyOn(console, 'error').mockImplementation(() => undefined),
        ];
    });

    afterEach(() => {
        spies.forEach(spy => spy.mockRestore());
    });

    describe('isWithinFetchInterval', () => {
        it('never skips a source without history', () => {
            expect(isWithinFetchInterval(null, HOUR_MS, NOW)).toBe(false);
            expect(isWithinFetchInterval(entry({ last_fetch_time: null }), HOUR_MS, NOW)).toBe(false);
        });

        it('skips a recent success', () => {
            expect(isWithinFetchInterval(entry({}), HOUR_MS, NOW)).toBe(true);
        });

        it('fetches again once the interval has passed', () => {
            expect(isWithinFetchInterval(entry({ last_fetch_time: '2024-01-15T11:00:00Z' }), HOUR_MS, NOW)).toBe(false);
        });

        it('skips a recent error only when it carries a message', () => {
            expect(isWithinFetchInterval(entry({ fetch_status: 'error', error_message: 'timeout' }), HOUR_MS, NOW)).toBe(true);
            expect(isWithinFetchInterval(entry({ fetch_status: 'error' }), HOUR_MS, NOW)).toBe(false);
        });

        it('ignores an unparseable timestamp', () => {
            expect(isWithinFetchInterval(entry({ last_fetch_time: 'yesterday' }), HOUR_MS, NOW)).toBe(false);
        });
    });

    it('reads the last fetch before deciding', async () => {
        const db = createMockSupabase().queue('fetch_log', {
            data: { last_fetch_time: '2024-01-15T11:45:00Z', fetch_status: 'success', error_message: null },
        });

        expect(await shouldSkipFetch(db.client, 'csrc', HOUR_MS, NOW)).toBe(true);
        expect(db.argsOf('fetch_log', 'eq')).toEqual(['source_name', 'csrc']);
    });

    it('upserts the fetch status per source', async () => {
        const db = createMockSupabase();

        await recordFetchStatus(db.client, 'gov_cn', 'error', 0, 'HTTP 503');

        expect(db.argsOf('fetch_log', 'upsert')).toEqual([
            expect.objectContaining({
                source_name: 'gov_cn',
                fetch_status: 'error',
                error_message: 'HTTP 503',
                records_fetched: 0,
            }),
            { onConflict: 'source_name' },
        ]);
    });

    it('throws when the status cannot be recorded', async () => {
        const db = createMockSupabase().queue('fetch_log', { error: { message: 'permission denied' } });

        await expect(recordFetchStatus(db.client, 'csrc', 'success', 3)).rejects.toThrow('Failed to record fetch status for csrc');
    });
});
