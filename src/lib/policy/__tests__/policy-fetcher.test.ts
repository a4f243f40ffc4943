/**
 * Policy Data Collection Tests
 *
 * Sources, fetch log, event store and analyzer are mocked.
 */

import { createMockSupabase } from '@/lib/test-utils/mock-supabase';
import { findEventKeysByTitles, insertEvents } from '@/lib/events/event-store';
import { analyzeUnprocessedPolicies } from '@/lib/analysis/policy-analyzer';
import { recordFetchStatus, shouldSkipFetch } from '../fetch-log-store';
import { fetchCsrcPolicies } from '../sources/csrc';
import { fetchGovCnPolicies } from '../sources/gov-cn';
import { fetchMofPolicies } from '../sources/mof';
import { fetchNdrcPolicies } from '../sources/ndrc';
import {
    analyzeNewPolicies,
    dedupePolicies,
    filterNewPolicies,
    runDataCollection,
    selectInsertable,
} from '../policy-fetcher';
import type { FetchedPolicy } from '../types';

jest.mock('@/lib/events/event-store', () => ({
    findEventKeysByTitles: jest.fn(),
    insertEvents: jest.fn(),
}));

jest.mock('@/lib/analysis/policy-analyzer', () => ({
    analyzeUnprocessedPolicies: jest.fn(),
}));

jest.mock('../fetch-log-store', () => ({
    recordFetchStatus: jest.fn(),
    shouldSkipFetch: jest.fn(),
}));

jest.mock('../sources/gov-cn', () => ({
    fetchGovCnPolicies: jest.fn(),
}));

jest.mock('../sources/ndrc', () => ({
    fetchNdrcPolicies: jest.fn(),
}));

jest.mock('../sources/mof', () => ({
    fetchMofPolicies: jest.fn(),
}));

jest.mock('../sources/csrc', () => ({
    fetchCsrcPolicies: jest.fn(),
}));

const mockFindKeys = jest.mocked(findEventKeysByTitles);
const mockInsert = jest.mocked(insertEvents);
const mockAnalyze = jest.mocked(analyzeUnprocessedPolicies);
const mockRecord = jest.mocked(recordFetchStatus);
const mockSkip = jest.mocked(shouldSkipFetch);
const mockGovCn = jest.mocked(fetchGovCnPolicies);
const mockCsrc = jest.mocked(fetchCsrcPolicies);
const mockNdrc = jest.mocked(fetchNdrcPolicies);
const mockMof = jest.mocked(fetchMofPolicies);

function policy(title: string, date: string, sourceUrl: string): FetchedPolicy {
    return {
        date,
        title,
        event_type: '经济政策',
        source_url: sourceUrl,
        department: '国务院',
        policy_level: '国家级',
        impact_level: '中',
        content_type: '政策',
    };
}

const A = policy('关于推进新能源汽车产业发展的意见', '2024-01-15', 'https://www.gov.cn/a.htm');
const B = policy('关于完善税收优惠政策的通知', '2024-01-12', 'https://www.gov.cn/b.htm');
const C = policy('关于发布上市公司监管指引的公告', '2024-01-10', 'http://www.csrc.gov.cn/c.shtml');

describe('Policy data collection', () => {
    const savedKey = process.env.SILICONFLOW_API_KEY;
    const db = createMockSupabase();
    let spies: jest.SpyInstance[];

    beforeEach(() => {
        jest.clearAllMocks();
        process.env.SILICONFLOW_API_KEY = 'test-secret';
        mockSkip.mockResolvedValue(false);
        mockRecord.mockResolvedValue(undefined);
        mockNdrc.mockResolvedValue([]);
        mockMof.mockResolvedValue([]);
        spies = [
            jest.spyOn(console, 'log').mockImplementation(() => undefined),
            jest.spyOn(console, 'warn').mockImplementation(() => undefined),
            jest.spyOn(console, 'error').mockImplementation(() => undefined),
        ];
    });

    afterEach(() => {
        spies.forEach(spy => spy.mockRestore());
        if (savedKey === undefined) {
            delete process.env.SILICONFLOW_API_KEY;
        } else {
            process.env.SILICONFLOW_API_KEY = savedKey;
        }
    });

    describe('pure steps', () => {
        it('dedupes on trimmed title and source url', () => {
            const padded = { ...A, title: ` ${A.title} ` };
            const otherUrl = { ...A, source_url: 'https://www.gov.cn/a2.htm' };

            expect(dedupePolicies([A, padded, otherUrl, B])).toEqual([A, otherUrl, B]);
        });

        it('drops policies stored with the same title and url', () => {
            const existing = [
                { title: A.title, date: '2024-01-15', source_url: A.source_url },
                { title: B.title, date: '2024-01-12', source_url: 'https://www.gov.cn/elsewhere.htm' },
            ];

            expect(filterNewPolicies([A, B], existing)).toEqual([B]);
        });

        it('keeps one policy per title and date', () => {
            const sameDay = { ...B, source_url: 'https://www.gov.cn/b-copy.htm' };
            const existing = [{ title: C.title, date: C.date, source_url: null }];

            expect(selectInsertable([B, sameDay, C], existing)).toEqual([B]);
        });
    });

    describe('analyzeNewPolicies', () => {
        it('does nothing when nothing was saved', async () => {
            expect(await analyzeNewPolicies(db.client, 0)).toBe(0);
            expect(mockAnalyze).not.toHaveBeenCalled();
        });

        it('skips analysis when the model is not configured', async () => {
            delete process.env.SILICONFLOW_API_KEY;

            expect(await analyzeNewPolicies(db.client, 3)).toBe(0);
            expect(mockAnalyze).not.toHaveBeenCalled();
        });

        it('analyzes small batches one at a time', async () => {
            mockAnalyze.mockResolvedValue({ selected: 2, analyzed: 2, failed: 0, skipped: 0 });

            expect(await analyzeNewPolicies(db.client, 2)).toBe(2);
            expect(mockAnalyze).toHaveBeenCalledWith(db.client, { limit: 2, maxConcurrent: 1 });
        });

        it('widens larger batches', async () => {
            mockAnalyze.mockResolvedValue({ selected: 10, analyzed: 9, failed: 1, skipped: 0 });

            expect(await analyzeNewPolicies(db.client, 5)).toBe(9);
            expect(mockAnalyze).toHaveBeenCalledWith(db.client, { limit: 10, maxConcurrent: 3 });
        });

        it('swallows analysis failures into a zero count', async () => {
            mockAnalyze.mockRejectedValue(new Error('provider down'));

            expect(await analyzeNewPolicies(db.client, 1)).toBe(0);
        });
    });

    describe('runDataCollection', () => {
        it('fetches, filters, inserts and analyzes', async () => {
            mockGovCn.mockResolvedValue([A, B, A]);
            mockCsrc.mockResolvedValue([C]);
            mockFindKeys.mockResolvedValue([{ title: B.title, date: B.date, source_url: B.source_url }]);
            mockInsert.mockResolvedValue(2);
            mockAnalyze.mockResolvedValue({ selected: 2, analyzed: 2, failed: 0, skipped: 0 });

            const result = await runDataCollection(db.client, { targetMonth: '2024-01', maxPages: 2 });

            expect(result).toEqual({ fetched: 3, fresh: 2, saved: 2, analyzed: 2 });
            expect(mockGovCn).toHaveBeenCalledWith({ targetMonth: '2024-01', maxPages: 2, now: undefined });
            expect(mockFindKeys).toHaveBeenCalledWith(db.client, [A.title, B.title, C.title]);
            expect(mockInsert).toHaveBeenCalledWith(db.client, [A, C]);
            expect(mockRecord).toHaveBeenCalledWith(db.client, 'gov_cn', 'success', 3);
            expect(mockRecord).toHaveBeenCalledWith(db.client, 'csrc', 'success', 1);
        });

        it('collects every source and dedupes across them', async () => {
            const fromNdrc = policy('关于印发促进民间投资若干措施的通知', '2024-01-09', 'https://www.ndrc.gov.cn/d.html');
            const fromMof = policy('关于延续实施个人所得税优惠政策的公告', '2024-01-08', 'https://www.mof.gov.cn/e.htm');
            mockGovCn.mockResolvedValue([A]);
            mockNdrc.mockResolvedValue([fromNdrc, A]);
            mockMof.mockResolvedValue([fromMof]);
            mockCsrc.mockResolvedValue([C]);
            mockFindKeys.mockResolvedValue([]);
            mockInsert.mockResolvedValue(4);
            mockAnalyze.mockResolvedValue({ selected: 4, analyzed: 4, failed: 0, skipped: 0 });

            const result = await runDataCollection(db.client, { maxPages: 3 });

            expect(result).toEqual({ fetched: 4, fresh: 4, saved: 4, analyzed: 4 });
            expect(mockNdrc).toHaveBeenCalledWith({ targetMonth: undefined, maxPages: 3, now: undefined });
            expect(mockMof).toHaveBeenCalledWith({ targetMonth: undefined, maxPages: 3, now: undefined });
            expect(mockInsert).toHaveBeenCalledWith(db.client, [A, fromNdrc, fromMof, C]);
            expect(mockRecord).toHaveBeenCalledWith(db.client, 'ndrc', 'success', 2);
            expect(mockRecord).toHaveBeenCalledWith(db.client, 'mof', 'success', 1);
        });

        it('records a failing source and continues with the others', async () => {
            mockGovCn.mockRejectedValue(new Error('HTTP 503'));
            mockCsrc.mockResolvedValue([C]);
            mockFindKeys.mockResolvedValue([]);
            mockInsert.mockResolvedValue(1);
            mockAnalyze.mockResolvedValue({ selected: 1, analyzed: 1, failed: 0, skipped: 0 });

            const result = await runDataCollection(db.client);

            expect(result).toEqual({ fetched: 1, fresh: 1, saved: 1, analyzed: 1 });
            expect(mockRecord).toHaveBeenCalledWith(db.client, 'gov_cn', 'error', 0, 'HTTP 503');
        });

        it('skips sources inside their fetch interval', async () => {
            mockSkip.mockResolvedValue(true);
            mockFindKeys.mockResolvedValue([]);

            const result = await runDataCollection(db.client);

            expect(result).toEqual({ fetched: 0, fresh: 0, saved: 0, analyzed: 0 });
            expect(mockGovCn).not.toHaveBeenCalled();
            expect(mockNdrc).not.toHaveBeenCalled();
            expect(mockMof).not.toHaveBeenCalled();
            expect(mockCsrc).not.toHaveBeenCalled();
            expect(mockInsert).not.toHaveBeenCalled();
        });
    });
});
