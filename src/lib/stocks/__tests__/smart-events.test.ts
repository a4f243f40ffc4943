/**
 * Smart Event Selection Tests
 */

import { createMockSupabase } from '@/lib/test-utils/mock-supabase';
import { makeEventDetails } from '@/lib/test-utils/fixtures';
import { listEventDetails, searchEventsByKeywords } from '@/lib/events/event-store';
import { getOrAnalyzeStockIndustry } from '../industry-analyzer';
import { getStockName } from '../stock-names';
import { getPoliciesByStock, getRelatedPolicies, getSmartEventsForStock } from '../smart-events';

jest.mock('@/lib/events/event-store', () => ({
    listEventDetails: jest.fn(),
    searchEventsByKeywords: jest.fn(),
}));
jest.mock('../industry-analyzer', () => ({
    getOrAnalyzeStockIndustry: jest.fn(),
}));
jest.mock('../stock-names', () => ({
    getStockName: jest.fn(),
}));

const mockListAll = jest.mocked(listEventDetails);
const mockSearch = jest.mocked(searchEventsByKeywords);
const mockIndustry = jest.mocked(getOrAnalyzeStockIndustry);
const mockName = jest.mocked(getStockName);

const ALL = [makeEventDetails({ id: 1 }), makeEventDetails({ id: 2 })];
const RELATED = [makeEventDetails({ id: 2, ai_industries: ['白酒'] })];

function industry(industries: string[]) {
    return {
        stock_code: '600519.SH',
        stock_name: '贵州茅台',
        industries,
        analysis_summary: null,
        confidence_score: null,
        updated_at: null,
    };
}

describe('getSmartEventsForStock', () => {
    const db = createMockSupabase();
    let logSpy: jest.SpyInstance;
    let errorSpy: jest.SpyInstance;

    beforeEach(() => {
        jest.resetAllMocks();
        mockListAll.mockResolvedValue(ALL);
        mockName.mockResolvedValue('贵州茅台');
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        logSpy.mockRestore();
        errorSpy.mockRestore();
    });

    it('shows every event on a broad-market index', async () => {
        await expect(getSmartEventsForStock(db.client, '000001.SH')).resolves.toBe(ALL);
        expect(mockIndustry).not.toHaveBeenCalled();
    });

    it('shows industry-related events for a stock', async () => {
        mockIndustry.mockResolvedValue(industry(['白酒', '消费']));
        mockSearch.mockResolvedValue(RELATED);

        await expect(getSmartEventsForStock(db.client, '600519')).resolves.toBe(RELATED);
        expect(mockIndustry).toHaveBeenCalledWith(db.client, '600519.SH', '贵州茅台');
        expect(mockSearch).toHaveBeenCalledWith(db.client, ['白酒', '消费'], 100);
    });

    it('falls back to every event without industries', async () => {
        mockIndustry.mockResolvedValue(null);

        await expect(getSmartEventsForStock(db.client, '600519')).resolves.toBe(ALL);
    });

    it('falls back to every event when nothing is related', async () => {
        mockIndustry.mockResolvedValue(industry(['白酒']));
        mockSearch.mockResolvedValue([]);

        await expect(getSmartEventsForStock(db.client, '600519')).resolves.toBe(ALL);
    });

    it('falls back to every event on errors', async () => {
        mockIndustry.mockRejectedValue(new Error('model down'));

        await expect(getSmartEventsForStock(db.client, '600519')).resolves.toBe(ALL);
        expect(errorSpy).toHaveBeenCalled();
    });
});

describe('related policies', () => {
    const db = createMockSupabase();

    beforeEach(() => {
        jest.resetAllMocks();
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('skips the search without industries', async () => {
        await expect(getRelatedPolicies(db.client, [])).resolves.toEqual([]);
        expect(mockSearch).not.toHaveBeenCalled();
    });

    it('returns [] for a stock without an industry mapping', async () => {
        mockName.mockResolvedValue(null);
        mockIndustry.mockResolvedValue(null);

        await expect(getPoliciesByStock(db.client, '603999')).resolves.toEqual([]);
        expect(mockIndustry).toHaveBeenCalledWith(db.client, '603999.SH', '');
    });
});
