import { createMockSupabase } from '@/lib/test-utils/mock-supabase';
import { deleteStockIndustry, getStockIndustry, saveStockIndustry } from '../industry-store';

const TABLE = 'stock_industry_mapping';

describe('Industry Store', () => {
    let errorSpy: jest.SpyInstance;

    beforeEach(() => {
        errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        errorSpy.mockRestore();
    });

    it('maps a cached row', async () => {
        const db = createMockSupabase().queue(TABLE, {
            data: {
                stock_code: '600519.SH',
                stock_name: '贵州茅台',
                industries: ['白酒', '消费'],
                analysis_summary: '高端白酒龙头',
                confidence_score: '0.9',
                updated_at: '2024-01-15T00:00:00Z',
            },
        });

        expect(await getStockIndustry(db.client, '600519.SH')).toEqual({
            stock_code: '600519.SH',
            stock_name: '贵州茅台',
            industries: ['白酒', '消费'],
            analysis_summary: '高端白酒龙头',
            confidence_score: 0.9,
            updated_at: '2024-01-15T00:00:00Z',
        });
    });

    it('returns null when nothing is cached', async () => {
        const db = createMockSupabase();

        expect(await getStockIndustry(db.client, '000001.SZ')).toBeNull();
    });

    it('upserts on the stock code and returns the saved row', async () => {
        const db = createMockSupabase();

        const saved = await saveStockIndustry(db.client, '512880.SH', '', {
            industries: ['证券'],
            analysis_summary: '证券行业ETF',
            confidence_score: 0.8,
        });

        expect(saved).toEqual(expect.objectContaining({ stock_code: '512880.SH', stock_name: null, industries: ['证券'] }));
        expect(db.argsOf(TABLE, 'upsert')?.[1]).toEqual({ onConflict: 'stock_code' });
    });

    it('throws when a delete fails', async () => {
        const db = createMockSupabase().queue(TABLE, { error: { message: 'permission denied' } });

        await expect(deleteStockIndustry(db.client, '600519.SH')).rejects.toThrow(
            'Failed to delete industry for 600519.SH: permission denied',
        );
    });
});
