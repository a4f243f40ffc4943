import { createMockSupabase } from '@/lib/test-utils/mock-supabase';
import { fetchSecurityName } from '@/lib/kline/tushare-client';
import { getStockName, lookupKnownName } from '../stock-names';

jest.mock('@/lib/kline/tushare-client', () => ({
    fetchSecurityName: jest.fn(),
}));

const mockFetchName = jest.mocked(fetchSecurityName);

describe('stock names', () => {
    let warnSpy: jest.SpyInstance;

    beforeEach(() => {
        mockFetchName.mockReset();
        delete process.env.TUSHARE_TOKEN;
        warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        warnSpy.mockRestore();
        delete process.env.TUSHARE_TOKEN;
    });

    it('finds bundled names by ts_code or bare code', () => {
        expect(lookupKnownName('600519')).toBe('贵州茅台');
        expect(lookupKnownName('000001.SH')).toBe('上证指数');
        expect(lookupKnownName('000001')).toBe('平安银行');
        expect(lookupKnownName('603999')).toBeNull();
    });

    it('uses the cached industry row next', async () => {
        const db = createMockSupabase().queue('stock_industry_mapping', {
            data: { stock_code: '603999.SH', stock_name: '读者传媒', industries: [] },
        });

        await expect(getStockName(db.client, '603999')).resolves.toBe('读者传媒');
        expect(mockFetchName).not.toHaveBeenCalled();
    });

    it('asks TuShare when configured', async () => {
        process.env.TUSHARE_TOKEN = 'test-token';
        mockFetchName.mockResolvedValue('读者传媒');
        const db = createMockSupabase();

        await expect(getStockName(db.client, '603999')).resolves.toBe('读者传媒');
        expect(mockFetchName).toHaveBeenCalledWith('603999.SH', 'stock');
    });

    it('returns null when nothing knows the code', async () => {
        const db = createMockSupabase().queue('stock_industry_mapping', { error: { message: 'db down' } });

        await expect(getStockName(db.client, '603999')).resolves.toBeNull();
        expect(warnSpy).toHaveBeenCalled();
    });

    it('swallows TuShare failures as null', async () => {
        process.env.TUSHARE_TOKEN = 'test-token';
        mockFetchName.mockRejectedValue(new Error('timeout'));

        await expect(getStockName(createMockSupabase().client, '603999')).resolves.toBeNull();
    });
});
