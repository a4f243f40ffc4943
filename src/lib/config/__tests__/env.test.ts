import {
    ConfigError,
    CONFIG_DEFAULTS,
    getSiliconFlowConfig,
    getStockIndustryModel,
    getAiRateLimitPerMinute,
    getPolicyFetchMinIntervalMs,
    getSupabaseServerConfig,
    getTushareToken,
} from '../env';

const KEYS = [
    'SILICONFLOW_API_KEY',
    'SILICONFLOW_BASE_URL',
    'SILICONFLOW_MODEL',
    'STOCK_INDUSTRY_MODEL',
    'AI_RATE_LIMIT_PER_MINUTE',
    'POLICY_FETCH_MIN_INTERVAL_MINUTES',
    'TUSHARE_TOKEN',
    'SUPABASE_URL',
    'SUPABASE_SERVICE_ROLE_KEY',
];

describe('env config', () => {
    beforeEach(() => {
        for (const key of KEYS) delete process.env[key];
    });

    afterAll(() => {
        for (const key of KEYS) delete process.env[key];
    });

    it('throws ConfigError naming the missing key', () => {
        expect(() => getSiliconFlowConfig()).toThrow(ConfigError);
        expect(() => getSiliconFlowConfig()).toThrow('AI analysis not configured: SILICONFLOW_API_KEY is required.');
        expect(() => getTushareToken()).toThrow('TUSHARE_TOKEN');
    });

    it('applies defaults and strips trailing slashes', () => {
        process.env.SILICONFLOW_API_KEY = 'test-secret';
        process.env.SILICONFLOW_BASE_URL = 'https://llm.example.test//';

        expect(getSiliconFlowConfig()).toEqual({
            apiKey: 'test-secret',
            baseUrl: 'https://llm.example.test',
            model: CONFIG_DEFAULTS.siliconFlowModel,
        });
    });

    it('treats blank values as missing', () => {
        process.env.SILICONFLOW_API_KEY = '   ';

        expect(() => getSiliconFlowConfig()).toThrow(ConfigError);
    });

    it('falls back from the industry model to the policy model', () => {
        expect(getStockIndustryModel()).toBe(CONFIG_DEFAULTS.siliconFlowModel);

        process.env.SILICONFLOW_MODEL = 'policy-model';
        expect(getStockIndustryModel()).toBe('policy-model');

        process.env.STOCK_INDUSTRY_MODEL = 'industry-model';
        expect(getStockIndustryModel()).toBe('industry-model');
    });

    it('reads positive integers and ignores invalid ones', () => {
        expect(getAiRateLimitPerMinute()).toBe(10);

        process.env.AI_RATE_LIMIT_PER_MINUTE = '30';
        expect(getAiRateLimitPerMinute()).toBe(30);

        process.env.AI_RATE_LIMIT_PER_MINUTE = '-1';
        expect(getAiRateLimitPerMinute()).toBe(10);

        process.env.POLICY_FETCH_MIN_INTERVAL_MINUTES = '5';
        expect(getPolicyFetchMinIntervalMs()).toBe(300_000);
    });

    it('names each missing database variable', () => {
        process.env.SUPABASE_URL = 'https://db.example.test';

        expect(() => getSupabaseServerConfig()).toThrow(
            'Database not configured: SUPABASE_SERVICE_ROLE_KEY is required.',
        );

        process.env.SUPABASE_SERVICE_ROLE_KEY = 'test-secret';
        expect(getSupabaseServerConfig()).toEqual({
            url: 'https://db.example.test',
            serviceRoleKey: 'test-secret',
        });
    });
});
