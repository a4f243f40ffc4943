/**
 * Environment Configuration
 *
 * Lazy getters over process.env. Nothing is read at import time so CLI
 * scripts can load dotenv before the first call.
 *
 * CONTRACT:
 *   - Required values throw ConfigError naming every missing variable
 *   - Optional numeric values fall back to defaults when absent or invalid
 *   - Secret values are never logged or echoed in error messages
 */

// =============================================================================
// Errors
// =============================================================================

export class ConfigError extends Error {
    readonly missing: string[];

    constructor(context: string, missing: string[]) {
        const verb = missing.length === 1 ? 'is' : 'are';
        super(`${context} not configured: ${missing.join(' and ')} ${verb} required.`);
        this.name = 'ConfigError';
        this.missing = missing;
    }
}

// =============================================================================
// Defaults
// =============================================================================

export const CONFIG_DEFAULTS = {
    siliconFlowBaseUrl: 'https://api.siliconflow.cn',
    siliconFlowModel: 'Qwen/Qwen2.5-7B-Instruct',
    aiRateLimitPerMinute: 10,
    policyFetchMinIntervalMinutes: 60,
    tushareBaseUrl: 'http://api.tushare.pro',
} as const;

// =============================================================================
// Helpers
// =============================================================================

function readTrimmed(name: string): string | undefined {
    const value = process.env[name];
    if (value === undefined) return undefined;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
}

function readPositiveInt(name: string, fallback: number): number {
    const raw = readTrimmed(name);
    if (!raw) return fallback;
    const parsed = parseInt(raw, 10);
    return !isNaN(parsed) && parsed > 0 ? parsed : fallback;
}

// =============================================================================
// Database
// =============================================================================

export interface SupabaseServerConfig {
    url: string;
    serviceRoleKey: string;
}

/**
 * Service-role credentials for server components, routes and scripts.
 * Throws ConfigError naming whichever variables are missing.
 */
export function getSupabaseServerConfig(): SupabaseServerConfig {
    const url = readTrimmed('SUPABASE_URL');
    const serviceRoleKey = readTrimmed('SUPABASE_SERVICE_ROLE_KEY');

    if (!url || !serviceRoleKey) {
        const missing = [
            ...(url ? [] : ['SUPABASE_URL']),
            ...(serviceRoleKey ? [] : ['SUPABASE_SERVICE_ROLE_KEY']),
        ];
        throw new ConfigError('Database', missing);
    }

    return { url, serviceRoleKey };
}

// =============================================================================
// AI provider
// =============================================================================

export interface SiliconFlowConfig {
    apiKey: string;
    baseUrl: string;
    model: string;
}

export function isSiliconFlowConfigured(): boolean {
    return Boolean(readTrimmed('SILICONFLOW_API_KEY'));
}

/**
 * Resolve the chat-completions provider settings.
 * Throws ConfigError when SILICONFLOW_API_KEY is missing.
 */
export function getSiliconFlowConfig(): SiliconFlowConfig {
    const apiKey = readTrimmed('SILICONFLOW_API_KEY');
    if (!apiKey) {
        throw new ConfigError('AI analysis', ['SILICONFLOW_API_KEY']);
    }

    const baseUrl = (readTrimmed('SILICONFLOW_BASE_URL') ?? CONFIG_DEFAULTS.siliconFlowBaseUrl)
        .replace(/\/+$/, '');

    return {
        apiKey,
        baseUrl,
        model: readTrimmed('SILICONFLOW_MODEL') ?? CONFIG_DEFAULTS.siliconFlowModel,
    };
}

/** Model used for stock → industry classification (falls back to the policy model) */
export function getStockIndustryModel(): string {
    return readTrimmed('STOCK_INDUSTRY_MODEL')
        ?? readTrimmed('SILICONFLOW_MODEL')
        ?? CONFIG_DEFAULTS.siliconFlowModel;
}

export function getAiRateLimitPerMinute(): number {
    return readPositiveInt('AI_RATE_LIMIT_PER_MINUTE', CONFIG_DEFAULTS.aiRateLimitPerMinute);
}

// =============================================================================
// Market data
// =============================================================================

export function isTushareConfigured(): boolean {
    return Boolean(readTrimmed('TUSHARE_TOKEN'));
}

export function getTushareToken(): string {
    const token = readTrimmed('TUSHARE_TOKEN');
    if (!token) {
        throw new ConfigError('K-line data', ['TUSHARE_TOKEN']);
    }
    return token;
}

export function getTushareBaseUrl(): string {
    return readTrimmed('TUSHARE_BASE_URL') ?? CONFIG_DEFAULTS.tushareBaseUrl;
}

// =============================================================================
// Policy collection
// =============================================================================

export function getPolicyFetchMinIntervalMs(): number {
    return readPositiveInt(
        'POLICY_FETCH_MIN_INTERVAL_MINUTES',
        CONFIG_DEFAULTS.policyFetchMinIntervalMinutes,
    ) * 60 * 1000;
}
