/**
 * Cron Auth — scheduled route authorization
 *
 * A scheduled route runs only when its flag env var is "true" and the
 * request carries `Authorization: Bearer <CRON_SECRET>`.
 *
 * SAFETY:
 *   - Reasons never include the configured or supplied secret
 *   - Callers answer every unauthorized request with 404
 */

/** Enables GET /api/cron/policy-update */
export const POLICY_UPDATE_FLAG = 'CRON_POLICY_UPDATE_ENABLED';

export type CronAuthCode =
    | 'CRON_AUTH_FLAG_DISABLED'
    | 'CRON_AUTH_MISSING_SECRET'
    | 'CRON_AUTH_MISSING_HEADER'
    | 'CRON_AUTH_INVALID'
    | 'CRON_AUTH_OK';

export interface CronAuthResult {
    authorized: boolean;
    code: CronAuthCode;
    reason?: string;
}

function deny(code: CronAuthCode, reason: string): CronAuthResult {
    return { authorized: false, code, reason };
}

export function bearerToken(header: string | null): string | null {
    if (!header) return null;
    return header.replace(/^Bearer\s+/i, '').trim() || null;
}

/**
 * Checks, in order: flag enabled, secret configured, header present, token matches
 */
export function validateCronRequest(request: Request, flagEnv: string = POLICY_UPDATE_FLAG): CronAuthResult {
    if (process.env[flagEnv] !== 'true') {
        return deny('CRON_AUTH_FLAG_DISABLED', `${flagEnv} is not "true"`);
    }

    const secret = process.env.CRON_SECRET;
    if (!secret) {
        return deny('CRON_AUTH_MISSING_SECRET', 'CRON_SECRET is not configured on the server');
    }

    const token = bearerToken(request.headers.get('authorization'));
    if (!token) {
        return deny('CRON_AUTH_MISSING_HEADER', 'Expected header: Authorization: Bearer <CRON_SECRET>');
    }

    if (token !== secret) {
        return deny('CRON_AUTH_INVALID', 'Bearer token does not match CRON_SECRET');
    }

    return { authorized: true, code: 'CRON_AUTH_OK' };
}
