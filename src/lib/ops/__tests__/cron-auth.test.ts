/**
 * Cron Auth Tests
 *
 * Flag, secret, header and token checks for scheduled routes.
 */

import { POLICY_UPDATE_FLAG, bearerToken, validateCronRequest } from '../cron-auth';

function makeRequest(headers: Record<string, string> = {}): Request {
    return new Request('http://localhost:3000/api/cron/policy-update', { headers });
}

describe('Cron Auth', () => {
    const originalEnv = process.env;

    beforeEach(() => {
        process.env = { ...originalEnv };
        process.env[POLICY_UPDATE_FLAG] = 'true';
        process.env.CRON_SECRET = 'test-secret';
    });

    afterAll(() => {
        process.env = originalEnv;
    });

    it('denies when the flag is unset', () => {
        delete process.env[POLICY_UPDATE_FLAG];

        const result = validateCronRequest(makeRequest({ authorization: 'Bearer test-secret' }));

        expect(result).toEqual({
            authorized: false,
            code: 'CRON_AUTH_FLAG_DISABLED',
            reason: 'CRON_POLICY_UPDATE_ENABLED is not "true"',
        });
    });

    it('denies when the flag is "false"', () => {
        process.env[POLICY_UPDATE_FLAG] = 'false';

        const result = validateCronRequest(makeRequest({ authorization: 'Bearer test-secret' }));

        expect(result.code).toBe('CRON_AUTH_FLAG_DISABLED');
    });

    it('checks a custom flag name', () => {
        process.env.CRON_OTHER_ENABLED = 'true';

        const result = validateCronRequest(makeRequest({ authorization: 'Bearer test-secret' }), 'CRON_OTHER_ENABLED');

        expect(result.authorized).toBe(true);
    });

    it('denies when CRON_SECRET is not configured', () => {
        delete process.env.CRON_SECRET;

        const result = validateCronRequest(makeRequest({ authorization: 'Bearer anything' }));

        expect(result.code).toBe('CRON_AUTH_MISSING_SECRET');
        expect(result.reason).not.toContain('anything');
    });

    it('denies a request without an Authorization header', () => {
        const result = validateCronRequest(makeRequest());

        expect(result.code).toBe('CRON_AUTH_MISSING_HEADER');
        expect(result.reason).not.toContain('test-secret');
    });

    it('denies a mismatched token without echoing either value', () => {
        const result = validateCronRequest(makeRequest({ authorization: 'Bearer wrong-secret' }));

        expect(result.code).toBe('CRON_AUTH_INVALID');
        expect(result.reason).toBe('Bearer token does not match CRON_SECRET');
    });

    it('accepts the matching token with a lower-case scheme', () => {
        const result = validateCronRequest(makeRequest({ authorization: 'bearer test-secret' }));

        expect(result).toEqual({ authorized: true, code: 'CRON_AUTH_OK' });
    });

    describe('bearerToken', () => {
        it('strips the scheme', () => {
            expect(bearerToken('Bearer abc')).toBe('abc');
        });

        it('returns null for a missing or empty header', () => {
            expect(bearerToken(null)).toBeNull();
            expect(bearerToken('Bearer ')).toBeNull();
        });
    });
});
