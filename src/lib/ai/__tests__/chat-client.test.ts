/**
 * Chat Client Tests
 *
 * fetch is replaced per test; no network access.
 */

import { chatCompletion, classifyProviderError, extractChatText, isTransientFailure } from '../chat-client';
import { ConfigError } from '@/lib/config/env';

const originalFetch = global.fetch;

function jsonResponse(body: unknown, status: number = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('classifyProviderError', () => {
    it.each([
        [401, '', 'AUTH', false],
        [403, '', 'AUTH', false],
        [404, '', 'NOT_FOUND', false],
        [429, '', 'RATE_LIMIT', true],
        [400, '{"error": "insufficient balance"}', 'QUOTA', true],
        [400, 'bad json', 'BAD_REQUEST', false],
        [503, '', 'SERVER_ERROR', true],
        [418, '', 'UNKNOWN', false],
    ])('status %i with body %p → %s', (status, body, code, transient) => {
        expect(classifyProviderError(status, body)).toEqual({ code, transient });
    });
});

describe('extractChatText', () => {
    it('reads the first choice', () => {
        expect(extractChatText({ choices: [{ message: { content: 'hello' } }] })).toBe('hello');
    });

    it('returns "" for unexpected shapes', () => {
        expect(extractChatText(null)).toBe('');
        expect(extractChatText({ choices: [] })).toBe('');
        expect(extractChatText({ choices: [{ message: { content: 42 } }] })).toBe('');
    });
});

describe('chatCompletion', () => {
    let fetchMock: jest.Mock<Promise<Response>, [RequestInfo | URL, RequestInit?]>;
    let warnSpy: jest.SpyInstance;

    beforeEach(() => {
        process.env.SILICONFLOW_API_KEY = 'test-secret';
        process.env.SILICONFLOW_BASE_URL = 'https://llm.example.test/';
        fetchMock = jest.fn();
        global.fetch = fetchMock;
        warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        global.fetch = originalFetch;
        delete process.env.SILICONFLOW_API_KEY;
        delete process.env.SILICONFLOW_BASE_URL;
        warnSpy.mockRestore();
    });

    it('posts to the chat-completions endpoint and returns the trimmed text', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ choices: [{ message: { content: '  {"ok": true}\n' } }] }));

        const result = await chatCompletion([{ role: 'user', content: 'hi' }], { model: 'test-model', maxTokens: 100 });

        expect(result.success).toBe(true);
        expect(result.text).toBe('{"ok": true}');
        expect(result.metadata.model).toBe('test-model');
        expect(result.metadata.promptLength).toBe(2);
        expect(result.metadata.httpStatus).toBe(200);

        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe('https://llm.example.test/v1/chat/completions');
        expect(typeof init?.body === 'string' ? JSON.parse(init.body) : null).toEqual({
            model: 'test-model',
            messages: [{ role: 'user', content: 'hi' }],
            temperature: 0.3,
            max_tokens: 100,
        });
    });

    it('classifies HTTP failures and previews the provider message', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ error: { message: 'Invalid token' } }, 401));

        const result = await chatCompletion([{ role: 'user', content: 'hi' }]);

        expect(result).toEqual(expect.objectContaining({ success: false, errorCode: 'AUTH', error: 'Invalid token' }));
        expect(isTransientFailure(result)).toBe(false);
    });

    it('reports an empty completion', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ choices: [{ message: { content: '   ' } }] }));

        const result = await chatCompletion([{ role: 'user', content: 'hi' }]);

        expect(result.errorCode).toBe('EMPTY_RESPONSE');
    });

    it('reports a timeout when the request is aborted', async () => {
        const abort = new Error('aborted');
        abort.name = 'AbortError';
        fetchMock.mockRejectedValue(abort);

        const result = await chatCompletion([{ role: 'user', content: 'hi' }], { timeoutMs: 5 });

        expect(result.errorCode).toBe('TIMEOUT');
        expect(result.error).toBe('Request timed out after 5ms');
        expect(isTransientFailure(result)).toBe(true);
    });

    it('throws ConfigError before any request when the key is missing', async () => {
        delete process.env.SILICONFLOW_API_KEY;

        await expect(chatCompletion([{ role: 'user', content: 'hi' }])).rejects.toBeInstanceOf(ConfigError);
        expect(fetchMock).not.toHaveBeenCalled();
    });
});
