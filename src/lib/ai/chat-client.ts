/**
 * Chat Client
 *
 * Server-side client for an OpenAI-compatible chat-completions endpoint
 * (SiliconFlow by default). This is the ONLY place that makes LLM calls.
 *
 * Safety rules:
 * - Server-side only
 * - No secrets in responses or logs (headers are never logged)
 * - Strict per-request timeout via AbortController
 * - Single attempt per call: failures are classified and returned, never retried
 * - Missing API key throws ConfigError before any request is made
 */

import { getSiliconFlowConfig } from '@/lib/config/env';
import { isRecord } from '@/lib/shared/type-guards';

// =============================================================================
// Types
// =============================================================================

export type ChatErrorCode =
    | 'AUTH'
    | 'QUOTA'
    | 'RATE_LIMIT'
    | 'BAD_REQUEST'
    | 'SERVER_ERROR'
    | 'NOT_FOUND'
    | 'TIMEOUT'
    | 'EMPTY_RESPONSE'
    | 'UNKNOWN';

export interface ProviderErrorClassification {
    code: ChatErrorCode;
    /** True when the same request could succeed later (rate limit, 5xx, timeout) */
    transient: boolean;
}

export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface ChatOptions {
    model?: string;
    maxTokens?: number;
    temperature?: number;
    timeoutMs?: number;
}

export interface ChatResultMetadata {
    model: string;
    promptLength: number;
    latencyMs: number;
    httpStatus?: number;
}

export interface ChatResult {
    success: boolean;
    text?: string;
    errorCode?: ChatErrorCode;
    error?: string;
    metadata: ChatResultMetadata;
}

export const CHAT_DEFAULTS = {
    maxTokens: 2000,
    temperature: 0.3,
    timeoutMs: 120_000,
    endpointPath: '/v1/chat/completions',
} as const;

// =============================================================================
// Error classification
// =============================================================================

/**
 * Classify a provider failure from HTTP status and body text
 */
export function classifyProviderError(status: number, bodyText: string): ProviderErrorClassification {
    const lowerBody = bodyText.toLowerCase();

    if (status === 401 || status === 403) {
        return { code: 'AUTH', transient: false };
    }

    if (status === 404) {
        return { code: 'NOT_FOUND', transient: false };
    }

    if (status === 429) {
        return { code: 'RATE_LIMIT', transient: true };
    }

    const quotaPatterns = [
        'resource_exhausted',
        'quota',
        'rate limit',
        'rate_limit',
        'insufficient_quota',
        'insufficient balance',
    ];

    for (const pattern of quotaPatterns) {
        if (lowerBody.includes(pattern)) {
            return { code: 'QUOTA', transient: true };
        }
    }

    if (status === 400) {
        return { code: 'BAD_REQUEST', transient: false };
    }

    if (status >= 500 && status < 600) {
        return { code: 'SERVER_ERROR', transient: true };
    }

    return { code: 'UNKNOWN', transient: false };
}

// =============================================================================
// Request / response shaping
// =============================================================================

function buildChatRequest(messages: ChatMessage[], model: string, maxTokens: number, temperature: number): object {
    return {
        model,
        messages,
        temperature,
        max_tokens: maxTokens,
    };
}

/**
 * Extract the first choice's content from a chat-completions response
 */
export function extractChatText(data: unknown): string {
    if (!isRecord(data) || !Array.isArray(data.choices)) return '';
    const first: unknown = data.choices[0];
    if (!isRecord(first) || !isRecord(first.message)) return '';
    const content = first.message.content;
    return typeof content === 'string' ? content : '';
}

/**
 * Parse error text to extract message preview (first 200 chars, no secrets)
 */
function extractMessagePreview(errorText: string): string {
    try {
        const parsed: unknown = JSON.parse(errorText);
        if (isRecord(parsed)) {
            const err = parsed.error;
            if (isRecord(err) && typeof err.message === 'string') {
                return err.message.slice(0, 200);
            }
            if (typeof parsed.message === 'string') {
                return parsed.message.slice(0, 200);
            }
            if (err !== undefined) {
                return JSON.stringify(err).slice(0, 200);
            }
        }
    } catch {
        // not JSON: fall through to the raw body
    }
    return errorText.slice(0, 200);
}

function isAbortError(error: unknown): boolean {
    return error instanceof Error && error.name === 'AbortError';
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Send one chat-completions request.
 *
 * Returns a ChatResult for every provider outcome (including timeouts and
 * network errors). Throws only ConfigError when the API key is missing.
 */
export async function chatCompletion(messages: ChatMessage[], opts: ChatOptions = {}): Promise<ChatResult> {
    const config = getSiliconFlowConfig();
    const model = opts.model ?? config.model;
    const maxTokens = opts.maxTokens ?? CHAT_DEFAULTS.maxTokens;
    const temperature = opts.temperature ?? CHAT_DEFAULTS.temperature;
    const timeoutMs = opts.timeoutMs ?? CHAT_DEFAULTS.timeoutMs;
    const promptLength = messages.reduce((sum, m) => sum + m.content.length, 0);
    const endpoint = `${config.baseUrl}${CHAT_DEFAULTS.endpointPath}`;

    const startedAt = Date.now();
    const metadata = (httpStatus?: number): ChatResultMetadata => ({
        model,
        promptLength,
        latencyMs: Date.now() - startedAt,
        ...(httpStatus !== undefined ? { httpStatus } : {}),
    });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
        const response = await fetch(endpoint, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                Authorization: `Bearer ${config.apiKey}`,
            },
            body: JSON.stringify(buildChatRequest(messages, model, maxTokens, temperature)),
            signal: controller.signal,
        });

        if (!response.ok) {
            const errorText = await response.text();
            const classification = classifyProviderError(response.status, errorText);
            console.warn(`[ChatClient] ${model} returned ${response.status} (${classification.code})`);
            return {
                success: false,
                errorCode: classification.code,
                error: extractMessagePreview(errorText) || `HTTP ${response.status}`,
                metadata: metadata(response.status),
            };
        }

        const data: unknown = await response.json();
        const text = extractChatText(data).trim();

        if (!text) {
            return {
                success: false,
                errorCode: 'EMPTY_RESPONSE',
                error: 'Provider returned no message content',
                metadata: metadata(response.status),
            };
        }

        return { success: true, text, metadata: metadata(response.status) };
    } catch (error) {
        if (isAbortError(error)) {
            console.warn(`[ChatClient] ${model} timed out after ${timeoutMs}ms`);
            return {
                success: false,
                errorCode: 'TIMEOUT',
                error: `Request timed out after ${timeoutMs}ms`,
                metadata: metadata(),
            };
        }
        const message = error instanceof Error ? error.message : 'Unknown error';
        console.warn(`[ChatClient] ${model} request failed: ${message}`);
        return { success: false, errorCode: 'UNKNOWN', error: message, metadata: metadata() };
    } finally {
        clearTimeout(timeoutId);
    }
}

/**
 * Whether a failed ChatResult is worth leaving for a later run
 */
export function isTransientFailure(result: ChatResult): boolean {
    switch (result.errorCode) {
        case 'RATE_LIMIT':
        case 'QUOTA':
        case 'SERVER_ERROR':
        case 'TIMEOUT':
            return true;
        default:
            return false;
    }
}
