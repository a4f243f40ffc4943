/**
 * Rate Limiter for outbound AI calls
 *
 * Sliding window: at most `maxCalls` acquisitions within any `windowMs`
 * interval. SiliconFlow free tier: 10 calls per minute.
 *
 * acquire() calls are serialized through a promise chain, so concurrent
 * workers are granted slots in the order they asked.
 */

import { getAiRateLimitPerMinute } from '@/lib/config/env';
import { sleep } from '@/lib/shared/concurrency';

export class RateLimiter {
    private readonly calls: number[] = [];
    private queue: Promise<void> = Promise.resolve();
    private readonly maxCalls: number;
    private readonly windowMs: number;

    constructor(maxCalls: number = 10, windowMs: number = 60_000) {
        this.maxCalls = Math.max(1, maxCalls);
        this.windowMs = windowMs;
    }

    /**
     * Drops call timestamps that have left the window
     */
    private prune(now: number): void {
        while (this.calls.length > 0 && now - this.calls[0] >= this.windowMs) {
            this.calls.shift();
        }
    }

    /**
     * Attempts to take a slot without waiting
     * @returns true if a slot was taken, false if the window is full
     */
    tryAcquire(): boolean {
        const now = Date.now();
        this.prune(now);

        if (this.calls.length < this.maxCalls) {
            this.calls.push(now);
            return true;
        }

        return false;
    }

    /**
     * Waits until a slot is free, then takes it
     */
    acquire(): Promise<void> {
        const granted = this.queue.then(() => this.waitForSlot());
        this.queue = granted;
        return granted;
    }

    private async waitForSlot(): Promise<void> {
        while (!this.tryAcquire()) {
            const waitMs = this.getWaitTime();
            console.log(`[RateLimiter] Window full (${this.maxCalls}/${this.windowMs}ms), waiting ${waitMs}ms`);
            await sleep(waitMs);
        }
    }

    /**
     * Milliseconds until the oldest call leaves the window (0 if a slot is free)
     */
    getWaitTime(): number {
        const now = Date.now();
        this.prune(now);

        if (this.calls.length < this.maxCalls) {
            return 0;
        }

        return Math.max(0, this.calls[0] + this.windowMs - now);
    }

    getCallsInWindow(): number {
        this.prune(Date.now());
        return this.calls.length;
    }

    reset(): void {
        this.calls.length = 0;
        this.queue = Promise.resolve();
    }
}

// Singleton shared by every AI caller in the process
let globalRateLimiter: RateLimiter | null = null;

export function getGlobalRateLimiter(callsPerMinute: number = getAiRateLimitPerMinute()): RateLimiter {
    if (!globalRateLimiter) {
        globalRateLimiter = new RateLimiter(callsPerMinute, 60_000);
    }
    return globalRateLimiter;
}

export function resetGlobalRateLimiter(): void {
    globalRateLimiter = null;
}
