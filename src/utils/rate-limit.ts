import { PipelineAbortedError } from './errors.js';

/**
 * A gate that callers pass through before each external request.
 */
export interface RateGate {
    acquire(signal?: AbortSignal): Promise<void>;
}

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
export class TokenBucket implements RateGate {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(signal?: AbortSignal): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        // Reserve the token now so concurrent callers queue behind each other
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        this.tokens -= 1;
        await sleep(waitMs, signal);
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

/**
 * Enforces a minimum delay between consecutive passes.
 * Used where a single external quota must be consumed strictly serially.
 */
export class IntervalGate implements RateGate {
    private nextAllowedAt = 0;

    constructor(private readonly minIntervalMs: number) {}

    async acquire(signal?: AbortSignal): Promise<void> {
        const now = Date.now();
        const startAt = Math.max(now, this.nextAllowedAt);
        this.nextAllowedAt = startAt + this.minIntervalMs;
        if (startAt > now) {
            await sleep(startAt - now, signal);
        }
    }
}

/**
 * Sleep for the specified number of milliseconds.
 * Rejects with `PipelineAbortedError` if the signal fires first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
        return Promise.reject(new PipelineAbortedError());
    }
    return new Promise((resolve, reject) => {
        const onAbort = () => {
            clearTimeout(timer);
            reject(new PipelineAbortedError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
