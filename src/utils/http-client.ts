import type { RetryPolicy } from '../types/index.js';
import { getLogger } from './logger.js';
import { PipelineAbortedError } from './errors.js';
import { TokenBucket, sleep } from './rate-limit.js';
import { calculateBackoff } from './retry.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * Per-source rate limit configurations.
 */
const RATE_LIMITS: Record<string, { tokensPerSecond: number; maxBurst: number }> = {
    places: { tokensPerSecond: 5, maxBurst: 5 },
    openai: { tokensPerSecond: 5, maxBurst: 5 },
    ollama: { tokensPerSecond: 100, maxBurst: 100 },   // Local, effectively unlimited
    default: { tokensPerSecond: 5, maxBurst: 5 },
};

const DEFAULT_RETRY: RetryPolicy = {
    maxAttempts: 4,
    initialBackoffMs: 1000,
    maxBackoffMs: 30000,
};

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
    headers?: Record<string, string>;
    body?: string | object;
    timeout?: number;
    source?: string;  // For per-source rate limiting
    signal?: AbortSignal;
}

/**
 * HTTP response wrapper. The body is left `unknown` for callers to validate.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    data: unknown;
    ok: boolean;
}

/**
 * HTTP error with classification.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    retry?: RetryPolicy;
}

/**
 * Centralized HTTP client with per-source rate limiting and retry logic.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly retry: RetryPolicy;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        const version = options?.version ?? '1.0.0';
        this.userAgent = `GemRadar/${version}`;
        this.retry = options?.retry ?? DEFAULT_RETRY;
    }

    /**
     * Make an HTTP request with rate limiting and retry.
     */
    async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const {
            method = 'GET',
            headers = {},
            body,
            timeout = this.defaultTimeout,
            source = 'default',
            signal,
        } = options;

        // Acquire rate limit token
        await this.getBucket(source).acquire(signal);

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        let requestBody: string | undefined;
        if (body) {
            if (typeof body === 'object') {
                requestBody = JSON.stringify(body);
                requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/json';
            } else {
                requestBody = body;
            }
        }

        const maxRetries = Math.max(0, this.retry.maxAttempts - 1);

        for (let attempt = 0; attempt <= maxRetries; attempt++) {
            if (signal?.aborted) throw new PipelineAbortedError();

            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeout);
            const forwardAbort = () => controller.abort();
            signal?.addEventListener('abort', forwardAbort, { once: true });

            try {
                const response = await fetch(url, {
                    method,
                    headers: requestHeaders,
                    body: requestBody,
                    signal: controller.signal,
                });

                const contentType = response.headers.get('content-type') ?? '';
                const data: unknown = contentType.includes('application/json')
                    ? await response.json()
                    : await response.text();

                const responseHeaders: Record<string, string> = {};
                response.headers.forEach((value, key) => {
                    responseHeaders[key] = value;
                });

                if (!response.ok) {
                    const retryable = RETRYABLE_STATUS_CODES.has(response.status);

                    if (retryable && attempt < maxRetries) {
                        const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
                        const backoff = retryAfter ?? calculateBackoff(attempt, this.retry);

                        getLogger().warn(
                            { status: response.status, attempt: attempt + 1, backoffMs: backoff, url },
                            `Retryable HTTP error, backing off`
                        );
                        await sleep(backoff, signal);
                        continue;
                    }

                    throw new HttpError(
                        `HTTP ${response.status}: ${response.statusText}`,
                        response.status,
                        retryable,
                        data
                    );
                }

                return { status: response.status, headers: responseHeaders, data, ok: true };
            } catch (error) {
                if (error instanceof HttpError || error instanceof PipelineAbortedError) throw error;
                if (signal?.aborted) throw new PipelineAbortedError();

                const code = errorCode(error);
                const retryable = code ? RETRYABLE_ERROR_CODES.has(code) : false;

                if (retryable && attempt < maxRetries) {
                    const backoff = calculateBackoff(attempt, this.retry);
                    getLogger().warn(
                        { errorCode: code, attempt: attempt + 1, backoffMs: backoff, url },
                        `Retryable network error, backing off`
                    );
                    await sleep(backoff, signal);
                    continue;
                }

                if (error instanceof Error && error.name === 'AbortError') {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
                }

                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    retryable
                );
            } finally {
                clearTimeout(timeoutId);
                signal?.removeEventListener('abort', forwardAbort);
            }
        }

        throw new HttpError(`Max retries exceeded for ${url}`, 0, true);
    }

    /**
     * Convenience method for POST requests.
     */
    async post(url: string, body: string | object, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'POST', body });
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = RATE_LIMITS[source] ?? RATE_LIMITS['default'] ?? { tokensPerSecond: 5, maxBurst: 5 };
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }

    private parseRetryAfter(header: string | null): number | null {
        if (!header) return null;

        // Try parsing as seconds
        const seconds = parseInt(header, 10);
        if (!isNaN(seconds)) return seconds * 1000;

        // Try parsing as HTTP date
        const date = new Date(header);
        if (!isNaN(date.getTime())) {
            return Math.max(0, date.getTime() - Date.now());
        }

        return null;
    }
}

/**
 * Pull a network error code from a fetch failure (undici nests it in `cause`).
 */
function errorCode(error: unknown): string | undefined {
    for (const candidate of [error, error instanceof Error ? error.cause : undefined]) {
        if (typeof candidate === 'object' && candidate !== null && 'code' in candidate && typeof candidate.code === 'string') {
            return candidate.code;
        }
    }
    return undefined;
}

/**
 * Singleton HTTP client instance.
 */
let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client instance.
 */
export function getHttpClient(options?: HttpClientOptions): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}

/**
 * Create a new HTTP client (for testing or custom configuration).
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
