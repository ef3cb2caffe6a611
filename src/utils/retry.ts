import type { RetryPolicy } from '../types/index.js';
import { getLogger } from './logger.js';
import { sleep } from './rate-limit.js';

/**
 * Exponential backoff with jitter, capped at `maxBackoffMs`.
 * `attempt` is zero-based (the delay before the second try is attempt 0).
 */
export function calculateBackoff(
    attempt: number,
    policy: Pick<RetryPolicy, 'initialBackoffMs' | 'maxBackoffMs'>,
    random: () => number = Math.random
): number {
    const exponential = policy.initialBackoffMs * Math.pow(2, attempt);
    const jitter = random() * exponential * 0.5;
    return Math.min(policy.maxBackoffMs, exponential + jitter);
}

/**
 * Run `fn` until it succeeds, the error is not retryable, or the policy's
 * attempts are spent. The last error is rethrown.
 *
 * @param isRetryable - Decides whether a thrown value warrants another try
 * @returns The value and the number of attempts it took
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    isRetryable: (error: unknown) => boolean,
    signal?: AbortSignal
): Promise<{ value: T; attempts: number }> {
    const maxAttempts = Math.max(1, policy.maxAttempts);

    for (let attempt = 0; ; attempt++) {
        try {
            const value = await fn(attempt);
            return { value, attempts: attempt + 1 };
        } catch (error) {
            if (!isRetryable(error) || attempt + 1 >= maxAttempts) {
                throw error;
            }
            const backoffMs = calculateBackoff(attempt, policy);
            getLogger().warn(
                { attempt: attempt + 1, maxAttempts, backoffMs, error: error instanceof Error ? error.message : String(error) },
                'Retryable failure, backing off'
            );
            await sleep(backoffMs, signal);
        }
    }
}
