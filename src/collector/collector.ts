import pLimit from 'p-limit';
import type { ListingSource, RetryPolicy, SeedPoint } from '../types/index.js';
import type { CheckpointStore } from '../storage/checkpoint-store.js';
import { classifySourceError, toRawEntity } from '../sources/utils.js';
import { PersistentSourceError, PipelineAbortedError, TransientSourceError, errorMessage, throwIfAborted } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { TokenBucket, type RateGate } from '../utils/rate-limit.js';
import { withRetry } from '../utils/retry.js';

export interface CollectOptions {
    radiusM: number;
    concurrency: number;
    /** Aggregate request rate across all workers */
    requestsPerSecond: number;
    maxPagesPerSeed: number;
    retry: RetryPolicy;
    /** Re-attempt seeds marked failed by an earlier run */
    retryFailed: boolean;
    /** Stop after this many seeds */
    limit?: number;
    signal?: AbortSignal;
    /** Shared request gate; defaults to a token bucket at `requestsPerSecond` */
    gate?: RateGate;
    /** Clock for `collectedAt` */
    now?: () => Date;
}

export interface CollectionReport {
    total: number;
    skipped: number;
    completed: number;
    failed: number;
    entities: number;
    aborted: boolean;
}

type SeedOutcome =
    | { status: 'completed'; entities: number }
    | { status: 'failed' }
    | { status: 'aborted' };

/**
 * Sweep the seed points that are not yet checkpointed.
 *
 * Workers claim whole seed points. Each page is staged as it arrives and the
 * last page commits the seed, so an interrupted or failed seed leaves nothing
 * visible. Transient source errors are retried per page; a seed whose
 * retries run out, or that fails persistently, is marked failed and the sweep
 * moves on. Cancellation is observed between pages and between seeds.
 */
export async function collectSeeds(
    seeds: readonly SeedPoint[],
    source: ListingSource,
    store: CheckpointStore,
    options: CollectOptions
): Promise<CollectionReport> {
    const logger = getLogger();
    const { signal } = options;
    const now = options.now ?? (() => new Date());
    const gate =
        options.gate ?? new TokenBucket(options.requestsPerSecond, Math.max(1, Math.ceil(options.requestsPerSecond)));

    store.discardStaged();

    const eligible = seeds.filter((seed) => !store.has(seed.index) && (options.retryFailed || !store.isFailed(seed.index)));
    const pending = options.limit !== undefined ? eligible.slice(0, options.limit) : eligible;

    const report: CollectionReport = {
        total: seeds.length,
        skipped: seeds.length - eligible.length,
        completed: 0,
        failed: 0,
        entities: 0,
        aborted: false,
    };

    logger.info(
        { seeds: seeds.length, pending: pending.length, skipped: report.skipped, source: source.name },
        'Starting collection sweep'
    );

    const collectOne = async (seed: SeedPoint): Promise<SeedOutcome> => {
        if (signal?.aborted) return { status: 'aborted' };

        let attempts = 0;
        let entities = 0;
        let pageToken: string | undefined;

        try {
            for (let page = 0; page < options.maxPagesPerSeed; page++) {
                throwIfAborted(signal);

                const { value } = await withRetry(
                    async () => {
                        attempts++;
                        await gate.acquire(signal);
                        try {
                            return await source.fetchPage(seed, options.radiusM, pageToken, signal);
                        } catch (error) {
                            throw classifySourceError(error, seed.index, source.name);
                        }
                    },
                    options.retry,
                    (error) => error instanceof TransientSourceError,
                    signal
                );

                pageToken = value.nextPageToken;
                const last = !pageToken || page + 1 >= options.maxPagesPerSeed;
                const collectedAt = now().toISOString();
                const raw = value.listings.map((listing) => toRawEntity(listing, seed, collectedAt));

                if (!store.append(seed.index, raw, last)) {
                    logger.debug({ seed: seed.index }, 'Seed already complete, skipping');
                    return { status: 'completed', entities: 0 };
                }
                entities += raw.length;
                if (last) break;
            }
            return { status: 'completed', entities };
        } catch (error) {
            if (error instanceof PipelineAbortedError) {
                store.discardStaged(seed.index);
                return { status: 'aborted' };
            }
            if (!(error instanceof TransientSourceError) && !(error instanceof PersistentSourceError)) {
                throw error;
            }
            store.markFailed(seed.index, errorMessage(error), Math.max(1, attempts));
            logger.warn({ seed: seed.index, attempts, error: errorMessage(error) }, 'Seed point failed, continuing sweep');
            return { status: 'failed' };
        }
    };

    const limit = pLimit(Math.max(1, options.concurrency));
    let done = 0;
    const outcomes = await Promise.all(
        pending.map((seed) =>
            limit(async () => {
                const outcome = await collectOne(seed);
                done++;
                if (done % 50 === 0) {
                    logger.info({ done, of: pending.length }, 'Collection progress');
                }
                return outcome;
            })
        )
    );

    for (const outcome of outcomes) {
        if (outcome.status === 'completed') {
            report.completed++;
            report.entities += outcome.entities;
        } else if (outcome.status === 'failed') {
            report.failed++;
        }
    }
    report.aborted = signal?.aborted ?? false;

    if (report.aborted) {
        logger.warn({ ...report }, 'Collection aborted, in-flight seeds discarded');
    } else {
        logger.info({ ...report }, 'Collection sweep complete');
    }
    return report;
}
