import type { GemRadarConfig, ListingSource, SeedPoint } from '../types/index.js';
import type { CheckpointStore } from '../storage/checkpoint-store.js';
import { collectSeeds, type CollectionReport } from '../collector/collector.js';
import { generateSeedPoints } from '../collector/seeds.js';

export interface CollectionDeps {
    source: ListingSource;
    store: CheckpointStore;
    signal?: AbortSignal;
    /** Pre-computed seed set; generated from `config.seeds` when absent */
    seeds?: SeedPoint[];
}

export interface CollectionRun {
    seeds: SeedPoint[];
    report: CollectionReport;
}

/**
 * Generate the seed set and sweep it into the checkpoint store.
 */
export async function runCollection(config: GemRadarConfig, deps: CollectionDeps): Promise<CollectionRun> {
    const seeds = deps.seeds ?? generateSeedPoints(config.seeds);
    const { collector } = config;

    const report = await collectSeeds(seeds, deps.source, deps.store, {
        radiusM: collector.radiusM,
        concurrency: collector.concurrency,
        requestsPerSecond: collector.requestsPerSecond,
        maxPagesPerSeed: collector.maxPagesPerSeed,
        retry: collector.retry,
        retryFailed: collector.retryFailed,
        limit: collector.limit,
        signal: deps.signal,
    });

    return { seeds, report };
}
